/**
 * Market Price Client
 *
 * Quotes the current USD spot price of an asset: Binance `<ASSET>USDT` first,
 * then Coinbase `<ASSET>-USD` after a short cooldown. Never throws; a failed
 * lookup resolves to null.
 */

import { getErrorMessage } from "../../pipeline/errors";
import { serviceLoggers, type Logger } from "../../utils/logger";
import {
  DEFAULT_BINANCE_BASE,
  DEFAULT_COINBASE_BASE,
  type MarketPriceClientConfig,
  type MarketPriceLookup,
  type PriceVenue,
} from "./types";

const DEFAULT_TIMEOUT = 8000;
const DEFAULT_COOLDOWN_MS = 2000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toPositivePrice(value: unknown): number | null {
  const price = typeof value === "string" ? Number(value) : value;
  return typeof price === "number" && Number.isFinite(price) && price > 0 ? price : null;
}

export class MarketPriceClient implements MarketPriceLookup {
  private readonly binanceBaseUrl: string;
  private readonly coinbaseBaseUrl: string;
  private readonly timeout: number;
  private readonly cooldownMs: number;
  private readonly logger: Logger;

  constructor(config: MarketPriceClientConfig = {}) {
    this.binanceBaseUrl = (config.binanceBaseUrl ?? DEFAULT_BINANCE_BASE).replace(/\/+$/, "");
    this.coinbaseBaseUrl = (config.coinbaseBaseUrl ?? DEFAULT_COINBASE_BASE).replace(/\/+$/, "");
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT;
    this.cooldownMs = config.cooldownMs ?? DEFAULT_COOLDOWN_MS;
    this.logger = config.logger ?? serviceLoggers.prices;
  }

  async getPrice(asset: string): Promise<number | null> {
    const symbol = asset.trim().toUpperCase();
    if (symbol === "") return null;

    const binance = await this.quote(
      "binance",
      `${this.binanceBaseUrl}/api/v3/ticker/price?symbol=${encodeURIComponent(`${symbol}USDT`)}`,
      (body) => toPositivePrice(body.price)
    );
    if (binance !== null) return binance;

    if (this.cooldownMs > 0) {
      await new Promise<void>((resolve) => setTimeout(resolve, this.cooldownMs));
    }

    const coinbase = await this.quote(
      "coinbase",
      `${this.coinbaseBaseUrl}/products/${encodeURIComponent(symbol)}-USD/ticker`,
      (body) => toPositivePrice(body.price) ?? toPositivePrice(body.last)
    );
    if (coinbase === null) {
      this.logger.debug("No market price available", { asset: symbol });
    }
    return coinbase;
  }

  private async quote(
    venue: PriceVenue,
    url: string,
    pick: (body: Record<string, unknown>) => number | null
  ): Promise<number | null> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(url, {
        method: "GET",
        headers: { Accept: "application/json" },
        signal: controller.signal,
      });
      if (!response.ok) {
        this.logger.debug("Price request rejected", { venue, status: response.status });
        return null;
      }
      const body: unknown = await response.json();
      return isRecord(body) ? pick(body) : null;
    } catch (error) {
      const reason =
        error instanceof Error && error.name === "AbortError"
          ? `timed out after ${this.timeout}ms`
          : getErrorMessage(error);
      this.logger.debug("Price request failed", { venue, error: reason });
      return null;
    } finally {
      clearTimeout(timer);
    }
  }
}

export function createMarketPriceClient(config?: MarketPriceClientConfig): MarketPriceClient {
  return new MarketPriceClient(config);
}
