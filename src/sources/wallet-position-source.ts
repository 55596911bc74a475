/**
 * Wallet Position Source
 *
 * Reads Hyperliquid whale alerts (large position opens and closes) from CoinGlass
 * and normalizes them into WalletPosition events.
 */

import type { CoinGlassClient } from "../api/coinglass/client";
import { COINGLASS_ENDPOINTS, type HyperliquidWhaleAlert } from "../api/coinglass/types";
import { FetchError, NormalizeError, getErrorMessage } from "../pipeline/errors";
import { EventSource, type WalletPositionEvent } from "../pipeline/types";
import { serviceLoggers, type Logger } from "../utils/logger";
import { isRecord, readNumber, readOptionalNumber, readString, readTimestamp } from "./parse";
import type { SourceAdapter } from "./types";

const SOURCE = EventSource.WALLET_POSITION;

const WALLET_PAGE_BASE = "https://www.coinglass.com/hyperliquid";

export interface WalletPositionSourceConfig {
  client: Pick<CoinGlassClient, "get">;
  /** Symbols to keep; empty keeps every symbol */
  watchCoins?: string[];
  logger?: Logger;
}

function toWhaleAlert(entry: unknown): HyperliquidWhaleAlert {
  if (!isRecord(entry)) return {};
  return {
    user: entry.user,
    symbol: entry.symbol,
    position_size: entry.position_size,
    entry_price: entry.entry_price,
    liq_price: entry.liq_price,
    position_value_usd: entry.position_value_usd,
    position_action: entry.position_action,
    create_time: entry.create_time,
  };
}

/**
 * Describe the position change, e.g. "Open Long" or "Close Short"
 */
export function describePositionAction(actionCode: number, signedSize: number): string {
  const verb = actionCode === 1 ? "Open" : actionCode === 2 ? "Close" : `Act${actionCode}`;
  const side = signedSize > 0 ? "Long" : signedSize < 0 ? "Short" : "Flat";
  return `${verb} ${side}`;
}

export class WalletPositionSource implements SourceAdapter<HyperliquidWhaleAlert> {
  public readonly source = SOURCE;
  public readonly name = "hyperliquid-whale-alerts";

  private readonly client: Pick<CoinGlassClient, "get">;
  private readonly watchCoins: Set<string>;
  private readonly logger: Logger;

  constructor(config: WalletPositionSourceConfig) {
    this.client = config.client;
    this.watchCoins = new Set((config.watchCoins ?? []).map((coin) => coin.toUpperCase()));
    this.logger = config.logger ?? serviceLoggers.sources;
  }

  async fetch(): Promise<HyperliquidWhaleAlert[]> {
    let data: unknown;
    try {
      data = await this.client.get(COINGLASS_ENDPOINTS.HYPERLIQUID_WHALE_ALERT);
    } catch (error) {
      throw new FetchError(SOURCE, `Hyperliquid whale alert fetch failed: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }

    if (data === null || data === undefined) {
      return [];
    }
    if (!Array.isArray(data)) {
      throw new FetchError(SOURCE, "Hyperliquid whale alert response is not a list");
    }

    const items: HyperliquidWhaleAlert[] = [];
    for (const entry of data) {
      const item = toWhaleAlert(entry);
      const symbol = typeof item.symbol === "string" ? item.symbol.toUpperCase() : undefined;
      if (this.watchCoins.size > 0 && symbol !== undefined && !this.watchCoins.has(symbol)) {
        continue;
      }
      items.push(item);
    }

    this.logger.debug("Fetched Hyperliquid whale alerts", {
      received: data.length,
      watched: items.length,
    });
    return items;
  }

  normalize(raw: HyperliquidWhaleAlert): WalletPositionEvent {
    const user = readString(SOURCE, raw.user, "user");
    const asset = readString(SOURCE, raw.symbol, "symbol").toUpperCase();
    const signedSize = readNumber(SOURCE, raw.position_size, "position_size");
    const notionalUsd = Math.abs(readNumber(SOURCE, raw.position_value_usd, "position_value_usd"));
    const createTime = readNumber(SOURCE, raw.create_time, "create_time");
    const occurredAt = readTimestamp(SOURCE, createTime, "create_time");
    const actionCode = Math.trunc(readOptionalNumber(SOURCE, raw.position_action, "position_action") ?? 0);
    const size = Math.abs(signedSize);

    const entryPrice = readOptionalNumber(SOURCE, raw.entry_price, "entry_price");
    if (entryPrice !== undefined && entryPrice < 0) {
      throw new NormalizeError(SOURCE, `Negative entry_price: ${entryPrice}`, "entry_price");
    }
    const price = entryPrice ?? (size > 0 ? notionalUsd / size : 0);
    if (!(price > 0)) {
      throw new NormalizeError(SOURCE, "Cannot determine a positive price", "entry_price");
    }

    const liquidationPrice = readOptionalNumber(SOURCE, raw.liq_price, "liq_price");

    return {
      source: SOURCE,
      asset,
      action: describePositionAction(actionCode, signedSize),
      notionalUsd,
      size,
      price,
      occurredAt,
      rawIdentity: `wallet:${user.toLowerCase()}:${asset}:${actionCode}:${createTime}`,
      link: `${WALLET_PAGE_BASE}/${user}`,
      liquidationPrice: liquidationPrice !== undefined && liquidationPrice > 0 ? liquidationPrice : undefined,
    };
  }
}

export function createWalletPositionSource(config: WalletPositionSourceConfig): WalletPositionSource {
  return new WalletPositionSource(config);
}
