/**
 * Orderbook Fill Source
 *
 * Reads filled large limit orders from CoinGlass, one request per
 * (exchange, watched coin) pair, and normalizes them into OrderbookFill events.
 */

import type { CoinGlassClient } from "../api/coinglass/client";
import { COINGLASS_ENDPOINTS, type LargeLimitOrder } from "../api/coinglass/types";
import { FetchError, NormalizeError, getErrorMessage } from "../pipeline/errors";
import { EventSource, type OrderbookFillEvent } from "../pipeline/types";
import { serviceLoggers, type Logger } from "../utils/logger";
import { isRecord, readNumber, readOptionalNumber, readString, readTimestamp } from "./parse";
import { noPacing, type PacingFn, type SourceAdapter } from "./types";

const SOURCE = EventSource.ORDERBOOK_FILL;

/** CoinGlass order_state for a fully filled order */
const ORDER_STATE_FILLED = 2;

const QUOTE_SUFFIXES = ["USDT", "USDC", "BUSD", "USD"];

export interface OrderbookFillSourceConfig {
  client: Pick<CoinGlassClient, "get">;
  watchCoins: string[];
  exchanges: string[];
  /** Quote asset used to build pair symbols (default: USDT) */
  quoteAsset?: string;
  /** How far back each request looks (default: 1 hour) */
  lookbackMs?: number;
  /** Wait applied between consecutive pair requests */
  pace?: PacingFn;
  clock?: () => Date;
  logger?: Logger;
}

function toLargeLimitOrder(entry: unknown, requestedExchange: string): LargeLimitOrder {
  if (!isRecord(entry)) return {};
  return {
    id: entry.id,
    exchange_name: entry.exchange_name ?? requestedExchange,
    symbol: entry.symbol,
    base_asset: entry.base_asset,
    quote_asset: entry.quote_asset,
    price: entry.price,
    start_time: entry.start_time,
    start_quantity: entry.start_quantity,
    start_usd_value: entry.start_usd_value,
    current_quantity: entry.current_quantity,
    current_usd_value: entry.current_usd_value,
    current_time: entry.current_time,
    executed_volume: entry.executed_volume,
    executed_usd_value: entry.executed_usd_value,
    trade_count: entry.trade_count,
    order_side: entry.order_side,
    order_state: entry.order_state,
    order_end_time: entry.order_end_time,
  };
}

/**
 * Base asset of a pair symbol: "BTCUSDT" -> "BTC", "ETH-USDT-SWAP" -> "ETH"
 */
export function baseAssetOf(symbol: string): string {
  const upper = symbol.toUpperCase();
  const separated = upper.split(/[-/_]/)[0];
  if (separated !== undefined && separated !== upper && separated !== "") {
    return separated;
  }
  for (const suffix of QUOTE_SUFFIXES) {
    if (upper.endsWith(suffix) && upper.length > suffix.length) {
      return upper.slice(0, -suffix.length);
    }
  }
  return upper;
}

export class OrderbookFillSource implements SourceAdapter<LargeLimitOrder> {
  public readonly source = SOURCE;
  public readonly name = "orderbook-large-fills";

  private readonly client: Pick<CoinGlassClient, "get">;
  private readonly watchCoins: string[];
  private readonly exchanges: string[];
  private readonly quoteAsset: string;
  private readonly lookbackMs: number;
  private readonly pace: PacingFn;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(config: OrderbookFillSourceConfig) {
    this.client = config.client;
    this.watchCoins = config.watchCoins.map((coin) => coin.toUpperCase());
    this.exchanges = [...config.exchanges];
    this.quoteAsset = (config.quoteAsset ?? "USDT").toUpperCase();
    this.lookbackMs = config.lookbackMs ?? 60 * 60 * 1000;
    this.pace = config.pace ?? noPacing;
    this.clock = config.clock ?? (() => new Date());
    this.logger = config.logger ?? serviceLoggers.sources;
  }

  /**
   * Fetch filled orders for every pair. A failing pair is skipped; the fetch
   * only fails when every pair failed.
   */
  async fetch(): Promise<LargeLimitOrder[]> {
    const pairs: Array<{ exchange: string; symbol: string }> = [];
    for (const exchange of this.exchanges) {
      for (const coin of this.watchCoins) {
        pairs.push({ exchange, symbol: `${coin}${this.quoteAsset}` });
      }
    }
    if (pairs.length === 0) {
      return [];
    }

    const now = this.clock().getTime();
    const items: LargeLimitOrder[] = [];
    let failures = 0;
    let lastError = "";

    for (const [index, pair] of pairs.entries()) {
      if (index > 0) {
        await this.pace();
      }

      try {
        const data = await this.client.get(COINGLASS_ENDPOINTS.LARGE_LIMIT_ORDER_HISTORY, {
          params: {
            exchange: pair.exchange,
            symbol: pair.symbol,
            start_time: now - this.lookbackMs,
            end_time: now,
            state: ORDER_STATE_FILLED,
          },
        });
        if (data === null || data === undefined) continue;
        if (!Array.isArray(data)) {
          throw new Error("response is not a list");
        }
        for (const entry of data) {
          items.push(toLargeLimitOrder(entry, pair.exchange));
        }
      } catch (error) {
        failures++;
        lastError = getErrorMessage(error);
        this.logger.warn("Orderbook pair fetch failed", {
          exchange: pair.exchange,
          symbol: pair.symbol,
          error: lastError,
        });
      }
    }

    if (failures === pairs.length) {
      throw new FetchError(SOURCE, `All ${pairs.length} orderbook requests failed: ${lastError}`);
    }

    this.logger.debug("Fetched orderbook fills", { pairs: pairs.length, failures, received: items.length });
    return items;
  }

  normalize(raw: LargeLimitOrder): OrderbookFillEvent {
    const id = readString(SOURCE, raw.id, "id");
    const exchange = readString(SOURCE, raw.exchange_name, "exchange_name");
    const symbol = readString(SOURCE, raw.symbol, "symbol");
    const asset =
      typeof raw.base_asset === "string" && raw.base_asset.trim() !== ""
        ? raw.base_asset.trim().toUpperCase()
        : baseAssetOf(symbol);

    const state = readOptionalNumber(SOURCE, raw.order_state, "order_state");
    if (state !== undefined && state !== ORDER_STATE_FILLED) {
      throw new NormalizeError(SOURCE, `Order ${id} is not filled (state ${state})`, "order_state");
    }

    const side = readNumber(SOURCE, raw.order_side, "order_side");
    let action: string;
    if (side === 1) {
      action = "Sell Fill";
    } else if (side === 2) {
      action = "Buy Fill";
    } else {
      throw new NormalizeError(SOURCE, `Unknown order_side: ${side}`, "order_side");
    }

    const price = readNumber(SOURCE, raw.price, "price");
    if (!(price > 0)) {
      throw new NormalizeError(SOURCE, `Price must be positive, got ${price}`, "price");
    }

    const size =
      readOptionalNumber(SOURCE, raw.executed_volume, "executed_volume") ??
      readOptionalNumber(SOURCE, raw.start_quantity, "start_quantity");
    if (size === undefined) {
      throw new NormalizeError(SOURCE, "Missing field executed_volume", "executed_volume");
    }
    if (size < 0) {
      throw new NormalizeError(SOURCE, `Negative size: ${size}`, "executed_volume");
    }

    const notionalUsd =
      readOptionalNumber(SOURCE, raw.executed_usd_value, "executed_usd_value") ?? size * price;
    if (notionalUsd < 0) {
      throw new NormalizeError(SOURCE, `Negative notional: ${notionalUsd}`, "executed_usd_value");
    }

    const endTime = readOptionalNumber(SOURCE, raw.order_end_time, "order_end_time");
    const occurredAt =
      endTime !== undefined
        ? readTimestamp(SOURCE, endTime, "order_end_time")
        : readTimestamp(SOURCE, raw.start_time, "start_time");

    return {
      source: SOURCE,
      asset,
      action,
      notionalUsd,
      size,
      price,
      exchange,
      occurredAt,
      rawIdentity: `orderbook:${exchange.toLowerCase()}:${id}`,
    };
  }
}

export function createOrderbookFillSource(config: OrderbookFillSourceConfig): OrderbookFillSource {
  return new OrderbookFillSource(config);
}
