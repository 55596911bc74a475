/**
 * Spot price lookup types
 */

import type { Logger } from "../../utils/logger";

/**
 * Anything that can quote a USD spot price for an asset symbol
 */
export interface MarketPriceLookup {
  /** Resolves to null when no venue returned a usable price */
  getPrice(asset: string): Promise<number | null>;
}

export interface MarketPriceClientConfig {
  binanceBaseUrl?: string;
  coinbaseBaseUrl?: string;
  /** Per-request timeout in milliseconds */
  timeout?: number;
  /** Pause between the Binance and Coinbase attempts */
  cooldownMs?: number;
  logger?: Logger;
}

export type PriceVenue = "binance" | "coinbase";

export const DEFAULT_BINANCE_BASE = "https://api.binance.com";
export const DEFAULT_COINBASE_BASE = "https://api.exchange.coinbase.com";
