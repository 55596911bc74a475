/**
 * CoinGlass API types
 */

import type { Logger } from "../../utils/logger";

/**
 * Configuration for the CoinGlass API client
 */
export interface CoinGlassClientConfig {
  /** Hosts tried in order; the first is the primary */
  hosts?: string[];
  /** Value of the CG-API-KEY header */
  apiKey?: string;
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Attempts per host before failing over to the next one */
  attemptsPerHost?: number;
  /** Receives failover warnings (default: the CoinGlass service logger) */
  logger?: Logger;
}

/**
 * Options for individual requests
 */
export interface CoinGlassRequestOptions {
  /** Query string parameters */
  params?: Record<string, string | number | undefined>;
  /** Request timeout override */
  timeout?: number;
}

/**
 * Response envelope returned by every CoinGlass endpoint
 */
export interface CoinGlassEnvelope<T> {
  /** "0" on success */
  code?: unknown;
  msg?: unknown;
  data?: T;
}

/**
 * API error details
 */
export interface CoinGlassApiError {
  message: string;
  statusCode: number;
  code?: string;
  host?: string;
}

/**
 * Item of /api/hyperliquid/whale-alert.
 *
 * Fields are kept as received (numbers may arrive as numeric strings) and
 * validated during normalization.
 */
export interface HyperliquidWhaleAlert {
  user?: unknown;
  symbol?: unknown;
  /** Signed position size: positive long, negative short */
  position_size?: unknown;
  entry_price?: unknown;
  liq_price?: unknown;
  position_value_usd?: unknown;
  /** 1 = open, 2 = close */
  position_action?: unknown;
  /** Execution time in milliseconds */
  create_time?: unknown;
}

/**
 * Item of /api/futures/orderbook/large-limit-order-history, unvalidated
 */
export interface LargeLimitOrder {
  id?: unknown;
  exchange_name?: unknown;
  symbol?: unknown;
  base_asset?: unknown;
  quote_asset?: unknown;
  price?: unknown;
  start_time?: unknown;
  start_quantity?: unknown;
  start_usd_value?: unknown;
  current_quantity?: unknown;
  current_usd_value?: unknown;
  current_time?: unknown;
  executed_volume?: unknown;
  executed_usd_value?: unknown;
  trade_count?: unknown;
  /** 1 = sell (ask), 2 = buy (bid) */
  order_side?: unknown;
  /** 1 = open, 2 = filled, 3 = revoked */
  order_state?: unknown;
  order_end_time?: unknown;
}

export const COINGLASS_ENDPOINTS = {
  HYPERLIQUID_WHALE_ALERT: "/api/hyperliquid/whale-alert",
  LARGE_LIMIT_ORDER_HISTORY: "/api/futures/orderbook/large-limit-order-history",
} as const;

export const DEFAULT_COINGLASS_HOSTS = [
  "https://open-api-v4.coinglass.com",
  "https://open-api.coinglass.com",
];
