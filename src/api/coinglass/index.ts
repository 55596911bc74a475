/**
 * CoinGlass API module
 */

export { CoinGlassClient, CoinGlassApiException, createCoinGlassClient } from "./client";
export { COINGLASS_ENDPOINTS, DEFAULT_COINGLASS_HOSTS } from "./types";
export type {
  CoinGlassClientConfig,
  CoinGlassRequestOptions,
  CoinGlassEnvelope,
  CoinGlassApiError,
  HyperliquidWhaleAlert,
  LargeLimitOrder,
} from "./types";
