/**
 * Market price module
 */

export { MarketPriceClient, createMarketPriceClient } from "./client";
export { DEFAULT_BINANCE_BASE, DEFAULT_COINBASE_BASE } from "./types";
export type { MarketPriceClientConfig, MarketPriceLookup, PriceVenue } from "./types";
