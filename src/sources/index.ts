export { WalletPositionSource, createWalletPositionSource, describePositionAction } from "./wallet-position-source";
export type { WalletPositionSourceConfig } from "./wallet-position-source";
export { OrderbookFillSource, createOrderbookFillSource, baseAssetOf } from "./orderbook-fill-source";
export type { OrderbookFillSourceConfig } from "./orderbook-fill-source";
export { createPacing, noPacing } from "./types";
export type { SourceAdapter, PacingFn } from "./types";
