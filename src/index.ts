/**
 * Whale Alert Relay
 * Library entry point
 */

export const APP_NAME = "Whale Alert Relay";
export const VERSION = "1.0.0";

export * from "./pipeline/types";
export * from "./pipeline/errors";
export { qualifies, explain, effectiveMinimum } from "./pipeline/threshold-evaluator";
export type { ThresholdDecision } from "./pipeline/threshold-evaluator";
export { Deduplicator, fingerprint } from "./pipeline/deduplicator";
export * from "./sources";
export { CoinGlassClient, CoinGlassApiException, createCoinGlassClient } from "./api/coinglass";
export { MarketPriceClient, createMarketPriceClient } from "./api/market-price";
export type { MarketPriceLookup } from "./api/market-price";
export { FanOutSink, createFanOutSink } from "./notifications/core/fan-out-sink";
export type { LogCell, LogTransport, NotificationChannel } from "./notifications/core/types";
export { LOG_HEADERS, toLogRow, toLogRecord } from "./notifications/log/row";
export { GoogleSheetsTransport, createGoogleSheetsApi } from "./notifications/log/google-sheets-transport";
export { WebhookLogTransport } from "./notifications/log/webhook-transport";
export { TelegramAlertChannel } from "./notifications/telegram/notification-service";
export { formatWhaleAlertHtml } from "./notifications/telegram/alert-formatter";
export { WhaleAlertPoller, createWhaleAlertPoller } from "./services/whale-alert-poller";
export type { CycleSummary, PollerState, WhaleAlertPollerStats } from "./services/whale-alert-poller";
export { buildServices, setupGracefulShutdown } from "./services/startup";
