/**
 * Startup wiring
 *
 * Builds the client, sources, sinks and poller from an AppConfig, and registers
 * signal handlers for a graceful stop.
 */

import type { AppConfig } from "../../config/env";
import { CoinGlassClient } from "../api/coinglass/client";
import { MarketPriceClient } from "../api/market-price/client";
import { FanOutSink } from "../notifications/core/fan-out-sink";
import type { LogTransport } from "../notifications/core/types";
import { createGoogleSheetsApi, GoogleSheetsTransport, type SheetsApi } from "../notifications/log/google-sheets-transport";
import { WebhookLogTransport } from "../notifications/log/webhook-transport";
import { TelegramAlertChannel } from "../notifications/telegram/notification-service";
import { EventSource } from "../pipeline/types";
import { OrderbookFillSource } from "../sources/orderbook-fill-source";
import { createPacing, type SourceAdapter } from "../sources/types";
import { WalletPositionSource } from "../sources/wallet-position-source";
import { TelegramBotClient } from "../telegram/bot";
import { serviceLoggers, type Logger } from "../utils/logger";
import { WhaleAlertPoller } from "./whale-alert-poller";

export interface AppServices {
  client: CoinGlassClient;
  /** Null when PRICE_LOOKUP is off */
  priceClient: MarketPriceClient | null;
  adapters: SourceAdapter[];
  notification: TelegramAlertChannel;
  sink: FanOutSink;
  poller: WhaleAlertPoller;
}

export interface BuildServicesOptions {
  /** Process start, used for the freshness gate (default: now) */
  startedAt?: Date;
  /** Sheets API override (default: googleapis with the service account key file) */
  sheetsApi?: SheetsApi;
}

/**
 * Primary and fallback log transports for the configuration
 */
export function buildLogTransports(
  config: AppConfig,
  sheetsApi?: SheetsApi
): { primaryLog?: LogTransport; fallbackLog?: LogTransport } {
  let primaryLog: LogTransport | undefined;
  const { spreadsheetId, serviceAccountKeyFile, tabName } = config.sheets;
  if (spreadsheetId) {
    const api = sheetsApi ?? (serviceAccountKeyFile ? createGoogleSheetsApi(serviceAccountKeyFile) : undefined);
    if (api) {
      primaryLog = new GoogleSheetsTransport({ api, spreadsheetId, tabName });
    }
  }

  const fallbackLog = config.webhookUrl
    ? new WebhookLogTransport({ url: config.webhookUrl, timeout: config.coinglass.timeoutMs })
    : undefined;

  return { primaryLog, fallbackLog };
}

/**
 * Build the whole pipeline from configuration
 */
export function buildServices(config: AppConfig, options: BuildServicesOptions = {}): AppServices {
  const client = new CoinGlassClient({
    apiKey: config.coinglass.apiKey,
    hosts: config.coinglass.hosts,
    timeout: config.coinglass.timeoutMs,
  });

  const pace = createPacing(config.requestPacingMs);
  const adapters: SourceAdapter[] = [];
  if (config.thresholds.enabledSources.has(EventSource.WALLET_POSITION)) {
    adapters.push(new WalletPositionSource({ client, watchCoins: config.watchCoins }));
  }
  if (config.thresholds.enabledSources.has(EventSource.ORDERBOOK_FILL)) {
    adapters.push(
      new OrderbookFillSource({
        client,
        watchCoins: config.watchCoins,
        exchanges: config.orderbookExchanges,
        pace,
      })
    );
  }

  const notification = new TelegramAlertChannel({
    bot: new TelegramBotClient(config.telegram.botToken),
    chatId: config.telegram.chatId,
    alertTag: config.telegram.alertTag,
  });

  const sink = new FanOutSink({ notification, ...buildLogTransports(config, options.sheetsApi) });

  const priceClient = config.marketPrice.enabled
    ? new MarketPriceClient({ timeout: config.marketPrice.timeoutMs, cooldownMs: config.marketPrice.cooldownMs })
    : null;

  const startedAt = options.startedAt ?? new Date();
  const ignoreBefore = config.allowedLagMs === null ? null : new Date(startedAt.getTime() - config.allowedLagMs);

  const poller = new WhaleAlertPoller({
    adapters,
    thresholds: config.thresholds,
    sink,
    pollIntervalMs: config.pollIntervalMs,
    dedupTtlMs: config.dedupTtlMs,
    ignoreBefore,
    priceLookup: priceClient ?? undefined,
    pace,
  });

  return { client, priceClient, adapters, notification, sink, poller };
}

/**
 * Stop the poller on SIGINT/SIGTERM; a second signal exits immediately.
 * Returns a function that removes the handlers.
 */
export function setupGracefulShutdown(
  poller: WhaleAlertPoller,
  logger: Logger = serviceLoggers.startup,
  exit: (code: number) => void = (code) => process.exit(code)
): () => void {
  let stopping = false;

  const shutdown = (signal: string): void => {
    if (stopping) {
      logger.warn(`Received ${signal} again, exiting without waiting for the current cycle`);
      exit(130);
      return;
    }
    stopping = true;
    logger.info(`Received ${signal}, stopping after the current step (send again to force exit)...`);
    poller.stop();
  };
  const onSigint = (): void => shutdown("SIGINT");
  const onSigterm = (): void => shutdown("SIGTERM");

  process.on("SIGINT", onSigint);
  process.on("SIGTERM", onSigterm);

  return () => {
    process.off("SIGINT", onSigint);
    process.off("SIGTERM", onSigterm);
  };
}
