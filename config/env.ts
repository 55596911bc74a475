import dotenv from "dotenv";
import { ConfigError } from "../src/pipeline/errors";
import { ALL_EVENT_SOURCES, EventSource, type ThresholdConfig } from "../src/pipeline/types";
import { DEFAULT_COINGLASS_HOSTS } from "../src/api/coinglass/types";

// Load environment variables from .env file
dotenv.config();

/**
 * Environment configuration with type safety and validation.
 *
 * Everything is read once by loadConfig() at startup; the resulting object is
 * frozen and passed to each component.
 */

type EnvSource = Record<string, string | undefined>;

export const DEFAULT_WATCH_COINS = ["BTC", "ETH", "SOL", "XRP", "DOGE", "LINK"];
export const DEFAULT_ORDERBOOK_EXCHANGES = ["Binance", "OKX", "Bybit"];

const SOURCE_ALIASES: Record<string, EventSource> = {
  wallet: EventSource.WALLET_POSITION,
  walletposition: EventSource.WALLET_POSITION,
  hyperliquid: EventSource.WALLET_POSITION,
  orderbook: EventSource.ORDERBOOK_FILL,
  orderbookfill: EventSource.ORDERBOOK_FILL,
};

const PER_ASSET_PREFIX = "MIN_NOTIONAL_";

/**
 * Full application configuration
 */
export interface AppConfig {
  nodeEnv: string;
  coinglass: {
    apiKey: string;
    hosts: string[];
    timeoutMs: number;
  };
  watchCoins: string[];
  /** Exchanges queried for orderbook fills */
  orderbookExchanges: string[];
  thresholds: ThresholdConfig;
  pollIntervalMs: number;
  dedupTtlMs: number;
  /** Events older than process start minus this lag are ignored; null disables the gate */
  allowedLagMs: number | null;
  requestPacingMs: number;
  telegram: {
    botToken?: string;
    chatId?: string;
    alertTag?: string;
  };
  sheets: {
    spreadsheetId?: string;
    tabName: string;
    serviceAccountKeyFile?: string;
  };
  webhookUrl?: string;
  marketPrice: {
    /** Attach a spot price to each alert before delivery */
    enabled: boolean;
    timeoutMs: number;
    /** Pause between the primary and secondary price venue */
    cooldownMs: number;
  };
}

/**
 * Validates that a URL string is properly formatted
 */
function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}

/**
 * Get a required environment variable
 */
function getEnvVar(source: EnvSource, key: string, defaultValue?: string): string {
  const value = source[key];
  if (value === undefined || value.trim() === "") {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ConfigError(`Missing required environment variable: ${key}`, [key]);
  }
  return value.trim();
}

/**
 * Get an optional environment variable (empty counts as unset)
 */
function getEnvVarOptional(source: EnvSource, key: string): string | undefined {
  const value = source[key]?.trim();
  return value === undefined || value === "" ? undefined : value;
}

/**
 * Get an optional URL environment variable with validation
 */
function getEnvVarUrlOptional(source: EnvSource, key: string): string | undefined {
  const value = getEnvVarOptional(source, key);
  if (value === undefined) {
    return undefined;
  }
  if (!isValidUrl(value)) {
    throw new ConfigError(`Environment variable ${key} must be a valid URL, got: ${value}`, [key]);
  }
  return value;
}

/**
 * Get an environment variable as a boolean
 */
function getEnvVarAsBoolean(source: EnvSource, key: string, defaultValue: boolean): boolean {
  const value = getEnvVarOptional(source, key)?.toLowerCase();
  if (value === undefined) {
    return defaultValue;
  }
  if (["true", "1", "yes", "on"].includes(value)) return true;
  if (["false", "0", "no", "off"].includes(value)) return false;
  throw new ConfigError(`Environment variable ${key} must be a boolean, got: ${value}`, [key]);
}

/**
 * Get an environment variable as a number (decimals allowed)
 */
function getEnvVarAsNumber(source: EnvSource, key: string, defaultValue: number): number {
  const value = getEnvVarOptional(source, key);
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = Number(value.replace(/_/g, ""));
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`Environment variable ${key} must be a number, got: ${value}`, [key]);
  }
  return parsed;
}

/**
 * Parse a comma-separated list of values
 */
function getEnvVarAsList(source: EnvSource, key: string, defaultValue: string[] = []): string[] {
  const value = getEnvVarOptional(source, key);
  if (value === undefined) {
    return defaultValue;
  }
  return value.split(",").map((item) => item.trim()).filter((item) => item !== "");
}

/**
 * Parse the SOURCES list into source kinds
 */
function parseSources(source: EnvSource): Set<EventSource> {
  const names = getEnvVarAsList(source, "SOURCES");
  if (names.length === 0) {
    return new Set(ALL_EVENT_SOURCES);
  }
  const result = new Set<EventSource>();
  for (const name of names) {
    const kind = SOURCE_ALIASES[name.toLowerCase().replace(/[^a-z]/g, "")];
    if (kind === undefined) {
      throw new ConfigError(
        `Unknown source "${name}" in SOURCES (expected wallet and/or orderbook)`,
        ["SOURCES"]
      );
    }
    result.add(kind);
  }
  return result;
}

/**
 * Collect MIN_NOTIONAL_<ASSET> overrides
 */
function parsePerAssetThresholds(source: EnvSource): Record<string, number> {
  const result: Record<string, number> = {};
  for (const key of Object.keys(source)) {
    if (!key.startsWith(PER_ASSET_PREFIX) || key === "MIN_NOTIONAL_USD") continue;
    const asset = key.slice(PER_ASSET_PREFIX.length).toUpperCase();
    if (asset === "" || getEnvVarOptional(source, key) === undefined) continue;
    const minimum = getEnvVarAsNumber(source, key, 0);
    if (minimum < 0) {
      throw new ConfigError(`Environment variable ${key} must not be negative`, [key]);
    }
    result[asset] = minimum;
  }
  return result;
}

/**
 * Redact sensitive values for logging
 */
function redactSecret(value: string | undefined): string {
  if (value === undefined || value === "") {
    return "(not set)";
  }
  if (value.length <= 8) {
    return "****";
  }
  return `${value.substring(0, 4)}****${value.substring(value.length - 4)}`;
}

/**
 * Build the application configuration.
 *
 * @throws ConfigError when a required value is missing or malformed
 */
export function loadConfig(source: EnvSource = process.env): AppConfig {
  const apiKey = getEnvVar(source, "COINGLASS_API_KEY");

  const hosts = [
    getEnvVarUrlOptional(source, "COINGLASS_BASE") ?? DEFAULT_COINGLASS_HOSTS[0],
    getEnvVarUrlOptional(source, "COINGLASS_FALLBACK_BASE") ?? DEFAULT_COINGLASS_HOSTS[1],
  ].filter((host): host is string => host !== undefined);

  const globalMinUsd = getEnvVarAsNumber(source, "MIN_NOTIONAL_USD", 1_000_000);
  if (globalMinUsd < 0) {
    throw new ConfigError("MIN_NOTIONAL_USD must not be negative", ["MIN_NOTIONAL_USD"]);
  }

  const intervalS = getEnvVarAsNumber(source, "INTERVAL_S", 30);
  if (intervalS <= 0) {
    throw new ConfigError("INTERVAL_S must be greater than 0", ["INTERVAL_S"]);
  }

  const pacingMs = getEnvVarAsNumber(source, "REQUEST_PACING_MS", 1000);
  if (pacingMs < 0) {
    throw new ConfigError("REQUEST_PACING_MS must not be negative", ["REQUEST_PACING_MS"]);
  }

  const timeoutMs = getEnvVarAsNumber(source, "REQUEST_TIMEOUT_MS", 20000);
  if (timeoutMs <= 0) {
    throw new ConfigError("REQUEST_TIMEOUT_MS must be greater than 0", ["REQUEST_TIMEOUT_MS"]);
  }

  const allowedLagS = getEnvVarAsNumber(source, "ALLOWED_LAG_S", 120);

  const priceTimeoutS = getEnvVarAsNumber(source, "PRICE_POLL_TIMEOUT_S", 8);
  if (priceTimeoutS <= 0) {
    throw new ConfigError("PRICE_POLL_TIMEOUT_S must be greater than 0", ["PRICE_POLL_TIMEOUT_S"]);
  }
  const priceCooldownS = getEnvVarAsNumber(source, "PRICE_COOLDOWN_S", 2);
  if (priceCooldownS < 0) {
    throw new ConfigError("PRICE_COOLDOWN_S must not be negative", ["PRICE_COOLDOWN_S"]);
  }
  const enabledExchanges = getEnvVarAsList(source, "EXCHANGES");
  const spreadsheetId = getEnvVarOptional(source, "GOOGLE_SHEETS_ID");
  const serviceAccountKeyFile = getEnvVarOptional(source, "GOOGLE_SA_JSON");

  if (spreadsheetId && !serviceAccountKeyFile) {
    throw new ConfigError("GOOGLE_SHEETS_ID is set but GOOGLE_SA_JSON is missing", [
      "GOOGLE_SHEETS_ID",
      "GOOGLE_SA_JSON",
    ]);
  }

  const config: AppConfig = {
    nodeEnv: getEnvVar(source, "NODE_ENV", "development"),
    coinglass: { apiKey, hosts, timeoutMs },
    watchCoins: getEnvVarAsList(source, "WATCH_COINS", DEFAULT_WATCH_COINS).map((coin) =>
      coin.toUpperCase()
    ),
    orderbookExchanges:
      enabledExchanges.length > 0
        ? enabledExchanges
        : getEnvVarAsList(source, "ORDERBOOK_EXCHANGES", DEFAULT_ORDERBOOK_EXCHANGES),
    thresholds: Object.freeze({
      globalMinUsd,
      perAssetMinUsd: Object.freeze(parsePerAssetThresholds(source)),
      enabledSources: parseSources(source),
      enabledExchanges: new Set(enabledExchanges),
    }),
    pollIntervalMs: intervalS * 1000,
    dedupTtlMs: getEnvVarAsNumber(source, "DEDUP_TTL_MIN", 180) * 60 * 1000,
    allowedLagMs: allowedLagS < 0 ? null : allowedLagS * 1000,
    requestPacingMs: pacingMs,
    telegram: {
      botToken: getEnvVarOptional(source, "TELEGRAM_BOT_TOKEN"),
      chatId: getEnvVarOptional(source, "TELEGRAM_CHAT_ID") ?? getEnvVarOptional(source, "TELEGRAM_CHANNEL"),
      alertTag: getEnvVarOptional(source, "ALERT_TAG"),
    },
    sheets: {
      spreadsheetId,
      tabName: getEnvVar(source, "GOOGLE_SHEETS_TAB", "Alerts"),
      serviceAccountKeyFile,
    },
    webhookUrl: getEnvVarUrlOptional(source, "GSHEET_WEBHOOK_URL"),
    marketPrice: {
      enabled: getEnvVarAsBoolean(source, "PRICE_LOOKUP", true),
      timeoutMs: priceTimeoutS * 1000,
      cooldownMs: priceCooldownS * 1000,
    },
  };

  return Object.freeze(config);
}

/**
 * Log the current configuration (with sensitive values redacted)
 */
export function logConfig(
  config: AppConfig,
  print: (line: string) => void = (line) => console.log(line)
): void {
  const thresholds = config.watchCoins
    .map((coin) => `${coin}:${config.thresholds.perAssetMinUsd[coin] ?? config.thresholds.globalMinUsd}`)
    .join(", ");

  const summary: Record<string, string | number> = {
    NODE_ENV: config.nodeEnv,
    COINGLASS_API_KEY: redactSecret(config.coinglass.apiKey),
    COINGLASS_HOSTS: config.coinglass.hosts.join(", "),
    WATCH_COINS: config.watchCoins.join(", "),
    SOURCES: [...config.thresholds.enabledSources].join(", "),
    EXCHANGES: config.thresholds.enabledExchanges.size > 0
      ? [...config.thresholds.enabledExchanges].join(", ")
      : "(any)",
    ORDERBOOK_EXCHANGES: config.orderbookExchanges.join(", "),
    MIN_NOTIONAL_USD: config.thresholds.globalMinUsd,
    PER_COIN_THRESHOLDS: thresholds,
    INTERVAL_S: config.pollIntervalMs / 1000,
    DEDUP_TTL_MIN: config.dedupTtlMs / 60000,
    ALLOWED_LAG_S: config.allowedLagMs === null ? "(disabled)" : config.allowedLagMs / 1000,
    REQUEST_PACING_MS: config.requestPacingMs,
    TELEGRAM_BOT_TOKEN: redactSecret(config.telegram.botToken),
    TELEGRAM_CHAT_ID: config.telegram.chatId ?? "(not set)",
    GOOGLE_SHEETS_ID: config.sheets.spreadsheetId ?? "(not set)",
    GOOGLE_SHEETS_TAB: config.sheets.tabName,
    GSHEET_WEBHOOK_URL: config.webhookUrl ? "(set)" : "(not set)",
    PRICE_LOOKUP: config.marketPrice.enabled ? "on" : "off",
    PRICE_POLL_TIMEOUT_S: config.marketPrice.timeoutMs / 1000,
    PRICE_COOLDOWN_S: config.marketPrice.cooldownMs / 1000,
  };

  print("=".repeat(60));
  print("Whale Alert Relay configuration (secrets redacted):");
  print("=".repeat(60));
  for (const [key, value] of Object.entries(summary)) {
    print(`  ${key}: ${value}`);
  }
  print("=".repeat(60));
}

/**
 * Non-fatal configuration problems worth a warning at startup
 */
export function validateConfig(config: AppConfig): { warnings: string[] } {
  const warnings: string[] = [];

  if (!config.telegram.botToken || !config.telegram.chatId) {
    warnings.push("Telegram not configured (TELEGRAM_BOT_TOKEN / TELEGRAM_CHAT_ID) - alerts will only be logged");
  }
  if (!config.sheets.spreadsheetId && !config.webhookUrl) {
    warnings.push("No durable log configured (GOOGLE_SHEETS_ID or GSHEET_WEBHOOK_URL)");
  }
  if (config.dedupTtlMs <= 0) {
    warnings.push("DEDUP_TTL_MIN <= 0 - deduplication disabled, repeated fetches will re-alert");
  }
  if (config.watchCoins.length === 0) {
    warnings.push("WATCH_COINS is empty - no orderbook pairs will be queried");
  }

  return { warnings };
}

// Export utility functions for testing
export const envUtils = {
  isValidUrl,
  redactSecret,
  getEnvVarAsBoolean,
  getEnvVarAsList,
  getEnvVarAsNumber,
  parsePerAssetThresholds,
  parseSources,
};
