/**
 * CoinGlass API Client
 *
 * HTTP client for the CoinGlass open API. Uses native fetch, validates the
 * `{ code, msg, data }` envelope and fails over across the configured hosts.
 */

import { serviceLoggers, type Logger } from "../../utils/logger";
import {
  type CoinGlassApiError,
  type CoinGlassClientConfig,
  type CoinGlassEnvelope,
  type CoinGlassRequestOptions,
  DEFAULT_COINGLASS_HOSTS,
} from "./types";

type ResolvedConfig = Required<Omit<CoinGlassClientConfig, "logger">>;

/**
 * Default configuration for the CoinGlass API client
 */
const DEFAULT_CONFIG: ResolvedConfig = {
  hosts: DEFAULT_COINGLASS_HOSTS,
  apiKey: "",
  timeout: 20000, // 20 seconds
  attemptsPerHost: 1,
};

/**
 * Custom error class for CoinGlass API errors
 */
export class CoinGlassApiException extends Error {
  public readonly statusCode: number;
  public readonly code?: string;
  public readonly host?: string;

  constructor(error: CoinGlassApiError) {
    super(error.message);
    this.name = "CoinGlassApiException";
    this.statusCode = error.statusCode;
    this.code = error.code;
    this.host = error.host;
  }

  /**
   * Authentication or plan errors are not fixed by trying another host
   */
  public isAuthError(): boolean {
    return this.statusCode === 401 || this.statusCode === 403;
  }
}

function isEnvelope(value: unknown): value is CoinGlassEnvelope<unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * CoinGlass API Client class
 *
 * @example
 * ```typescript
 * const client = new CoinGlassClient({ apiKey: process.env.COINGLASS_API_KEY });
 * const alerts = await client.get("/api/hyperliquid/whale-alert");
 * ```
 */
export class CoinGlassClient {
  private readonly config: ResolvedConfig;
  private readonly logger: Logger;

  constructor(config: CoinGlassClientConfig = {}) {
    const { logger, ...rest } = config;
    this.config = {
      ...DEFAULT_CONFIG,
      ...rest,
      hosts: (rest.hosts ?? DEFAULT_CONFIG.hosts)
        .map((host) => host.replace(/\/+$/, ""))
        .filter((host) => host !== ""),
    };
    this.logger = logger ?? serviceLoggers.api;
  }

  public getHosts(): string[] {
    return [...this.config.hosts];
  }

  public getTimeout(): number {
    return this.config.timeout;
  }

  public hasApiKey(): boolean {
    return this.config.apiKey.length > 0;
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: "application/json",
    };
    if (this.config.apiKey) {
      headers["CG-API-KEY"] = this.config.apiKey;
    }
    return headers;
  }

  private buildQuery(params: CoinGlassRequestOptions["params"]): string {
    if (!params) return "";
    const search = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        search.set(key, String(value));
      }
    }
    const query = search.toString();
    return query ? `?${query}` : "";
  }

  /**
   * Perform one request against one host and unwrap the envelope
   */
  private async requestHost(host: string, url: string, timeout: number): Promise<unknown> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeout);

    try {
      const response = await fetch(url, {
        method: "GET",
        headers: this.buildHeaders(),
        signal: controller.signal,
      });

      const text = await response.text();
      let body: unknown = undefined;
      if (text) {
        try {
          body = JSON.parse(text);
        } catch {
          body = undefined;
        }
      }
      const envelope: CoinGlassEnvelope<unknown> = isEnvelope(body) ? body : {};
      const msg = typeof envelope.msg === "string" ? envelope.msg : undefined;

      if (!response.ok) {
        throw new CoinGlassApiException({
          message: `HTTP ${response.status}: ${msg ?? (text || response.statusText)}`,
          statusCode: response.status,
          host,
        });
      }

      if (String(envelope.code) !== "0") {
        throw new CoinGlassApiException({
          message: `CoinGlass error code=${String(envelope.code)} msg=${msg ?? "(none)"}`,
          statusCode: response.status,
          code: envelope.code === undefined ? undefined : String(envelope.code),
          host,
        });
      }

      return envelope.data;
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new Error(`Request to ${host} timed out after ${timeout}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Make a GET request, failing over across hosts.
   *
   * @returns the envelope's `data` member, unvalidated
   * @throws CoinGlassApiException on auth errors, or the last error once every host failed
   */
  public async get(endpoint: string, options: CoinGlassRequestOptions = {}): Promise<unknown> {
    const timeout = options.timeout ?? this.config.timeout;
    const query = this.buildQuery(options.params);
    let lastError: Error | null = null;

    for (const host of this.config.hosts) {
      for (let attempt = 1; attempt <= this.config.attemptsPerHost; attempt++) {
        try {
          return await this.requestHost(host, `${host}${endpoint}${query}`, timeout);
        } catch (error) {
          if (error instanceof CoinGlassApiException && error.isAuthError()) {
            throw error;
          }
          lastError = error instanceof Error ? error : new Error(String(error));
          this.logger.warn("CoinGlass request failed", {
            host,
            endpoint,
            attempt,
            error: lastError.message,
          });
        }
      }
    }

    throw new Error(
      `All CoinGlass hosts failed for ${endpoint}: ${lastError?.message ?? "no hosts configured"}`
    );
  }
}

/**
 * Create a new CoinGlass client instance
 */
export function createCoinGlassClient(config?: CoinGlassClientConfig): CoinGlassClient {
  return new CoinGlassClient(config);
}
