/**
 * Error taxonomy for the whale alert pipeline
 *
 * FetchError     - upstream unreachable or malformed top-level response; the source is skipped for the cycle
 * NormalizeError - a single malformed item; the item is skipped
 * DeliveryError  - a notification or log transport failed; isolated per sink
 * ConfigError    - invalid or missing configuration; fatal at startup only
 */

import type { EventSource } from "./types";

export type WhaleAlertErrorCode = "FETCH_ERROR" | "NORMALIZE_ERROR" | "DELIVERY_ERROR" | "CONFIG_ERROR";

export class WhaleAlertError extends Error {
  public readonly code: WhaleAlertErrorCode;

  constructor(message: string, code: WhaleAlertErrorCode, options: { cause?: unknown } = {}) {
    super(message);
    this.name = "WhaleAlertError";
    this.code = code;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class FetchError extends WhaleAlertError {
  public readonly source: EventSource;

  constructor(source: EventSource, message: string, options: { cause?: unknown } = {}) {
    super(message, "FETCH_ERROR", options);
    this.name = "FetchError";
    this.source = source;
  }
}

export class NormalizeError extends WhaleAlertError {
  public readonly source: EventSource;
  /** Field that was missing or malformed, when known */
  public readonly field?: string;

  constructor(source: EventSource, message: string, field?: string) {
    super(message, "NORMALIZE_ERROR");
    this.name = "NormalizeError";
    this.source = source;
    this.field = field;
  }
}

export class DeliveryError extends WhaleAlertError {
  /** Sink or transport that failed */
  public readonly sink: string;

  constructor(sink: string, message: string, options: { cause?: unknown } = {}) {
    super(message, "DELIVERY_ERROR", options);
    this.name = "DeliveryError";
    this.sink = sink;
  }
}

export class ConfigError extends WhaleAlertError {
  /** Offending configuration keys */
  public readonly keys: string[];

  constructor(message: string, keys: string[] = []) {
    super(message, "CONFIG_ERROR");
    this.name = "ConfigError";
    this.keys = keys;
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
