/**
 * Field readers shared by the source adapters
 */

import type { EventSource } from "../pipeline/types";
import { NormalizeError } from "../pipeline/errors";

/**
 * Read a numeric field; numeric strings are accepted
 */
export function readNumber(source: EventSource, value: unknown, field: string): number {
  if (value === null || value === undefined || value === "") {
    throw new NormalizeError(source, `Missing field ${field}`, field);
  }
  if (typeof value !== "number" && typeof value !== "string") {
    throw new NormalizeError(source, `Field ${field} is not numeric`, field);
  }
  const parsed = typeof value === "number" ? value : Number(value);
  if (!Number.isFinite(parsed)) {
    throw new NormalizeError(source, `Field ${field} is not numeric: ${String(value)}`, field);
  }
  return parsed;
}

/**
 * Read an optional numeric field; missing, blank and zero values yield undefined
 */
export function readOptionalNumber(source: EventSource, value: unknown, field: string): number | undefined {
  if (value === null || value === undefined || value === "") {
    return undefined;
  }
  const parsed = readNumber(source, value, field);
  return parsed === 0 ? undefined : parsed;
}

/**
 * Read a required non-blank string field
 */
export function readString(source: EventSource, value: unknown, field: string): string {
  if (typeof value !== "string" && typeof value !== "number") {
    throw new NormalizeError(source, `Missing field ${field}`, field);
  }
  const text = String(value).trim();
  if (text === "") {
    throw new NormalizeError(source, `Missing field ${field}`, field);
  }
  return text;
}

/**
 * Convert an epoch timestamp (ms) into a Date
 */
export function readTimestamp(source: EventSource, value: unknown, field: string): Date {
  const ms = readNumber(source, value, field);
  if (ms <= 0) {
    throw new NormalizeError(source, `Field ${field} is not a valid timestamp: ${String(value)}`, field);
  }
  return new Date(ms);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
