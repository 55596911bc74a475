/**
 * Source adapter contract
 */

import type { EventSource, NormalizedEvent } from "../pipeline/types";

/**
 * Fetches raw events from one upstream category and normalizes them
 */
export interface SourceAdapter<Raw = unknown> {
  readonly source: EventSource;
  readonly name: string;

  /**
   * Fetch the latest raw events.
   * @throws FetchError when the upstream is unreachable or the response is malformed
   */
  fetch(): Promise<Raw[]>;

  /**
   * Convert one raw item into the common event shape.
   * @throws NormalizeError when a required field is missing or malformed
   */
  normalize(raw: Raw): NormalizedEvent;
}

/**
 * Fixed wait applied between upstream requests
 */
export type PacingFn = () => Promise<void>;

export const noPacing: PacingFn = () => Promise.resolve();

/**
 * Create a pacing function that waits a fixed delay
 */
export function createPacing(delayMs: number): PacingFn {
  if (delayMs <= 0) return noPacing;
  return () => new Promise((resolve) => setTimeout(resolve, delayMs));
}
