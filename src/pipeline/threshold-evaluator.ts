/**
 * Threshold Evaluator
 *
 * Decides whether a normalized event is alert-worthy. Pure: no side effects,
 * the decision depends only on the event and the threshold configuration.
 */

import { EventSource, type NormalizedEvent, type ThresholdConfig } from "./types";

// ============================================================================
// Types
// ============================================================================

export type RejectionReason = "source_disabled" | "exchange_not_allowed" | "below_threshold";

export interface ThresholdDecision {
  qualifies: boolean;
  reason: RejectionReason | null;
  /** Minimum that applied to the event's asset */
  minimumUsd: number;
}

// ============================================================================
// Evaluation
// ============================================================================

/**
 * Minimum USD notional for an asset: the per-asset override if present, else the global minimum
 */
export function effectiveMinimum(asset: string, config: ThresholdConfig): number {
  const override = config.perAssetMinUsd[asset.toUpperCase()];
  return override !== undefined ? override : config.globalMinUsd;
}

/**
 * Exchange names are matched case-insensitively
 */
function isExchangeAllowed(exchange: string, allowed: ReadonlySet<string>): boolean {
  if (allowed.size === 0) return true;
  const wanted = exchange.toLowerCase();
  for (const candidate of allowed) {
    if (candidate.toLowerCase() === wanted) return true;
  }
  return false;
}

/**
 * Evaluate an event and report why it was rejected
 */
export function explain(event: NormalizedEvent, config: ThresholdConfig): ThresholdDecision {
  const minimumUsd = effectiveMinimum(event.asset, config);

  if (!config.enabledSources.has(event.source)) {
    return { qualifies: false, reason: "source_disabled", minimumUsd };
  }

  switch (event.source) {
    case EventSource.ORDERBOOK_FILL:
      if (!isExchangeAllowed(event.exchange, config.enabledExchanges)) {
        return { qualifies: false, reason: "exchange_not_allowed", minimumUsd };
      }
      break;
    case EventSource.WALLET_POSITION:
      // Exchange allow-list does not apply to wallet positions
      break;
  }

  if (event.notionalUsd >= minimumUsd) {
    return { qualifies: true, reason: null, minimumUsd };
  }
  return { qualifies: false, reason: "below_threshold", minimumUsd };
}

/**
 * Whether an event qualifies as a whale alert
 */
export function qualifies(event: NormalizedEvent, config: ThresholdConfig): boolean {
  return explain(event, config).qualifies;
}
