/**
 * Core types shared by the alert processing pipeline
 */

/**
 * The two upstream event categories the relay watches
 */
export enum EventSource {
  /** Hyperliquid whale position change */
  WALLET_POSITION = "WalletPosition",
  /** Large filled orderbook order */
  ORDERBOOK_FILL = "OrderbookFill",
}

export const ALL_EVENT_SOURCES: readonly EventSource[] = [
  EventSource.WALLET_POSITION,
  EventSource.ORDERBOOK_FILL,
];

interface NormalizedEventBase {
  /** Upper-case asset symbol, e.g. "BTC" */
  asset: string;
  /** Free-form action label, e.g. "Open Long" or "Sell Fill" */
  action: string;
  /** USD value of the event, never negative */
  notionalUsd: number;
  /** Size in native units, never negative */
  size: number;
  /** Strictly positive price */
  price: number;
  /** Execution time (UTC) */
  occurredAt: Date;
  /** Spot price at alert time, when the lookup succeeded */
  marketPrice?: number;
  /** Stable identifier embedding the source kind, used for fingerprinting */
  rawIdentity: string;
}

/**
 * Large wallet position change (Hyperliquid whale alert)
 */
export interface WalletPositionEvent extends NormalizedEventBase {
  source: EventSource.WALLET_POSITION;
  /** Wallet page on CoinGlass */
  link?: string;
  liquidationPrice?: number;
}

/**
 * Large filled orderbook order
 */
export interface OrderbookFillEvent extends NormalizedEventBase {
  source: EventSource.ORDERBOOK_FILL;
  exchange: string;
}

export type NormalizedEvent = WalletPositionEvent | OrderbookFillEvent;

/**
 * Threshold configuration, immutable for the process lifetime
 */
export interface ThresholdConfig {
  readonly globalMinUsd: number;
  /** Per-asset minimums, keyed by upper-case symbol; override the global minimum */
  readonly perAssetMinUsd: Readonly<Record<string, number>>;
  readonly enabledSources: ReadonlySet<EventSource>;
  /** Exchange allow-list for orderbook fills; empty allows every exchange */
  readonly enabledExchanges: ReadonlySet<string>;
}

export type SinkStatus = "delivered" | "failed" | "skipped";

/**
 * Outcome of one sink's delivery attempt
 */
export interface SinkOutcome {
  sink: string;
  status: SinkStatus;
  error?: string;
}

/**
 * Outcome of the durable-log delivery, including which transport took it
 */
export interface LogOutcome extends SinkOutcome {
  via: "primary" | "fallback" | null;
  /** Set when the primary transport failed and the fallback was tried */
  primaryError?: string;
}

export interface DeliveryResult {
  notification: SinkOutcome;
  log: LogOutcome;
}

/**
 * Human readable label for a source kind
 */
export function getSourceLabel(source: EventSource): string {
  switch (source) {
    case EventSource.WALLET_POSITION:
      return "Hyperliquid Whale";
    case EventSource.ORDERBOOK_FILL:
      return "Orderbook Fill";
  }
}
