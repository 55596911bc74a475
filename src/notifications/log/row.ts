/**
 * Durable-log row schema
 */

import { EventSource, getSourceLabel, type NormalizedEvent } from "../../pipeline/types";
import { formatUtcTimestamp } from "../../utils/format";
import type { LogCell } from "../core/types";

export const LOG_HEADERS = [
  "Timestamp",
  "Source",
  "Asset",
  "Action",
  "NotionalUSD",
  "Size",
  "Price",
  "Exchange",
] as const;

export type LogHeader = (typeof LOG_HEADERS)[number];

/**
 * Build the log row for an event, in LOG_HEADERS order
 */
export function toLogRow(event: NormalizedEvent): LogCell[] {
  const exchange = event.source === EventSource.ORDERBOOK_FILL ? event.exchange : "";
  return [
    formatUtcTimestamp(event.occurredAt),
    getSourceLabel(event.source),
    event.asset,
    event.action,
    event.notionalUsd,
    event.size,
    event.price,
    exchange,
  ];
}

/**
 * Pair each header with the matching cell of a row
 */
export function toLogRecord(columns: LogCell[]): Record<string, LogCell> {
  const record: Record<string, LogCell> = {};
  LOG_HEADERS.forEach((header, index) => {
    record[header] = columns[index] ?? "";
  });
  return record;
}
