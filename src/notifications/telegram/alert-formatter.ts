/**
 * Whale alert message formatter for Telegram (HTML parse mode)
 */

import { EventSource, getSourceLabel, type NormalizedEvent } from "../../pipeline/types";
import { formatAmount, formatUsd, formatUtcTimestamp, shortenWalletUrl } from "../../utils/format";
import { escapeHtml, type WhaleAlertFormatOptions } from "./types";

export const WHALE_ALERT_HEADER = "🐳🐳🐳 <b>WHALE ALERT</b> 🐳🐳🐳";

/**
 * Format a qualifying event as an HTML Telegram message
 */
export function formatWhaleAlertHtml(event: NormalizedEvent, options: WhaleAlertFormatOptions = {}): string {
  const lines: string[] = [];

  if (options.alertTag) {
    lines.push(escapeHtml(options.alertTag));
  }
  lines.push(WHALE_ALERT_HEADER);
  lines.push(`Source: ${getSourceLabel(event.source)}`);
  lines.push(`Coin: ${escapeHtml(event.asset)}`);
  lines.push(`Action: ${escapeHtml(event.action)}`);
  lines.push(`Notional: ${formatUsd(event.notionalUsd)} | Size: ${formatAmount(event.size)}`);
  lines.push(
    event.marketPrice === undefined
      ? `Price: ${formatUsd(event.price)}`
      : `Price: ${formatUsd(event.price)} | Market Price: ${formatUsd(event.marketPrice)}`
  );

  if (event.source === EventSource.ORDERBOOK_FILL) {
    lines.push(`Exchange: ${escapeHtml(event.exchange)}`);
  } else if (event.liquidationPrice !== undefined) {
    lines.push(`Liq. Price: ${formatUsd(event.liquidationPrice)}`);
  }

  lines.push(`UTC: ${formatUtcTimestamp(event.occurredAt)}`);

  if (event.source === EventSource.WALLET_POSITION && event.link) {
    const href = escapeHtml(event.link);
    lines.push(`Wallet: <a href="${href}">${escapeHtml(shortenWalletUrl(event.link))}</a>`);
  }

  return lines.join("\n");
}
