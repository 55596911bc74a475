/**
 * Display formatting helpers shared by the notification and log sinks
 */

const pad = (value: number): string => String(value).padStart(2, "0");

/**
 * Format a date as "YYYY-MM-DD HH:MM:SS" in UTC
 */
export function formatUtcTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}

/**
 * Format a USD amount with thousands separators.
 * Whole dollars from $1,000 up, 4 decimals below $1, 2 decimals otherwise.
 */
export function formatUsd(value: number): string {
  const abs = Math.abs(value);
  const digits = abs >= 1000 ? 0 : abs < 1 ? 4 : 2;
  const formatted = new Intl.NumberFormat("en-US", {
    minimumFractionDigits: digits,
    maximumFractionDigits: digits,
  }).format(abs);
  return `${value < 0 ? "-" : ""}$${formatted}`;
}

/**
 * Format a native-unit amount with thousands separators and up to 4 decimals
 */
export function formatAmount(value: number): string {
  return new Intl.NumberFormat("en-US", {
    minimumFractionDigits: 0,
    maximumFractionDigits: 4,
  }).format(value);
}

/**
 * Shorten a wallet page URL for display: ".../hyperliquid/0x9abc...3fc4" -> ".../hyperliquid/0x9...fc4"
 */
export function shortenWalletUrl(url: string): string {
  const slash = url.lastIndexOf("/");
  if (slash < 0) return url;
  const base = url.slice(0, slash);
  const address = url.slice(slash + 1);
  const display = address.length > 8 ? `${address.slice(0, 3)}...${address.slice(-3)}` : address;
  return `${base}/${display}`;
}
