/**
 * Telegram notification types and text helpers
 */

/**
 * Telegram message parse modes
 */
export enum TelegramParseMode {
  HTML = "HTML",
  MARKDOWN = "Markdown",
  MARKDOWN_V2 = "MarkdownV2",
}

/**
 * Options for the whale alert message
 */
export interface WhaleAlertFormatOptions {
  /** Optional tag printed on the first line (e.g. "#prod") */
  alertTag?: string;
}

/**
 * Validate a Telegram chat ID (numeric ID or @channel username)
 */
export function isValidChatId(chatId: string | number | null | undefined): boolean {
  if (chatId === null || chatId === undefined) return false;

  if (typeof chatId === "number") {
    return Number.isInteger(chatId) && chatId !== 0;
  }

  if (chatId.startsWith("@")) {
    return /^@[A-Za-z][A-Za-z0-9_]{4,}$/.test(chatId);
  }
  return /^-?\d+$/.test(chatId) && Number(chatId) !== 0;
}

/**
 * Escape special characters for HTML parse mode
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}
