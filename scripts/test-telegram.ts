/**
 * Send a single test message to the configured Telegram chat
 *
 * Usage:
 *   npx tsx scripts/test-telegram.ts
 */

import * as dotenv from "dotenv";
import { TelegramAlertChannel } from "../src/notifications/telegram/notification-service";
import { escapeHtml } from "../src/notifications/telegram/types";
import { TelegramBotClient } from "../src/telegram/bot";
import { formatUtcTimestamp } from "../src/utils/format";

dotenv.config();

async function main(): Promise<void> {
  console.log("\n=== Telegram connectivity check ===\n");

  const token = process.env.TELEGRAM_BOT_TOKEN;
  const chatId = process.env.TELEGRAM_CHAT_ID || process.env.TELEGRAM_CHANNEL;

  if (!token || !chatId) {
    console.error("❌ Error: TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID must be set in .env");
    process.exit(1);
  }

  const channel = new TelegramAlertChannel({ bot: new TelegramBotClient(token), chatId });
  const tag = process.env.ALERT_TAG ? `${escapeHtml(process.env.ALERT_TAG)}\n` : "";
  const text = `${tag}✅ <b>Whale Alert Relay</b> test message\nUTC: ${formatUtcTimestamp(new Date())}`;

  try {
    const messageId = await channel.sendText(text);
    console.log(`✅ Sent test message to ${chatId} (message id ${messageId ?? "unknown"})\n`);
  } catch (error) {
    console.error("❌ Failed to send:", error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
