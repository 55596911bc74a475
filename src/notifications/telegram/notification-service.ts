/**
 * Telegram notification channel
 *
 * Formats qualifying events and sends them to a single chat through the bot client.
 * The bot is initialized lazily on the first send.
 */

import { DeliveryError } from "../../pipeline/errors";
import type { NormalizedEvent } from "../../pipeline/types";
import { TelegramBotClient } from "../../telegram/bot";
import { serviceLoggers, type Logger } from "../../utils/logger";
import type { NotificationChannel } from "../core/types";
import { formatWhaleAlertHtml } from "./alert-formatter";
import { isValidChatId, TelegramParseMode } from "./types";

export interface TelegramAlertChannelConfig {
  bot: TelegramBotClient;
  chatId?: string;
  alertTag?: string;
  logger?: Logger;
}

export class TelegramAlertChannel implements NotificationChannel {
  public readonly name = "telegram";

  private readonly bot: TelegramBotClient;
  private readonly chatId: string | undefined;
  private readonly alertTag: string | undefined;
  private readonly logger: Logger;
  private initPromise: Promise<void> | null = null;

  constructor(config: TelegramAlertChannelConfig) {
    this.bot = config.bot;
    this.chatId = config.chatId;
    this.alertTag = config.alertTag;
    this.logger = config.logger ?? serviceLoggers.telegram;
  }

  isConfigured(): boolean {
    return this.bot.hasToken() && isValidChatId(this.chatId);
  }

  async send(event: NormalizedEvent): Promise<void> {
    const chatId = this.chatId;
    if (!chatId || !this.bot.hasToken()) {
      throw new DeliveryError(this.name, "Telegram is not configured");
    }

    await this.ensureInitialized();

    const text = formatWhaleAlertHtml(event, { alertTag: this.alertTag });
    const result = await this.bot.sendMessage(chatId, text, {
      parseMode: TelegramParseMode.HTML,
      disableWebPagePreview: true,
    });

    if (!result.success) {
      throw new DeliveryError(this.name, result.error ?? "Failed to send message");
    }

    this.logger.debug("Alert sent to Telegram", { messageId: result.messageId, asset: event.asset });
  }

  /**
   * Send an arbitrary HTML message (used by the connectivity check script)
   */
  async sendText(text: string): Promise<number | undefined> {
    const chatId = this.chatId;
    if (!chatId) {
      throw new DeliveryError(this.name, "TELEGRAM_CHAT_ID is not configured");
    }
    await this.ensureInitialized();
    const result = await this.bot.sendMessage(chatId, text, { parseMode: TelegramParseMode.HTML });
    if (!result.success) {
      throw new DeliveryError(this.name, result.error ?? "Failed to send message");
    }
    return result.messageId;
  }

  private ensureInitialized(): Promise<void> {
    if (this.bot.isReady()) {
      return Promise.resolve();
    }
    if (!this.initPromise) {
      this.initPromise = this.bot.initialize().then((result) => {
        if (!result.success) {
          throw new DeliveryError(this.name, result.error ?? "Failed to initialize bot");
        }
        this.logger.info("Telegram bot ready", { username: result.botInfo?.username });
      });
      // A failed init is retried on the next send
      this.initPromise.catch(() => {
        this.initPromise = null;
      });
    }
    return this.initPromise;
  }
}

export function createTelegramAlertChannel(config: TelegramAlertChannelConfig): TelegramAlertChannel {
  return new TelegramAlertChannel(config);
}
