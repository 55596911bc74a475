/**
 * Telegram Bot Client
 *
 * Wraps a grammy bot used only for outbound alert messages.
 * The bot never polls for updates.
 */

import { Bot, GrammyError, HttpError } from "grammy";

/**
 * Bot status for health checks
 */
export type BotStatus = "uninitialized" | "ready" | "error";

/**
 * Bot initialization result
 */
export interface BotInitResult {
  success: boolean;
  botInfo?: {
    id: number;
    username: string;
    firstName: string;
  };
  error?: string;
}

/**
 * Result of a single sendMessage call
 */
export interface SendMessageResult {
  success: boolean;
  messageId?: number;
  error?: string;
}

export interface SendMessageOptions {
  parseMode?: "HTML" | "Markdown" | "MarkdownV2";
  disableNotification?: boolean;
  disableWebPagePreview?: boolean;
}

function describeTelegramError(error: unknown, fallback: string): string {
  if (error instanceof GrammyError) {
    return `Telegram API error: ${error.description}`;
  }
  if (error instanceof HttpError) {
    return `Network error: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return fallback;
}

/**
 * TelegramBotClient manages the grammy bot instance
 */
export class TelegramBotClient {
  private bot: Bot | null = null;
  private status: BotStatus = "uninitialized";
  private lastError: Error | null = null;

  constructor(private readonly token: string | undefined) {}

  public hasToken(): boolean {
    return Boolean(this.token);
  }

  public getStatus(): BotStatus {
    return this.status;
  }

  public isReady(): boolean {
    return this.status === "ready" && this.bot !== null;
  }

  public getLastError(): Error | null {
    return this.lastError;
  }

  /**
   * Create the bot instance and verify the token with getMe
   */
  public async initialize(): Promise<BotInitResult> {
    if (!this.token) {
      this.status = "error";
      this.lastError = new Error("TELEGRAM_BOT_TOKEN is not configured");
      return { success: false, error: "TELEGRAM_BOT_TOKEN is not configured" };
    }

    try {
      this.bot = new Bot(this.token);
      const me = await this.bot.api.getMe();
      this.status = "ready";
      this.lastError = null;

      return {
        success: true,
        botInfo: {
          id: me.id,
          username: me.username || "",
          firstName: me.first_name,
        },
      };
    } catch (error) {
      this.status = "error";
      this.lastError = error instanceof Error ? error : new Error(String(error));
      this.bot = null;
      return { success: false, error: describeTelegramError(error, "Failed to initialize bot") };
    }
  }

  /**
   * Send a message to a specific chat
   */
  public async sendMessage(
    chatId: number | string,
    text: string,
    options?: SendMessageOptions
  ): Promise<SendMessageResult> {
    if (!this.bot) {
      return { success: false, error: "Bot is not initialized" };
    }

    try {
      const result = await this.bot.api.sendMessage(chatId, text, {
        parse_mode: options?.parseMode,
        disable_notification: options?.disableNotification,
        link_preview_options: options?.disableWebPagePreview ? { is_disabled: true } : undefined,
      });
      return { success: true, messageId: result.message_id };
    } catch (error) {
      this.lastError = error instanceof Error ? error : new Error(String(error));
      return { success: false, error: describeTelegramError(error, "Failed to send message") };
    }
  }

  /**
   * Get bot health info for monitoring
   */
  public getHealthInfo(): {
    status: BotStatus;
    hasToken: boolean;
    lastError: string | null;
  } {
    return {
      status: this.status,
      hasToken: this.hasToken(),
      lastError: this.lastError?.message ?? null,
    };
  }
}

export function createTelegramBot(token: string | undefined): TelegramBotClient {
  return new TelegramBotClient(token);
}
