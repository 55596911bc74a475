/**
 * Unit tests for Telegram Bot Client
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { GrammyError } from "grammy";
import { TelegramBotClient, createTelegramBot } from "../../src/telegram/bot";

const mocks = vi.hoisted(() => ({
  getMe: vi.fn(),
  sendMessage: vi.fn(),
  tokens: new Array<string>(),
}));

// Mock grammy
vi.mock("grammy", () => {
  const MockBot = function (this: { api: unknown }, token: string) {
    mocks.tokens.push(token);
    this.api = { getMe: mocks.getMe, sendMessage: mocks.sendMessage };
  };

  return {
    Bot: MockBot,
    GrammyError: class GrammyError extends Error {
      description: string;
      constructor(message: string) {
        super(message);
        this.description = message;
      }
    },
    HttpError: class HttpError extends Error {},
  };
});

describe("TelegramBotClient", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mocks.tokens.length = 0;
    mocks.getMe.mockResolvedValue({ id: 42, is_bot: true, first_name: "Relay", username: "relay_bot" });
    mocks.sendMessage.mockResolvedValue({ message_id: 7 });
  });

  describe("initial state", () => {
    it("should be uninitialized with a token", () => {
      const client = createTelegramBot("test-token");
      expect(client).toBeInstanceOf(TelegramBotClient);
      expect(client.getStatus()).toBe("uninitialized");
      expect(client.hasToken()).toBe(true);
      expect(client.isReady()).toBe(false);
    });

    it("should report a missing token", () => {
      expect(createTelegramBot(undefined).hasToken()).toBe(false);
      expect(createTelegramBot("").hasToken()).toBe(false);
    });
  });

  describe("initialize", () => {
    it("should verify the token with getMe", async () => {
      const client = createTelegramBot("test-token");
      const result = await client.initialize();

      expect(result).toEqual({ success: true, botInfo: { id: 42, username: "relay_bot", firstName: "Relay" } });
      expect(mocks.tokens).toEqual(["test-token"]);
      expect(client.isReady()).toBe(true);
      expect(client.getHealthInfo()).toEqual({ status: "ready", hasToken: true, lastError: null });
    });

    it("should fail without a token", async () => {
      const client = createTelegramBot(undefined);
      const result = await client.initialize();

      expect(result).toEqual({ success: false, error: "TELEGRAM_BOT_TOKEN is not configured" });
      expect(client.getStatus()).toBe("error");
      expect(mocks.getMe).not.toHaveBeenCalled();
    });

    it("should describe Telegram API errors", async () => {
      mocks.getMe.mockRejectedValueOnce(new GrammyError("Unauthorized", { ok: false, error_code: 401, description: "Unauthorized" }, "getMe", {}));
      const client = createTelegramBot("test-token");
      const result = await client.initialize();

      expect(result).toEqual({ success: false, error: "Telegram API error: Unauthorized" });
      expect(client.isReady()).toBe(false);
      expect(client.getLastError()?.message).toBe("Unauthorized");
    });
  });

  describe("sendMessage", () => {
    it("should fail before initialization", async () => {
      const result = await createTelegramBot("test-token").sendMessage("-100123", "hi");
      expect(result).toEqual({ success: false, error: "Bot is not initialized" });
    });

    it("should pass options through to the API", async () => {
      const client = createTelegramBot("test-token");
      await client.initialize();

      const result = await client.sendMessage("-100123", "<b>hi</b>", {
        parseMode: "HTML",
        disableWebPagePreview: true,
      });

      expect(result).toEqual({ success: true, messageId: 7 });
      expect(mocks.sendMessage).toHaveBeenCalledWith("-100123", "<b>hi</b>", {
        parse_mode: "HTML",
        disable_notification: undefined,
        link_preview_options: { is_disabled: true },
      });
    });

    it("should report send failures", async () => {
      const client = createTelegramBot("test-token");
      await client.initialize();
      mocks.sendMessage.mockRejectedValueOnce(new Error("socket hang up"));

      const result = await client.sendMessage("-100123", "hi");
      expect(result).toEqual({ success: false, error: "socket hang up" });
    });
  });
});
