/**
 * Tests for the whale alert poller
 */

import { describe, it, expect, vi } from "vitest";
import type { MarketPriceLookup } from "../../src/api/market-price/types";
import { Deduplicator } from "../../src/pipeline/deduplicator";
import { FetchError, NormalizeError } from "../../src/pipeline/errors";
import { EventSource, type DeliveryResult, type NormalizedEvent, type ThresholdConfig } from "../../src/pipeline/types";
import { WhaleAlertPoller, type CycleSummary } from "../../src/services/whale-alert-poller";
import type { SourceAdapter } from "../../src/sources/types";
import { createSilentLogger } from "../../src/utils/logger";
import { fillEvent, thresholds, walletEvent } from "../fixtures/events";

const NOW = new Date("2024-05-01T12:10:00Z");
const MINUTE = 60_000;

const DELIVERED: DeliveryResult = {
  notification: { sink: "telegram", status: "delivered" },
  log: { sink: "google-sheets", status: "delivered", via: "primary" },
};

function fakeAdapter(source: EventSource, result: NormalizedEvent[] | Error, malformed: unknown[] = []) {
  const byId = new Map((result instanceof Error ? [] : result).map((event) => [event.rawIdentity, event] as const));
  const fetch = vi.fn(async (): Promise<unknown[]> => {
    if (result instanceof Error) throw result;
    return [...byId.keys(), ...malformed];
  });
  const adapter: SourceAdapter = {
    source,
    name: `fake-${source}`,
    fetch,
    normalize: (raw: unknown): NormalizedEvent => {
      const event = typeof raw === "string" ? byId.get(raw) : undefined;
      if (!event) throw new NormalizeError(source, "Missing field id", "id");
      return event;
    },
  };
  return { adapter, fetch };
}

function createPoller(options: {
  adapters: SourceAdapter[];
  config?: ThresholdConfig;
  deliver?: (event: NormalizedEvent) => Promise<DeliveryResult>;
  deduplicator?: Deduplicator;
  dedupTtlMs?: number;
  ignoreBefore?: Date | null;
  pollIntervalMs?: number;
  pace?: () => Promise<void>;
  priceLookup?: MarketPriceLookup;
}) {
  const deliver = vi.fn<(event: NormalizedEvent) => Promise<DeliveryResult>>(
    options.deliver ?? (async () => DELIVERED)
  );
  const poller = new WhaleAlertPoller({
    adapters: options.adapters,
    thresholds: options.config ?? thresholds(),
    sink: { deliver },
    pollIntervalMs: options.pollIntervalMs ?? 30_000,
    dedupTtlMs: options.dedupTtlMs ?? 180 * MINUTE,
    ignoreBefore: options.ignoreBefore,
    deduplicator: options.deduplicator,
    priceLookup: options.priceLookup,
    pace: options.pace,
    clock: () => NOW,
    logger: createSilentLogger(),
  });
  return { poller, deliver };
}

describe("WhaleAlertPoller", () => {
  describe("runOnce", () => {
    it("should deliver qualifying events from every source and stop", async () => {
      const wallet = fakeAdapter(EventSource.WALLET_POSITION, [walletEvent()]);
      const book = fakeAdapter(EventSource.ORDERBOOK_FILL, [fillEvent()]);
      const { poller, deliver } = createPoller({ adapters: [wallet.adapter, book.adapter] });

      const summary = await poller.runOnce();

      expect(summary).toEqual({
        cycle: 1,
        fetched: 2,
        events: 2,
        stale: 0,
        rejected: 0,
        suppressed: 0,
        delivered: 2,
        durationMs: 0,
      });
      expect(deliver).toHaveBeenCalledTimes(2);
      expect(poller.getState()).toBe("stopped");
      expect(poller.isRunning()).toBe(false);
    });

    it("should keep going when one source fails", async () => {
      const wallet = fakeAdapter(
        EventSource.WALLET_POSITION,
        new FetchError(EventSource.WALLET_POSITION, "Hyperliquid whale alert fetch failed: HTTP 503")
      );
      const book = fakeAdapter(EventSource.ORDERBOOK_FILL, [fillEvent()]);
      const { poller, deliver } = createPoller({ adapters: [wallet.adapter, book.adapter] });
      const onSourceError = vi.fn();
      poller.on("source:error", onSourceError);

      const summary = await poller.runOnce();

      expect(summary.delivered).toBe(1);
      expect(deliver).toHaveBeenCalledWith(fillEvent());
      expect(poller.getStats().fetchErrors).toBe(1);
      expect(onSourceError).toHaveBeenCalledWith({
        source: EventSource.WALLET_POSITION,
        adapter: "fake-WalletPosition",
        error: "Hyperliquid whale alert fetch failed: HTTP 503",
      });
    });

    it("should skip malformed items individually", async () => {
      const book = fakeAdapter(EventSource.ORDERBOOK_FILL, [fillEvent()], [{ junk: true }, 42]);
      const { poller } = createPoller({ adapters: [book.adapter] });

      const summary = await poller.runOnce();

      expect(summary.fetched).toBe(3);
      expect(summary.events).toBe(1);
      expect(summary.delivered).toBe(1);
      expect(poller.getStats().normalizeErrors).toBe(2);
    });

    it("should not deliver events below the threshold", async () => {
      const book = fakeAdapter(EventSource.ORDERBOOK_FILL, [
        fillEvent({ notionalUsd: 999_999, rawIdentity: "orderbook:binance:1" }),
        fillEvent({ notionalUsd: 1_000_000, rawIdentity: "orderbook:binance:2" }),
      ]);
      const { poller, deliver } = createPoller({ adapters: [book.adapter] });

      const summary = await poller.runOnce();

      expect(summary.rejected).toBe(1);
      expect(deliver).toHaveBeenCalledTimes(1);
      expect(deliver.mock.calls[0]?.[0].rawIdentity).toBe("orderbook:binance:2");
    });

    it("should apply the exchange allow-list", async () => {
      const book = fakeAdapter(EventSource.ORDERBOOK_FILL, [
        fillEvent({ exchange: "OKX", rawIdentity: "orderbook:okx:1" }),
        fillEvent({ exchange: "Bybit", rawIdentity: "orderbook:bybit:1" }),
      ]);
      const wallet = fakeAdapter(EventSource.WALLET_POSITION, [walletEvent()]);
      const config = thresholds({ enabledExchanges: new Set(["Binance", "Bybit"]) });
      const { poller, deliver } = createPoller({ adapters: [wallet.adapter, book.adapter], config });

      await poller.runOnce();

      expect(deliver.mock.calls.map((call) => call[0].rawIdentity)).toEqual([
        walletEvent().rawIdentity,
        "orderbook:bybit:1",
      ]);
    });

    it("should not fetch disabled sources", async () => {
      const wallet = fakeAdapter(EventSource.WALLET_POSITION, [walletEvent()]);
      const book = fakeAdapter(EventSource.ORDERBOOK_FILL, [fillEvent()]);
      const config = thresholds({ enabledSources: new Set([EventSource.ORDERBOOK_FILL]) });
      const { poller } = createPoller({ adapters: [wallet.adapter, book.adapter], config });

      await poller.runOnce();

      expect(wallet.fetch).not.toHaveBeenCalled();
      expect(book.fetch).toHaveBeenCalledTimes(1);
    });

    it("should pace between adapters", async () => {
      const pace = vi.fn().mockResolvedValue(undefined);
      const wallet = fakeAdapter(EventSource.WALLET_POSITION, []);
      const book = fakeAdapter(EventSource.ORDERBOOK_FILL, []);
      const { poller } = createPoller({ adapters: [wallet.adapter, book.adapter], pace });

      await poller.runOnce();
      expect(pace).toHaveBeenCalledTimes(1);
    });

    it("should drop events that predate the freshness cutoff", async () => {
      const wallet = fakeAdapter(EventSource.WALLET_POSITION, [walletEvent()]);
      const book = fakeAdapter(EventSource.ORDERBOOK_FILL, [fillEvent()]);
      const { poller, deliver } = createPoller({
        adapters: [wallet.adapter, book.adapter],
        ignoreBefore: new Date("2024-05-01T12:03:00Z"),
      });

      const summary = await poller.runOnce();

      expect(summary.stale).toBe(1);
      expect(deliver).toHaveBeenCalledTimes(1);
      expect(deliver).toHaveBeenCalledWith(fillEvent());
    });

    it("should refuse to run while already running", async () => {
      const { poller } = createPoller({ adapters: [] });
      const first = poller.runOnce();
      await expect(poller.runOnce()).rejects.toThrow("Poller is already running");
      await first;
    });
  });

  describe("deduplication", () => {
    it("should not re-alert the same events on the next cycle", async () => {
      const wallet = fakeAdapter(EventSource.WALLET_POSITION, [walletEvent()]);
      const book = fakeAdapter(EventSource.ORDERBOOK_FILL, [fillEvent()]);
      const { poller, deliver } = createPoller({ adapters: [wallet.adapter, book.adapter] });
      const onSuppressed = vi.fn();
      poller.on("alert:suppressed", onSuppressed);

      await poller.runOnce();
      const second = await poller.runOnce();

      expect(deliver).toHaveBeenCalledTimes(2);
      expect(second.suppressed).toBe(2);
      expect(second.delivered).toBe(0);
      expect(onSuppressed).toHaveBeenCalledTimes(2);
      expect(poller.getStats().cycles).toBe(2);
    });

    it("should alert again with a fresh deduplicator", async () => {
      const book = fakeAdapter(EventSource.ORDERBOOK_FILL, [fillEvent()]);

      const first = createPoller({ adapters: [book.adapter], deduplicator: new Deduplicator() });
      await first.poller.runOnce();
      const second = createPoller({ adapters: [book.adapter], deduplicator: new Deduplicator() });
      await second.poller.runOnce();

      expect(first.deliver).toHaveBeenCalledTimes(1);
      expect(second.deliver).toHaveBeenCalledTimes(1);
    });

    it("should re-alert every cycle when the TTL is zero", async () => {
      const book = fakeAdapter(EventSource.ORDERBOOK_FILL, [fillEvent()]);
      const { poller, deliver } = createPoller({ adapters: [book.adapter], dedupTtlMs: 0 });

      await poller.runOnce();
      await poller.runOnce();
      expect(deliver).toHaveBeenCalledTimes(2);
    });

    it("should keep the dedup entry when delivery fails", async () => {
      const book = fakeAdapter(EventSource.ORDERBOOK_FILL, [fillEvent()]);
      const failed: DeliveryResult = {
        notification: { sink: "telegram", status: "failed", error: "chat not found" },
        log: { sink: "webhook", status: "delivered", via: "fallback", primaryError: "quota exceeded" },
      };
      const { poller, deliver } = createPoller({ adapters: [book.adapter], deliver: async () => failed });

      await poller.runOnce();
      await poller.runOnce();

      expect(deliver).toHaveBeenCalledTimes(1);
      expect(poller.getStats()).toMatchObject({
        delivered: 1,
        suppressed: 1,
        notificationFailures: 1,
        logFailures: 0,
        fallbackUses: 1,
      });
    });
  });

  describe("market price", () => {
    it("should attach the looked-up price before delivery", async () => {
      const getPrice = vi.fn(async (): Promise<number | null> => 64_000);
      const wallet = fakeAdapter(EventSource.WALLET_POSITION, [walletEvent()]);
      const { poller, deliver } = createPoller({ adapters: [wallet.adapter], priceLookup: { getPrice } });
      const onDelivered = vi.fn();
      poller.on("alert:delivered", onDelivered);

      await poller.runOnce();

      expect(getPrice).toHaveBeenCalledWith("BTC");
      expect(deliver).toHaveBeenCalledWith({ ...walletEvent(), marketPrice: 64_000 });
      expect(onDelivered.mock.calls[0]?.[0].event.marketPrice).toBe(64_000);
    });

    it("should deliver the event unchanged when no price is found", async () => {
      const book = fakeAdapter(EventSource.ORDERBOOK_FILL, [fillEvent()]);
      const { poller, deliver } = createPoller({
        adapters: [book.adapter],
        priceLookup: { getPrice: async () => null },
      });

      await poller.runOnce();

      expect(deliver).toHaveBeenCalledTimes(1);
      expect(deliver.mock.calls[0]?.[0]).not.toHaveProperty("marketPrice");
    });

    it("should deliver the event unchanged when the lookup throws", async () => {
      const book = fakeAdapter(EventSource.ORDERBOOK_FILL, [fillEvent()]);
      const { poller, deliver } = createPoller({
        adapters: [book.adapter],
        priceLookup: {
          getPrice: async () => {
            throw new Error("socket hang up");
          },
        },
      });

      const summary = await poller.runOnce();

      expect(summary.delivered).toBe(1);
      expect(deliver.mock.calls[0]?.[0]).not.toHaveProperty("marketPrice");
      expect(poller.getStats().processingErrors).toBe(0);
    });

    it("should only look up prices for alerts that will be delivered", async () => {
      const getPrice = vi.fn(async (): Promise<number | null> => 3_000);
      const book = fakeAdapter(EventSource.ORDERBOOK_FILL, [fillEvent({ notionalUsd: 10_000 })]);
      const { poller } = createPoller({ adapters: [book.adapter], priceLookup: { getPrice } });

      await poller.runOnce();

      expect(getPrice).not.toHaveBeenCalled();
    });
  });

  describe("event processing errors", () => {
    it("should log and continue when delivery throws", async () => {
      const book = fakeAdapter(EventSource.ORDERBOOK_FILL, [
        fillEvent({ rawIdentity: "orderbook:binance:1" }),
        fillEvent({ rawIdentity: "orderbook:binance:2" }),
      ]);
      const deliver = vi
        .fn<(event: NormalizedEvent) => Promise<DeliveryResult>>()
        .mockRejectedValueOnce(new Error("unexpected"))
        .mockResolvedValueOnce(DELIVERED);
      const { poller } = createPoller({ adapters: [book.adapter], deliver });

      const summary = await poller.runOnce();

      expect(summary.delivered).toBe(1);
      expect(poller.getStats().processingErrors).toBe(1);
    });
  });

  describe("continuous mode", () => {
    it("should run cycles until stopped", async () => {
      const book = fakeAdapter(EventSource.ORDERBOOK_FILL, []);
      const { poller } = createPoller({ adapters: [book.adapter], pollIntervalMs: 5 });
      const onStopped = vi.fn();
      poller.on("stopped", onStopped);
      poller.on("cycle:complete", (summary: CycleSummary) => {
        if (summary.cycle === 3) poller.stop();
      });

      await poller.start();

      expect(book.fetch).toHaveBeenCalledTimes(3);
      expect(poller.getState()).toBe("stopped");
      expect(onStopped).toHaveBeenCalledTimes(1);
    });

    it("should finish delivering the fetched events when stopped mid-cycle", async () => {
      const wallet = fakeAdapter(EventSource.WALLET_POSITION, [
        walletEvent({ rawIdentity: "wallet:0xabc:BTC:1:1" }),
        walletEvent({ rawIdentity: "wallet:0xabc:BTC:1:2" }),
        walletEvent({ rawIdentity: "wallet:0xabc:BTC:1:3" }),
      ]);
      let onFirstDelivery: () => void = () => {};
      const { poller, deliver } = createPoller({
        adapters: [wallet.adapter],
        pollIntervalMs: 60 * MINUTE,
        deliver: async () => {
          onFirstDelivery();
          onFirstDelivery = () => {};
          return DELIVERED;
        },
      });
      onFirstDelivery = () => poller.stop();

      await poller.start();

      expect(deliver).toHaveBeenCalledTimes(3);
      expect(wallet.fetch).toHaveBeenCalledTimes(1);
      expect(poller.getStats()).toMatchObject({ cycles: 1, fetched: 3, delivered: 3 });
      expect(poller.getState()).toBe("stopped");
    });

    it("should end the sleep early on stop", async () => {
      const book = fakeAdapter(EventSource.ORDERBOOK_FILL, []);
      const { poller } = createPoller({ adapters: [book.adapter], pollIntervalMs: 60 * MINUTE });
      poller.on("cycle:complete", () => {
        setTimeout(() => poller.stop(), 0);
      });

      const startedAt = Date.now();
      await poller.start();

      expect(Date.now() - startedAt).toBeLessThan(5_000);
      expect(book.fetch).toHaveBeenCalledTimes(1);
    });

    it("should ignore a second start while running", async () => {
      const { poller } = createPoller({ adapters: [], pollIntervalMs: 60 * MINUTE });
      poller.on("cycle:complete", () => {
        setTimeout(() => poller.stop(), 0);
      });

      const running = poller.start();
      await poller.start();
      await running;

      expect(poller.getStats().cycles).toBe(1);
    });
  });
});
