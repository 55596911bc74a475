/**
 * Unit tests for the threshold evaluator
 */

import { describe, it, expect } from "vitest";
import { effectiveMinimum, explain, qualifies } from "../../src/pipeline/threshold-evaluator";
import { EventSource } from "../../src/pipeline/types";
import { fillEvent, thresholds, walletEvent } from "../fixtures/events";

describe("effectiveMinimum", () => {
  it("should use the global minimum when no override exists", () => {
    expect(effectiveMinimum("ETH", thresholds())).toBe(1_000_000);
  });

  it("should prefer the per-asset override", () => {
    const config = thresholds({ perAssetMinUsd: { BTC: 5_000_000 } });
    expect(effectiveMinimum("BTC", config)).toBe(5_000_000);
    expect(effectiveMinimum("btc", config)).toBe(5_000_000);
  });

  it("should allow an override below the global minimum", () => {
    const config = thresholds({ perAssetMinUsd: { DOGE: 250_000 } });
    expect(effectiveMinimum("DOGE", config)).toBe(250_000);
  });
});

describe("qualifies", () => {
  it("should accept a notional exactly at the minimum", () => {
    expect(qualifies(walletEvent({ notionalUsd: 1_000_000 }), thresholds())).toBe(true);
  });

  it("should reject a notional just below the minimum", () => {
    expect(qualifies(walletEvent({ notionalUsd: 999_999.99 }), thresholds())).toBe(false);
  });

  it("should apply a per-asset override above the global minimum", () => {
    const config = thresholds({ perAssetMinUsd: { BTC: 5_000_000 } });
    expect(qualifies(walletEvent({ asset: "BTC", notionalUsd: 4_000_000 }), config)).toBe(false);
    expect(qualifies(walletEvent({ asset: "BTC", notionalUsd: 5_000_000 }), config)).toBe(true);
    expect(qualifies(fillEvent({ asset: "ETH", notionalUsd: 4_000_000 }), config)).toBe(true);
  });

  it("should reject events from a disabled source", () => {
    const config = thresholds({ enabledSources: new Set([EventSource.WALLET_POSITION]) });
    expect(qualifies(fillEvent({ notionalUsd: 50_000_000 }), config)).toBe(false);
    expect(qualifies(walletEvent(), config)).toBe(true);
  });

  it("should apply the exchange allow-list to orderbook fills only", () => {
    const config = thresholds({ enabledExchanges: new Set(["Binance", "Bybit"]) });
    expect(qualifies(fillEvent({ exchange: "OKX" }), config)).toBe(false);
    expect(qualifies(fillEvent({ exchange: "Bybit" }), config)).toBe(true);
    expect(qualifies(walletEvent(), config)).toBe(true);
  });

  it("should match exchange names case-insensitively", () => {
    const config = thresholds({ enabledExchanges: new Set(["binance"]) });
    expect(qualifies(fillEvent({ exchange: "Binance" }), config)).toBe(true);
  });

  it("should allow every exchange when the allow-list is empty", () => {
    expect(qualifies(fillEvent({ exchange: "Hyperliquid" }), thresholds())).toBe(true);
  });

  it("should return the same answer for the same inputs", () => {
    const event = fillEvent();
    const config = thresholds();
    expect(qualifies(event, config)).toBe(qualifies(event, config));
  });
});

describe("explain", () => {
  it("should report the reason for each rejection", () => {
    const config = thresholds({
      enabledSources: new Set([EventSource.ORDERBOOK_FILL]),
      enabledExchanges: new Set(["Binance"]),
    });

    expect(explain(walletEvent(), config)).toEqual({
      qualifies: false,
      reason: "source_disabled",
      minimumUsd: 1_000_000,
    });
    expect(explain(fillEvent({ exchange: "OKX" }), config).reason).toBe("exchange_not_allowed");
    expect(explain(fillEvent({ notionalUsd: 10 }), config).reason).toBe("below_threshold");
    expect(explain(fillEvent(), config)).toEqual({ qualifies: true, reason: null, minimumUsd: 1_000_000 });
  });
});
