/**
 * Whale Alert Poller
 *
 * Drives the pipeline: every cycle it fetches each enabled source, normalizes the
 * items, and passes each event through the freshness gate, the threshold evaluator,
 * the deduplicator and the fan-out sink, in that order. Cycles never overlap.
 */

import { EventEmitter } from "events";
import { Deduplicator } from "../pipeline/deduplicator";
import { getErrorMessage } from "../pipeline/errors";
import { explain } from "../pipeline/threshold-evaluator";
import type { DeliveryResult, NormalizedEvent, ThresholdConfig } from "../pipeline/types";
import type { MarketPriceLookup } from "../api/market-price/types";
import type { FanOutSink } from "../notifications/core/fan-out-sink";
import { noPacing, type PacingFn, type SourceAdapter } from "../sources/types";
import { serviceLoggers, type Logger } from "../utils/logger";

export type PollerState = "idle" | "polling" | "evaluating" | "delivering" | "sleeping" | "stopped";

export interface WhaleAlertPollerConfig {
  adapters: SourceAdapter[];
  thresholds: ThresholdConfig;
  sink: Pick<FanOutSink, "deliver">;
  /** Sleep between cycles in continuous mode */
  pollIntervalMs: number;
  /** Suppression window for repeated events; 0 or less disables deduplication */
  dedupTtlMs: number;
  /** Events that occurred before this instant are dropped */
  ignoreBefore?: Date | null;
  deduplicator?: Deduplicator;
  /** Spot price lookup attached to alerts before delivery */
  priceLookup?: MarketPriceLookup;
  /** Wait applied between adapters */
  pace?: PacingFn;
  clock?: () => Date;
  logger?: Logger;
}

export interface WhaleAlertPollerStats {
  cycles: number;
  fetched: number;
  normalizeErrors: number;
  fetchErrors: number;
  processingErrors: number;
  stale: number;
  rejected: number;
  suppressed: number;
  delivered: number;
  notificationFailures: number;
  logFailures: number;
  fallbackUses: number;
  lastCycleAt: Date | null;
  startedAt: Date | null;
}

export interface CycleSummary {
  cycle: number;
  fetched: number;
  events: number;
  stale: number;
  rejected: number;
  suppressed: number;
  delivered: number;
  durationMs: number;
}

export interface SourceErrorEvent {
  source: string;
  adapter: string;
  error: string;
}

export interface AlertDeliveredEvent {
  event: NormalizedEvent;
  result: DeliveryResult;
}

export class WhaleAlertPoller extends EventEmitter {
  private readonly adapters: SourceAdapter[];
  private readonly thresholds: ThresholdConfig;
  private readonly sink: Pick<FanOutSink, "deliver">;
  private readonly pollIntervalMs: number;
  private readonly dedupTtlMs: number;
  private readonly ignoreBefore: Date | null;
  private readonly deduplicator: Deduplicator;
  private readonly priceLookup: MarketPriceLookup | null;
  private readonly pace: PacingFn;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  private state: PollerState = "idle";
  private running = false;
  private stopRequested = false;
  private wakeUp: (() => void) | null = null;
  private sleepTimer: ReturnType<typeof setTimeout> | null = null;

  private stats: WhaleAlertPollerStats = {
    cycles: 0,
    fetched: 0,
    normalizeErrors: 0,
    fetchErrors: 0,
    processingErrors: 0,
    stale: 0,
    rejected: 0,
    suppressed: 0,
    delivered: 0,
    notificationFailures: 0,
    logFailures: 0,
    fallbackUses: 0,
    lastCycleAt: null,
    startedAt: null,
  };

  constructor(config: WhaleAlertPollerConfig) {
    super();
    this.adapters = config.adapters;
    this.thresholds = config.thresholds;
    this.sink = config.sink;
    this.pollIntervalMs = config.pollIntervalMs;
    this.dedupTtlMs = config.dedupTtlMs;
    this.ignoreBefore = config.ignoreBefore ?? null;
    this.deduplicator = config.deduplicator ?? new Deduplicator();
    this.priceLookup = config.priceLookup ?? null;
    this.pace = config.pace ?? noPacing;
    this.clock = config.clock ?? (() => new Date());
    this.logger = config.logger ?? serviceLoggers.poller;
  }

  getState(): PollerState {
    return this.state;
  }

  getStats(): WhaleAlertPollerStats {
    return { ...this.stats };
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run exactly one cycle, then stop
   */
  async runOnce(): Promise<CycleSummary> {
    if (this.running) {
      throw new Error("Poller is already running");
    }
    this.running = true;
    this.stats.startedAt = this.clock();
    try {
      return await this.runCycle();
    } finally {
      this.finish();
    }
  }

  /**
   * Run cycles until stop() is called. Resolves once the loop has ended.
   */
  async start(): Promise<void> {
    if (this.running) {
      this.logger.warn("Poller already running");
      return;
    }

    this.running = true;
    this.stopRequested = false;
    this.stats.startedAt = this.clock();
    this.logger.info("Poller started", {
      adapters: this.adapters.map((adapter) => adapter.name),
      pollIntervalMs: this.pollIntervalMs,
    });

    try {
      while (!this.stopRequested) {
        await this.runCycle();
        if (this.stopRequested) break;
        await this.sleep(this.pollIntervalMs);
      }
    } finally {
      this.finish();
    }
  }

  /**
   * Request a stop. Takes effect at the next cycle or adapter boundary and ends a sleep early;
   * events already fetched in the current cycle are still processed.
   */
  stop(): void {
    if (!this.running) return;
    this.logger.info("Stop requested");
    this.stopRequested = true;
    if (this.sleepTimer) {
      clearTimeout(this.sleepTimer);
      this.sleepTimer = null;
    }
    if (this.wakeUp) {
      this.wakeUp();
      this.wakeUp = null;
    }
  }

  private finish(): void {
    this.running = false;
    this.stopRequested = false;
    this.state = "stopped";
    this.emit("stopped", this.getStats());
    this.logger.info("Poller stopped", { cycles: this.stats.cycles, delivered: this.stats.delivered });
  }

  private sleep(ms: number): Promise<void> {
    this.state = "sleeping";
    return new Promise((resolve) => {
      this.wakeUp = resolve;
      this.sleepTimer = setTimeout(() => {
        this.sleepTimer = null;
        this.wakeUp = null;
        resolve();
      }, ms);
    });
  }

  private async runCycle(): Promise<CycleSummary> {
    const startedAt = this.clock();
    const cycle = ++this.stats.cycles;
    const log = this.logger.child({ cycle });
    this.emit("cycle:start", cycle);

    const summary: CycleSummary = {
      cycle,
      fetched: 0,
      events: 0,
      stale: 0,
      rejected: 0,
      suppressed: 0,
      delivered: 0,
      durationMs: 0,
    };

    this.deduplicator.purgeExpired(startedAt);

    const events = await this.collectEvents(log, summary);
    summary.events = events.length;

    for (const event of events) {
      try {
        await this.processEvent(event, log, summary);
      } catch (error) {
        this.stats.processingErrors++;
        log.error("Event processing failed", { rawIdentity: event.rawIdentity, error: getErrorMessage(error) });
      }
    }

    const finishedAt = this.clock();
    summary.durationMs = finishedAt.getTime() - startedAt.getTime();
    this.stats.lastCycleAt = finishedAt;

    log.info("Cycle complete", { ...summary });
    this.emit("cycle:complete", summary);
    return summary;
  }

  private async collectEvents(log: Logger, summary: CycleSummary): Promise<NormalizedEvent[]> {
    this.state = "polling";
    const events: NormalizedEvent[] = [];
    const enabled = this.adapters.filter((adapter) => this.thresholds.enabledSources.has(adapter.source));

    for (const [index, adapter] of enabled.entries()) {
      if (this.stopRequested) break;
      if (index > 0) {
        await this.pace();
      }

      let items: unknown[];
      try {
        items = await adapter.fetch();
      } catch (error) {
        const message = getErrorMessage(error);
        this.stats.fetchErrors++;
        log.error("Source fetch failed", { adapter: adapter.name, error: message });
        const payload: SourceErrorEvent = { source: adapter.source, adapter: adapter.name, error: message };
        this.emit("source:error", payload);
        continue;
      }

      summary.fetched += items.length;
      this.stats.fetched += items.length;

      for (const item of items) {
        try {
          events.push(adapter.normalize(item));
        } catch (error) {
          this.stats.normalizeErrors++;
          log.debug("Skipped malformed item", { adapter: adapter.name, error: getErrorMessage(error) });
        }
      }
    }

    return events;
  }

  private async processEvent(event: NormalizedEvent, log: Logger, summary: CycleSummary): Promise<void> {
    this.state = "evaluating";

    if (this.ignoreBefore && event.occurredAt.getTime() < this.ignoreBefore.getTime()) {
      summary.stale++;
      this.stats.stale++;
      return;
    }

    const decision = explain(event, this.thresholds);
    if (!decision.qualifies) {
      summary.rejected++;
      this.stats.rejected++;
      log.trace("Event rejected", { rawIdentity: event.rawIdentity, reason: decision.reason });
      return;
    }

    if (!this.deduplicator.shouldEmit(event, this.clock(), this.dedupTtlMs)) {
      summary.suppressed++;
      this.stats.suppressed++;
      this.emit("alert:suppressed", event);
      return;
    }

    this.state = "delivering";
    const alert = await this.withMarketPrice(event, log);
    const result = await this.sink.deliver(alert);
    summary.delivered++;
    this.stats.delivered++;
    if (result.notification.status === "failed") this.stats.notificationFailures++;
    if (result.log.status === "failed") this.stats.logFailures++;
    if (result.log.via === "fallback") this.stats.fallbackUses++;

    log.info("Whale alert emitted", {
      source: event.source,
      asset: event.asset,
      action: event.action,
      notionalUsd: event.notionalUsd,
      notification: result.notification.status,
      log: result.log.status,
    });

    const payload: AlertDeliveredEvent = { event: alert, result };
    this.emit("alert:delivered", payload);
  }

  /**
   * Attach the current spot price; the event is returned unchanged when the lookup fails
   */
  private async withMarketPrice(event: NormalizedEvent, log: Logger): Promise<NormalizedEvent> {
    if (!this.priceLookup) return event;
    try {
      const marketPrice = await this.priceLookup.getPrice(event.asset);
      return marketPrice === null ? event : { ...event, marketPrice };
    } catch (error) {
      log.warn("Market price lookup failed", { asset: event.asset, error: getErrorMessage(error) });
      return event;
    }
  }
}

export function createWhaleAlertPoller(config: WhaleAlertPollerConfig): WhaleAlertPoller {
  return new WhaleAlertPoller(config);
}
