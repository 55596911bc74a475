/**
 * Fan-out sink
 *
 * Delivers a qualifying event to the notification channel and the durable log.
 * The two deliveries are independent; the log falls back to a secondary transport
 * when the primary fails. deliver() never rejects.
 */

import { getErrorMessage } from "../../pipeline/errors";
import type { DeliveryResult, LogOutcome, NormalizedEvent, SinkOutcome } from "../../pipeline/types";
import { serviceLoggers, type Logger } from "../../utils/logger";
import { toLogRow } from "../log/row";
import type { LogCell, LogTransport, NotificationChannel } from "./types";

export interface FanOutSinkConfig {
  notification?: NotificationChannel;
  primaryLog?: LogTransport;
  fallbackLog?: LogTransport;
  logger?: Logger;
}

export class FanOutSink {
  private readonly notification: NotificationChannel | undefined;
  private readonly primaryLog: LogTransport | undefined;
  private readonly fallbackLog: LogTransport | undefined;
  private readonly logger: Logger;

  constructor(config: FanOutSinkConfig) {
    this.notification = config.notification;
    this.primaryLog = config.primaryLog;
    this.fallbackLog = config.fallbackLog;
    this.logger = config.logger ?? serviceLoggers.fanOut;
  }

  hasNotificationChannel(): boolean {
    return this.notification?.isConfigured() ?? false;
  }

  hasLogTransport(): boolean {
    return this.primaryLog !== undefined || this.fallbackLog !== undefined;
  }

  async deliver(event: NormalizedEvent): Promise<DeliveryResult> {
    const [notification, log] = await Promise.all([this.notify(event), this.writeLog(toLogRow(event))]);
    return { notification, log };
  }

  private async notify(event: NormalizedEvent): Promise<SinkOutcome> {
    const channel = this.notification;
    if (!channel || !channel.isConfigured()) {
      return { sink: channel?.name ?? "notification", status: "skipped" };
    }

    try {
      await channel.send(event);
      return { sink: channel.name, status: "delivered" };
    } catch (error) {
      const message = getErrorMessage(error);
      this.logger.error("Notification delivery failed", { sink: channel.name, asset: event.asset, error: message });
      return { sink: channel.name, status: "failed", error: message };
    }
  }

  private async writeLog(columns: LogCell[]): Promise<LogOutcome> {
    const primary = this.primaryLog;
    const fallback = this.fallbackLog;

    if (!primary && !fallback) {
      return { sink: "log", status: "skipped", via: null };
    }

    let primaryError: string | undefined;
    if (primary) {
      try {
        await primary.appendRow(columns);
        return { sink: primary.name, status: "delivered", via: "primary" };
      } catch (error) {
        primaryError = getErrorMessage(error);
        this.logger.warn("Primary log transport failed", { sink: primary.name, error: primaryError });
      }
    }

    if (!fallback) {
      return { sink: primary?.name ?? "log", status: "failed", via: null, error: primaryError };
    }

    // With no primary configured the fallback is the sole transport
    const via = primary ? "fallback" : "primary";
    try {
      await fallback.appendRow(columns);
      return { sink: fallback.name, status: "delivered", via, primaryError };
    } catch (error) {
      const message = getErrorMessage(error);
      this.logger.error("Log delivery failed", { sink: fallback.name, error: message, primaryError });
      return { sink: fallback.name, status: "failed", via: null, error: message, primaryError };
    }
  }
}

export function createFanOutSink(config: FanOutSinkConfig): FanOutSink {
  return new FanOutSink(config);
}
