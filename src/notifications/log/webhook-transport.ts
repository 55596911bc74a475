/**
 * Webhook log transport
 *
 * Posts log rows as JSON to a generic webhook (e.g. an Apps Script endpoint that
 * appends to the same spreadsheet). Used as the fallback durable log.
 */

import { DeliveryError, getErrorMessage } from "../../pipeline/errors";
import { serviceLoggers, type Logger } from "../../utils/logger";
import type { LogCell, LogTransport } from "../core/types";
import { LOG_HEADERS, toLogRecord } from "./row";

export interface WebhookLogTransportConfig {
  url: string;
  /** Request timeout in milliseconds (default: 20000) */
  timeout?: number;
  logger?: Logger;
}

/**
 * Body posted for every row
 */
export interface WebhookLogPayload {
  headers: readonly string[];
  rows: LogCell[][];
  record: Record<string, LogCell>;
}

/**
 * Mask all but the host of a webhook URL for logs
 */
export function maskWebhookUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.protocol}//${parsed.host}/****`;
  } catch {
    return "****";
  }
}

export class WebhookLogTransport implements LogTransport {
  public readonly name = "webhook";

  private readonly url: string;
  private readonly timeout: number;
  private readonly logger: Logger;

  constructor(config: WebhookLogTransportConfig) {
    this.url = config.url;
    this.timeout = config.timeout ?? 20000;
    this.logger = config.logger ?? serviceLoggers.webhook;
  }

  async appendRow(columns: LogCell[]): Promise<void> {
    const payload: WebhookLogPayload = {
      headers: LOG_HEADERS,
      rows: [columns],
      record: toLogRecord(columns),
    };

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeout);

    let response: Response;
    try {
      response = await fetch(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
    } catch (error) {
      throw new DeliveryError(this.name, `Webhook request failed: ${getErrorMessage(error)}`, { cause: error });
    } finally {
      clearTimeout(timer);
    }

    const text = await response.text();
    if (!response.ok) {
      throw new DeliveryError(this.name, `Webhook returned HTTP ${response.status}: ${text || response.statusText}`);
    }

    // A JSON body may report failure explicitly
    if (text) {
      let body: unknown;
      try {
        body = JSON.parse(text);
      } catch {
        body = undefined;
      }
      if (typeof body === "object" && body !== null && "ok" in body && body.ok === false) {
        throw new DeliveryError(this.name, `Webhook rejected the row: ${text}`);
      }
    }

    this.logger.debug("Row appended via webhook", { url: maskWebhookUrl(this.url) });
  }
}

export function createWebhookLogTransport(config: WebhookLogTransportConfig): WebhookLogTransport {
  return new WebhookLogTransport(config);
}
