/**
 * Sink contracts for alert delivery
 */

import type { NormalizedEvent } from "../../pipeline/types";

/**
 * Channel that receives whale alerts (e.g. Telegram)
 */
export interface NotificationChannel {
  readonly name: string;
  /** Whether the channel has what it needs to send */
  isConfigured(): boolean;
  /**
   * Send one alert.
   * @throws DeliveryError when the transport rejects the message
   */
  send(event: NormalizedEvent): Promise<void>;
}

/**
 * One cell of a durable-log row
 */
export type LogCell = string | number;

/**
 * Transport that appends rows to the durable log (e.g. Google Sheets, webhook)
 */
export interface LogTransport {
  readonly name: string;
  /**
   * Append one row keyed by the fixed log schema.
   * @throws DeliveryError when the row could not be stored
   */
  appendRow(columns: LogCell[]): Promise<void>;
}
