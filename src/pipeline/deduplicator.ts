/**
 * Alert Deduplicator
 *
 * Remembers the fingerprints of recently emitted alerts and suppresses repeats
 * until their entry expires. Expiry is checked on lookup; there is no background
 * sweep, the owner calls purgeExpired() once per poll cycle to bound the store.
 */

import { createHash } from "crypto";
import type { NormalizedEvent } from "./types";

/**
 * Deduplication entry
 */
export interface DedupEntry {
  fingerprint: string;
  expiresAt: Date;
}

/**
 * Derive the fingerprint of an event.
 *
 * Only the source kind and the raw identity take part: notional and price are
 * facts of the same logical event and must not defeat dedup on re-fetch.
 */
export function fingerprint(event: Pick<NormalizedEvent, "source" | "rawIdentity">): string {
  return createHash("sha256")
    .update(event.source)
    .update("\u0000")
    .update(event.rawIdentity)
    .digest("hex");
}

export class Deduplicator {
  // fingerprint -> expiry (epoch ms)
  private readonly entries: Map<string, number> = new Map();

  /**
   * Decide whether an event should be emitted, recording its fingerprint when it is.
   * A TTL of zero or less disables deduplication.
   */
  shouldEmit(event: NormalizedEvent, now: Date, ttlMs: number): boolean {
    if (ttlMs <= 0) {
      return true;
    }

    const key = fingerprint(event);
    const nowMs = now.getTime();
    const expiresAt = this.entries.get(key);

    if (expiresAt !== undefined && expiresAt > nowMs) {
      return false;
    }

    this.entries.set(key, nowMs + ttlMs);
    return true;
  }

  /**
   * Whether a live entry exists for the event
   */
  isSuppressed(event: NormalizedEvent, now: Date): boolean {
    const expiresAt = this.entries.get(fingerprint(event));
    return expiresAt !== undefined && expiresAt > now.getTime();
  }

  /**
   * Drop every entry whose expiry has passed. Returns the number removed.
   */
  purgeExpired(now: Date): number {
    const nowMs = now.getTime();
    let removed = 0;
    for (const [key, expiresAt] of this.entries) {
      if (expiresAt <= nowMs) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  getEntry(event: NormalizedEvent): DedupEntry | undefined {
    const key = fingerprint(event);
    const expiresAt = this.entries.get(key);
    return expiresAt === undefined ? undefined : { fingerprint: key, expiresAt: new Date(expiresAt) };
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
