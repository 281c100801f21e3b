/**
 * Event Deduplication Service
 *
 * In-memory deduplication for Slack events within one process.
 *
 * Design:
 * - `seen()` checks and records in one synchronous step, so two concurrent
 *   deliveries of the same event can never both pass
 * - Retention is bounded by a TTL and a max size; both are injectable
 * - Insertion order of the Map doubles as age order for eviction
 */

import { DEDUPE_CONSTANTS } from '../config/constants';
import { logDebug, logInfo } from '../utils/slackLogger';

export interface DedupePolicy {
  /** Forget ids older than this. Omit to keep ids for the process lifetime. */
  ttlMs?: number;
  /** Drop the oldest ids past this size. Omit for no size bound. */
  maxEntries?: number;
  /** Clock in milliseconds */
  now?: () => number;
}

export const DEFAULT_DEDUPE_POLICY: DedupePolicy = {
  ttlMs: DEDUPE_CONSTANTS.TTL_MS,
  maxEntries: DEDUPE_CONSTANTS.MAX_ENTRIES,
};

export class EventDeduplicator {
  private readonly seenAt = new Map<string, number>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(policy: DedupePolicy = DEFAULT_DEDUPE_POLICY) {
    this.ttlMs = policy.ttlMs ?? Number.POSITIVE_INFINITY;
    this.maxEntries = policy.maxEntries ?? Number.POSITIVE_INFINITY;
    this.now = policy.now ?? Date.now;

    if (this.maxEntries < 1) {
      throw new Error(`[Dedupe] maxEntries must be at least 1, got ${policy.maxEntries}`);
    }
  }

  /**
   * Check whether an event was processed before, recording it if not.
   *
   * @returns true if duplicate (already seen), false if new
   */
  seen(eventId: string): boolean {
    const now = this.now();
    this.evictExpired(now);

    if (this.seenAt.has(eventId)) {
      logInfo(`[Dedupe] Duplicate detected: ${eventId}`);
      return true;
    }

    this.seenAt.set(eventId, now);
    this.evictOverflow();
    return false;
  }

  get size(): number {
    return this.seenAt.size;
  }

  private evictExpired(now: number): void {
    if (this.ttlMs === Number.POSITIVE_INFINITY) return;

    const cutoff = now - this.ttlMs;
    for (const [key, timestamp] of this.seenAt) {
      if (timestamp > cutoff) break;
      this.seenAt.delete(key);
    }
  }

  private evictOverflow(): void {
    while (this.seenAt.size > this.maxEntries) {
      const oldest = this.seenAt.keys().next();
      if (oldest.done) return;
      this.seenAt.delete(oldest.value);
      logDebug(`[Dedupe] Evicted oldest entry: ${oldest.value}`);
    }
  }
}
