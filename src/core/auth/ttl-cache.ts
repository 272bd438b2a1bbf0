// SPDX-License-Identifier: Apache-2.0

import {type Duration} from '../time/duration.js';
import * as constants from '../constants.js';

interface Entry<V> {
  value: V;
  expiresAt: number;
}

/**
 * A bounded map whose entries expire. A zero TTL disables caching. Once full, the least recently used entry
 * is evicted, and expired entries are swept on `set` at most once per default TTL.
 */
export class TtlCache<V> {
  private readonly entries = new Map<string, Entry<V>>();
  private nextSweepAt = 0;

  /**
   * @param defaultTtl - used when `set` is not given a TTL
   * @param now - the clock, in epoch milliseconds
   * @param capacity - the most entries kept
   */
  public constructor(
    private readonly defaultTtl: Duration,
    private readonly now: () => number = Date.now,
    private readonly capacity: number = constants.WEBHOOK_CACHE_CAPACITY,
  ) {}

  public get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    this.entries.delete(key);
    if (entry.expiresAt <= this.now()) {
      return undefined;
    }
    this.entries.set(key, entry);
    return entry.value;
  }

  public set(key: string, value: V, ttl: Duration = this.defaultTtl): void {
    if (ttl.toMillis() <= 0 || this.capacity <= 0) {
      return;
    }
    const now = this.now();
    if (now >= this.nextSweepAt) {
      this.sweep(now);
      this.nextSweepAt = now + Math.max(this.defaultTtl.toMillis(), 1000);
    }

    this.entries.delete(key);
    this.entries.set(key, {value, expiresAt: now + ttl.toMillis()});
    for (const oldest of this.entries.keys()) {
      if (this.entries.size <= this.capacity) {
        break;
      }
      this.entries.delete(oldest);
    }
  }

  public size(): number {
    return this.entries.size;
  }

  private sweep(now: number): void {
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }
  }
}
