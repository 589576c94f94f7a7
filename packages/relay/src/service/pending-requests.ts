/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '@lsp-relay/core';

import { DuplicateInFlightIdError } from '../errors.js';
import type { RequestId } from '../types.js';

const logger = DebugLogger.getLogger('lsp-relay:pending');

export interface PendingEntry {
  id: RequestId;
  method: string;
  recordedAt: number;
}

export interface PendingRequestTableOptions {
  /** Entries older than this are evicted; `0` keeps them until resolved. */
  requestTimeoutMs?: number;
  onEvict?: (entry: PendingEntry) => void;
  now?: () => number;
}

interface Slot {
  entry: PendingEntry;
  timer: ReturnType<typeof setTimeout> | null;
}

/**
 * Correlates server-bound request ids with the method that was sent, so a
 * response (which carries only an id) can reach the right response hook.
 *
 * Every operation runs to completion synchronously, which makes each one
 * atomic with respect to both forwarding loops. Callers never keep an entry
 * across an await; they get copies.
 *
 * `1` and `"1"` are distinct ids.
 */
export class PendingRequestTable {
  private readonly slots = new Map<RequestId, Slot>();
  private readonly requestTimeoutMs: number;
  private readonly onEvict: ((entry: PendingEntry) => void) | undefined;
  private readonly now: () => number;
  private evictedCount = 0;

  constructor(options: PendingRequestTableOptions = {}) {
    this.requestTimeoutMs = Math.max(0, options.requestTimeoutMs ?? 0);
    this.onEvict = options.onEvict;
    this.now = options.now ?? Date.now;
  }

  /**
   * Starts tracking `id`. When `id` is already pending the newer mapping
   * replaces the older one and the collision is returned for reporting.
   */
  record(id: RequestId, method: string): DuplicateInFlightIdError | undefined {
    const existing = this.slots.get(id);
    let duplicate: DuplicateInFlightIdError | undefined;
    if (existing) {
      duplicate = new DuplicateInFlightIdError(
        id,
        existing.entry.method,
        method,
      );
      this.clearTimer(existing);
    }

    const slot: Slot = {
      entry: { id, method, recordedAt: this.now() },
      timer: null,
    };
    if (this.requestTimeoutMs > 0) {
      slot.timer = setTimeout(() => this.evict(id, slot), this.requestTimeoutMs);
      slot.timer.unref?.();
    }
    this.slots.set(id, slot);
    return duplicate;
  }

  /** Stops tracking `id` and returns the method it was sent with. */
  resolve(id: RequestId): string | undefined {
    const slot = this.slots.get(id);
    if (!slot) {
      return undefined;
    }
    this.clearTimer(slot);
    this.slots.delete(id);
    return slot.entry.method;
  }

  has(id: RequestId): boolean {
    return this.slots.has(id);
  }

  get(id: RequestId): PendingEntry | undefined {
    const slot = this.slots.get(id);
    return slot ? { ...slot.entry } : undefined;
  }

  get size(): number {
    return this.slots.size;
  }

  get evictions(): number {
    return this.evictedCount;
  }

  entries(): PendingEntry[] {
    return [...this.slots.values()].map((slot) => ({ ...slot.entry }));
  }

  /** Drops every entry and cancels their timers, e.g. at session end. */
  clear(): void {
    for (const slot of this.slots.values()) {
      this.clearTimer(slot);
    }
    this.slots.clear();
  }

  private evict(id: RequestId, slot: Slot): void {
    // A newer record for the same id owns the map entry now.
    if (this.slots.get(id) !== slot) {
      return;
    }
    slot.timer = null;
    this.slots.delete(id);
    this.evictedCount += 1;
    logger.warn(
      () =>
        `Evicted '${slot.entry.method}' request ${JSON.stringify(id)} after ${this.requestTimeoutMs}ms without a response`,
    );
    this.onEvict?.({ ...slot.entry });
  }

  private clearTimer(slot: Slot): void {
    if (slot.timer !== null) {
      clearTimeout(slot.timer);
      slot.timer = null;
    }
  }
}
