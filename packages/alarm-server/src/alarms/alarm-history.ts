/**
 * Alarm transition audit trail.
 */

import { randomUUID } from 'crypto';
import { writeFileSync } from 'fs';
import { DEFAULT_HISTORY_MAX_ENTRIES, MANUAL_OVERRIDE_RAISED_BY } from '../constants.js';
import type { AlarmRecord } from './types.js';

export interface AlarmHistoryEntry {
  id: string;
  record: AlarmRecord;
}

export interface AlarmHistoryQuery {
  limit?: number;
  name?: string;
  raisedOnly?: boolean;
  raisedBy?: string;
}

export interface AlarmHistoryStats {
  total: number;
  raises: number;
  clears: number;
  overrides: number;
}

/**
 * In-memory trail of every record the bus commits, bounded to
 * `maxEntries` with the oldest evicted first. Records are immutable so
 * entries hold them by reference.
 */
export class AlarmHistory {
  private entries: AlarmHistoryEntry[] = [];
  private readonly maxEntries: number;

  constructor(maxEntries = DEFAULT_HISTORY_MAX_ENTRIES) {
    this.maxEntries = maxEntries;
  }

  record(record: AlarmRecord): AlarmHistoryEntry {
    const entry: AlarmHistoryEntry = { id: randomUUID(), record };
    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(-this.maxEntries);
    }
    return entry;
  }

  /** Entries newest first, filtered then limited. */
  getEntries(options: AlarmHistoryQuery = {}): AlarmHistoryEntry[] {
    let result = this.entries.filter(e =>
      (options.name === undefined || e.record.name === options.name) &&
      (!options.raisedOnly || e.record.raised) &&
      (options.raisedBy === undefined || e.record.raisedBy === options.raisedBy)
    );

    result.reverse();

    if (options.limit && options.limit > 0) {
      result = result.slice(0, options.limit);
    }
    return result;
  }

  getStats(): AlarmHistoryStats {
    let raises = 0;
    let overrides = 0;
    for (const { record } of this.entries) {
      if (record.raised) raises++;
      if (record.raisedBy === MANUAL_OVERRIDE_RAISED_BY) overrides++;
    }
    return { total: this.entries.length, raises, clears: this.entries.length - raises, overrides };
  }

  /**
   * Inclusive on both ends, oldest first.
   */
  getEntriesByTimeRange(startMs: number, endMs: number): AlarmHistoryEntry[] {
    return this.entries.filter(e => e.record.observedAt >= startMs && e.record.observedAt <= endMs);
  }

  /**
   * Export the trail to a JSON file.
   * @returns The number of entries written.
   */
  exportToFile(filePath: string, options: AlarmHistoryQuery = {}): number {
    const entries = this.getEntries(options);
    const data = {
      exportedAt: new Date().toISOString(),
      stats: this.getStats(),
      entries,
    };
    writeFileSync(filePath, JSON.stringify(data, null, 2));
    return entries.length;
  }

  get size(): number {
    return this.entries.length;
  }

  clear(): void {
    this.entries = [];
  }
}
