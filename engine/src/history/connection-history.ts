/**
 * Connection History
 *
 * Bounded, newest-first record of finished connection attempts. Lives for
 * the process only; nothing is persisted.
 */

import type { ConnectionHistoryEntry } from '@hostwarden/core';
import { CONNECTION_HISTORY_LIMIT } from '../connection/constants.js';

export class ConnectionHistory {
  private entries: ConnectionHistoryEntry[] = [];

  constructor(private readonly limit = CONNECTION_HISTORY_LIMIT) {}

  get size(): number {
    return this.entries.length;
  }

  record(entry: ConnectionHistoryEntry): void {
    this.entries.unshift(entry);
    if (this.entries.length > this.limit) {
      this.entries.length = this.limit;
    }
  }

  /** Newest first. */
  list(): ConnectionHistoryEntry[] {
    return [...this.entries];
  }
}
