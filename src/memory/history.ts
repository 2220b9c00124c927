/**
 * In-memory discussion log: rolling list of utterances with a retention bound.
 */

import type { HistoryEntry, IDiscussionHistory } from "./types";

export interface DiscussionHistoryConfig {
  /** Max number of entries retained for display. */
  maxEntries: number;
}

export class DiscussionHistory implements IDiscussionHistory {
  private entries: HistoryEntry[] = [];
  private readonly maxEntries: number;

  constructor(config: DiscussionHistoryConfig) {
    this.maxEntries = Math.max(1, config.maxEntries);
  }

  append(entry: Omit<HistoryEntry, "timestamp">): void {
    const text = entry.text.trim();
    if (!text) return;
    this.entries.push({ ...entry, text, timestamp: Date.now() });
    while (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }
  }

  recent(count: number): HistoryEntry[] {
    if (count <= 0) return [];
    return this.entries.slice(-count);
  }

  all(): HistoryEntry[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }
}
