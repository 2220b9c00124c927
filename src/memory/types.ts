/**
 * Discussion history types.
 * Full log kept for display (bounded by retention); only the tail feeds the generator.
 */

export interface HistoryEntry {
  agentId: string;
  agentName: string;
  text: string;
  timestamp: number;
}

export interface IDiscussionHistory {
  /** Append one utterance; blank text is ignored. */
  append(entry: Omit<HistoryEntry, "timestamp">): void;

  /** The last `count` entries, oldest first. */
  recent(count: number): HistoryEntry[];

  /** Everything still retained, oldest first. */
  all(): HistoryEntry[];

  readonly size: number;
}
