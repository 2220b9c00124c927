/**
 * EventBroadcaster: synchronous fan-out of discussion events to observers, plus snapshots for late joiners.
 * Delivery is at-most-once; an observer that throws is logged and removed.
 */

import type { DiscussionEvents, EventEnvelope, EventKind, EventSink, Snapshot } from "./types";
import { errMessage, logger } from "../logging";

export type Observer = (envelope: EventEnvelope) => void;

export interface EventBroadcasterConfig {
  /** Builds the current view; must be synchronous and side-effect free. */
  snapshot: () => Snapshot;
}

export class EventBroadcaster implements EventSink {
  private readonly observers = new Set<Observer>();

  constructor(private readonly config: EventBroadcasterConfig) {}

  /** Returns an unsubscribe function. */
  subscribe(observer: Observer): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  get observerCount(): number {
    return this.observers.size;
  }

  publish<K extends EventKind>(kind: K, payload: DiscussionEvents[K]): void {
    const envelope: EventEnvelope = { event: kind, data: payload };
    logger.debug({ event: "BROADCAST", kind, observers: this.observers.size }, "Publishing event");
    for (const observer of [...this.observers]) {
      try {
        observer(envelope);
      } catch (err) {
        this.observers.delete(observer);
        logger.warn({ event: "OBSERVER_REMOVED", kind, err: errMessage(err) }, "Observer failed; removed");
      }
    }
  }

  snapshot(): Snapshot {
    return this.config.snapshot();
  }
}
