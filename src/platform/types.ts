/**
 * Live platform control plane: produces the ingest target for the outbound feed and drives the
 * remote broadcast's lifecycle.
 */

import type { LivePlatformKind } from "../config";

export type BroadcastLifecycle = "idle" | "ready" | "live" | "complete";

export interface PrepareOptions {
  title?: string;
  description?: string;
  /** Overrides the configured key (manual_key only). */
  streamKey?: string;
}

export interface PlatformStatus {
  kind: LivePlatformKind;
  lifecycle: BroadcastLifecycle;
  broadcast_id: string | null;
  watch_url: string | null;
}

export interface LivePlatformControl {
  readonly kind: LivePlatformKind;
  /**
   * Returns the full ingest URL (base + key).
   * Rejects with ExternalResourceMissingError when no target can be produced.
   */
  prepare(options: PrepareOptions): Promise<string>;
  /** Called once the feed reports it is connected. */
  goLive(): Promise<void>;
  /** Called after the feed stops. */
  end(): Promise<void>;
  status(): PlatformStatus;
}
