/**
 * Manual stream key: RTMP base URL + a key pasted from the platform's dashboard.
 * The key can come from config or from the start request, and can be rotated between streams.
 */

import type { BroadcastLifecycle, LivePlatformControl, PlatformStatus, PrepareOptions } from "./types";
import { ExternalResourceMissingError } from "../utils/errors";
import { logger } from "../logging";

export interface ManualKeyPlatformConfig {
  rtmpUrl: string;
  streamKey?: string;
}

export class ManualKeyPlatform implements LivePlatformControl {
  readonly kind = "manual_key" as const;
  private streamKey: string | undefined;
  private lifecycle: BroadcastLifecycle = "idle";

  constructor(private readonly config: ManualKeyPlatformConfig) {
    this.streamKey = config.streamKey?.trim() || undefined;
  }

  /** Replace the key used by the next prepare(). */
  rotateKey(streamKey: string): void {
    const key = streamKey.trim();
    if (!key) throw new ExternalResourceMissingError("Stream key is empty");
    this.streamKey = key;
    logger.info({ event: "STREAM_KEY_ROTATED" }, "Stream key rotated");
  }

  async prepare(options: PrepareOptions): Promise<string> {
    if (options.streamKey?.trim()) this.rotateKey(options.streamKey);
    if (!this.streamKey) {
      throw new ExternalResourceMissingError("Stream key is not configured; pass stream_key or set STREAM_KEY");
    }
    this.lifecycle = "ready";
    return `${this.config.rtmpUrl.replace(/\/+$/, "")}/${this.streamKey}`;
  }

  async goLive(): Promise<void> {
    // The platform goes live on its own once ingest starts.
    this.lifecycle = "live";
  }

  async end(): Promise<void> {
    this.lifecycle = "complete";
  }

  status(): PlatformStatus {
    return { kind: this.kind, lifecycle: this.lifecycle, broadcast_id: null, watch_url: null };
  }
}
