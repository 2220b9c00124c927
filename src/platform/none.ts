import type { LivePlatformControl, PlatformStatus, PrepareOptions } from "./types";
import { ExternalResourceMissingError } from "../utils/errors";

/** No live platform: the outbound feed can never start. */
export class NoLivePlatform implements LivePlatformControl {
  readonly kind = "none" as const;

  async prepare(_options: PrepareOptions): Promise<string> {
    throw new ExternalResourceMissingError("No live platform configured (LIVE_PLATFORM=none)");
  }

  async goLive(): Promise<void> {}

  async end(): Promise<void> {}

  status(): PlatformStatus {
    return { kind: this.kind, lifecycle: "idle", broadcast_id: null, watch_url: null };
  }
}
