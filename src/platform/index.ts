/**
 * Live platform factory: returns the control plane selected by LIVE_PLATFORM.
 */

import type { AppConfig } from "../config";
import type { LivePlatformControl } from "./types";
import { NoLivePlatform } from "./none";
import { ManualKeyPlatform } from "./manual-key";
import { YouTubePlatform } from "./youtube";

export type { LivePlatformControl, PlatformStatus, PrepareOptions, BroadcastLifecycle } from "./types";
export { NoLivePlatform } from "./none";
export { ManualKeyPlatform } from "./manual-key";
export { YouTubePlatform } from "./youtube";

export function createLivePlatform(config: AppConfig): LivePlatformControl {
  const p = config.platform;
  switch (p.kind) {
    case "none":
      return new NoLivePlatform();
    case "manual_key":
      return new ManualKeyPlatform({ rtmpUrl: p.rtmpUrl, streamKey: p.streamKey });
    case "managed_account":
      return new YouTubePlatform({
        accessToken: p.youtubeAccessToken,
        privacyStatus: p.privacyStatus,
        title: p.title,
        description: p.description,
      });
  }
}
