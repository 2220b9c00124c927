/**
 * Managed YouTube account via the YouTube Data API v3.
 * Needs a pre-acquired OAuth access token (YOUTUBE_ACCESS_TOKEN); acquiring one is out of scope.
 *
 * prepare: insert broadcast -> insert stream -> bind. goLive: transition to live. end: transition to complete.
 * A prepare that fails after the broadcast exists deletes what it created before rethrowing.
 */

import type { BroadcastLifecycle, LivePlatformControl, PlatformStatus, PrepareOptions } from "./types";
import { ExternalResourceMissingError } from "../utils/errors";
import { errMessage, logger } from "../logging";

const API_BASE = "https://www.googleapis.com/youtube/v3";

export interface YouTubePlatformConfig {
  accessToken?: string;
  privacyStatus: "public" | "unlisted" | "private";
  title: string;
  description: string;
  /** Clock for scheduledStartTime. */
  now?: () => Date;
}

/** Read a string at `keys` inside a parsed JSON value. */
export function readJsonString(value: unknown, ...keys: string[]): string | undefined {
  let cur: unknown = value;
  for (const key of keys) {
    if (typeof cur !== "object" || cur === null) return undefined;
    cur = new Map<string, unknown>(Object.entries(cur)).get(key);
  }
  return typeof cur === "string" ? cur : undefined;
}

export class YouTubePlatform implements LivePlatformControl {
  readonly kind = "managed_account" as const;
  private broadcastId: string | null = null;
  private lifecycle: BroadcastLifecycle = "idle";
  private readonly now: () => Date;

  constructor(private readonly config: YouTubePlatformConfig) {
    this.now = config.now ?? (() => new Date());
  }

  async prepare(options: PrepareOptions): Promise<string> {
    const token = this.token();
    const title = options.title?.trim() || this.config.title;
    const description = options.description?.trim() || this.config.description;

    const broadcast = await this.call(token, "POST", "/liveBroadcasts?part=snippet,status,contentDetails", {
      snippet: { title, description, scheduledStartTime: this.now().toISOString() },
      status: { privacyStatus: this.config.privacyStatus, selfDeclaredMadeForKids: false },
      contentDetails: { enableAutoStart: false, enableAutoStop: true },
    });
    const broadcastId = readJsonString(broadcast, "id");
    if (!broadcastId) throw new Error("YouTube API returned a broadcast without an id");

    let streamId: string | undefined;
    try {
      const stream = await this.call(token, "POST", "/liveStreams?part=snippet,cdn", {
        snippet: { title },
        cdn: { frameRate: "30fps", ingestionType: "rtmp", resolution: "1080p" },
      });
      streamId = readJsonString(stream, "id");
      const address = readJsonString(stream, "cdn", "ingestionInfo", "ingestionAddress");
      const streamName = readJsonString(stream, "cdn", "ingestionInfo", "streamName");
      if (!streamId || !address || !streamName) {
        throw new Error("YouTube API returned a stream without ingestion info");
      }

      await this.call(
        token,
        "POST",
        `/liveBroadcasts/bind?id=${encodeURIComponent(broadcastId)}&part=id,contentDetails&streamId=${encodeURIComponent(streamId)}`
      );

      this.broadcastId = broadcastId;
      this.lifecycle = "ready";
      logger.info({ event: "STREAM_PLATFORM_READY", broadcastId, streamId }, "YouTube broadcast created and bound");
      return `${address.replace(/\/+$/, "")}/${streamName}`;
    } catch (err) {
      await this.discard(token, broadcastId, streamId);
      throw err;
    }
  }

  async goLive(): Promise<void> {
    if (!this.broadcastId || this.lifecycle !== "ready") return;
    await this.transition(this.broadcastId, "live");
    this.lifecycle = "live";
  }

  async end(): Promise<void> {
    const id = this.broadcastId;
    if (!id || this.lifecycle === "complete") return;
    try {
      if (this.lifecycle === "live") await this.transition(id, "complete");
    } finally {
      this.lifecycle = "complete";
    }
  }

  status(): PlatformStatus {
    return {
      kind: this.kind,
      lifecycle: this.lifecycle,
      broadcast_id: this.broadcastId,
      watch_url: this.broadcastId ? `https://www.youtube.com/watch?v=${this.broadcastId}` : null,
    };
  }

  private token(): string {
    const token = this.config.accessToken?.trim();
    if (!token) throw new ExternalResourceMissingError("YouTube access token is not configured (YOUTUBE_ACCESS_TOKEN)");
    return token;
  }

  /** Best-effort delete of resources left by a failed prepare. */
  private async discard(token: string, broadcastId: string, streamId: string | undefined): Promise<void> {
    const leftovers: [string, string][] = [["/liveBroadcasts", broadcastId]];
    if (streamId) leftovers.push(["/liveStreams", streamId]);
    for (const [resource, id] of leftovers) {
      try {
        await this.call(token, "DELETE", `${resource}?id=${encodeURIComponent(id)}`);
        logger.info({ event: "STREAM_PLATFORM_CLEANUP", resource, id }, "Deleted partially created YouTube resource");
      } catch (err) {
        logger.warn(
          { event: "STREAM_PLATFORM_CLEANUP_FAILED", resource, id, err: errMessage(err) },
          "Could not delete partially created YouTube resource"
        );
      }
    }
  }

  private async transition(broadcastId: string, status: "live" | "complete"): Promise<void> {
    await this.call(
      this.token(),
      "POST",
      `/liveBroadcasts/transition?broadcastStatus=${status}&id=${encodeURIComponent(broadcastId)}&part=status`
    );
    logger.info({ event: "STREAM_PLATFORM_TRANSITION", broadcastId, status }, "YouTube broadcast transitioned");
  }

  private async call(token: string, method: string, pathAndQuery: string, body?: unknown): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(`${API_BASE}${pathAndQuery}`, {
        method,
        headers: {
          Authorization: `Bearer ${token}`,
          "Content-Type": "application/json",
        },
        body: body === undefined ? undefined : JSON.stringify(body),
      });
    } catch (err) {
      throw new Error(`YouTube API request failed: ${errMessage(err)}`);
    }
    if (!response.ok) {
      const errText = await response.text();
      throw new Error(`YouTube API ${method} ${pathAndQuery.split("?")[0]} failed: ${response.status} ${errText}`);
    }
    const text = await response.text();
    return text ? JSON.parse(text) : {};
  }
}
