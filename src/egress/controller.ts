/**
 * LiveStreamController: starts and stops the outbound feed around a LivePlatformControl.
 * At most one feed runs at a time; the sink asks this controller for it via FeedSource.
 */

import type { EventSink } from "../events/types";
import type { LivePlatformControl, PrepareOptions } from "../platform/types";
import type { FeedHooks, FeedSource, LiveFeed, StreamStatus } from "./types";
import { redactTarget } from "./ffmpeg-feed";
import { StateConflictError } from "../utils/errors";
import { errMessage, logger } from "../logging";

export type FeedFactory = (target: string, hooks: FeedHooks) => LiveFeed;

export interface LiveStreamControllerConfig {
  platform: LivePlatformControl;
  events: EventSink;
  createFeed: FeedFactory;
  now?: () => number;
}

export type StartStreamOptions = PrepareOptions;

export class LiveStreamController implements FeedSource {
  private readonly platform: LivePlatformControl;
  private readonly events: EventSink;
  private readonly createFeed: FeedFactory;
  private readonly now: () => number;
  private feed: LiveFeed | null = null;
  private target: string | null = null;
  private startedAt: number | null = null;
  private starting = false;
  /** Set by a stop() that arrives while start() waits on the platform. */
  private pendingStop: string | null = null;
  private stopReason: string | null = null;

  constructor(config: LiveStreamControllerConfig) {
    this.platform = config.platform;
    this.events = config.events;
    this.createFeed = config.createFeed;
    this.now = config.now ?? Date.now;
  }

  activeFeed(): LiveFeed | null {
    return this.feed;
  }

  get isStreaming(): boolean {
    return this.feed?.running ?? false;
  }

  /**
   * Rejects with ExternalResourceMissingError when the platform cannot produce a target,
   * and with StateConflictError when a feed is already running or starting, or when a stop
   * arrived before the platform was ready.
   */
  async start(options: StartStreamOptions = {}): Promise<StreamStatus> {
    if (this.starting || this.isStreaming) throw new StateConflictError("Stream is already running");
    this.starting = true;
    try {
      const target = await this.platform.prepare(options);
      if (this.pendingStop !== null) await this.cancelStart(this.pendingStop);
      const redacted = redactTarget(target);
      const feed = this.createFeed(target, {
        onConnected: () => this.onConnected(feed, redacted),
        onWarning: (message) => this.events.publish("stream_warning", { message }),
        onExit: (code) => this.onExit(feed, code),
      });
      this.feed = feed;
      this.target = redacted;
      this.startedAt = this.now();
      this.stopReason = null;
      feed.start();
      logger.info({ event: "STREAM_STARTED", target: redacted, platform: this.platform.kind }, "Live stream started");
      this.events.publish("stream_started", {
        target: redacted,
        platform: this.platform.kind,
        title: options.title?.trim() || null,
      });
      return this.status();
    } finally {
      this.starting = false;
      this.pendingStop = null;
    }
  }

  /** Returns false when nothing was streaming or starting. */
  async stop(reason = "requested"): Promise<boolean> {
    if (this.starting) {
      this.pendingStop = reason;
      logger.info({ event: "STREAM_STOP_PENDING", reason }, "Stop requested while the platform prepares");
      return true;
    }
    const feed = this.feed;
    if (!feed) return false;
    this.stopReason = reason;
    await feed.stop();
    return true;
  }

  status(): StreamStatus {
    const feed = this.feed;
    const running = feed?.running ?? false;
    return {
      is_streaming: running,
      connected: feed?.connected ?? false,
      stalled: feed?.stalled ?? false,
      target: running ? this.target : null,
      pid: feed?.pid ?? null,
      started_at: running && this.startedAt !== null ? new Date(this.startedAt).toISOString() : null,
      uptime_seconds: running && this.startedAt !== null ? Math.floor((this.now() - this.startedAt) / 1000) : 0,
      queue_ms: feed?.queuedMs() ?? 0,
      platform: this.platform.status(),
    };
  }

  private async cancelStart(reason: string): Promise<never> {
    logger.info({ event: "STREAM_START_CANCELLED", reason }, "Stream start cancelled before the feed was spawned");
    this.events.publish("stream_stopped", { reason, exit_code: null });
    try {
      await this.platform.end();
    } catch (err) {
      logger.warn({ event: "STREAM_PLATFORM_END_FAILED", err: errMessage(err) }, "Platform end failed");
    }
    throw new StateConflictError("Stream start was cancelled by a stop request");
  }

  private onConnected(feed: LiveFeed, target: string): void {
    if (this.feed !== feed) return;
    this.events.publish("stream_connected", { target });
    this.platform.goLive().catch((err: unknown) => {
      logger.warn({ event: "STREAM_GO_LIVE_FAILED", err: errMessage(err) }, "Platform go-live failed");
      this.events.publish("stream_warning", { message: `Platform go-live failed: ${errMessage(err)}` });
    });
  }

  private onExit(feed: LiveFeed, code: number | null): void {
    if (this.feed !== feed) return;
    const reason = this.stopReason ?? (code === 0 ? "ended" : "process_exited");
    this.feed = null;
    this.startedAt = null;
    this.stopReason = null;
    logger.info({ event: "STREAM_STOPPED", reason, code }, "Live stream stopped");
    this.events.publish("stream_stopped", { reason, exit_code: code });
    this.platform.end().catch((err: unknown) => {
      logger.warn({ event: "STREAM_PLATFORM_END_FAILED", err: errMessage(err) }, "Platform end failed");
    });
  }
}
