/**
 * Continuous outbound feed: one long-lived ffmpeg process muxing a solid-colour video with PCM from stdin
 * into FLV over RTMP. A PcmPacer keeps stdin fed with speech or silence; optional drawtext layers show
 * the overlay files (topic, speaker, current line).
 */

import { spawn } from "child_process";
import type { Readable, Writable } from "stream";
import * as readline from "readline";
import type { FeedHooks, LiveFeed, PcmFormat } from "./types";
import { PcmPacer } from "./pcm-pacer";
import type { OverlayFiles } from "./overlay";
import { logger } from "../logging";

export const DEFAULT_FEED_FORMAT: PcmFormat = { sampleRateHz: 24_000, channels: 1 };

const STOP_TIMEOUT_MS = 5000;
export const DEFAULT_STALL_TIMEOUT_MS = 15_000;

export interface FeedProcess {
  readonly pid?: number;
  readonly stdin: Writable;
  readonly stderr: Readable;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: "error", listener: (err: Error) => void): unknown;
}

export type SpawnFeedProcess = (command: string, args: string[]) => FeedProcess;

export interface FfmpegFeedConfig {
  ffmpegPath: string;
  /** Full ingest URL including the key. */
  target: string;
  format?: PcmFormat;
  videoSize: string;
  backgroundColor: string;
  overlay?: OverlayFiles;
  fontFile?: string;
  hooks: FeedHooks;
  /** A connected feed with no progress line for this long counts as stalled. */
  stallTimeoutMs?: number;
  spawnProcess?: SpawnFeedProcess;
  now?: () => number;
}

export interface FfmpegArgsOptions {
  target: string;
  format: PcmFormat;
  videoSize: string;
  backgroundColor: string;
  overlay?: OverlayFiles;
  fontFile?: string;
  fps?: number;
}

/** Escape a value for a filter option inside a filtergraph (two parsing levels). */
export function escapeFilterValue(value: string): string {
  return value.replace(/[\\:'\[\],;]/g, (c) => `\\\\${c}`);
}

export function buildOverlayFilter(files: OverlayFiles, fontFile?: string): string {
  const font = fontFile ? `fontfile=${escapeFilterValue(fontFile)}:` : "";
  const layer = (file: string, size: number, y: string): string =>
    `drawtext=${font}textfile=${escapeFilterValue(file)}:reload=1:expansion=none` +
    `:fontcolor=white:fontsize=${size}:line_spacing=12:x=(w-text_w)/2:y=${y}`;
  return [
    layer(files.topicFile, 40, "h*0.08"),
    layer(files.speakerFile, 64, "h*0.32"),
    layer(files.lineFile, 44, "h*0.46"),
  ].join(",");
}

export function buildFfmpegArgs(o: FfmpegArgsOptions): string[] {
  const fps = o.fps ?? 30;
  return [
    "-hide_banner",
    "-loglevel", "info",
    "-re",
    "-f", "lavfi",
    "-i", `color=c=${o.backgroundColor}:s=${o.videoSize}:r=${fps}`,
    "-f", "s16le",
    "-ar", String(o.format.sampleRateHz),
    "-ac", String(o.format.channels),
    "-i", "pipe:0",
    "-map", "0:v",
    "-map", "1:a",
    ...(o.overlay ? ["-vf", buildOverlayFilter(o.overlay, o.fontFile)] : []),
    "-c:v", "libx264",
    "-preset", "veryfast",
    "-tune", "stillimage",
    "-pix_fmt", "yuv420p",
    "-g", String(fps * 2),
    "-b:v", "2500k",
    "-maxrate", "2500k",
    "-bufsize", "5000k",
    "-c:a", "aac",
    "-b:a", "128k",
    "-ar", "44100",
    "-f", "flv",
    o.target,
  ];
}

export type FfmpegLineKind = "progress" | "connected" | "error" | "info";

/** Classify one ffmpeg stderr line. */
export function classifyFfmpegLine(line: string): FfmpegLineKind {
  const l = line.trim();
  if (/^frame=\s*\d+/.test(l) || /\bsize=.*\btime=/.test(l)) return "progress";
  if (/^Output #0/.test(l)) return "connected";
  if (/error|failed|refused|broken pipe|connection reset|invalid|could not/i.test(l)) return "error";
  return "info";
}

/** Hide the stream key: keep the base URL and the key's last 4 characters. */
export function redactTarget(target: string): string {
  const i = target.lastIndexOf("/");
  if (i < 0 || i === target.length - 1) return target;
  const key = target.slice(i + 1);
  return `${target.slice(0, i + 1)}****${key.length > 8 ? key.slice(-4) : ""}`;
}

export class FfmpegFeed implements LiveFeed {
  readonly format: PcmFormat;
  private readonly config: FfmpegFeedConfig;
  private proc: FeedProcess | null = null;
  private pacer: PcmPacer | null = null;
  private exited: Promise<void> = Promise.resolve();
  private isConnected = false;
  private lastProgressAt = 0;
  private lastProgressLogAt = 0;
  private readonly stallTimeoutMs: number;
  private readonly now: () => number;

  constructor(config: FfmpegFeedConfig) {
    this.config = config;
    this.format = config.format ?? DEFAULT_FEED_FORMAT;
    this.stallTimeoutMs = config.stallTimeoutMs ?? DEFAULT_STALL_TIMEOUT_MS;
    this.now = config.now ?? Date.now;
  }

  get running(): boolean {
    return this.proc !== null;
  }

  get connected(): boolean {
    return this.isConnected;
  }

  /** Connected once, but ffmpeg has stopped reporting progress (a wedged ingest or encoder). */
  get stalled(): boolean {
    return this.proc !== null && this.isConnected && this.now() - this.lastProgressAt > this.stallTimeoutMs;
  }

  get pid(): number | null {
    return this.proc?.pid ?? null;
  }

  start(): void {
    if (this.proc) return;
    const args = buildFfmpegArgs({
      target: this.config.target,
      format: this.format,
      videoSize: this.config.videoSize,
      backgroundColor: this.config.backgroundColor,
      overlay: this.config.overlay,
      fontFile: this.config.fontFile,
    });
    const spawnProcess: SpawnFeedProcess =
      this.config.spawnProcess ?? ((cmd, a) => spawn(cmd, a, { stdio: ["pipe", "ignore", "pipe"] }));
    const proc = spawnProcess(this.config.ffmpegPath, args);
    this.proc = proc;
    logger.info({ event: "STREAM_FEED_SPAWNED", pid: proc.pid, target: redactTarget(this.config.target) }, "ffmpeg feed started");

    this.exited = new Promise<void>((resolve) => {
      let done = false;
      const finish = (code: number | null, signal: NodeJS.Signals | null): void => {
        if (done) return;
        done = true;
        this.teardown();
        logger.info({ event: "STREAM_FEED_EXIT", code, signal }, "ffmpeg feed exited");
        this.config.hooks.onExit(code, signal);
        resolve();
      };
      proc.once("exit", finish);
      proc.once("error", (err) => {
        logger.error({ event: "STREAM_FEED_ERROR", err: err.message }, "ffmpeg feed failed");
        this.config.hooks.onWarning(`ffmpeg failed: ${err.message}`);
        finish(null, null);
      });
    });
    proc.stdin.on("error", (err) => {
      // EPIPE once ffmpeg dies; the exit handler reports it.
      logger.debug({ event: "STREAM_FEED_STDIN_ERROR", err: err.message }, "ffmpeg stdin error");
    });

    const rl = readline.createInterface({ input: proc.stderr });
    rl.on("line", (line) => this.onStderrLine(line));

    this.pacer = new PcmPacer(proc.stdin, this.format);
    this.pacer.start();
  }

  push(pcm: Buffer): Promise<void> {
    return this.pacer ? this.pacer.push(pcm) : Promise.resolve();
  }

  queuedMs(): number {
    return this.pacer?.queuedMs() ?? 0;
  }

  async stop(): Promise<void> {
    const proc = this.proc;
    if (!proc) return;
    this.pacer?.stop();
    proc.stdin.end();
    proc.kill("SIGTERM");
    const timer = setTimeout(() => {
      if (this.proc === proc) proc.kill("SIGKILL");
    }, STOP_TIMEOUT_MS);
    try {
      await this.exited;
    } finally {
      clearTimeout(timer);
    }
  }

  private teardown(): void {
    this.pacer?.stop();
    this.pacer = null;
    this.proc = null;
    this.isConnected = false;
  }

  private onStderrLine(line: string): void {
    const kind = classifyFfmpegLine(line);
    if (kind === "connected" || kind === "progress") this.lastProgressAt = this.now();
    if ((kind === "connected" || kind === "progress") && !this.isConnected && this.proc) {
      this.isConnected = true;
      logger.info({ event: "STREAM_CONNECTED" }, "ffmpeg feed connected");
      this.config.hooks.onConnected();
    }
    if (kind === "error") {
      logger.warn({ event: "STREAM_FEED_STDERR", line: line.trim() }, "ffmpeg reported an error");
      this.config.hooks.onWarning(line.trim());
    } else if (kind === "progress") {
      if (this.lastProgressAt - this.lastProgressLogAt >= 30_000) {
        this.lastProgressLogAt = this.lastProgressAt;
        logger.debug({ event: "STREAM_FEED_STATS", line: line.trim() }, "ffmpeg progress");
      }
    }
  }
}
