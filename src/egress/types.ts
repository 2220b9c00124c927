/**
 * Egress types: where a synthesized utterance goes once it has audio.
 */

import type { AudioArtifact } from "../speech/synthesizer";
import type { PlatformStatus } from "../platform/types";

export type EgressOutput = "local" | "stream";

export interface EgressResult {
  /** Best-effort audio duration. */
  durationSec: number;
  /** Time spent inside emit(). */
  elapsedMs: number;
  /** Outputs that accepted the audio. */
  outputs: EgressOutput[];
}

export interface IEgressSink {
  /** Never rejects. A null artifact only yields a duration estimate. */
  emit(artifact: AudioArtifact | null, text: string): Promise<EgressResult>;
}

/** Raw PCM format of the continuous feed (16-bit little-endian). */
export interface PcmFormat {
  sampleRateHz: number;
  channels: number;
}

export interface FeedHooks {
  onConnected: () => void;
  onWarning: (message: string) => void;
  onExit: (code: number | null, signal: NodeJS.Signals | null) => void;
}

/** A running outbound feed that accepts speech PCM. */
export interface LiveFeed {
  readonly format: PcmFormat;
  readonly running: boolean;
  readonly connected: boolean;
  /** Connected, but no longer making progress. */
  readonly stalled: boolean;
  readonly pid: number | null;
  start(): void;
  /** Resolves once the PCM has been written to the feed at real-time pace (or the feed stopped). */
  push(pcm: Buffer): Promise<void>;
  /** Milliseconds of speech waiting to be written. */
  queuedMs(): number;
  stop(): Promise<void>;
}

/** Reports whichever feed is currently running. */
export interface FeedSource {
  activeFeed(): LiveFeed | null;
}

export interface StreamStatus {
  is_streaming: boolean;
  connected: boolean;
  stalled: boolean;
  /** Ingest URL with the key redacted. */
  target: string | null;
  pid: number | null;
  started_at: string | null;
  uptime_seconds: number;
  queue_ms: number;
  platform: PlatformStatus;
}
