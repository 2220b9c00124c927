/**
 * High-signal metrics and watchdogs for production.
 * Per-turn latencies are logged; watchdogs call recovery hooks after repeated failed checks.
 */

import { errMessage, logger } from "../logging";
import type { UtteranceSource } from "../scheduler/types";

/** Timing of one turn (ms). */
export interface TurnMetrics {
  round?: number;
  personaId?: string;
  llmLatencyMs?: number;
  utteranceSource?: UtteranceSource;
  ttsLatencyMs?: number;
  /** Time spent inside egress.emit(). */
  egressMs?: number;
  /** Turn start to turn end, including the post-speech wait. */
  totalMs?: number;
  /** Audio duration reported by egress (seconds). */
  audioSec?: number;
  ttsCached?: boolean;
  responseChars?: number;
}

export function recordTurnMetrics(metrics: TurnMetrics): void {
  logger.info(
    {
      event: "TURN_METRICS",
      round: metrics.round,
      persona_id: metrics.personaId,
      llm_latency_ms: metrics.llmLatencyMs,
      utterance_source: metrics.utteranceSource,
      tts_latency_ms: metrics.ttsLatencyMs,
      egress_ms: metrics.egressMs,
      total_ms: metrics.totalMs,
      audio_sec: metrics.audioSec,
      tts_cached: metrics.ttsCached,
      response_chars: metrics.responseChars,
    },
    "Turn latency"
  );
}

/** Watchdog: outbound feed health. Returns true if healthy (or not streaming). */
export type EgressHealthCheck = () => boolean;

/** Watchdog: discussion progress. Returns true if turns are still completing. */
export type DiscussionHealthCheck = () => boolean;

export interface WatchdogConfig {
  /** Tick interval for startWatchdog (ms). */
  intervalMs: number;
  /** Restart the feed if the egress check fails this many times in a row. */
  egressFailCountBeforeRestart?: number;
  /** Report a stalled discussion if the progress check fails this many times in a row. */
  discussionFailCountBeforeAlert?: number;
}

export interface WatchdogCallbacks {
  onEgressUnhealthy?: () => void | Promise<void>;
  onDiscussionStalled?: () => void | Promise<void>;
}

let egressFailCount = 0;
let discussionFailCount = 0;

export function resetWatchdogCounters(): void {
  egressFailCount = 0;
  discussionFailCount = 0;
}

function fire(name: string, cb: (() => void | Promise<void>) | undefined): void {
  Promise.resolve()
    .then(() => cb?.())
    .catch((e: unknown) => logger.warn({ event: "WATCHDOG_CALLBACK_FAILED", callback: name, err: errMessage(e) }, `${name} error`));
}

export interface WatchdogChecks {
  egress: EgressHealthCheck;
  discussion?: DiscussionHealthCheck;
}

/**
 * Run one watchdog tick: run health checks and call recovery callbacks if thresholds are reached.
 */
export function runWatchdogTick(
  config: WatchdogConfig,
  callbacks: WatchdogCallbacks,
  checks: WatchdogChecks
): void {
  if (!checks.egress()) {
    egressFailCount++;
    if (config.egressFailCountBeforeRestart != null && egressFailCount >= config.egressFailCountBeforeRestart) {
      logger.warn({ event: "WATCHDOG_EGRESS_UNHEALTHY", failCount: egressFailCount }, "Egress unhealthy; triggering restart");
      egressFailCount = 0;
      fire("onEgressUnhealthy", callbacks.onEgressUnhealthy);
    }
  } else {
    egressFailCount = 0;
  }

  if (checks.discussion) {
    if (!checks.discussion()) {
      discussionFailCount++;
      if (config.discussionFailCountBeforeAlert != null && discussionFailCount >= config.discussionFailCountBeforeAlert) {
        logger.warn({ event: "WATCHDOG_DISCUSSION_STALLED", failCount: discussionFailCount }, "Discussion stalled");
        discussionFailCount = 0;
        fire("onDiscussionStalled", callbacks.onDiscussionStalled);
      }
    } else {
      discussionFailCount = 0;
    }
  }
}

/** Runs a tick every config.intervalMs with fresh counters. Returns a stop function. */
export function startWatchdog(config: WatchdogConfig, callbacks: WatchdogCallbacks, checks: WatchdogChecks): () => void {
  resetWatchdogCounters();
  const timer = setInterval(() => runWatchdogTick(config, callbacks, checks), config.intervalMs);
  return () => clearInterval(timer);
}
