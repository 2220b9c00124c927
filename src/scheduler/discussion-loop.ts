/**
 * DiscussionLoop: the unattended outer loop. Runs a round whenever enabled and idle,
 * polls while disabled, and backs off after an unexpected round failure.
 */

import type { RoundOutcome } from "./types";
import { sleep as defaultSleep } from "../utils/async";
import { logError, logger } from "../logging";

export interface RoundRunner {
  runRound(): Promise<RoundOutcome>;
}

export interface DiscussionLoopConfig {
  scheduler: RoundRunner;
  startDelayMs: number;
  idlePollMs: number;
  errorBackoffMs: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export class DiscussionLoop {
  private readonly scheduler: RoundRunner;
  private readonly startDelayMs: number;
  private readonly idlePollMs: number;
  private readonly errorBackoffMs: number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private enabled = false;
  private readonly shutdownCtl = new AbortController();
  /** Aborted to cut an idle wait short. */
  private wake: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private roundsRun = 0;

  constructor(config: DiscussionLoopConfig) {
    this.scheduler = config.scheduler;
    this.startDelayMs = config.startDelayMs;
    this.idlePollMs = config.idlePollMs;
    this.errorBackoffMs = config.errorBackoffMs;
    this.sleep = config.sleep ?? defaultSleep;
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  /** True once start() has been called and until shutdown. */
  get isStarted(): boolean {
    return this.loop !== null && !this.shutdownCtl.signal.aborted;
  }

  get rounds(): number {
    return this.roundsRun;
  }

  start(enabled: boolean): void {
    if (this.loop) return;
    this.enabled = enabled;
    logger.info({ event: "LOOP_START", enabled }, "Discussion loop started");
    this.loop = this.run();
  }

  /** Returns false when already enabled. Wakes an idle wait so the next round starts promptly. */
  enable(): boolean {
    if (this.enabled) return false;
    this.enabled = true;
    this.wake?.abort();
    logger.info({ event: "LOOP_ENABLED" }, "Discussion enabled");
    return true;
  }

  /** Returns false when already disabled. A running round is not interrupted here. */
  disable(): boolean {
    if (!this.enabled) return false;
    this.enabled = false;
    logger.info({ event: "LOOP_DISABLED" }, "Discussion disabled");
    return true;
  }

  /** Stop looping and wait for the current round to return. */
  async shutdown(): Promise<void> {
    this.enabled = false;
    this.shutdownCtl.abort();
    this.wake?.abort();
    if (this.loop) await this.loop;
    logger.info({ event: "LOOP_SHUTDOWN", rounds: this.roundsRun }, "Discussion loop stopped");
  }

  private async run(): Promise<void> {
    const signal = this.shutdownCtl.signal;
    await this.idle(this.startDelayMs);
    while (!signal.aborted) {
      if (!this.enabled) {
        await this.idle(this.idlePollMs);
        continue;
      }
      try {
        const outcome = await this.scheduler.runRound();
        if (outcome === "skipped") {
          await this.idle(this.idlePollMs);
        } else {
          this.roundsRun++;
        }
      } catch (err) {
        logError(logger, err, { event: "LOOP_ROUND_FAILED" });
        await this.sleep(this.errorBackoffMs, signal);
      }
    }
  }

  private async idle(ms: number): Promise<void> {
    const wake = new AbortController();
    this.wake = wake;
    if (this.shutdownCtl.signal.aborted) wake.abort();
    await this.sleep(ms, wake.signal);
    if (this.wake === wake) this.wake = null;
  }
}
