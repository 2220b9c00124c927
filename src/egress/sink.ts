/**
 * EgressSink: plays and/or streams one artifact and reports how long the audio lasts.
 * Output failures become `stream_warning` events; emit() itself never rejects.
 */

import type { AudioArtifact } from "../speech/synthesizer";
import type { EventSink } from "../events/types";
import type { EgressOutput, EgressResult, FeedSource, IEgressSink, PcmFormat } from "./types";
import type { LocalPlayer } from "./local-player";
import { decodeToPcm } from "./decode";
import { estimateSpeechSeconds, probeDuration } from "./duration";
import { withTimeout } from "../utils/async";
import { errMessage, logger } from "../logging";

const DEFAULT_GRACE_MS = 15_000;
const DEFAULT_PROBE_TIMEOUT_MS = 5000;

export interface EgressSinkConfig {
  feeds: FeedSource;
  events: EventSink;
  /** Null disables local playback. */
  player?: LocalPlayer | null;
  ffmpegPath: string;
  ffprobePath: string;
  /** Allowed beyond the audio's own duration for each output. */
  graceMs?: number;
  probeTimeoutMs?: number;
  probe?: (filePath: string) => Promise<number | null>;
  decode?: (filePath: string, format: PcmFormat) => Promise<Buffer>;
}

export class EgressSink implements IEgressSink {
  private readonly feeds: FeedSource;
  private readonly events: EventSink;
  private readonly player: LocalPlayer | null;
  private readonly graceMs: number;
  private readonly probe: (filePath: string) => Promise<number | null>;
  private readonly decode: (filePath: string, format: PcmFormat) => Promise<Buffer>;

  constructor(config: EgressSinkConfig) {
    this.feeds = config.feeds;
    this.events = config.events;
    this.player = config.player ?? null;
    this.graceMs = config.graceMs ?? DEFAULT_GRACE_MS;
    const probeTimeoutMs = config.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.probe = config.probe ?? ((p) => probeDuration(p, config.ffprobePath, probeTimeoutMs));
    this.decode = config.decode ?? ((p, format) => decodeToPcm(p, format, config.ffmpegPath, this.graceMs));
  }

  async emit(artifact: AudioArtifact | null, text: string): Promise<EgressResult> {
    const start = Date.now();
    const durationSec = await this.resolveDuration(artifact, text);
    const outputs: EgressOutput[] = [];
    if (!artifact) return { durationSec, elapsedMs: Date.now() - start, outputs };

    const budgetMs = Math.ceil(durationSec * 1000) + this.graceMs;
    const tasks: Promise<void>[] = [];

    const feed = this.feeds.activeFeed();
    if (feed?.running) {
      tasks.push(
        this.run("stream", budgetMs, async () => {
          const pcm = await this.decode(artifact.path, feed.format);
          await feed.push(pcm);
        }).then((ok) => {
          if (ok) outputs.push("stream");
        })
      );
    }
    const player = this.player;
    if (player) {
      tasks.push(
        this.run("local", budgetMs, () => player.play(artifact.path, budgetMs)).then((ok) => {
          if (ok) outputs.push("local");
        })
      );
    }
    await Promise.all(tasks);

    const elapsedMs = Date.now() - start;
    logger.info({ event: "EGRESS", key: artifact.key, durationSec, elapsedMs, outputs }, "Egress complete");
    return { durationSec, elapsedMs, outputs };
  }

  private async resolveDuration(artifact: AudioArtifact | null, text: string): Promise<number> {
    if (!artifact) return estimateSpeechSeconds(text);
    if (artifact.durationSec !== null && artifact.durationSec > 0) return artifact.durationSec;
    try {
      const probed = await this.probe(artifact.path);
      if (probed !== null) return probed;
    } catch (err) {
      logger.warn({ event: "EGRESS_PROBE_FAILED", key: artifact.key, err: errMessage(err) }, "Duration probe failed");
    }
    return estimateSpeechSeconds(text);
  }

  /** Resolves false (after a warning) when the output fails or overruns its budget. */
  private async run(output: EgressOutput, budgetMs: number, fn: () => Promise<void>): Promise<boolean> {
    try {
      await withTimeout(fn(), budgetMs, `egress ${output}`);
      return true;
    } catch (err) {
      const message = `${output} output failed: ${errMessage(err)}`;
      logger.warn({ event: "EGRESS_FAILED", output, err: errMessage(err) }, "Egress output failed");
      this.events.publish("stream_warning", { message });
      return false;
    }
  }
}
