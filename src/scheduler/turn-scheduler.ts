/**
 * TurnScheduler: owns the discussion state and runs rounds.
 *
 * Idle -> RoundRunning -> Idle. A round picks a topic if none is set, walks a fresh random speaking
 * order one persona at a time (generate -> synthesize -> egress -> pace), then pauses and may rotate
 * the topic. At most one round runs at a time: `running` is checked and set before the first await.
 */

import type { EventSink } from "../events/types";
import type { IDiscussionHistory } from "../memory/types";
import { DiscussionHistory } from "../memory/history";
import type { Persona } from "../personas/types";
import type { PersonaRegistry } from "../personas/registry";
import type { TopicCatalog } from "../personas/topics";
import type { IEgressSink } from "../egress/types";
import type {
  DiscussionStateView,
  ISpeechSynthesizer,
  IUtteranceGenerator,
  RoundOutcome,
  SchedulerPacing,
} from "./types";
import { shuffle, uniformBetween } from "./pacing";
import { recordTurnMetrics } from "../metrics";
import { sleep as defaultSleep } from "../utils/async";
import { errMessage, logError, logger, logTurn, preview } from "../logging";

export interface TurnSchedulerConfig {
  registry: PersonaRegistry;
  topics: TopicCatalog;
  generator: IUtteranceGenerator;
  synthesizer: ISpeechSynthesizer;
  egress: IEgressSink;
  events: EventSink;
  pacing: SchedulerPacing;
  history?: IDiscussionHistory;
  /** Float in [0, 1). */
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
}

const DEFAULT_HISTORY_RETENTION = 200;

export class TurnScheduler {
  private readonly registry: PersonaRegistry;
  private readonly topics: TopicCatalog;
  private readonly generator: IUtteranceGenerator;
  private readonly synthesizer: ISpeechSynthesizer;
  private readonly egress: IEgressSink;
  private readonly events: EventSink;
  private readonly pacing: SchedulerPacing;
  private readonly history: IDiscussionHistory;
  private readonly random: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly now: () => number;

  private topic = "";
  private round = 0;
  private messageCount = 0;
  private activeAgentId: string | null = null;
  private running = false;
  private stopRequested = false;
  private lastTurnAt: number | null = null;
  /** Aborts pacing sleeps of the current round on stop. */
  private roundAbort: AbortController | null = null;

  constructor(config: TurnSchedulerConfig) {
    this.registry = config.registry;
    this.topics = config.topics;
    this.generator = config.generator;
    this.synthesizer = config.synthesizer;
    this.egress = config.egress;
    this.events = config.events;
    this.pacing = config.pacing;
    this.history = config.history ?? new DiscussionHistory({ maxEntries: DEFAULT_HISTORY_RETENTION });
    this.random = config.random ?? Math.random;
    this.sleep = config.sleep ?? defaultSleep;
    this.now = config.now ?? Date.now;
  }

  /** Synchronous; never waits on a running round. */
  getSnapshot(): DiscussionStateView {
    return {
      topic: this.topic,
      round: this.round,
      messageCount: this.messageCount,
      activeAgentId: this.activeAgentId,
      running: this.running,
      stopRequested: this.stopRequested,
      lastTurnAt: this.lastTurnAt,
    };
  }

  /**
   * Set the topic (the override when non-empty, otherwise a catalog pick different from the current one
   * when possible) and announce it. A running round keeps the topic it started with.
   */
  selectTopic(override?: string): string {
    const forced = override?.trim();
    let topic = forced || this.topics.pick(this.random);
    for (let tries = 0; !forced && topic === this.topic && this.topics.size > 1 && tries < 5; tries++) {
      topic = this.topics.pick(this.random);
    }
    this.topic = topic;
    logger.info({ event: "TOPIC_CHANGED", topic, round: this.round, forced: Boolean(forced) }, "Topic changed");
    this.events.publish("topic_update", { topic, round: this.round });
    return topic;
  }

  /** Cooperative stop, honoured at the next turn boundary. Returns true when a round was running. */
  requestStop(): boolean {
    if (!this.running) return false;
    this.stopRequested = true;
    this.roundAbort?.abort();
    logger.info({ event: "STOP_REQUESTED", round: this.round }, "Stop requested");
    return true;
  }

  async runRound(): Promise<RoundOutcome> {
    if (this.running) {
      logger.debug({ event: "ROUND_SKIPPED", round: this.round }, "Round already running");
      return "skipped";
    }
    this.running = true;
    this.stopRequested = false;
    const abort = new AbortController();
    this.roundAbort = abort;

    try {
      this.round += 1;
      const round = this.round;
      if (!this.topic) this.topic = this.topics.pick(this.random);
      const topic = this.topic;
      logger.info({ event: "ROUND_START", round, topic }, "Round start");
      this.events.publish("topic_update", { topic, round });

      const order = shuffle(this.registry.list(), this.random);
      for (let i = 0; i < order.length; i++) {
        if (this.stopRequested) break;
        await this.runTurn(order[i], round, topic);
        if (i < order.length - 1 && !this.stopRequested) {
          await this.sleep(
            uniformBetween(this.pacing.interTurnPauseMinMs, this.pacing.interTurnPauseMaxMs, this.random),
            abort.signal
          );
        }
      }

      if (this.stopRequested) {
        logger.info({ event: "ROUND_STOPPED", round, totalMessages: this.messageCount }, "Round stopped");
        this.events.publish("discussion_stopped", { round, total_messages: this.messageCount });
        return "stopped";
      }

      logger.info({ event: "ROUND_COMPLETE", round, totalMessages: this.messageCount }, "Round complete");
      this.events.publish("round_complete", {
        round,
        total_messages: this.messageCount,
        next_round_in_seconds: Math.round(this.pacing.interRoundDelayMs / 1000),
      });
      await this.sleep(this.pacing.interRoundDelayMs, abort.signal);
      if (!this.stopRequested && this.random() < this.pacing.topicRotationProbability) {
        this.selectTopic();
      }
      return "completed";
    } finally {
      this.running = false;
      this.activeAgentId = null;
      this.roundAbort = null;
    }
  }

  private async runTurn(persona: Persona, round: number, topic: string): Promise<void> {
    const turnStart = this.now();
    this.activeAgentId = persona.id;
    logTurn(logger, "start", round, persona.id);
    this.events.publish("agent_start_speaking", {
      agent_id: persona.id,
      agent_name: persona.name,
      avatar: persona.avatar,
      color: persona.color,
      round,
    });

    try {
      const llmStart = this.now();
      const { text, source } = await this.generator.generate(
        persona,
        topic,
        this.history.recent(this.pacing.historyWindow)
      );
      const llmLatencyMs = this.now() - llmStart;

      this.history.append({ agentId: persona.id, agentName: persona.name, text });
      this.messageCount += 1;
      logger.info({ event: "MESSAGE", round, personaId: persona.id, source, text: preview(text) }, "New message");
      this.events.publish("new_message", {
        agent_id: persona.id,
        agent_name: persona.name,
        avatar: persona.avatar,
        color: persona.color,
        expertise: persona.expertise,
        message: text,
        timestamp: new Date(this.now()).toISOString(),
        message_count: this.messageCount,
        round,
      });

      const ttsStart = this.now();
      const artifact = await this.synthesizer.synthesize(text, persona.voice);
      const ttsLatencyMs = this.now() - ttsStart;

      const result = await this.egress.emit(artifact, text);
      const remainingMs = result.durationSec * 1000 + this.pacing.postSpeechBufferMs - result.elapsedMs;
      if (remainingMs > 0) await this.sleep(remainingMs);

      this.lastTurnAt = this.now();
      recordTurnMetrics({
        round,
        personaId: persona.id,
        llmLatencyMs,
        utteranceSource: source,
        ttsLatencyMs,
        egressMs: result.elapsedMs,
        totalMs: this.lastTurnAt - turnStart,
        audioSec: result.durationSec,
        ttsCached: artifact?.cached,
        responseChars: text.length,
      });
    } catch (err) {
      logError(logger, err, { event: "TURN_FAILED", round, personaId: persona.id });
      this.events.publish("discussion_error", { round, agent_id: persona.id, message: errMessage(err) });
    } finally {
      this.activeAgentId = null;
      this.events.publish("agent_stop_speaking", { agent_id: persona.id, round });
      logTurn(logger, "end", round, persona.id);
    }
  }
}
