/**
 * Turn scheduler collaborators and state views.
 */

import type { HistoryEntry } from "../memory/types";
import type { Persona } from "../personas/types";
import type { AudioArtifact } from "../speech/synthesizer";

export type UtteranceSource = "llm" | "canned" | "error_fallback";

export interface GeneratedUtterance {
  /** Never empty. */
  text: string;
  source: UtteranceSource;
}

export interface IUtteranceGenerator {
  /** Never rejects. */
  generate(persona: Persona, topic: string, history: HistoryEntry[]): Promise<GeneratedUtterance>;
}

export interface ISpeechSynthesizer {
  /** Null when no audio could be produced. */
  synthesize(text: string, voiceId: string): Promise<AudioArtifact | null>;
}

export interface SchedulerPacing {
  historyWindow: number;
  interTurnPauseMinMs: number;
  interTurnPauseMaxMs: number;
  interRoundDelayMs: number;
  /** 0..1 */
  topicRotationProbability: number;
  postSpeechBufferMs: number;
}

export type RoundOutcome = "completed" | "stopped" | "skipped";

/** Read-only copy of DiscussionState. */
export interface DiscussionStateView {
  topic: string;
  round: number;
  messageCount: number;
  activeAgentId: string | null;
  running: boolean;
  stopRequested: boolean;
  /** Epoch ms of the last completed turn, or null before the first. */
  lastTurnAt: number | null;
}
