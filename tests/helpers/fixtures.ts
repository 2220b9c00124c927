/**
 * Shared test fixtures: config, personas and in-process fakes for the scheduler's collaborators.
 */

import type { AppConfig } from "../../src/config";
import type { DiscussionEvents, EventKind, EventSink } from "../../src/events/types";
import type { EgressResult, IEgressSink } from "../../src/egress/types";
import type { Persona } from "../../src/personas/types";
import type { AudioArtifact } from "../../src/speech/synthesizer";

export function testConfig(): AppConfig {
  return {
    llm: { provider: "stub", timeoutMs: 25_000 },
    tts: {
      provider: "stub",
      timeoutMs: 20_000,
      defaultVoiceId: "male_en",
      cacheDir: "/tmp/roundtable-test-cache",
      cacheMaxEntries: 500,
      cacheMaxAgeMs: 24 * 60 * 60 * 1000,
    },
    discussion: {
      personasFile: "data/personas.json",
      topicsFile: "data/topics.json",
      historyWindow: 3,
      historyRetention: 200,
      interTurnPauseMinMs: 2000,
      interTurnPauseMaxMs: 3000,
      interRoundDelayMs: 10_000,
      topicRotationProbability: 0.3,
      postSpeechBufferMs: 500,
      maxUtteranceChars: 600,
      loopStartDelayMs: 2000,
      loopIdlePollMs: 500,
      loopErrorBackoffMs: 5000,
      autoStart: true,
    },
    egress: {
      localPlayback: false,
      ffmpegPath: "ffmpeg",
      ffprobePath: "ffprobe",
      ffplayPath: "ffplay",
      graceMs: 15_000,
      videoSize: "1920x1080",
      backgroundColor: "0x0c2461",
      overlay: false,
      overlayDir: "/tmp/roundtable-test-overlay",
    },
    platform: {
      kind: "none",
      rtmpUrl: "rtmp://ingest.example.test/live2",
      privacyStatus: "unlisted",
      title: "Test stream",
      description: "Test description",
    },
    server: { port: 0 },
  };
}

export function persona(id: string, overrides: Partial<Persona> = {}): Persona {
  return {
    id,
    name: `Dr. ${id[0].toUpperCase()}${id.slice(1)}`,
    expertise: "Quantum physics",
    personality: "Precise",
    avatar: "*",
    color: "#123456",
    voice: "male_en",
    ...overrides,
  };
}

export function fourPersonas(): Persona[] {
  return [
    persona("volkov", { expertise: "Quantum physics", voice: "male_en" }),
    persona("sokolova", { expertise: "Neurobiology", voice: "female_en" }),
    persona("petrov", { expertise: "Climate science", voice: "male_en_deep" }),
    persona("kovaleva", { expertise: "AI and robotics", voice: "female_en_soft" }),
  ];
}

export interface RecordedEvent {
  kind: EventKind;
  data: DiscussionEvents[EventKind];
}

/** EventSink that keeps every published event in order. */
export class RecordingSink implements EventSink {
  readonly events: RecordedEvent[] = [];

  publish<K extends EventKind>(kind: K, payload: DiscussionEvents[K]): void {
    this.events.push({ kind, data: payload });
  }

  kinds(): EventKind[] {
    return this.events.map((e) => e.kind);
  }

  ofKind(kind: EventKind): RecordedEvent[] {
    return this.events.filter((e) => e.kind === kind);
  }
}

/** Egress that reports a fixed duration and no elapsed time. */
export class FakeEgress implements IEgressSink {
  readonly emitted: { artifact: AudioArtifact | null; text: string }[] = [];

  constructor(private readonly durationSec = 1) {}

  async emit(artifact: AudioArtifact | null, text: string): Promise<EgressResult> {
    this.emitted.push({ artifact, text });
    return { durationSec: this.durationSec, elapsedMs: 0, outputs: [] };
  }
}

/** Deterministic [0, 1) sequence that cycles through `values`. */
export function sequenceRandom(values: number[]): () => number {
  let i = 0;
  return () => {
    const v = values[i % values.length];
    i++;
    return v;
  };
}
