/**
 * Integration test: one unattended round end to end, from canned generation through the audio cache
 * to a live feed, observed through the broadcaster.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { StubLLM } from "../../src/adapters/llm";
import type { ITTS } from "../../src/adapters/tts";
import { LiveStreamController } from "../../src/egress/controller";
import { EgressSink } from "../../src/egress/sink";
import { EventBroadcaster } from "../../src/events/broadcaster";
import { buildSnapshot } from "../../src/events/snapshot";
import type { EventEnvelope } from "../../src/events/types";
import { ManualKeyPlatform } from "../../src/platform";
import { PersonaRegistry } from "../../src/personas/registry";
import { TopicCatalog } from "../../src/personas/topics";
import { cannedUtterances } from "../../src/prompts/fallback";
import { UtteranceGenerator } from "../../src/pipeline/utterance-generator";
import { TurnScheduler } from "../../src/scheduler/turn-scheduler";
import { SpeechSynthesizer } from "../../src/speech/synthesizer";
import { FakeFeed } from "../helpers/fakes";
import { RecordingSink, fourPersonas } from "../helpers/fixtures";

class FailingTTS implements ITTS {
  readonly provider = "google" as const;
  readonly available = true;
  calls = 0;

  async synthesize(): Promise<Buffer> {
    this.calls++;
    throw new Error("quota exceeded");
  }
}

class SilenceTTS implements ITTS {
  readonly provider = "azure" as const;
  readonly available = true;

  async synthesize(): Promise<Buffer> {
    // 0.1s of 24 kHz mono
    return Buffer.alloc(4800);
  }
}

describe("discussion round", () => {
  let cacheDir: string;

  beforeEach(() => {
    cacheDir = fs.mkdtempSync(path.join(os.tmpdir(), "roundtable-round-"));
  });

  afterEach(() => {
    fs.rmSync(cacheDir, { recursive: true, force: true });
  });

  it("speaks every persona once, streams each line and reports the round", async () => {
    const personas = fourPersonas();
    const registry = new PersonaRegistry(personas);
    const topic = "Is dark matter real?";
    const feeds: FakeFeed[] = [];
    let scheduler: TurnScheduler | null = null;

    const broadcaster: EventBroadcaster = new EventBroadcaster({
      snapshot: () =>
        buildSnapshot({
          registry,
          state: scheduler?.getSnapshot() ?? {
            topic: "",
            round: 0,
            messageCount: 0,
            activeAgentId: null,
            running: false,
            stopRequested: false,
            lastTurnAt: null,
          },
          loopEnabled: true,
          stream: stream.status(),
        }),
    });
    const seen: EventEnvelope[] = [];
    broadcaster.subscribe((e) => seen.push(e));

    const stream = new LiveStreamController({
      platform: new ManualKeyPlatform({ rtmpUrl: "rtmp://ingest.example.test/live2", streamKey: "test-key-0000" }),
      events: broadcaster,
      createFeed: (target, hooks) => {
        const feed = new FakeFeed(target, hooks);
        feeds.push(feed);
        return feed;
      },
    });
    await stream.start({});

    const synthesizer = new SpeechSynthesizer({ tts: new SilenceTTS(), cacheDir, defaultVoiceId: "male_en" });
    await synthesizer.init();

    scheduler = new TurnScheduler({
      registry,
      topics: new TopicCatalog([topic]),
      generator: new UtteranceGenerator({ llm: new StubLLM() }),
      synthesizer,
      egress: new EgressSink({
        feeds: stream,
        events: broadcaster,
        ffmpegPath: "ffmpeg",
        ffprobePath: "ffprobe",
        decode: async () => Buffer.alloc(4800),
      }),
      events: broadcaster,
      pacing: {
        historyWindow: 3,
        interTurnPauseMinMs: 1,
        interTurnPauseMaxMs: 2,
        interRoundDelayMs: 1,
        topicRotationProbability: 0,
        postSpeechBufferMs: 0,
      },
    });

    await expect(scheduler.runRound()).resolves.toBe("completed");
    await stream.stop();

    const kinds = seen.map((e) => e.event);
    expect(kinds[0]).toBe("stream_started");
    expect(kinds[1]).toBe("topic_update");
    expect(kinds.filter((k) => k === "new_message")).toHaveLength(4);
    expect(kinds.slice(-2)).toEqual(["round_complete", "stream_stopped"]);

    const messages = seen.flatMap((e) => (e.event === "new_message" && "expertise" in e.data ? [e.data] : []));
    expect(messages.map((m) => m.agent_id).sort()).toEqual(["kovaleva", "petrov", "sokolova", "volkov"]);
    for (const m of messages) {
      const p = personas.find((x) => x.id === m.agent_id);
      expect(p && cannedUtterances(p, topic)).toContain(m.message);
    }

    expect(feeds).toHaveLength(1);
    expect(feeds[0].pushed).toHaveLength(4);
    expect(fs.readdirSync(cacheDir).filter((n) => n.endsWith(".wav")).length).toBeGreaterThanOrEqual(1);
    expect(scheduler.getSnapshot()).toMatchObject({ round: 1, messageCount: 4, running: false, topic });
  });

  it("completes the round on estimated pacing when every synthesis fails", async () => {
    const events = new RecordingSink();
    const tts = new FailingTTS();
    const sleeps: number[] = [];
    const scheduler = new TurnScheduler({
      registry: new PersonaRegistry(fourPersonas()),
      topics: new TopicCatalog(["Is dark matter real?"]),
      generator: new UtteranceGenerator({ llm: new StubLLM("stub response") }),
      synthesizer: new SpeechSynthesizer({ tts, cacheDir, defaultVoiceId: "male_en" }),
      egress: new EgressSink({ feeds: { activeFeed: () => null }, events, ffmpegPath: "ffmpeg", ffprobePath: "ffprobe" }),
      events,
      pacing: {
        historyWindow: 3,
        interTurnPauseMinMs: 0,
        interTurnPauseMaxMs: 0,
        interRoundDelayMs: 0,
        topicRotationProbability: 0,
        postSpeechBufferMs: 0,
      },
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });

    await expect(scheduler.runRound()).resolves.toBe("completed");

    expect(tts.calls).toBe(4);
    expect(events.ofKind("new_message").map((e) => e.data)).toEqual(
      Array.from({ length: 4 }, () => expect.objectContaining({ message: "stub response" }))
    );
    expect(events.ofKind("discussion_error")).toHaveLength(0);
    expect(events.ofKind("round_complete")[0].data).toEqual({ round: 1, total_messages: 4, next_round_in_seconds: 0 });
    // "stub response" is two words: the 3s floor of the estimate paces each turn
    const postSpeech = sleeps.filter((ms) => ms > 0);
    expect(postSpeech).toHaveLength(4);
    for (const ms of postSpeech) {
      expect(ms).toBeGreaterThan(2900);
      expect(ms).toBeLessThanOrEqual(3000);
    }
  });
});
