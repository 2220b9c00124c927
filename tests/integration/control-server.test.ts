/**
 * Integration tests for the control server: real scheduler, loop, synthesizer cache and broadcaster
 * behind the HTTP API and the WebSocket gateway, on a random port.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import WebSocket from "ws";
import { StubLLM } from "../../src/adapters/llm";
import type { ITTS } from "../../src/adapters/tts";
import { createControlServer, type ControlServer } from "../../src/control-server";
import { LiveStreamController } from "../../src/egress/controller";
import { EgressSink } from "../../src/egress/sink";
import { EventBroadcaster } from "../../src/events/broadcaster";
import { buildSnapshot } from "../../src/events/snapshot";
import { ManualKeyPlatform } from "../../src/platform";
import { PersonaRegistry } from "../../src/personas/registry";
import { TopicCatalog } from "../../src/personas/topics";
import { UtteranceGenerator } from "../../src/pipeline/utterance-generator";
import { DiscussionLoop } from "../../src/scheduler/discussion-loop";
import { TurnScheduler } from "../../src/scheduler/turn-scheduler";
import { SpeechSynthesizer } from "../../src/speech/synthesizer";
import { FakeFeed } from "../helpers/fakes";
import { fourPersonas } from "../helpers/fixtures";

/** A quarter second of 24 kHz mono silence per call. */
class SilenceTTS implements ITTS {
  readonly provider = "google" as const;
  readonly available = true;
  calls = 0;

  async synthesize(): Promise<Buffer> {
    this.calls++;
    return Buffer.alloc(12_000);
  }
}

let cacheDir: string;
let control: ControlServer;
let loop: DiscussionLoop;
let scheduler: TurnScheduler;
let broadcaster: EventBroadcaster;
let tts: SilenceTTS;
let baseUrl: string;

beforeAll(async () => {
  cacheDir = fs.mkdtempSync(path.join(os.tmpdir(), "roundtable-control-"));
  const registry = new PersonaRegistry(fourPersonas());
  tts = new SilenceTTS();
  const synthesizer = new SpeechSynthesizer({ tts, cacheDir, defaultVoiceId: "male_en" });
  await synthesizer.init();

  broadcaster = new EventBroadcaster({
    snapshot: () =>
      buildSnapshot({ registry, state: scheduler.getSnapshot(), loopEnabled: loop.isEnabled, stream: stream.status() }),
  });
  const stream = new LiveStreamController({
    platform: new ManualKeyPlatform({ rtmpUrl: "rtmp://ingest.example.test/live2" }),
    events: broadcaster,
    createFeed: (target, hooks) => new FakeFeed(target, hooks),
  });
  const egress = new EgressSink({
    feeds: stream,
    events: broadcaster,
    ffmpegPath: "ffmpeg",
    ffprobePath: "ffprobe",
    decode: async () => Buffer.alloc(4800),
  });
  scheduler = new TurnScheduler({
    registry,
    topics: new TopicCatalog(["Dark matter", "Ocean acidification"]),
    generator: new UtteranceGenerator({ llm: new StubLLM() }),
    synthesizer,
    egress,
    events: broadcaster,
    pacing: {
      historyWindow: 3,
      interTurnPauseMinMs: 5,
      interTurnPauseMaxMs: 10,
      interRoundDelayMs: 20,
      topicRotationProbability: 0,
      postSpeechBufferMs: 0,
    },
  });
  loop = new DiscussionLoop({ scheduler, startDelayMs: 60_000, idlePollMs: 60_000, errorBackoffMs: 50 });

  control = createControlServer({
    registry,
    scheduler,
    loop,
    stream,
    synthesizer,
    egress,
    broadcaster,
    defaultVoiceId: "male_en",
  });
  await new Promise<void>((resolve) => control.server.listen(0, "127.0.0.1", resolve));
  baseUrl = `http://127.0.0.1:${control.port()}`;
});

afterAll(async () => {
  scheduler.requestStop();
  await loop.shutdown();
  await control.close();
  fs.rmSync(cacheDir, { recursive: true, force: true });
});

async function request(method: string, urlPath: string, body?: unknown): Promise<{ status: number; data: unknown }> {
  const res = await fetch(`${baseUrl}${urlPath}`, {
    method,
    headers: { "Content-Type": "application/json" },
    body: body === undefined ? undefined : typeof body === "string" ? body : JSON.stringify(body),
  });
  const text = await res.text();
  return { status: res.status, data: text ? JSON.parse(text) : null };
}

/** Collects parsed messages from a socket and hands them out in arrival order. */
class MessageQueue {
  private readonly buffered: unknown[] = [];
  private readonly waiters: ((value: unknown) => void)[] = [];

  constructor(ws: WebSocket) {
    ws.on("message", (raw) => {
      const value: unknown = JSON.parse(raw.toString());
      const waiter = this.waiters.shift();
      if (waiter) waiter(value);
      else this.buffered.push(value);
    });
  }

  next(): Promise<unknown> {
    if (this.buffered.length > 0) return Promise.resolve(this.buffered.shift());
    return new Promise((resolve) => this.waiters.push(resolve));
  }
}

describe("control server", () => {
  it("answers health probes and reports readiness once the loop starts", async () => {
    await expect(request("GET", "/health")).resolves.toEqual({ status: 200, data: { ok: true } });
    await expect(request("GET", "/ready")).resolves.toEqual({ status: 503, data: { ok: false, ready: false, rounds_completed: 0 } });

    loop.start(false);

    await expect(request("GET", "/ready")).resolves.toEqual({ status: 200, data: { ok: true, ready: true, rounds_completed: 0 } });
  });

  it("lists the roster and the stats", async () => {
    const agents = await request("GET", "/api/agents");
    expect(agents.status).toBe(200);
    expect(agents.data).toEqual({
      agents: fourPersonas().map((p) => ({
        id: p.id,
        name: p.name,
        expertise: p.expertise,
        avatar: p.avatar,
        color: p.color,
        is_speaking: false,
      })),
    });

    const stats = await request("GET", "/api/stats");
    expect(stats.data).toEqual({
      message_count: 0,
      round: 0,
      current_topic: "",
      is_active: false,
      active_agent: null,
      agents_count: 4,
      egress_live: false,
    });
  });

  it("sets the topic and validates the body", async () => {
    await expect(request("POST", "/api/topic", { topic: "Fusion energy" })).resolves.toEqual({
      status: 200,
      data: { success: true, topic: "Fusion energy" },
    });
    await expect(request("GET", "/api/topic")).resolves.toEqual({ status: 200, data: { topic: "Fusion energy" } });

    await expect(request("POST", "/api/topic", { topic: 5 })).resolves.toEqual({
      status: 400,
      data: { success: false, error: '"topic" must be a string' },
    });
    await expect(request("POST", "/api/topic", "{not json")).resolves.toEqual({
      status: 400,
      data: { success: false, error: "Invalid JSON body" },
    });
  });

  it("synthesizes a voice test and serves the repeat from the cache", async () => {
    const first = await request("POST", "/api/test_audio", { agent_id: "volkov" });
    expect(first).toEqual({
      status: 200,
      data: {
        success: true,
        text: "Hello! I am Dr. Volkov, an expert in quantum physics. This is a voice test.",
        voice: "male_en",
        cached: false,
        duration_sec: 0.25,
        outputs: [],
      },
    });

    const second = await request("POST", "/api/test_audio", { agent_id: "volkov" });
    expect(second.data).toMatchObject({ success: true, cached: true, duration_sec: 0.25 });
    expect(tts.calls).toBe(1);

    await expect(request("POST", "/api/test_audio", { agent_id: "nobody" })).resolves.toEqual({
      status: 404,
      data: { success: false, error: "Unknown agent: nobody" },
    });
    await expect(request("POST", "/api/test_audio", {})).resolves.toEqual({
      status: 400,
      data: { success: false, error: 'Provide "agent_id" or "text"' },
    });
  });

  it("starts and stops the live stream", async () => {
    await expect(request("POST", "/api/start_stream", {})).resolves.toEqual({
      status: 400,
      data: { success: false, error: "Stream key is not configured; pass stream_key or set STREAM_KEY" },
    });

    const started = await request("POST", "/api/start_stream", { stream_key: "test-key-12345678", title: "Live" });
    expect(started.status).toBe(200);
    expect(started.data).toMatchObject({
      success: true,
      message: "Stream started",
      status: { is_streaming: true, target: "rtmp://ingest.example.test/live2/****5678", pid: 77 },
    });

    const conflict = await request("POST", "/api/start_stream", { stream_key: "test-key-12345678" });
    expect(conflict).toEqual({ status: 409, data: { success: false, error: "Stream is already running" } });

    const withFeed = await request("POST", "/api/test_audio", { text: "Testing the feed.", voice: "female_en" });
    expect(withFeed.data).toMatchObject({ success: true, voice: "female_en", outputs: ["stream"] });

    await expect(request("POST", "/api/stop_stream")).resolves.toEqual({
      status: 200,
      data: { success: true, message: "Stream stopped" },
    });
    await expect(request("POST", "/api/stop_stream")).resolves.toEqual({
      status: 200,
      data: { success: false, message: "Stream is not running" },
    });
    const status = await request("GET", "/api/stream_status");
    expect(status.data).toMatchObject({ is_streaming: false, target: null, platform: { kind: "manual_key", lifecycle: "complete" } });
  });

  it("sends a snapshot on connect, answers update requests and forwards events", async () => {
    const ws = new WebSocket(`ws://127.0.0.1:${control.port()}/ws`);
    const queue = new MessageQueue(ws);
    await new Promise<void>((resolve, reject) => {
      ws.once("open", () => resolve());
      ws.once("error", reject);
    });

    await expect(queue.next()).resolves.toMatchObject({
      event: "connected",
      data: { topic: "Fusion energy", stats: { agents_count: 4 } },
    });

    ws.send(JSON.stringify({ type: "request_update" }));
    await expect(queue.next()).resolves.toMatchObject({ event: "update", data: { topic: "Fusion energy" } });

    broadcaster.publish("stream_warning", { message: "hello observers" });
    await expect(queue.next()).resolves.toEqual({ event: "stream_warning", data: { message: "hello observers" } });

    const closed = new Promise<void>((resolve) => ws.once("close", () => resolve()));
    ws.close();
    await closed;
  });

  it("enables and stops the discussion", async () => {
    await expect(request("POST", "/api/start_discussion")).resolves.toEqual({
      status: 200,
      data: { success: true, message: "Discussion started" },
    });
    await expect(request("POST", "/api/start_discussion")).resolves.toEqual({
      status: 200,
      data: { success: false, message: "Discussion is already running" },
    });

    const stopped = await request("POST", "/api/stop_discussion");
    expect(stopped.status).toBe(200);
    expect(stopped.data).toMatchObject({ success: true, was_active: true });
    expect(loop.isEnabled).toBe(false);
  });

  it("handles preflight and unknown routes", async () => {
    const preflight = await fetch(`${baseUrl}/api/topic`, { method: "OPTIONS" });
    expect(preflight.status).toBe(204);
    expect(preflight.headers.get("access-control-allow-origin")).toBe("*");

    await expect(request("GET", "/api/nothing")).resolves.toEqual({ status: 404, data: { error: "Not found" } });
  });
});
