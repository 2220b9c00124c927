import { createHash } from "crypto";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import type { ITTS, VoiceOptions } from "../../../src/adapters/tts";
import { SpeechSynthesizer, cacheKey } from "../../../src/speech/synthesizer";

class FakeTTS implements ITTS {
  readonly provider = "google" as const;
  readonly calls: { text: string; options?: VoiceOptions }[] = [];

  constructor(
    private readonly audio: () => Promise<Buffer> = async () => Buffer.alloc(48_000),
    readonly available = true
  ) {}

  synthesize(text: string, options?: VoiceOptions): Promise<Buffer> {
    this.calls.push({ text, options });
    return this.audio();
  }
}

describe("SpeechSynthesizer", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "roundtable-cache-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function make(tts: ITTS, extra: { maxEntries?: number; maxAgeMs?: number } = {}): SpeechSynthesizer {
    return new SpeechSynthesizer({ tts, cacheDir: dir, defaultVoiceId: "male_en", ...extra });
  }

  it("keys the cache by sha-256 of text and voice", () => {
    const expected = createHash("sha256").update("Hello\u0000male_en").digest("hex");
    expect(cacheKey("Hello", "male_en")).toBe(expected);
  });

  it("writes a WAV once and serves repeats from the cache", async () => {
    const tts = new FakeTTS();
    const synth = make(tts);

    const first = await synth.synthesize("Hello there.", "female_en");
    const second = await synth.synthesize("Hello there.", "female_en");

    expect(tts.calls).toHaveLength(1);
    expect(first).toMatchObject({ cached: false, durationSec: 1, bytes: 44 + 48_000 });
    expect(second).toMatchObject({ cached: true, durationSec: 1, path: first?.path });
    expect(first?.path).toBe(path.join(dir, `${cacheKey("Hello there.", "female_en")}.wav`));
    await expect(fs.stat(path.join(dir, `${cacheKey("Hello there.", "female_en")}.wav`))).resolves.toBeDefined();
  });

  it("shares one provider call between concurrent requests", async () => {
    const tts = new FakeTTS();
    const synth = make(tts);
    const [a, b] = await Promise.all([synth.synthesize("Same", "male_en"), synth.synthesize("Same", "male_en")]);
    expect(tts.calls).toHaveLength(1);
    expect(a?.key).toBe(b?.key);
  });

  it("passes the voice profile to the provider", async () => {
    const tts = new FakeTTS();
    await make(tts).synthesize("Deep voice.", "male_en_deep");
    expect(tts.calls[0].options).toEqual({
      voiceName: "en-US-Neural2-J",
      languageCode: "en-US",
      sampleRateHz: 24_000,
      speakingRate: 0.9,
      pitch: -2,
    });
  });

  it("falls back to the default voice for an unknown id", async () => {
    const tts = new FakeTTS();
    const artifact = await make(tts).synthesize("Who am I?", "robot_voice");
    expect(artifact?.key).toBe(cacheKey("Who am I?", "male_en"));
    expect(tts.calls[0].options?.voiceName).toBe("en-US-Neural2-D");
  });

  it("returns null when the provider fails, returns nothing or is unavailable", async () => {
    await expect(make(new FakeTTS(() => Promise.reject(new Error("503")))).synthesize("x", "male_en")).resolves.toBeNull();
    await expect(make(new FakeTTS(async () => Buffer.alloc(0))).synthesize("x", "male_en")).resolves.toBeNull();

    const unavailable = new FakeTTS(undefined, false);
    await expect(make(unavailable).synthesize("x", "male_en")).resolves.toBeNull();
    expect(unavailable.calls).toHaveLength(0);
  });

  it("returns null for blank text", async () => {
    const tts = new FakeTTS();
    await expect(make(tts).synthesize("   ", "male_en")).resolves.toBeNull();
    expect(tts.calls).toHaveLength(0);
  });

  it("bounds the number of cached files and keeps the newest write", async () => {
    const synth = make(new FakeTTS(), { maxEntries: 2 });
    await synth.synthesize("one", "male_en");
    await synth.synthesize("two", "male_en");
    const third = await synth.synthesize("three", "male_en");

    const files = (await fs.readdir(dir)).filter((f) => f.endsWith(".wav"));
    expect(files).toHaveLength(2);
    expect(files).toContain(`${third?.key}.wav`);
  });

  it("removes entries older than the age limit at init", async () => {
    const stale = path.join(dir, `${cacheKey("old", "male_en")}.wav`);
    await fs.writeFile(stale, Buffer.alloc(10));
    const twoDaysAgo = new Date(Date.now() - 48 * 60 * 60 * 1000);
    await fs.utimes(stale, twoDaysAgo, twoDaysAgo);
    const unrelated = path.join(dir, "notes.txt");
    await fs.writeFile(unrelated, "keep");

    await make(new FakeTTS()).init();

    expect(await fs.readdir(dir)).toEqual(["notes.txt"]);
  });
});
