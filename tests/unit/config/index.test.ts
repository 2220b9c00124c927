/**
 * Unit tests for config loading.
 */

import { loadConfig, parseChoice, TTS_PROVIDERS } from "../../../src/config";

describe("parseChoice", () => {
  it("matches case-insensitively and trims", () => {
    expect(parseChoice(" Azure ", TTS_PROVIDERS, "stub")).toBe("azure");
  });

  it("falls back on unknown or missing values", () => {
    expect(parseChoice("polly", TTS_PROVIDERS, "stub")).toBe("stub");
    expect(parseChoice(undefined, TTS_PROVIDERS, "google")).toBe("google");
  });
});

describe("loadConfig", () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it("orders the inter-turn pause bounds", () => {
    process.env.INTER_TURN_PAUSE_MIN_MS = "4000";
    process.env.INTER_TURN_PAUSE_MAX_MS = "1000";
    const config = loadConfig();
    expect(config.discussion.interTurnPauseMinMs).toBe(1000);
    expect(config.discussion.interTurnPauseMaxMs).toBe(4000);
  });

  it("ignores an out-of-range rotation probability", () => {
    process.env.TOPIC_ROTATION_PROBABILITY = "1.5";
    expect(loadConfig().discussion.topicRotationProbability).toBe(0.3);
  });

  it("converts the cache age from hours", () => {
    process.env.AUDIO_CACHE_MAX_AGE_HOURS = "2";
    expect(loadConfig().tts.cacheMaxAgeMs).toBe(2 * 60 * 60 * 1000);
  });

  it("defaults the live platform to a manual key on the YouTube ingest", () => {
    delete process.env.LIVE_PLATFORM;
    delete process.env.RTMP_URL;
    const config = loadConfig();
    expect(config.platform.kind).toBe("manual_key");
    expect(config.platform.rtmpUrl).toBe("rtmp://a.rtmp.youtube.com/live2");
  });

  it("reads booleans", () => {
    process.env.AUTO_START = "false";
    process.env.LOCAL_PLAYBACK = "yes";
    const config = loadConfig();
    expect(config.discussion.autoStart).toBe(false);
    expect(config.egress.localPlayback).toBe(true);
  });
});
