/**
 * Env-based configuration for the discussion stream.
 * Load from .env.local (or process.env). Do not commit secrets.
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";

// Load .env.local from project root when not set
const envPath = path.resolve(process.cwd(), ".env.local");
loadEnv({ path: envPath });

export const LLM_PROVIDERS = ["openai", "anthropic", "stub"] as const;
export const TTS_PROVIDERS = ["google", "azure", "stub"] as const;
export const LIVE_PLATFORMS = ["none", "manual_key", "managed_account"] as const;

export type LlmProvider = (typeof LLM_PROVIDERS)[number];
export type TtsProvider = (typeof TTS_PROVIDERS)[number];
export type LivePlatformKind = (typeof LIVE_PLATFORMS)[number];

export interface AppConfig {
  /** Text generation provider and options */
  llm: {
    provider: LlmProvider;
    openaiApiKey?: string;
    openaiModel?: string;
    anthropicApiKey?: string;
    anthropicModel?: string;
    /** Per-call timeout for text generation (ms). */
    timeoutMs: number;
  };

  /** Speech synthesis provider, voice fallback and audio cache */
  tts: {
    provider: TtsProvider;
    googleApiKey?: string;
    azureKey?: string;
    azureRegion?: string;
    timeoutMs: number;
    /** Voice id used when a persona names a voice that has no profile. */
    defaultVoiceId: string;
    cacheDir: string;
    cacheMaxEntries: number;
    cacheMaxAgeMs: number;
  };

  /** Discussion pacing and roster */
  discussion: {
    personasFile: string;
    topicsFile: string;
    /** Number of most recent history entries passed to the generator. */
    historyWindow: number;
    /** Number of history entries kept for display. */
    historyRetention: number;
    interTurnPauseMinMs: number;
    interTurnPauseMaxMs: number;
    interRoundDelayMs: number;
    /** Probability (0..1) of switching topic after a round. */
    topicRotationProbability: number;
    /** Extra silence after each utterance's audio (ms). */
    postSpeechBufferMs: number;
    maxUtteranceChars: number;
    /** Delay before the first round after start-up (ms). */
    loopStartDelayMs: number;
    loopIdlePollMs: number;
    loopErrorBackoffMs: number;
    /** Start the discussion loop without waiting for a start request. */
    autoStart: boolean;
  };

  /** Local playback and outbound feed */
  egress: {
    localPlayback: boolean;
    ffmpegPath: string;
    ffprobePath: string;
    ffplayPath: string;
    /** Time allowed for an egress push beyond the audio's own duration (ms). */
    graceMs: number;
    videoSize: string;
    backgroundColor: string;
    /** Draw topic, speaker and current line on the feed's video. */
    overlay: boolean;
    overlayDir: string;
    /** Font for the overlay; ffmpeg's default font when unset. */
    fontFile?: string;
  };

  /** Live platform control plane */
  platform: {
    kind: LivePlatformKind;
    rtmpUrl: string;
    streamKey?: string;
    youtubeAccessToken?: string;
    privacyStatus: "public" | "unlisted" | "private";
    title: string;
    description: string;
  };

  /** Control server (HTTP API + WebSocket observers) */
  server: {
    port: number;
  };
}

function getEnv(key: string, defaultValue?: string): string | undefined {
  const v = process.env[key];
  if (v === undefined || v === "") return defaultValue;
  return v.trim();
}

function getEnvInt(key: string, defaultValue: number, min = 0): number {
  const v = getEnv(key);
  if (v === undefined) return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) || n < min ? defaultValue : n;
}

function getEnvFloat(key: string, defaultValue: number, min: number, max: number): number {
  const v = getEnv(key);
  if (v === undefined) return defaultValue;
  const n = parseFloat(v);
  return Number.isNaN(n) || n < min || n > max ? defaultValue : n;
}

function getEnvBool(key: string, defaultValue: boolean): boolean {
  const v = getEnv(key)?.toLowerCase();
  if (v === undefined) return defaultValue;
  return v === "1" || v === "true" || v === "yes";
}

/** Returns the member of `choices` equal to `value`, or `fallback`. */
export function parseChoice<T extends string>(value: string | undefined, choices: readonly T[], fallback: T): T {
  const key = (value ?? "").trim().toLowerCase();
  return choices.find((c) => c === key) ?? fallback;
}

/**
 * Build config from environment variables.
 * LLM_PROVIDER, TTS_PROVIDER and LIVE_PLATFORM select adapters; missing credentials degrade to stubs.
 */
export function loadConfig(): AppConfig {
  const pauseMin = getEnvInt("INTER_TURN_PAUSE_MIN_MS", 2000);
  const pauseMax = getEnvInt("INTER_TURN_PAUSE_MAX_MS", 3000);

  return {
    llm: {
      provider: parseChoice(getEnv("MODEL_PROVIDER") || getEnv("LLM_PROVIDER"), LLM_PROVIDERS, "openai"),
      openaiApiKey: getEnv("OPENAI_API_KEY"),
      openaiModel: getEnv("OPENAI_MODEL_NAME") || "gpt-4o-mini",
      anthropicApiKey: getEnv("ANTHROPIC_API_KEY"),
      anthropicModel: getEnv("ANTHROPIC_MODEL_NAME") || "claude-3-5-sonnet-20241022",
      timeoutMs: getEnvInt("LLM_TIMEOUT_MS", 25_000, 1000),
    },
    tts: {
      provider: parseChoice(getEnv("TTS_PROVIDER"), TTS_PROVIDERS, "google"),
      googleApiKey: getEnv("GOOGLE_CLOUD_TTS_API_KEY"),
      azureKey: getEnv("AZURE_TTS_KEY"),
      azureRegion: getEnv("AZURE_TTS_REGION"),
      timeoutMs: getEnvInt("TTS_TIMEOUT_MS", 20_000, 1000),
      defaultVoiceId: getEnv("DEFAULT_VOICE_ID") || "male_en",
      cacheDir: path.resolve(process.cwd(), getEnv("AUDIO_CACHE_DIR") || "audio_cache"),
      cacheMaxEntries: getEnvInt("AUDIO_CACHE_MAX_ENTRIES", 500, 1),
      cacheMaxAgeMs: getEnvInt("AUDIO_CACHE_MAX_AGE_HOURS", 24, 1) * 60 * 60 * 1000,
    },
    discussion: {
      personasFile: path.resolve(process.cwd(), getEnv("PERSONAS_FILE") || "data/personas.json"),
      topicsFile: path.resolve(process.cwd(), getEnv("TOPICS_FILE") || "data/topics.json"),
      historyWindow: getEnvInt("HISTORY_WINDOW", 3, 1),
      historyRetention: getEnvInt("HISTORY_RETENTION", 200, 1),
      interTurnPauseMinMs: Math.min(pauseMin, pauseMax),
      interTurnPauseMaxMs: Math.max(pauseMin, pauseMax),
      interRoundDelayMs: getEnvInt("INTER_ROUND_DELAY_MS", 10_000),
      topicRotationProbability: getEnvFloat("TOPIC_ROTATION_PROBABILITY", 0.3, 0, 1),
      postSpeechBufferMs: getEnvInt("POST_SPEECH_BUFFER_MS", 500),
      maxUtteranceChars: getEnvInt("MAX_UTTERANCE_CHARS", 600, 50),
      loopStartDelayMs: getEnvInt("LOOP_START_DELAY_MS", 2000),
      loopIdlePollMs: getEnvInt("LOOP_IDLE_POLL_MS", 500, 10),
      loopErrorBackoffMs: getEnvInt("LOOP_ERROR_BACKOFF_MS", 5000, 10),
      autoStart: getEnvBool("AUTO_START", true),
    },
    egress: {
      localPlayback: getEnvBool("LOCAL_PLAYBACK", false),
      ffmpegPath: getEnv("FFMPEG_PATH") || "ffmpeg",
      ffprobePath: getEnv("FFPROBE_PATH") || "ffprobe",
      ffplayPath: getEnv("FFPLAY_PATH") || "ffplay",
      graceMs: getEnvInt("EGRESS_GRACE_MS", 15_000, 1000),
      videoSize: getEnv("STREAM_VIDEO_SIZE") || "1920x1080",
      backgroundColor: getEnv("STREAM_BACKGROUND_COLOR") || "0x0c2461",
      overlay: getEnvBool("STREAM_OVERLAY", true),
      overlayDir: getEnv("STREAM_OVERLAY_DIR") || "stream_overlay",
      fontFile: getEnv("STREAM_FONT_FILE"),
    },
    platform: {
      kind: parseChoice(getEnv("LIVE_PLATFORM"), LIVE_PLATFORMS, "manual_key"),
      rtmpUrl: getEnv("RTMP_URL") || "rtmp://a.rtmp.youtube.com/live2",
      streamKey: getEnv("STREAM_KEY"),
      youtubeAccessToken: getEnv("YOUTUBE_ACCESS_TOKEN"),
      privacyStatus: parseChoice(getEnv("YOUTUBE_PRIVACY_STATUS"), ["public", "unlisted", "private"] as const, "unlisted"),
      title: getEnv("STREAM_TITLE") || "AI Roundtable Live",
      description: getEnv("STREAM_DESCRIPTION") || "Autonomous AI personas discussing science in real time.",
    },
    server: {
      port: getEnvInt("PORT", 5000),
    },
  };
}
