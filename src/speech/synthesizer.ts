/**
 * SpeechSynthesizer: utterance text + voice id -> WAV artifact in a content-addressed cache.
 *
 * Cache layout: <cacheDir>/<sha256(text \0 voiceId)>.wav, written to a temp file and renamed into place.
 * Bounded by entry count and age; pruned at init and after each write.
 */

import { createHash, randomUUID } from "crypto";
import * as fs from "fs/promises";
import * as path from "path";
import type { ITTS } from "../adapters/tts";
import { parseWavHeader, toWav } from "../audio/wav";
import { withTimeout } from "../utils/async";
import { errMessage, logger, logTtsCall } from "../logging";
import { VOICE_PROFILES, findVoiceProfile, toVoiceOptions, type VoiceProfile } from "./voice-profiles";

const DEFAULT_TTS_TIMEOUT_MS = 20_000;
const DEFAULT_SAMPLE_RATE_HZ = 24_000;
const DEFAULT_MAX_ENTRIES = 500;
const DEFAULT_MAX_AGE_MS = 24 * 60 * 60 * 1000;
const CACHE_FILE = /^[0-9a-f]{64}\.wav$/;

export interface AudioArtifact {
  key: string;
  path: string;
  /** Null when the file carries no readable WAV header. */
  durationSec: number | null;
  /** True when served from the cache without a provider call. */
  cached: boolean;
  bytes: number;
}

export interface SpeechSynthesizerConfig {
  tts: ITTS;
  cacheDir: string;
  defaultVoiceId: string;
  timeoutMs?: number;
  sampleRateHz?: number;
  maxEntries?: number;
  maxAgeMs?: number;
  profiles?: readonly VoiceProfile[];
  now?: () => number;
}

export function cacheKey(text: string, voiceId: string): string {
  return createHash("sha256").update(`${text}\u0000${voiceId}`, "utf8").digest("hex");
}

export class SpeechSynthesizer {
  private readonly tts: ITTS;
  private readonly cacheDir: string;
  private readonly defaultVoiceId: string;
  private readonly timeoutMs: number;
  private readonly sampleRateHz: number;
  private readonly maxEntries: number;
  private readonly maxAgeMs: number;
  private readonly profiles: readonly VoiceProfile[];
  private readonly now: () => number;
  private readonly inFlight = new Map<string, Promise<AudioArtifact | null>>();
  private ready: Promise<void> | null = null;

  constructor(config: SpeechSynthesizerConfig) {
    this.tts = config.tts;
    this.cacheDir = config.cacheDir;
    this.defaultVoiceId = config.defaultVoiceId;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TTS_TIMEOUT_MS;
    this.sampleRateHz = config.sampleRateHz ?? DEFAULT_SAMPLE_RATE_HZ;
    this.maxEntries = Math.max(1, config.maxEntries ?? DEFAULT_MAX_ENTRIES);
    this.maxAgeMs = config.maxAgeMs ?? DEFAULT_MAX_AGE_MS;
    this.profiles = config.profiles ?? VOICE_PROFILES;
    this.now = config.now ?? Date.now;
  }

  /** Create the cache directory and prune stale entries. Safe to call more than once. */
  init(): Promise<void> {
    if (!this.ready) {
      this.ready = (async () => {
        await fs.mkdir(this.cacheDir, { recursive: true });
        await this.prune();
      })();
    }
    return this.ready;
  }

  get provider(): ITTS["provider"] {
    return this.tts.provider;
  }

  /** Resolves the voice id actually used (unknown ids fall back to the default voice). */
  resolveVoice(voiceId: string): VoiceProfile {
    const profile = findVoiceProfile(voiceId, this.profiles);
    if (profile) return profile;
    logger.warn({ event: "TTS_UNKNOWN_VOICE", voiceId, fallback: this.defaultVoiceId }, "Unknown voice id, using default");
    const fallback = findVoiceProfile(this.defaultVoiceId, this.profiles);
    if (fallback) return fallback;
    return this.profiles[0];
  }

  /** Returns null when no audio could be produced; never rejects. */
  synthesize(text: string, voiceId: string): Promise<AudioArtifact | null> {
    const trimmed = text.trim();
    if (!trimmed) return Promise.resolve(null);
    const profile = this.resolveVoice(voiceId);
    const key = cacheKey(trimmed, profile.id);

    const pending = this.inFlight.get(key);
    if (pending) return pending;
    const job = this.load(key, trimmed, profile).finally(() => this.inFlight.delete(key));
    this.inFlight.set(key, job);
    return job;
  }

  private async load(key: string, text: string, profile: VoiceProfile): Promise<AudioArtifact | null> {
    try {
      await this.init();
      const filePath = this.pathFor(key);
      const hit = await this.readArtifact(key, filePath);
      if (hit) {
        logger.debug({ event: "TTS_CACHE_HIT", voiceId: profile.id, key }, "Audio served from cache");
        return hit;
      }
      if (!this.tts.available) {
        logger.debug({ event: "TTS_UNAVAILABLE", voiceId: profile.id }, "No TTS provider configured");
        return null;
      }

      const start = this.now();
      const audio = await withTimeout(
        this.tts.synthesize(text, toVoiceOptions(profile, this.tts.provider, this.sampleRateHz)),
        this.timeoutMs,
        "TTS"
      );
      logTtsCall(logger, profile.id, text.length, audio.length, this.now() - start);
      if (audio.length === 0) {
        logger.warn({ event: "TTS_EMPTY", voiceId: profile.id }, "TTS returned no audio");
        return null;
      }

      const wav = toWav(audio, this.sampleRateHz);
      const tmp = path.join(this.cacheDir, `.${key}.${randomUUID()}.tmp`);
      await fs.writeFile(tmp, wav);
      await fs.rename(tmp, filePath);
      await this.prune(key);
      return {
        key,
        path: filePath,
        durationSec: parseWavHeader(wav)?.durationSec ?? null,
        cached: false,
        bytes: wav.length,
      };
    } catch (err) {
      logger.warn({ event: "TTS_FAILED", voiceId: profile.id, err: errMessage(err) }, "TTS failed");
      return null;
    }
  }

  private pathFor(key: string): string {
    return path.join(this.cacheDir, `${key}.wav`);
  }

  private async readArtifact(key: string, filePath: string): Promise<AudioArtifact | null> {
    let data: Buffer;
    try {
      data = await fs.readFile(filePath);
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
    if (data.length === 0) return null;
    return { key, path: filePath, durationSec: parseWavHeader(data)?.durationSec ?? null, cached: true, bytes: data.length };
  }

  /**
   * Remove entries older than maxAgeMs, then the oldest beyond maxEntries.
   * `keep` is never removed.
   */
  async prune(keep?: string): Promise<number> {
    let names: string[];
    try {
      names = await fs.readdir(this.cacheDir);
    } catch (err) {
      if (isNotFound(err)) return 0;
      throw err;
    }

    const entries: { name: string; mtimeMs: number }[] = [];
    for (const name of names) {
      if (!CACHE_FILE.test(name)) continue;
      try {
        const stat = await fs.stat(path.join(this.cacheDir, name));
        entries.push({ name, mtimeMs: stat.mtimeMs });
      } catch (err) {
        if (!isNotFound(err)) throw err;
      }
    }

    const keepName = keep ? `${keep}.wav` : undefined;
    const hasKeep = entries.some((e) => e.name === keepName);
    const limit = this.maxEntries - (hasKeep ? 1 : 0);
    const cutoff = this.now() - this.maxAgeMs;
    entries.sort((a, b) => b.mtimeMs - a.mtimeMs);
    const doomed: string[] = [];
    let kept = 0;
    for (const entry of entries) {
      if (entry.name === keepName) continue;
      if (entry.mtimeMs < cutoff || kept >= limit) {
        doomed.push(entry.name);
      } else {
        kept++;
      }
    }

    for (const name of doomed) {
      await fs.rm(path.join(this.cacheDir, name), { force: true });
    }
    if (doomed.length > 0) {
      logger.info({ event: "TTS_CACHE_PRUNED", removed: doomed.length, remaining: entries.length - doomed.length }, "Audio cache pruned");
    }
    return doomed.length;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
