/**
 * Voice profile table: maps the persona-facing voice ids to provider voices and prosody.
 */

import type { TtsProvider } from "../config";
import type { VoiceOptions } from "../adapters/tts";

export interface VoiceProfile {
  id: string;
  languageCode: string;
  /** Provider voice name per TTS provider. */
  voices: Record<Exclude<TtsProvider, "stub">, string>;
  /** 1 = normal rate. */
  speakingRate: number;
  /** Semitones. */
  pitch: number;
}

export const VOICE_PROFILES: readonly VoiceProfile[] = [
  {
    id: "male_ru",
    languageCode: "ru-RU",
    voices: { google: "ru-RU-Wavenet-D", azure: "ru-RU-DmitryNeural" },
    speakingRate: 1,
    pitch: 0,
  },
  {
    id: "male_ru_deep",
    languageCode: "ru-RU",
    voices: { google: "ru-RU-Wavenet-B", azure: "ru-RU-DmitryNeural" },
    speakingRate: 0.9,
    pitch: -2,
  },
  {
    id: "female_ru",
    languageCode: "ru-RU",
    voices: { google: "ru-RU-Wavenet-A", azure: "ru-RU-SvetlanaNeural" },
    speakingRate: 1,
    pitch: 0,
  },
  {
    id: "female_ru_soft",
    languageCode: "ru-RU",
    voices: { google: "ru-RU-Wavenet-C", azure: "ru-RU-DariyaNeural" },
    speakingRate: 0.95,
    pitch: 1,
  },
  {
    id: "male_en",
    languageCode: "en-US",
    voices: { google: "en-US-Neural2-D", azure: "en-US-GuyNeural" },
    speakingRate: 1,
    pitch: 0,
  },
  {
    id: "male_en_deep",
    languageCode: "en-US",
    voices: { google: "en-US-Neural2-J", azure: "en-US-DavisNeural" },
    speakingRate: 0.9,
    pitch: -2,
  },
  {
    id: "female_en",
    languageCode: "en-US",
    voices: { google: "en-US-Neural2-F", azure: "en-US-JennyNeural" },
    speakingRate: 1,
    pitch: 0,
  },
  {
    id: "female_en_soft",
    languageCode: "en-US",
    voices: { google: "en-US-Neural2-C", azure: "en-US-AriaNeural" },
    speakingRate: 0.95,
    pitch: 1,
  },
];

export function findVoiceProfile(id: string, profiles: readonly VoiceProfile[] = VOICE_PROFILES): VoiceProfile | undefined {
  return profiles.find((p) => p.id === id);
}

/** Adapter options for a profile; the stub provider gets no voice name. */
export function toVoiceOptions(profile: VoiceProfile, provider: TtsProvider, sampleRateHz: number): VoiceOptions {
  return {
    voiceName: provider === "stub" ? undefined : profile.voices[provider],
    languageCode: profile.languageCode,
    sampleRateHz,
    speakingRate: profile.speakingRate,
    pitch: profile.pitch,
  };
}
