/**
 * TTS (Text-to-Speech) adapter types.
 * Implementations can be swapped via config (Google Cloud, Azure, stub).
 */

import type { TtsProvider } from "../../config";

export interface VoiceOptions {
  /** Provider voice name (e.g. en-US-Neural2-D). */
  voiceName?: string;
  /** Language code (e.g. en-US). */
  languageCode?: string;
  /** Sample rate in Hz of the returned 16-bit mono audio. */
  sampleRateHz?: number;
  /** Speaking rate multiplier; 1 is the voice's normal rate. */
  speakingRate?: number;
  /** Pitch shift in semitones; 0 is the voice's normal pitch. */
  pitch?: number;
}

/**
 * TTS adapter interface: text in, 16-bit mono audio out (raw PCM or WAV).
 * An empty buffer means the provider produced no audio.
 */
export interface ITTS {
  readonly provider: TtsProvider;
  /** False when no provider credential is configured. */
  readonly available: boolean;
  synthesize(text: string, options?: VoiceOptions): Promise<Buffer>;
}
