/**
 * Google Cloud Text-to-Speech adapter.
 * - With API key: REST API (env GOOGLE_CLOUD_TTS_API_KEY).
 * - Without API key: @google-cloud/text-to-speech client using Application Default
 *   Credentials (GOOGLE_APPLICATION_CREDENTIALS service account JSON).
 * LINEAR16 responses carry their own WAV header.
 */

import { TextToSpeechClient } from "@google-cloud/text-to-speech";
import type { ITTS, VoiceOptions } from "./types";

export interface GoogleCloudTTSConfig {
  apiKey: string;
  voiceName?: string;
  languageCode?: string;
}

const SYNTHESIZE_URL = "https://texttospeech.googleapis.com/v1/text:synthesize";
const DEFAULT_VOICE = "en-US-Neural2-D";

function buildRequest(text: string, defaults: { voiceName?: string; languageCode?: string }, options?: VoiceOptions) {
  return {
    input: { text },
    voice: {
      name: options?.voiceName ?? defaults.voiceName ?? DEFAULT_VOICE,
      languageCode: options?.languageCode ?? defaults.languageCode ?? "en-US",
    },
    audioConfig: {
      audioEncoding: "LINEAR16" as const,
      sampleRateHertz: options?.sampleRateHz ?? 24000,
      speakingRate: options?.speakingRate,
      pitch: options?.pitch,
    },
  };
}

/** TTS using REST API with API key. */
export class GoogleCloudTTS implements ITTS {
  readonly provider = "google" as const;
  readonly available = true;

  constructor(private readonly config: GoogleCloudTTSConfig) {}

  async synthesize(text: string, options?: VoiceOptions): Promise<Buffer> {
    const url = `${SYNTHESIZE_URL}?key=${encodeURIComponent(this.config.apiKey)}`;
    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(buildRequest(text, this.config, options)),
    });
    if (!response.ok) {
      const errText = await response.text();
      throw new Error(`Google TTS failed: ${response.status} ${errText}`);
    }
    const data = (await response.json()) as { audioContent?: string };
    const b64 = data.audioContent;
    if (!b64) return Buffer.alloc(0);
    return Buffer.from(b64, "base64");
  }
}

/** TTS using official Node client and Application Default Credentials (OAuth2 / service account). */
export interface GoogleCloudTTSADCConfig {
  voiceName?: string;
  languageCode?: string;
}

export class GoogleCloudTTSADC implements ITTS {
  readonly provider = "google" as const;
  readonly available = true;
  private readonly client: TextToSpeechClient;

  constructor(private readonly config: GoogleCloudTTSADCConfig = {}) {
    this.client = new TextToSpeechClient();
  }

  async synthesize(text: string, options?: VoiceOptions): Promise<Buffer> {
    const [response] = await this.client.synthesizeSpeech(buildRequest(text, this.config, options));
    const content = response.audioContent;
    if (!content || !(content instanceof Uint8Array)) return Buffer.alloc(0);
    return Buffer.from(content);
  }
}
