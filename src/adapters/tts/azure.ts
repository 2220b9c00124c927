/**
 * Azure Cognitive Services Text-to-Speech adapter (optional).
 * Uses REST API with subscription key; rate and pitch go through SSML prosody.
 */

import type { ITTS, VoiceOptions } from "./types";

export interface AzureTTSConfig {
  key: string;
  region: string;
  voiceName?: string;
}

const OUTPUT_FORMATS: Record<number, string> = {
  16000: "raw-16khz-16bit-mono-pcm",
  24000: "raw-24khz-16bit-mono-pcm",
  48000: "raw-48khz-16bit-mono-pcm",
};

export class AzureTTS implements ITTS {
  readonly provider = "azure" as const;
  readonly available = true;

  constructor(private readonly config: AzureTTSConfig) {}

  async synthesize(text: string, options?: VoiceOptions): Promise<Buffer> {
    const region = this.config.region;
    const url = `https://${region}.tts.speech.microsoft.com/cognitiveservices/v1`;
    const outputFormat = OUTPUT_FORMATS[options?.sampleRateHz ?? 24000] ?? OUTPUT_FORMATS[24000];
    const response = await fetch(url, {
      method: "POST",
      headers: {
        "Ocp-Apim-Subscription-Key": this.config.key,
        "Content-Type": "application/ssml+xml",
        "X-Microsoft-OutputFormat": outputFormat,
      },
      body: buildSsml(text, {
        ...options,
        voiceName: options?.voiceName ?? this.config.voiceName ?? "en-US-JennyNeural",
      }),
    });
    if (!response.ok) throw new Error(`Azure TTS failed: ${response.status} ${response.statusText}`);
    const arrayBuffer = await response.arrayBuffer();
    return Buffer.from(arrayBuffer);
  }
}

function signed(n: number, unit: string): string {
  return `${n >= 0 ? "+" : ""}${n}${unit}`;
}

export function buildSsml(text: string, options: VoiceOptions): string {
  const lang = options.languageCode ?? "en-US";
  const rate = signed(Math.round(((options.speakingRate ?? 1) - 1) * 100), "%");
  const pitch = signed(options.pitch ?? 0, "st");
  return (
    `<speak version='1.0' xml:lang='${lang}'><voice name='${options.voiceName}'>` +
    `<prosody rate='${rate}' pitch='${pitch}'>${escapeXml(text)}</prosody></voice></speak>`
  );
}

function escapeXml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}
