/**
 * Stub TTS adapter for testing or when no provider is configured.
 * Returns empty audio buffer (silence).
 */

import type { ITTS, VoiceOptions } from "./types";

export class StubTTS implements ITTS {
  readonly provider = "stub" as const;
  readonly available = false;

  async synthesize(_text: string, _options?: VoiceOptions): Promise<Buffer> {
    return Buffer.alloc(0);
  }
}
