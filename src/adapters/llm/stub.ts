/**
 * Stub LLM adapter for testing or when no provider is configured.
 * Without fixed text it reports itself unavailable so the generator uses canned lines.
 */

import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export class StubLLM implements ILLM {
  readonly available: boolean;

  constructor(private readonly fixedText?: string) {
    this.available = fixedText !== undefined;
  }

  async chat(_messages: Message[], _options?: ChatOptions): Promise<ChatResponse> {
    return { text: this.fixedText ?? "" };
  }
}
