/**
 * Anthropic Claude LLM adapter.
 */

import Anthropic from "@anthropic-ai/sdk";
import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export interface AnthropicLlmConfig {
  apiKey: string;
  model: string;
}

export class AnthropicLLM implements ILLM {
  readonly available = true;
  private client: Anthropic;

  constructor(private readonly cfg: AnthropicLlmConfig) {
    this.client = new Anthropic({ apiKey: cfg.apiKey });
  }

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    const system = messages
      .filter((m) => m.role === "system")
      .map((m) => m.content)
      .join("\n\n");
    const msgs: Anthropic.MessageParam[] = [];
    for (const m of messages) {
      if (m.role === "user" || m.role === "assistant") msgs.push({ role: m.role, content: m.content });
    }
    const response = await this.client.messages.create({
      model: this.cfg.model,
      max_tokens: options?.maxTokens ?? 250,
      temperature: options?.temperature ?? 0.8,
      system: system || undefined,
      messages: msgs,
    });
    const text = response.content
      .map((b) => (b.type === "text" ? b.text : ""))
      .join("");
    return { text };
  }
}
