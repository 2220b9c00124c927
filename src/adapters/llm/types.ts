/**
 * LLM adapter types.
 * Implementations can be swapped via config (OpenAI, Anthropic, stub).
 */

export interface Message {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatOptions {
  maxTokens?: number;
  temperature?: number;
}

export interface ChatResponse {
  text: string;
}

export interface ILLM {
  /** False when no provider credential is configured; callers use their fallback text instead. */
  readonly available: boolean;
  chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse>;
}
