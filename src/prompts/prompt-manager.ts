import type { Message } from "../adapters/llm";
import type { HistoryEntry } from "../memory/types";
import type { Persona } from "../personas/types";

/** House rules appended to every persona's system prompt. */
export const DISCUSSION_RULES = [
  "You are taking part in a live science discussion that is streamed to an audience. Be:",
  "- professional and respectful",
  "- concrete and substantive",
  "- natural and conversational",
  "- grounded in examples from your own field",
  "Answer in 2-3 sentences. Do not prefix your answer with your name.",
].join("\n");

export interface PromptManagerConfig {
  /** Overrides DISCUSSION_RULES. */
  rules?: string;
}

export interface BuildPromptArgs {
  persona: Persona;
  topic: string;
  /** Most recent lines, oldest first; the caller bounds the window. */
  history: HistoryEntry[];
}

/**
 * PromptManager
 *
 * Centralizes how a persona's turn is framed for the LLM so the persona voice and
 * discussion etiquette can evolve without touching the generator or the scheduler.
 */
export class PromptManager {
  private readonly rules: string;

  constructor(cfg: PromptManagerConfig = {}) {
    this.rules = cfg.rules ?? DISCUSSION_RULES;
  }

  buildSystemPrompt(persona: Persona): string {
    return [
      `You are ${persona.name}, an expert in ${persona.expertise}.`,
      `Your personality: ${persona.personality}`,
      "",
      this.rules,
    ].join("\n");
  }

  buildMessages(args: BuildPromptArgs): Message[] {
    const parts: string[] = [`Discussion topic: ${args.topic}`, ""];
    if (args.history.length > 0) {
      parts.push("Latest remarks:");
      for (const entry of args.history) parts.push(`- ${entry.agentName}: ${entry.text}`);
      parts.push("");
    }
    parts.push(`${args.persona.name}, what do you think about this topic? (briefly, 2-3 sentences)`);
    return [
      { role: "system", content: this.buildSystemPrompt(args.persona) },
      { role: "user", content: parts.join("\n") },
    ];
  }
}
