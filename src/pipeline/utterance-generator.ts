/**
 * UtteranceGenerator: one persona's next statement.
 * Wraps the LLM adapter with a timeout and a fallback policy so a turn always has text to speak.
 */

import type { ILLM } from "../adapters/llm";
import type { HistoryEntry } from "../memory/types";
import type { Persona } from "../personas/types";
import type { GeneratedUtterance, IUtteranceGenerator } from "../scheduler/types";
import { PromptManager } from "../prompts/prompt-manager";
import { cannedUtterances, errorUtterance } from "../prompts/fallback";
import { UtteranceFilter } from "./utterance-filter";
import { withTimeout } from "../utils/async";
import { errMessage, logger, logLlmCall, preview } from "../logging";

const DEFAULT_LLM_TIMEOUT_MS = 25_000;
const DEFAULT_MAX_TOKENS = 250;
const DEFAULT_TEMPERATURE = 0.8;

export interface UtteranceGeneratorConfig {
  llm: ILLM;
  timeoutMs?: number;
  maxTokens?: number;
  temperature?: number;
  promptManager?: PromptManager;
  filter?: UtteranceFilter;
  /** Float in [0, 1); picks among canned lines. */
  random?: () => number;
}

export class UtteranceGenerator implements IUtteranceGenerator {
  private readonly llm: ILLM;
  private readonly timeoutMs: number;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly promptManager: PromptManager;
  private readonly filter: UtteranceFilter;
  private readonly random: () => number;

  constructor(config: UtteranceGeneratorConfig) {
    this.llm = config.llm;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_LLM_TIMEOUT_MS;
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.temperature = config.temperature ?? DEFAULT_TEMPERATURE;
    this.promptManager = config.promptManager ?? new PromptManager();
    this.filter = config.filter ?? new UtteranceFilter();
    this.random = config.random ?? Math.random;
  }

  /** Never rejects; the returned text is always non-empty. */
  async generate(persona: Persona, topic: string, history: HistoryEntry[]): Promise<GeneratedUtterance> {
    const start = Date.now();
    if (!this.llm.available) {
      const options = cannedUtterances(persona, topic);
      const i = Math.min(options.length - 1, Math.floor(this.random() * options.length));
      return { text: options[i], source: "canned" };
    }

    try {
      const messages = this.promptManager.buildMessages({ persona, topic, history });
      const response = await withTimeout(
        this.llm.chat(messages, { maxTokens: this.maxTokens, temperature: this.temperature }),
        this.timeoutMs,
        "LLM"
      );
      const text = this.filter.clean(response.text, persona.name);
      const latencyMs = Date.now() - start;
      logLlmCall(logger, persona.id, text.length, latencyMs);
      if (text) {
        logger.debug({ event: "UTTERANCE", personaId: persona.id, text: preview(text) }, "Utterance generated");
        return { text, source: "llm" };
      }
      logger.warn({ event: "LLM_EMPTY", personaId: persona.id }, "LLM returned no usable text");
    } catch (err) {
      logger.warn({ event: "LLM_FAILED", personaId: persona.id, err: errMessage(err) }, "LLM failed");
    }
    return { text: errorUtterance(persona, topic), source: "error_fallback" };
  }
}
