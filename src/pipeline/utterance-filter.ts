/**
 * UtteranceFilter: normalizes raw model output into a single speakable line.
 *
 * - drops a leading "Name:" the model sometimes echoes from the transcript format
 * - strips wrapping quotes and collapses whitespace
 * - caps length on a sentence boundary
 */

import { truncateAtSentence } from "./sentence-splitter";

export interface UtteranceFilterConfig {
  /** Max characters kept (cut at a sentence boundary). */
  maxChars?: number;
}

const DEFAULT_MAX_CHARS = 600;

const QUOTE_PAIRS: ReadonlyArray<[string, string]> = [
  ['"', '"'],
  ["'", "'"],
  ["“", "”"],
  ["«", "»"],
];

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export class UtteranceFilter {
  private readonly maxChars: number;

  constructor(cfg: UtteranceFilterConfig = {}) {
    this.maxChars = cfg.maxChars ?? DEFAULT_MAX_CHARS;
  }

  /** Returns "" when nothing speakable remains. */
  clean(raw: string, speakerName: string): string {
    let text = (raw || "").replace(/\s+/g, " ").trim();
    if (!text) return "";

    const prefix = new RegExp(`^\\**${escapeRegExp(speakerName)}\\**\\s*:\\s*`, "i");
    text = text.replace(prefix, "");
    text = stripQuotes(text);
    return truncateAtSentence(text, this.maxChars);
  }
}

function stripQuotes(text: string): string {
  let out = text.trim();
  for (;;) {
    const pair = QUOTE_PAIRS.find(([open, close]) => out.length >= 2 && out.startsWith(open) && out.endsWith(close));
    if (!pair) return out;
    out = out.slice(pair[0].length, out.length - pair[1].length).trim();
  }
}
