/**
 * Sentence boundary helpers for capping generated utterances.
 * A boundary is sentence-ending punctuation ( . ! ? ) optionally followed by closing quotes/brackets.
 */

const SENTENCE_END = /[.!?]+["')\]]*(?=\s|$)/g;

/** Split text into trimmed, non-empty sentences. Trailing text without punctuation is kept as the last item. */
export function splitSentences(text: string): string[] {
  const trimmed = text.trim();
  if (trimmed.length === 0) return [];

  const sentences: string[] = [];
  let lastIndex = 0;
  let match: RegExpExecArray | null;
  SENTENCE_END.lastIndex = 0;
  while ((match = SENTENCE_END.exec(trimmed)) !== null) {
    const sentence = trimmed.slice(lastIndex, match.index + match[0].length).trim();
    if (sentence.length > 0) sentences.push(sentence);
    lastIndex = match.index + match[0].length;
  }
  const remainder = trimmed.slice(lastIndex).trim();
  if (remainder.length > 0) sentences.push(remainder);
  return sentences;
}

/**
 * Cap text at maxChars, cutting after the last complete sentence that fits.
 * Falls back to a word boundary (with an ellipsis) when not even the first sentence fits.
 */
export function truncateAtSentence(text: string, maxChars: number): string {
  const trimmed = text.trim();
  if (trimmed.length <= maxChars) return trimmed;

  let out = "";
  for (const sentence of splitSentences(trimmed)) {
    const next = out ? `${out} ${sentence}` : sentence;
    if (next.length > maxChars) break;
    out = next;
  }
  if (out) return out;

  const chunk = trimmed.slice(0, Math.max(0, maxChars - 3));
  const lastSpace = chunk.lastIndexOf(" ");
  const cut = lastSpace > chunk.length / 2 ? chunk.slice(0, lastSpace) : chunk;
  return `${cut.trimEnd()}...`;
}
