/**
 * Audio duration when the WAV header has none: ffprobe, then a word-count estimate.
 */

import { runProcess } from "../utils/process";

const SECONDS_PER_WORD = 0.3;
const MIN_ESTIMATE_SEC = 3;
const MAX_ESTIMATE_SEC = 10;

/** words x 0.3 s, clamped to [3, 10]. */
export function estimateSpeechSeconds(text: string): number {
  const words = text.trim().split(/\s+/).filter((w) => w.length > 0).length;
  return Math.max(MIN_ESTIMATE_SEC, Math.min(words * SECONDS_PER_WORD, MAX_ESTIMATE_SEC));
}

/** Parse ffprobe's `format=duration` output. */
export function parseProbeOutput(stdout: string): number | null {
  const n = parseFloat(stdout.trim());
  return Number.isFinite(n) && n > 0 ? n : null;
}

export async function probeDuration(filePath: string, ffprobePath: string, timeoutMs = 5000): Promise<number | null> {
  const result = await runProcess(
    ffprobePath,
    ["-v", "error", "-show_entries", "format=duration", "-of", "default=noprint_wrappers=1:nokey=1", filePath],
    { timeoutMs, label: "ffprobe" }
  );
  if (result.code !== 0) return null;
  return parseProbeOutput(result.stdout.toString("utf8"));
}
