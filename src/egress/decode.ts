/**
 * Turn a cached artifact into raw PCM in the feed's format.
 * WAVs already in the right format are sliced directly; anything else goes through ffmpeg.
 */

import * as fs from "fs/promises";
import { parseWavHeader } from "../audio/wav";
import { runProcess } from "../utils/process";
import type { PcmFormat } from "./types";

export async function decodeToPcm(filePath: string, format: PcmFormat, ffmpegPath: string, timeoutMs: number): Promise<Buffer> {
  const data = await fs.readFile(filePath);
  const info = parseWavHeader(data);
  if (
    info &&
    info.bitsPerSample === 16 &&
    info.sampleRateHz === format.sampleRateHz &&
    info.channels === format.channels
  ) {
    return data.subarray(info.dataOffset, info.dataOffset + info.dataBytes);
  }

  const result = await runProcess(
    ffmpegPath,
    ["-v", "error", "-i", filePath, "-f", "s16le", "-ac", String(format.channels), "-ar", String(format.sampleRateHz), "pipe:1"],
    { timeoutMs, label: "ffmpeg decode" }
  );
  if (result.code !== 0) throw new Error(`ffmpeg decode failed: ${result.stderr.trim()}`);
  return result.stdout;
}
