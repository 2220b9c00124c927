/**
 * PcmPacer: feeds a Writable with fixed 100 ms PCM slices in real time.
 * Queued speech is written when present; silence otherwise, so the encoder never starves.
 * While the consumer is not draining (writableNeedDrain) ticks are skipped: nothing is buffered
 * beyond the stream's highWaterMark and queued speech waits instead of piling up.
 */

import type { Writable } from "stream";
import type { PcmFormat } from "./types";

export const SLICE_MS = 100;

interface QueuedClip {
  pcm: Buffer;
  offset: number;
  resolve: () => void;
}

export function bytesPerSlice(format: PcmFormat, sliceMs = SLICE_MS): number {
  const frames = Math.round((format.sampleRateHz * sliceMs) / 1000);
  return frames * format.channels * 2;
}

export class PcmPacer {
  private readonly queue: QueuedClip[] = [];
  private readonly sliceBytes: number;
  private readonly bytesPerMs: number;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly out: Writable,
    format: PcmFormat
  ) {
    this.sliceBytes = bytesPerSlice(format);
    this.bytesPerMs = (format.sampleRateHz * format.channels * 2) / 1000;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.tick(), SLICE_MS);
  }

  /** Resolves once the whole clip has been written, or when the pacer stops. */
  push(pcm: Buffer): Promise<void> {
    if (!this.timer || pcm.length === 0) return Promise.resolve();
    // Keep sample alignment.
    const aligned = pcm.length % 2 === 0 ? pcm : pcm.subarray(0, pcm.length - 1);
    return new Promise<void>((resolve) => {
      this.queue.push({ pcm: aligned, offset: 0, resolve });
    });
  }

  queuedMs(): number {
    let bytes = 0;
    for (const clip of this.queue) bytes += clip.pcm.length - clip.offset;
    return Math.round(bytes / this.bytesPerMs);
  }

  /** Stops writing and resolves every pending push. */
  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    for (const clip of this.queue.splice(0)) clip.resolve();
  }

  private tick(): void {
    if (this.out.destroyed || this.out.writableEnded) {
      this.stop();
      return;
    }
    if (this.out.writableNeedDrain) return;
    const slice = Buffer.alloc(this.sliceBytes);
    let filled = 0;
    while (filled < this.sliceBytes && this.queue.length > 0) {
      const clip = this.queue[0];
      const n = Math.min(this.sliceBytes - filled, clip.pcm.length - clip.offset);
      clip.pcm.copy(slice, filled, clip.offset, clip.offset + n);
      clip.offset += n;
      filled += n;
      if (clip.offset >= clip.pcm.length) {
        this.queue.shift();
        clip.resolve();
      }
    }
    this.out.write(slice);
  }
}
