/**
 * WAV container helpers: wrap provider PCM for the audio cache and read durations back.
 */

export interface WavInfo {
  sampleRateHz: number;
  channels: number;
  bitsPerSample: number;
  byteRate: number;
  /** Offset of the first PCM byte. */
  dataOffset: number;
  dataBytes: number;
  durationSec: number;
}

const RIFF_HEADER_BYTES = 12;

export function isWav(buf: Buffer): boolean {
  return buf.length >= RIFF_HEADER_BYTES && buf.toString("ascii", 0, 4) === "RIFF" && buf.toString("ascii", 8, 12) === "WAVE";
}

/**
 * Prepend a 44-byte WAV header to 16-bit PCM.
 */
export function pcmToWav(pcm: Buffer, sampleRateHz: number, numChannels = 1): Buffer {
  const bitsPerSample = 16;
  const byteRate = sampleRateHz * numChannels * (bitsPerSample / 8);
  const dataSize = pcm.length;
  const headerSize = 44;
  const fileSize = headerSize + dataSize;
  const header = Buffer.alloc(headerSize);
  header.write("RIFF", 0);
  header.writeUInt32LE(fileSize - 8, 4);
  header.write("WAVE", 8);
  header.write("fmt ", 12);
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(numChannels, 22);
  header.writeUInt32LE(sampleRateHz, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE((numChannels * bitsPerSample) / 8, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  header.write("data", 36);
  header.writeUInt32LE(dataSize, 40);
  return Buffer.concat([header, pcm]);
}

/** Return the audio as WAV, wrapping raw PCM when the provider sent no container. */
export function toWav(audio: Buffer, sampleRateHz: number): Buffer {
  return isWav(audio) ? audio : pcmToWav(audio, sampleRateHz);
}

/**
 * Walk the RIFF chunks for "fmt " and "data". Returns null for anything that is not PCM WAV.
 * A data chunk that claims more bytes than the buffer holds is clamped (streamed WAVs write 0xFFFFFFFF).
 */
export function parseWavHeader(buf: Buffer): WavInfo | null {
  if (!isWav(buf)) return null;
  let offset = RIFF_HEADER_BYTES;
  let fmt: { channels: number; sampleRateHz: number; byteRate: number; bitsPerSample: number } | null = null;
  while (offset + 8 <= buf.length) {
    const id = buf.toString("ascii", offset, offset + 4);
    const size = buf.readUInt32LE(offset + 4);
    const body = offset + 8;
    if (id === "fmt " && body + 16 <= buf.length) {
      fmt = {
        channels: buf.readUInt16LE(body + 2),
        sampleRateHz: buf.readUInt32LE(body + 4),
        byteRate: buf.readUInt32LE(body + 8),
        bitsPerSample: buf.readUInt16LE(body + 14),
      };
    } else if (id === "data") {
      if (!fmt || fmt.byteRate === 0) return null;
      const dataBytes = Math.min(size, buf.length - body);
      return { ...fmt, dataOffset: body, dataBytes, durationSec: dataBytes / fmt.byteRate };
    }
    // Chunks are word-aligned.
    offset = body + size + (size % 2);
  }
  return null;
}
