/**
 * Minimal RIFF/WAVE reader for recorded utterances.
 *
 * Layout: ["RIFF"][uint32 LE size]["WAVE"] followed by chunks of
 * [4-byte id][uint32 LE length][payload, padded to an even length].
 * Only the "fmt " and "data" chunks are read; everything else is skipped.
 */

// ─── Constants ──────────────────────────────────────────────────────────────────

const RIFF_HEADER_SIZE = 12;
const CHUNK_HEADER_SIZE = 8;
const MIN_FMT_CHUNK_SIZE = 16;

const WAVE_FORMAT_PCM = 0x0001;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

// ─── Types ──────────────────────────────────────────────────────────────────────

export interface WavFormat {
  audioFormat: number;
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
}

export interface DecodedWav {
  format: WavFormat;
  /** Raw sample bytes of the "data" chunk */
  data: Buffer;
}

export type WavDecodeResult =
  | { ok: true; wav: DecodedWav }
  | { ok: false; error: string };

// ─── Decode ─────────────────────────────────────────────────────────────────────

/**
 * Parse a WAV container. Does not judge the sample format: callers decide
 * which formats they accept (see isPcm16Mono).
 */
export function decodeWav(buf: Buffer): WavDecodeResult {
  if (buf.length < RIFF_HEADER_SIZE) {
    return { ok: false, error: `Buffer too small for a WAV header (${buf.length} bytes)` };
  }
  if (buf.toString("ascii", 0, 4) !== "RIFF" || buf.toString("ascii", 8, 12) !== "WAVE") {
    return { ok: false, error: "Missing RIFF/WAVE signature" };
  }

  let format: WavFormat | null = null;
  let data: Buffer | null = null;
  let offset = RIFF_HEADER_SIZE;

  while (offset + CHUNK_HEADER_SIZE <= buf.length) {
    const id = buf.toString("ascii", offset, offset + 4);
    const size = buf.readUInt32LE(offset + 4);
    const bodyStart = offset + CHUNK_HEADER_SIZE;
    // Writers that stream audio often leave the data size unset; clamp to what is there
    const bodyEnd = Math.min(bodyStart + size, buf.length);

    if (id === "fmt ") {
      if (bodyEnd - bodyStart < MIN_FMT_CHUNK_SIZE) {
        return { ok: false, error: `fmt chunk too small (${bodyEnd - bodyStart} bytes)` };
      }
      format = {
        audioFormat: buf.readUInt16LE(bodyStart),
        channels: buf.readUInt16LE(bodyStart + 2),
        sampleRate: buf.readUInt32LE(bodyStart + 4),
        bitsPerSample: buf.readUInt16LE(bodyStart + 14),
      };
    } else if (id === "data") {
      data = buf.subarray(bodyStart, bodyEnd);
    }

    offset = bodyStart + size + (size % 2);
  }

  if (format === null) return { ok: false, error: "Missing fmt chunk" };
  if (data === null) return { ok: false, error: "Missing data chunk" };

  return { ok: true, wav: { format, data } };
}

/**
 * True for 16-bit integer PCM with a single channel.
 */
export function isPcm16Mono(format: WavFormat): boolean {
  return (
    (format.audioFormat === WAVE_FORMAT_PCM || format.audioFormat === WAVE_FORMAT_EXTENSIBLE) &&
    format.bitsPerSample === 16 &&
    format.channels === 1
  );
}

// ─── Encode ─────────────────────────────────────────────────────────────────────

/**
 * Wrap 16-bit mono PCM in a canonical 44-byte-header WAV container.
 */
export function encodeWav(samples: Buffer, sampleRate: number): Buffer {
  const header = Buffer.alloc(44);
  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(36 + samples.length, 4);
  header.write("WAVE", 8, "ascii");
  header.write("fmt ", 12, "ascii");
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(WAVE_FORMAT_PCM, 20);
  header.writeUInt16LE(1, 22); // channels
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * 2, 28); // byte rate
  header.writeUInt16LE(2, 32); // block align
  header.writeUInt16LE(16, 34); // bits per sample
  header.write("data", 36, "ascii");
  header.writeUInt32LE(samples.length, 40);
  return Buffer.concat([header, samples]);
}
