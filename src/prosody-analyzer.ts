// Prosody Insight - Prosody Analyzer
// Converts a recorded utterance (16-bit mono PCM) into fixed-stride acoustic
// windows (pitch, energy, silence, whisper), pause events, and the speaker's
// pitch/energy baselines. The result is the single shared input of the
// hesitation analyzer, the emotion analyzer and the prosody formatter.

import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { DEFAULT_PROSODY_CONFIG, type ProsodyConfig } from "./config.js";
import { detectPitch, type PitchSearchRange } from "./pitch-detector.js";
import { decodeWav, isPcm16Mono } from "./wav-reader.js";
import { clamp, computeMedian, deepFreeze } from "./utils.js";
import type {
  Logger,
  PauseEvent,
  PcmAudio,
  ProsodyFailure,
  ProsodyFailureReason,
  ProsodyResult,
  ProsodySuccess,
  ProsodyWindow,
  RawProsodyWindow,
} from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Energy reported for digital silence (rms below 1e-10) */
const ENERGY_FLOOR_DB = -100;

const INT16_SCALE = 32768;

// ─── Options ────────────────────────────────────────────────────────────────────

export interface AnalyzeOptions {
  /** Checked at every window boundary; an aborted run yields a "cancelled" failure */
  signal?: AbortSignal;
}

// ─── Pure helpers ───────────────────────────────────────────────────────────────

/**
 * Convert 16-bit signed little-endian PCM bytes to samples in [-1, 1).
 */
export function toNormalizedSamples(pcm: Buffer): Float64Array {
  const sampleCount = Math.floor(pcm.length / 2);
  const samples = new Float64Array(sampleCount);
  for (let i = 0; i < sampleCount; i++) {
    samples[i] = pcm.readInt16LE(i * 2) / INT16_SCALE;
  }
  return samples;
}

/**
 * RMS energy of a window in dB relative to full scale.
 */
export function computeEnergyDb(window: Float64Array): number {
  if (window.length === 0) return ENERGY_FLOOR_DB;
  let sumSquares = 0;
  for (let i = 0; i < window.length; i++) {
    sumSquares += window[i] * window[i];
  }
  const rms = Math.sqrt(sumSquares / window.length);
  if (rms < 1e-10) return ENERGY_FLOOR_DB;
  return 20 * Math.log10(rms);
}

/**
 * Second construction phase: derive the session baselines from voiced,
 * non-silent windows (median, not mean) and attach per-window deltas.
 * Returns new window objects; the raw windows are left untouched.
 */
export function attachBaseline(raw: readonly RawProsodyWindow[]): {
  windows: ProsodyWindow[];
  baselinePitchHz: number;
  baselineEnergyDb: number;
} {
  const voiced = raw.filter((w) => !w.isSilence && w.pitchHz > 0);
  const hasBaseline = voiced.length > 0;
  const baselinePitchHz = computeMedian(voiced.map((w) => w.pitchHz));
  const baselineEnergyDb = computeMedian(voiced.map((w) => w.energyDb));

  const windows = raw.map((w): ProsodyWindow => {
    const isVoiced = !w.isSilence && w.pitchHz > 0;
    // +1 = doubled pitch, -1 = halved (or lower)
    const pitchDelta =
      isVoiced && baselinePitchHz > 0
        ? clamp((w.pitchHz - baselinePitchHz) / baselinePitchHz, -1, 1)
        : 0;
    const energyDelta = hasBaseline ? w.energyDb - baselineEnergyDb : 0;
    return { ...w, pitchDelta, energyDelta };
  });

  return { windows, baselinePitchHz, baselineEnergyDb };
}

/**
 * Group consecutive silent windows into pause events of at least `minPauseMs`.
 *
 * A run that is ended by a non-silent window spans up to that window's start;
 * a run still open at the end of the audio spans to the last window's end.
 * Durations are measured in whole samples so that a run of exactly the
 * minimum length is kept wherever it starts.
 */
export function detectPauses(
  windows: readonly Pick<ProsodyWindow, "startTime" | "endTime" | "isSilence">[],
  minPauseMs: number,
  sampleRate: number,
): PauseEvent[] {
  const pauses: PauseEvent[] = [];
  let pauseStart: number | null = null;

  const emit = (start: number, end: number) => {
    const sampleCount = Math.round(end * sampleRate) - Math.round(start * sampleRate);
    const durationMs = (sampleCount * 1000) / sampleRate;
    if (durationMs >= minPauseMs) {
      pauses.push({ startTime: start, endTime: end, durationMs });
    }
  };

  for (const w of windows) {
    if (w.isSilence) {
      if (pauseStart === null) pauseStart = w.startTime;
    } else if (pauseStart !== null) {
      emit(pauseStart, w.startTime);
      pauseStart = null;
    }
  }

  if (pauseStart !== null && windows.length > 0) {
    emit(pauseStart, windows[windows.length - 1].endTime);
  }

  return pauses;
}

function failure(reason: ProsodyFailureReason, error: string): ProsodyFailure {
  const result: ProsodyFailure = { ok: false, reason, error };
  return Object.freeze(result);
}

// ─── Prosody Analyzer ───────────────────────────────────────────────────────────

export class ProsodyAnalyzer {
  private readonly config: ProsodyConfig;
  private readonly logger?: Logger;

  constructor(config: ProsodyConfig = DEFAULT_PROSODY_CONFIG, logger?: Logger) {
    this.config = config;
    this.logger = logger;
  }

  /**
   * Analyze a WAV container holding 16-bit mono PCM.
   */
  async analyzeWav(wav: Buffer, options: AnalyzeOptions = {}): Promise<ProsodyResult> {
    const decoded = decodeWav(wav);
    if (!decoded.ok) {
      this.logger?.warn(`Unreadable WAV input: ${decoded.error}`);
      return failure("unreadable", decoded.error);
    }

    const { format, data } = decoded.wav;
    if (!isPcm16Mono(format)) {
      return failure(
        "format",
        `Expected 16-bit mono PCM, got ${format.bitsPerSample}-bit ${format.channels}-channel (format 0x${format.audioFormat.toString(16)})`,
      );
    }

    return this.analyze({ samples: data, sampleRate: format.sampleRate }, options);
  }

  /**
   * Analyze raw 16-bit mono PCM.
   *
   * Never throws for bad input: format problems, empty or too-short audio and
   * cancellation are all reported as failure results.
   */
  async analyze(audio: PcmAudio, options: AnalyzeOptions = {}): Promise<ProsodyResult> {
    const { signal } = options;
    const { samples: pcm, sampleRate } = audio;

    if (!Number.isInteger(sampleRate) || sampleRate <= 0) {
      return failure("format", `Invalid sample rate: ${sampleRate}`);
    }
    if (pcm.length === 0) {
      return failure("empty", "Audio buffer is empty");
    }
    if (pcm.length % 2 !== 0) {
      return failure(
        "format",
        `Audio byte length (${pcm.length}) is not a multiple of 2. Expected 16-bit aligned PCM data.`,
      );
    }

    const windowSamples = Math.floor((sampleRate * this.config.windowMs) / 1000);
    const hopSamples = Math.floor((sampleRate * this.config.hopMs) / 1000);
    if (windowSamples < 1 || hopSamples < 1) {
      return failure("format", `Sample rate ${sampleRate}Hz is too low for ${this.config.hopMs}ms hops`);
    }

    const samples = toNormalizedSamples(pcm);
    if (samples.length < windowSamples) {
      return failure(
        "too_short",
        `Audio too short for analysis: ${samples.length} samples, need at least ${windowSamples}`,
      );
    }

    if (signal?.aborted) return failure("cancelled", "Analysis cancelled");

    const range: PitchSearchRange = {
      minPitchHz: this.config.minPitchHz,
      maxPitchHz: this.config.maxPitchHz,
      threshold: this.config.yinThreshold,
    };

    // Phase 1: raw per-window features
    const raw: RawProsodyWindow[] = [];
    let index = 0;
    for (let offset = 0; offset + windowSamples <= samples.length; offset += hopSamples) {
      if (signal?.aborted) {
        this.logger?.info(`Analysis cancelled after ${raw.length} windows`);
        return failure("cancelled", "Analysis cancelled");
      }

      const window = samples.subarray(offset, offset + windowSamples);
      const energyDb = computeEnergyDb(window);
      const isSilence = energyDb < this.config.silenceThresholdDb;
      const pitchHz = isSilence ? 0 : detectPitch(window, sampleRate, range);

      raw.push(
        Object.freeze({
          startTime: offset / sampleRate,
          endTime: (offset + windowSamples) / sampleRate,
          pitchHz,
          energyDb,
          isSilence,
          isWhisper: pitchHz > 0 && energyDb < this.config.whisperThresholdDb,
        }),
      );

      index++;
      if (index % this.config.yieldEveryWindows === 0) {
        await yieldToEventLoop();
      }
    }

    if (signal?.aborted) return failure("cancelled", "Analysis cancelled");

    // Phase 2: baselines and deltas
    const { windows, baselinePitchHz, baselineEnergyDb } = attachBaseline(raw);
    const pauses = detectPauses(windows, this.config.minPauseMs, sampleRate);

    const voicedCount = windows.filter((w) => w.pitchHz > 0).length;
    this.logger?.info(
      `Analysis complete: ${windows.length} windows, ${voicedCount} voiced, ${pauses.length} pauses, ` +
        `baseline pitch=${baselinePitchHz.toFixed(1)}Hz, baseline energy=${baselineEnergyDb.toFixed(1)}dB`,
    );

    const result: ProsodySuccess = {
      ok: true,
      windows,
      pauses,
      baselinePitchHz,
      baselineEnergyDb,
    };
    return deepFreeze(result);
  }
}
