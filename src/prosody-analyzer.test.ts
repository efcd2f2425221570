import { describe, it, expect, vi } from "vitest";
import { DEFAULT_PROSODY_CONFIG } from "./config.js";
import {
  ProsodyAnalyzer,
  attachBaseline,
  computeEnergyDb,
  detectPauses,
  toNormalizedSamples,
} from "./prosody-analyzer.js";
import { encodeWav } from "./wav-reader.js";
import type { ProsodyResult, ProsodySuccess, RawProsodyWindow } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

const SAMPLE_RATE = 16000;

function createSilentLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

/** Encode samples in [-1, 1] as 16-bit little-endian PCM. */
function toPcm(samples: ArrayLike<number>): Buffer {
  const buf = Buffer.alloc(samples.length * 2);
  for (let i = 0; i < samples.length; i++) {
    buf.writeInt16LE(Math.round(Math.max(-1, Math.min(1, samples[i])) * 32767), i * 2);
  }
  return buf;
}

function tone(frequency: number, seconds: number, amplitude = 0.5): number[] {
  const count = Math.round(seconds * SAMPLE_RATE);
  return Array.from({ length: count }, (_, i) =>
    amplitude * Math.sin((2 * Math.PI * frequency * i) / SAMPLE_RATE),
  );
}

function silence(seconds: number): number[] {
  return new Array<number>(Math.round(seconds * SAMPLE_RATE)).fill(0);
}

function expectSuccess(result: ProsodyResult): ProsodySuccess {
  if (!result.ok) throw new Error(`Expected success, got ${result.reason}: ${result.error}`);
  return result;
}

function rawWindow(overrides: Partial<RawProsodyWindow>): RawProsodyWindow {
  return {
    startTime: 0,
    endTime: 0.05,
    pitchHz: 0,
    energyDb: -20,
    isSilence: false,
    isWhisper: false,
    ...overrides,
  };
}

// ─── Pure helpers ───────────────────────────────────────────────────────────────

describe("toNormalizedSamples", () => {
  it("scales int16 to [-1, 1)", () => {
    const buf = Buffer.alloc(6);
    buf.writeInt16LE(-32768, 0);
    buf.writeInt16LE(16384, 2);
    buf.writeInt16LE(0, 4);
    expect(Array.from(toNormalizedSamples(buf))).toEqual([-1, 0.5, 0]);
  });
});

describe("computeEnergyDb", () => {
  it("floors digital silence at -100dB", () => {
    expect(computeEnergyDb(new Float64Array(100))).toBe(-100);
  });

  it("reports a full-scale square wave at 0dB", () => {
    expect(computeEnergyDb(Float64Array.from([1, -1, 1, -1]))).toBeCloseTo(0, 10);
  });

  it("reports amplitude 0.1 at -20dB", () => {
    expect(computeEnergyDb(Float64Array.from([0.1, -0.1]))).toBeCloseTo(-20, 10);
  });
});

describe("attachBaseline", () => {
  it("uses the median of voiced, non-silent windows", () => {
    const { windows, baselinePitchHz, baselineEnergyDb } = attachBaseline([
      rawWindow({ pitchHz: 100, energyDb: -20 }),
      rawWindow({ pitchHz: 200, energyDb: -10 }),
      rawWindow({ pitchHz: 300, energyDb: -30 }),
      rawWindow({ pitchHz: 0, energyDb: -100, isSilence: true }),
    ]);

    expect(baselinePitchHz).toBe(200);
    expect(baselineEnergyDb).toBe(-20);
    expect(windows.map((w) => w.pitchDelta)).toEqual([-0.5, 0, 0.5, 0]);
    expect(windows.map((w) => w.energyDelta)).toEqual([0, 10, -10, -80]);
  });

  it("clamps pitch delta to [-1, 1]", () => {
    const { windows } = attachBaseline([
      rawWindow({ pitchHz: 100 }),
      rawWindow({ pitchHz: 100 }),
      rawWindow({ pitchHz: 450 }),
    ]);
    expect(windows[2].pitchDelta).toBe(1);
  });

  it("leaves deltas at 0 when nothing is voiced", () => {
    const { windows, baselinePitchHz, baselineEnergyDb } = attachBaseline([
      rawWindow({ energyDb: -50, isSilence: true }),
      rawWindow({ energyDb: -35 }),
    ]);
    expect(baselinePitchHz).toBe(0);
    expect(baselineEnergyDb).toBe(0);
    expect(windows.map((w) => [w.pitchDelta, w.energyDelta])).toEqual([
      [0, 0],
      [0, 0],
    ]);
  });
});

describe("detectPauses", () => {
  const w = (startTime: number, isSilence: boolean) => ({
    startTime,
    endTime: startTime + 0.05,
    isSilence,
  });

  it("ends a pause at the start of the next voiced window", () => {
    const windows = [w(0, false), w(0.1, true), w(0.2, true), w(0.3, true), w(0.4, false)];
    const pauses = detectPauses(windows, 200, SAMPLE_RATE);
    expect(pauses).toHaveLength(1);
    expect(pauses[0].startTime).toBe(0.1);
    expect(pauses[0].endTime).toBe(0.4);
    expect(pauses[0].durationMs).toBe(300);
  });

  it("drops silent runs shorter than the minimum", () => {
    expect(detectPauses([w(0, false), w(0.1, true), w(0.2, false)], 200, SAMPLE_RATE)).toEqual([]);
  });

  it("closes a trailing pause at the last window's end", () => {
    const pauses = detectPauses([w(0, false), w(0.1, true), w(0.2, true), w(0.3, true)], 200, SAMPLE_RATE);
    expect(pauses).toHaveLength(1);
    expect(pauses[0].endTime).toBeCloseTo(0.35, 10);
    expect(pauses[0].durationMs).toBe(250);
  });

  it("keeps a run of exactly the minimum length", () => {
    // 0.7 - 0.5 is 0.19999999999999996 in floating point
    const pauses = detectPauses([w(0.4, false), w(0.5, true), w(0.6, true), w(0.7, false)], 200, SAMPLE_RATE);
    expect(pauses).toEqual([{ startTime: 0.5, endTime: 0.7, durationMs: 200 }]);
  });
});

// ─── ProsodyAnalyzer ────────────────────────────────────────────────────────────

describe("ProsodyAnalyzer", () => {
  const analyzer = new ProsodyAnalyzer(DEFAULT_PROSODY_CONFIG, createSilentLogger());

  it("treats all-zero input as silence", async () => {
    const result = expectSuccess(
      await analyzer.analyze({ samples: toPcm(silence(1)), sampleRate: SAMPLE_RATE }),
    );

    expect(result.windows).toHaveLength(39);
    expect(result.windows.every((w) => w.isSilence && w.pitchHz === 0)).toBe(true);
    expect(result.windows.every((w) => w.energyDb === -100)).toBe(true);
    expect(result.baselinePitchHz).toBe(0);
    expect(result.baselineEnergyDb).toBe(0);
    expect(result.pauses).toHaveLength(1);
    expect(result.pauses[0].startTime).toBe(0);
    expect(result.pauses[0].endTime).toBe(1);
  });

  it("detects a 200Hz tone within 2%", async () => {
    const result = expectSuccess(
      await analyzer.analyze({ samples: toPcm(tone(200, 1)), sampleRate: SAMPLE_RATE }),
    );

    const voiced = result.windows.filter((w) => w.pitchHz > 0);
    expect(voiced).toHaveLength(result.windows.length);
    for (const w of voiced) {
      expect(w.pitchHz).toBeGreaterThanOrEqual(196);
      expect(w.pitchHz).toBeLessThanOrEqual(204);
      expect(w.isSilence).toBe(false);
      expect(w.isWhisper).toBe(false);
      expect(Math.abs(w.pitchDelta)).toBeLessThan(0.02);
    }
    expect(result.baselinePitchHz).toBeGreaterThanOrEqual(196);
    expect(result.baselinePitchHz).toBeLessThanOrEqual(204);
    // rms of a 0.5 sine = 0.3536 → -9.03dB
    expect(result.baselineEnergyDb).toBeCloseTo(-9.03, 1);
    expect(result.pauses).toEqual([]);
  });

  it("finds exactly one ~2000ms pause in a 2 second gap", async () => {
    const samples = toPcm([...tone(200, 1), ...silence(2), ...tone(200, 1)]);
    const result = expectSuccess(await analyzer.analyze({ samples, sampleRate: SAMPLE_RATE }));

    expect(result.pauses).toHaveLength(1);
    const [pause] = result.pauses;
    expect(pause.startTime).toBeCloseTo(1, 6);
    expect(pause.endTime).toBeCloseTo(2.975, 6);
    expect(pause.durationMs).toBeGreaterThanOrEqual(1950);
    expect(pause.durationMs).toBeLessThanOrEqual(2050);
  });

  // 3600 zero samples leave exactly 8 fully silent windows (8 hops = 200ms)
  it.each([4, 5, 6, 7])("keeps a minimum-length gap starting at hop %i", async (hop) => {
    const samples = [...tone(200, 1)];
    samples.fill(0, hop * 400, hop * 400 + 3600);
    const result = expectSuccess(await analyzer.analyze({ samples: toPcm(samples), sampleRate: SAMPLE_RATE }));

    expect(result.pauses).toHaveLength(1);
    expect(result.pauses[0].durationMs).toBe(200);
    expect(result.pauses[0].startTime).toBeCloseTo((hop * 400) / SAMPLE_RATE, 10);
  });

  it("flags quiet voiced windows as whisper", async () => {
    // amplitude 0.02 → -37dB: above the silence floor, below the whisper line
    const result = expectSuccess(
      await analyzer.analyze({ samples: toPcm(tone(200, 0.5, 0.02)), sampleRate: SAMPLE_RATE }),
    );
    expect(result.windows.every((w) => !w.isSilence && w.isWhisper)).toBe(true);
  });

  it("produces windows at a fixed 25ms stride and drops the partial tail", async () => {
    // 0.51s = 8160 samples: offsets 0..7200 fit, 7600 does not
    const result = expectSuccess(
      await analyzer.analyze({ samples: toPcm(tone(200, 0.51)), sampleRate: SAMPLE_RATE }),
    );
    expect(result.windows).toHaveLength(19);
    result.windows.forEach((w, i) => {
      expect(w.startTime).toBeCloseTo(i * 0.025, 10);
      expect(w.endTime - w.startTime).toBeCloseTo(0.05, 10);
    });
  });

  it("returns a deeply frozen result", async () => {
    const result = expectSuccess(
      await analyzer.analyze({ samples: toPcm(tone(200, 0.2)), sampleRate: SAMPLE_RATE }),
    );
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.windows)).toBe(true);
    expect(Object.isFrozen(result.windows[0])).toBe(true);
    expect(Object.isFrozen(result.pauses)).toBe(true);
  });

  it("is deterministic", async () => {
    const samples = toPcm([...tone(180, 0.5), ...silence(0.4), ...tone(240, 0.5, 0.3)]);
    const a = await analyzer.analyze({ samples, sampleRate: SAMPLE_RATE });
    const b = await analyzer.analyze({ samples, sampleRate: SAMPLE_RATE });
    expect(b).toEqual(a);
  });

  describe("failures", () => {
    it("rejects an empty buffer", async () => {
      const result = await analyzer.analyze({ samples: Buffer.alloc(0), sampleRate: SAMPLE_RATE });
      expect(result).toMatchObject({ ok: false, reason: "empty" });
    });

    it("rejects a buffer with an odd byte length", async () => {
      const result = await analyzer.analyze({ samples: Buffer.alloc(3201), sampleRate: SAMPLE_RATE });
      expect(result).toMatchObject({ ok: false, reason: "format" });
    });

    it("rejects a non-integer sample rate", async () => {
      const result = await analyzer.analyze({ samples: toPcm(tone(200, 0.1)), sampleRate: 16000.5 });
      expect(result).toMatchObject({ ok: false, reason: "format" });
    });

    it("rejects audio shorter than one window", async () => {
      const result = await analyzer.analyze({ samples: toPcm(tone(200, 0.04)), sampleRate: SAMPLE_RATE });
      expect(result).toMatchObject({ ok: false, reason: "too_short" });
    });
  });

  describe("cancellation", () => {
    it("reports an already-aborted signal as cancelled", async () => {
      const controller = new AbortController();
      controller.abort();
      const result = await analyzer.analyze(
        { samples: toPcm(tone(200, 0.5)), sampleRate: SAMPLE_RATE },
        { signal: controller.signal },
      );
      expect(result).toEqual({ ok: false, reason: "cancelled", error: "Analysis cancelled" });
    });

    it("stops at the next window boundary after an abort", async () => {
      const yieldingAnalyzer = new ProsodyAnalyzer(
        { ...DEFAULT_PROSODY_CONFIG, yieldEveryWindows: 1 },
        createSilentLogger(),
      );
      const controller = new AbortController();
      const pending = yieldingAnalyzer.analyze(
        { samples: toPcm(tone(200, 1)), sampleRate: SAMPLE_RATE },
        { signal: controller.signal },
      );
      controller.abort();

      const result = await pending;
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.reason).toBe("cancelled");
    });
  });

  describe("analyzeWav", () => {
    it("analyzes a 16-bit mono WAV container", async () => {
      const wav = encodeWav(toPcm(tone(200, 0.3)), SAMPLE_RATE);
      const result = expectSuccess(await analyzer.analyzeWav(wav));
      expect(result.windows).toHaveLength(11);
    });

    it("reports garbage input as unreadable", async () => {
      const result = await analyzer.analyzeWav(Buffer.from("definitely not a wav file"));
      expect(result).toMatchObject({ ok: false, reason: "unreadable" });
    });

    it("rejects stereo audio as a format failure", async () => {
      const wav = encodeWav(toPcm(tone(200, 0.3)), SAMPLE_RATE);
      wav.writeUInt16LE(2, 22);
      const result = await analyzer.analyzeWav(wav);
      expect(result).toMatchObject({ ok: false, reason: "format" });
    });
  });
});
