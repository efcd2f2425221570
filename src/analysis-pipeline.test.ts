import { describe, it, expect, vi } from "vitest";
import { AnalysisPipeline, hasNotableHesitation } from "./analysis-pipeline.js";
import { DEFAULT_CONFIG, resolveConfig } from "./config.js";
import { ANGRY_WARNING } from "./emotion-analyzer.js";
import { ProsodyAnalyzer } from "./prosody-analyzer.js";
import type { PcmAudio, ProsodyResult, ProsodyWindow, TranscriptSegment } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function createSilentLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

/** Returns a fixed prosody result instead of analysing the audio */
class FixedProsodyAnalyzer extends ProsodyAnalyzer {
  constructor(private readonly result: ProsodyResult) {
    super();
  }

  async analyze(): Promise<ProsodyResult> {
    return this.result;
  }
}

function windowsFor(start: number, energyDelta: number, pitchDelta: number): ProsodyWindow[] {
  return Array.from({ length: 10 }, (_, i) => ({
    startTime: start + i * 0.1,
    endTime: start + i * 0.1 + 0.05,
    pitchHz: 180,
    pitchDelta,
    energyDb: -20,
    energyDelta,
    isSilence: false,
    isWhisper: false,
  }));
}

function fixedPipeline(windows: ProsodyWindow[], config = DEFAULT_CONFIG): AnalysisPipeline {
  const prosody: ProsodyResult = { ok: true, windows, pauses: [], baselinePitchHz: 180, baselineEnergyDb: -20 };
  return new AnalysisPipeline(config, {
    prosodyAnalyzer: new FixedProsodyAnalyzer(prosody),
    logger: createSilentLogger(),
  });
}

const audio: PcmAudio = { samples: Buffer.alloc(32000), sampleRate: 16000 };

function oneSegment(text: string): TranscriptSegment[] {
  return [{ text, startTime: 0, endTime: 1 }];
}

// ─── AnalysisPipeline ───────────────────────────────────────────────────────────

describe("AnalysisPipeline", () => {
  it("formats the text and appends hesitation and emotion footers", async () => {
    const text = "um this is fine";
    const output = await fixedPipeline(windowsFor(0, -3, 0)).run({
      audio,
      text,
      segments: oneSegment(text),
      language: "en",
    });

    expect(output.formattedText).toBe("um this is fine");
    expect(output.hesitation?.fillerCount).toBe(1);
    expect(output.emotion?.dominantEmotion).toBe("calm");
    expect(output.text).toBe(
      "um this is fine" +
        "\n---\n[Hesitation Analysis] Fluency: 95% | Fillers: 1" +
        "\n[Emotion] Mood: Calm (50%) | Arc: Calm(1)",
    );
    expect(output.warning).toBeNull();
  });

  it("surfaces the emotion warning for angry delivery", async () => {
    const text = "stop doing that";
    const output = await fixedPipeline(windowsFor(0, 8, 0.3)).run({ audio, text, segments: oneSegment(text) });

    expect(output.formattedText).toBe("**stop doing that**?");
    expect(output.emotion?.dominantEmotion).toBe("angry");
    expect(output.warning).toBe(ANGRY_WARNING);
  });

  it("skips the hesitation footer when nothing notable was found", async () => {
    const text = "this is fine";
    const output = await fixedPipeline(windowsFor(0, -3, 0)).run({ audio, text, segments: oneSegment(text) });

    expect(output.hesitation?.fluencyScore).toBe(1);
    expect(output.text).toBe("this is fine\n[Emotion] Mood: Calm (50%) | Arc: Calm(1)");
  });

  it("still runs the text-only checks when prosody fails", async () => {
    const pipeline = new AnalysisPipeline(DEFAULT_CONFIG, { logger: createSilentLogger() });
    const output = await pipeline.run({
      audio: { samples: Buffer.alloc(0), sampleRate: 16000 },
      text: "um hello",
      segments: oneSegment("um hello"),
    });

    expect(output.prosody).toMatchObject({ ok: false, reason: "empty" });
    expect(output.formattedText).toBe("um hello");
    expect(output.emotion).toBeNull();
    expect(output.text).toBe("um hello\n---\n[Hesitation Analysis] Fluency: 95% | Fillers: 1");
  });

  it("returns the transcript unchanged when cancelled", async () => {
    const pipeline = new AnalysisPipeline(DEFAULT_CONFIG, { logger: createSilentLogger() });
    const controller = new AbortController();
    controller.abort();

    const output = await pipeline.run(
      { audio, text: "um hello", segments: oneSegment("um hello") },
      { signal: controller.signal },
    );

    expect(output).toEqual({
      prosody: output.prosody,
      text: "um hello",
      formattedText: "um hello",
      hesitation: null,
      emotion: null,
      warning: null,
    });
    expect(output.prosody).toMatchObject({ ok: false, reason: "cancelled" });
  });

  it("honours disabled features", async () => {
    const config = resolveConfig({ features: { formatting: false, hesitation: false, emotion: false } });
    const text = "um stop doing that";
    const output = await fixedPipeline(windowsFor(0, 8, 0.3), config).run({
      audio,
      text,
      segments: oneSegment(text),
    });

    expect(output.text).toBe(text);
    expect(output.formattedText).toBe(text);
    expect(output.hesitation).toBeNull();
    expect(output.emotion).toBeNull();
    expect(output.warning).toBeNull();
  });

  it("skips emotion without segments and hesitation for blank text", async () => {
    const output = await fixedPipeline(windowsFor(0, 8, 0.3)).run({ audio, text: "   " });

    expect(output.emotion).toBeNull();
    expect(output.hesitation).toBeNull();
    expect(output.text).toBe("   ");
  });

  it("returns a frozen result", async () => {
    const output = await fixedPipeline(windowsFor(0, -3, 0)).run({ audio, text: "fine", segments: oneSegment("fine") });
    expect(Object.isFrozen(output)).toBe(true);
    expect(Object.isFrozen(output.emotion)).toBe(true);
  });
});

describe("hasNotableHesitation", () => {
  const base = { annotations: [], fluencyScore: 1, fatigueLevel: 0, fillerCount: 0, selfCorrectionCount: 0 };

  it("needs fillers, corrections or fatigue above 0.3", () => {
    expect(hasNotableHesitation(base)).toBe(false);
    expect(hasNotableHesitation({ ...base, fillerCount: 1 })).toBe(true);
    expect(hasNotableHesitation({ ...base, selfCorrectionCount: 1 })).toBe(true);
    expect(hasNotableHesitation({ ...base, fatigueLevel: 0.3 })).toBe(false);
    expect(hasNotableHesitation({ ...base, fatigueLevel: 0.31 })).toBe(true);
  });
});
