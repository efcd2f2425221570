import { describe, it, expect } from "vitest";
import { DEFAULT_FORMATTER_CONFIG } from "./config.js";
import { ProsodyFormatter, endsWithPunctuation, wrapEmphasis } from "./prosody-formatter.js";
import type { PauseEvent, ProsodySuccess, ProsodyWindow, TranscriptSegment } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

interface Delivery {
  energyDelta?: number;
  pitchDelta?: number;
  isWhisper?: boolean;
}

/** Voiced windows every 100ms across [start, end) */
function windowsFor(start: number, end: number, delivery: Delivery = {}): ProsodyWindow[] {
  const windows: ProsodyWindow[] = [];
  for (let t = start; t < end - 1e-9; t += 0.1) {
    windows.push({
      startTime: t,
      endTime: t + 0.05,
      pitchHz: 180,
      pitchDelta: delivery.pitchDelta ?? 0,
      energyDb: -20,
      energyDelta: delivery.energyDelta ?? 0,
      isSilence: false,
      isWhisper: delivery.isWhisper ?? false,
    });
  }
  return windows;
}

function prosodyOf(windows: ProsodyWindow[], pauses: PauseEvent[] = []): ProsodySuccess {
  return { ok: true, windows, pauses, baselinePitchHz: 180, baselineEnergyDb: -20 };
}

function seg(text: string, startTime: number, endTime: number): TranscriptSegment {
  return { text, startTime, endTime };
}

function pause(startTime: number, endTime: number): PauseEvent {
  return { startTime, endTime, durationMs: (endTime - startTime) * 1000 };
}

/** Format a single segment spanning [0, 1) delivered as described. */
function formatOne(text: string, delivery: Delivery): string {
  return formatter.format(text, [seg(text, 0, 1)], prosodyOf(windowsFor(0, 1, delivery)));
}

const formatter = new ProsodyFormatter(DEFAULT_FORMATTER_CONFIG);

// ─── Text helpers ───────────────────────────────────────────────────────────────

describe("wrapEmphasis", () => {
  it("keeps surrounding whitespace outside the markers", () => {
    expect(wrapEmphasis("  hi there  ", "**")).toBe("  **hi there**  ");
    expect(wrapEmphasis("quiet", "*")).toBe("*quiet*");
  });

  it("leaves blank text alone", () => {
    expect(wrapEmphasis("   ", "**")).toBe("   ");
  });
});

describe("endsWithPunctuation", () => {
  it("looks through trailing emphasis markers", () => {
    expect(endsWithPunctuation("**done.**")).toBe(true);
    expect(endsWithPunctuation("wait…  ")).toBe(true);
    expect(endsWithPunctuation("*done*")).toBe(false);
    expect(endsWithPunctuation("**")).toBe(false);
  });
});

// ─── ProsodyFormatter ───────────────────────────────────────────────────────────

describe("ProsodyFormatter", () => {
  it("returns the input unchanged without segments or prosody", () => {
    const text = "  raw text stays  ";
    expect(formatter.format(text, [], prosodyOf([]))).toBe(text);
    expect(formatter.format(text, null, prosodyOf([]))).toBe(text);
    expect(
      formatter.format(text, [seg("raw text stays", 0, 1)], { ok: false, reason: "empty", error: "Audio buffer is empty" }),
    ).toBe(text);
  });

  it("passes a segment without voiced windows through unmodified", () => {
    const silent = windowsFor(0, 1, { energyDelta: 10 }).map((w) => ({ ...w, isSilence: true }));
    expect(formatter.format("hello there", [seg("hello there", 0, 1)], prosodyOf(silent))).toBe("hello there");
  });

  describe("emphasis", () => {
    it("bolds loud speech", () => {
      expect(formatOne("this matters", { energyDelta: 8 })).toBe("**this matters**");
    });

    it("italicises whispered speech", () => {
      expect(formatOne("quiet words", { energyDelta: -2, isWhisper: true })).toBe("*quiet words*");
    });

    it("italicises very quiet speech", () => {
      expect(formatOne("barely there", { energyDelta: -9 })).toBe("*barely there*");
    });

    it("leaves ordinary speech plain", () => {
      expect(formatOne("just talking", { energyDelta: 2 })).toBe("just talking");
    });

    it("keeps the segment's trailing whitespace outside the markers", () => {
      const segments = [seg("this matters ", 0, 1), seg("ok.", 1.2, 2)];
      const prosody = prosodyOf([...windowsFor(0, 1, { energyDelta: 8 }), ...windowsFor(1.2, 2)]);
      expect(formatter.format("this matters ok.", segments, prosody)).toBe("**this matters** ok.");
    });
  });

  describe("punctuation", () => {
    it("adds a question mark for a rising ending", () => {
      expect(formatOne("are you coming", { pitchDelta: 0.2 })).toBe("are you coming?");
    });

    it("adds an exclamation mark for a loud falling ending", () => {
      expect(formatOne("watch out", { energyDelta: 4, pitchDelta: -0.2 })).toBe("watch out!");
    });

    it("places the mark after emphasis markers", () => {
      expect(formatOne("watch out", { energyDelta: 8, pitchDelta: -0.2 })).toBe("**watch out**!");
    });

    it("needs energy for an exclamation", () => {
      expect(formatOne("oh well", { energyDelta: 1, pitchDelta: -0.2 })).toBe("oh well");
    });

    it("keeps existing punctuation", () => {
      expect(formatOne("really?", { pitchDelta: 0.3 })).toBe("really?");
      expect(formatOne("fine, then", { pitchDelta: -0.3, energyDelta: 8 })).toBe("**fine, then**!");
    });
  });

  describe("separators", () => {
    const segments = [seg("first part.", 0, 1), seg("second part.", 2.6, 3.6)];
    const windows = [...windowsFor(0, 1), ...windowsFor(2.6, 3.6)];

    it("joins segments across a 1600ms pause with a paragraph break", () => {
      const prosody = prosodyOf(windows, [pause(1, 2.6)]);
      expect(formatter.format("first part. second part.", segments, prosody)).toBe(
        "first part.\n\nsecond part.",
      );
    });

    it("treats a pause of exactly the paragraph length as a paragraph break", () => {
      const prosody = prosodyOf(windows, [{ startTime: 1, endTime: 2.5, durationMs: 1500 }]);
      expect(formatter.format("x", segments, prosody)).toBe("first part.\n\nsecond part.");
    });

    it("uses a line break for a medium pause", () => {
      const prosody = prosodyOf(windows, [pause(1.05, 1.75)]);
      expect(formatter.format("first part. second part.", segments, prosody)).toBe(
        "first part.\nsecond part.",
      );
    });

    it("uses a space for a short or unrelated pause", () => {
      expect(formatter.format("x", segments, prosodyOf(windows, [pause(1.1, 1.4)]))).toBe(
        "first part. second part.",
      );
      expect(formatter.format("x", segments, prosodyOf(windows, [pause(5, 7)]))).toBe(
        "first part. second part.",
      );
    });

    it("skips blank segments", () => {
      const parts = [seg("hello", 0, 1), seg("   ", 1, 2), seg("world", 2, 3)];
      expect(formatter.format("hello world", parts, prosodyOf([]))).toBe("hello world");
    });
  });
});
