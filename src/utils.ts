// Shared utilities for the prosody components.
//
// Deterministic numeric and alignment helpers used by the analyzers, the
// formatter and the pipeline so that every component aligns transcript
// segments to prosody windows the same way.

import type { ProsodyWindow } from "./types.js";

// ─── Numeric helpers ────────────────────────────────────────────────────────────

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Compute the median of a numeric array.
 * Returns 0 for empty arrays.
 */
export function computeMedian(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 0) {
    return (sorted[mid - 1] + sorted[mid]) / 2;
  }
  return sorted[mid];
}

/** Arithmetic mean; 0 for empty arrays. */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Population standard deviation; 0 for fewer than two values. */
export function standardDeviation(values: readonly number[]): number {
  if (values.length <= 1) return 0;
  const m = mean(values);
  const variance = values.reduce((sum, v) => sum + (v - m) * (v - m), 0) / values.length;
  return Math.sqrt(variance);
}

/** Render a 0..1 ratio the way the summary footers print it ("85%"). */
export function formatPercent(ratio: number): string {
  return `${Math.round(ratio * 100)}%`;
}

// ─── Text helpers ───────────────────────────────────────────────────────────────

/** Whitespace tokenisation used for word counts and filler scanning. */
export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((w) => w.length > 0);
}

// ─── Alignment ──────────────────────────────────────────────────────────────────

/**
 * Non-silent prosody windows whose span overlaps [startTime, endTime).
 * Touching spans do not overlap.
 */
export function overlappingVoicedWindows(
  windows: readonly ProsodyWindow[],
  startTime: number,
  endTime: number,
): ProsodyWindow[] {
  return windows.filter(
    (w) => w.startTime < endTime && w.endTime > startTime && !w.isSilence,
  );
}

// ─── Immutability ───────────────────────────────────────────────────────────────

/**
 * Recursively freeze a plain object/array graph and return it typed as readonly.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) {
    return value;
  }
  for (const key of Object.keys(value)) {
    deepFreeze(Reflect.get(value, key));
  }
  Object.freeze(value);
  return value;
}
