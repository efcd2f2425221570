// YIN fundamental-frequency estimator
// de Cheveigné & Kawahara (2002), "YIN, a fundamental frequency estimator for speech and music".
//
// Works on one analysis window of samples normalised to [-1, 1]. The cost is
// O(window length × lag range), which is why the prosody analyzer only calls
// it for non-silent windows.

export interface PitchSearchRange {
  minPitchHz: number;
  maxPitchHz: number;
  /** CMND dip threshold (0.1-0.2 typical) */
  threshold: number;
}

/**
 * Lag bounds (in samples) for a pitch range, capped so that the difference
 * function always has half a window of overlap to sum over.
 * Returns null when the window is too short to hold the range.
 */
export function lagBounds(
  windowLength: number,
  sampleRate: number,
  range: Pick<PitchSearchRange, "minPitchHz" | "maxPitchHz">,
): { minLag: number; maxLag: number } | null {
  const minLag = Math.floor(sampleRate / range.maxPitchHz);
  let maxLag = Math.floor(sampleRate / range.minPitchHz);

  if (maxLag >= Math.floor(windowLength / 2)) {
    maxLag = Math.floor(windowLength / 2) - 1;
  }
  if (minLag >= maxLag) return null;
  return { minLag, maxLag };
}

/**
 * Cumulative mean normalized difference function for lags 0..maxLag.
 * CMND[0] = 1 by convention; a lag with zero running sum also maps to 1.
 */
export function cumulativeMeanNormalizedDifference(
  window: Float64Array,
  maxLag: number,
): Float64Array {
  const length = maxLag + 1;
  const cmnd = new Float64Array(length);
  cmnd[0] = 1;

  // Every lag sums over the same span so the values stay comparable
  const span = window.length - maxLag;
  let runningSum = 0;

  for (let tau = 1; tau < length; tau++) {
    let sum = 0;
    for (let j = 0; j < span; j++) {
      const delta = window[j] - window[j + tau];
      sum += delta * delta;
    }
    runningSum += sum;
    cmnd[tau] = runningSum > 0 ? (sum * tau) / runningSum : 1;
  }

  return cmnd;
}

/**
 * Parabolic interpolation of the minimum around `tau` using its neighbours.
 * Falls back to `tau` at the edges or when the parabola is degenerate.
 */
export function refineLag(cmnd: Float64Array, tau: number): number {
  if (tau <= 0 || tau >= cmnd.length - 1) return tau;
  const a = cmnd[tau - 1];
  const b = cmnd[tau];
  const c = cmnd[tau + 1];
  // Vertex of the parabola through (tau-1, a), (tau, b), (tau+1, c)
  const denom = 2 * (a - 2 * b + c);
  if (Math.abs(denom) <= 1e-6) return tau;
  return tau + (a - c) / denom;
}

/**
 * Estimate the fundamental frequency of one window.
 * Returns 0 when no periodicity is found inside the search range (unvoiced).
 */
export function detectPitch(
  window: Float64Array,
  sampleRate: number,
  range: PitchSearchRange,
): number {
  const bounds = lagBounds(window.length, sampleRate, range);
  if (bounds === null) return 0;

  const cmnd = cumulativeMeanNormalizedDifference(window, bounds.maxLag);

  // Absolute threshold: first dip below threshold, then slide to its local minimum
  let bestTau = -1;
  for (let tau = bounds.minLag; tau < cmnd.length - 1; tau++) {
    if (cmnd[tau] < range.threshold) {
      while (tau + 1 < cmnd.length && cmnd[tau + 1] < cmnd[tau]) {
        tau++;
      }
      bestTau = tau;
      break;
    }
  }

  if (bestTau < 1) return 0;

  const refined = refineLag(cmnd, bestTau);
  if (refined < 1) return 0;

  const frequency = sampleRate / refined;
  return frequency >= range.minPitchHz && frequency <= range.maxPitchHz ? frequency : 0;
}
