/**
 * Signal Processor
 *
 * Signal utilities shared by the segmenters: smoothing, sample-rate
 * estimation and order statistics.
 */

// ============================================
// Filtering
// ============================================

/**
 * Centred moving average.
 *
 * An even window leans one sample backward (k/2 before, k/2 - 1 after).
 * Near the edges the window shrinks to the samples that exist, so the
 * output has the same length as the input.
 */
export function movingAverage(
  signal: readonly number[],
  windowSize: number,
): number[] {
  const window = Math.max(1, Math.floor(windowSize));
  if (window === 1 || signal.length === 0) return [...signal];

  const before = Math.floor(window / 2);
  const after = window - 1 - before;

  // Prefix sums keep this O(n) for long recordings
  const prefix = new Float64Array(signal.length + 1);
  for (let i = 0; i < signal.length; i++) {
    prefix[i + 1] = prefix[i] + signal[i];
  }

  const result: number[] = new Array(signal.length);
  for (let i = 0; i < signal.length; i++) {
    const start = Math.max(0, i - before);
    const end = Math.min(signal.length, i + after + 1);
    result[i] = (prefix[end] - prefix[start]) / (end - start);
  }

  return result;
}

/**
 * Convert a duration in seconds to a whole number of samples.
 */
export function secondsToSamples(seconds: number, sampleRate: number): number {
  return Math.round(seconds * sampleRate);
}

// ============================================
// Sampling
// ============================================

/**
 * Estimate sample rate (Hz) from the median positive time step.
 * Returns null when fewer than two usable timestamps exist.
 */
export function estimateSampleRate(time: readonly number[]): number | null {
  if (time.length < 2) return null;

  const diffs: number[] = [];
  for (let i = 1; i < time.length; i++) {
    const dt = time[i] - time[i - 1];
    if (dt > 0) diffs.push(dt);
  }
  if (diffs.length === 0) return null;

  return 1 / median(diffs);
}

// ============================================
// Statistical Utilities
// ============================================

export function median(values: readonly number[]): number {
  return percentile(values, 50);
}

/**
 * Percentile with linear interpolation between closest ranks
 * (Hyndman & Fan type 7).
 */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return NaN;

  const sorted = [...values].sort((a, b) => a - b);
  const rank = (Math.min(100, Math.max(0, p)) / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  const fraction = rank - lower;

  return sorted[lower] + (sorted[upper] - sorted[lower]) * fraction;
}

/**
 * Per-sample maximum absolute value across equally long channels.
 * Returns an all-zero signal of `length` when no channel is given.
 */
export function maxAbsAcross(
  channels: ReadonlyArray<readonly number[]>,
  length: number,
): number[] {
  const result = new Array<number>(length).fill(0);
  for (const channel of channels) {
    for (let i = 0; i < length; i++) {
      const magnitude = Math.abs(channel[i]);
      if (magnitude > result[i]) result[i] = magnitude;
    }
  }
  return result;
}

export function maxValue(values: readonly number[]): number {
  let max = -Infinity;
  for (const v of values) {
    if (v > max) max = v;
  }
  return max;
}
