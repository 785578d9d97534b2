/**
 * DurationOutlierFilter
 * =====================
 *
 * Rejects candidate segments with implausible durations. Shared by every
 * archetype; knows nothing about what the candidates are.
 *
 * - fixed:    minDuration <= d <= maxDuration
 * - adaptive: [max(min, Q1 - k*IQR), min(max, Q3 + k*IQR)]. Needs at least
 *             4 candidates, otherwise fixed.
 *
 * @module segmentation/DurationOutlierFilter
 */

import { percentile } from "../lib/signal/SignalProcessor";
import { ConfigurationError } from "./errors";
import type {
  DurationBounds,
  DurationFilterMode,
  DurationFilterReport,
} from "./types";

// ============================================================================
// TYPES
// ============================================================================

export interface DurationFilterPolicy {
  mode: DurationFilterMode;
  minDuration: number;
  maxDuration: number;
  /** IQR fence multiplier (adaptive only) */
  iqrMultiplier?: number;
}

export interface DurationFilterResult<T> extends DurationFilterReport {
  kept: T[];
}

export const MIN_ADAPTIVE_CANDIDATES = 4;
const DEFAULT_IQR_MULTIPLIER = 1.5;

// ============================================================================
// BOUNDS
// ============================================================================

function assertValidPolicy(policy: DurationFilterPolicy): void {
  const issues: string[] = [];
  if (!(policy.minDuration >= 0)) issues.push("minDuration must be >= 0");
  if (!(policy.maxDuration > 0)) issues.push("maxDuration must be > 0");
  if (policy.minDuration > policy.maxDuration) {
    issues.push("minDuration exceeds maxDuration");
  }
  if (policy.iqrMultiplier !== undefined && !(policy.iqrMultiplier > 0)) {
    issues.push("iqrMultiplier must be > 0");
  }
  if (issues.length > 0) {
    throw new ConfigurationError("Invalid duration filter policy", issues);
  }
}

/**
 * Acceptance window for a set of durations under `policy`.
 */
export function computeDurationBounds(
  durations: readonly number[],
  policy: DurationFilterPolicy,
): { mode: DurationFilterMode; bounds: DurationBounds } {
  assertValidPolicy(policy);

  const fixed: DurationBounds = {
    lower: policy.minDuration,
    upper: policy.maxDuration,
  };

  if (policy.mode === "fixed" || durations.length < MIN_ADAPTIVE_CANDIDATES) {
    return { mode: "fixed", bounds: fixed };
  }

  const k = policy.iqrMultiplier ?? DEFAULT_IQR_MULTIPLIER;
  const q1 = percentile(durations, 25);
  const q3 = percentile(durations, 75);
  const iqr = q3 - q1;

  return {
    mode: "adaptive",
    bounds: {
      lower: Math.max(policy.minDuration, q1 - k * iqr),
      upper: Math.min(policy.maxDuration, q3 + k * iqr),
    },
  };
}

export function applyDurationBounds<T extends { duration: number }>(
  candidates: readonly T[],
  bounds: DurationBounds,
): T[] {
  return candidates.filter(
    (c) => c.duration >= bounds.lower && c.duration <= bounds.upper,
  );
}

// ============================================================================
// FILTER
// ============================================================================

/**
 * Filter candidates by duration. Order is preserved; candidates are never
 * modified.
 */
export function filterByDuration<T extends { duration: number }>(
  candidates: readonly T[],
  policy: DurationFilterPolicy,
): DurationFilterResult<T> {
  const { mode, bounds } = computeDurationBounds(
    candidates.map((c) => c.duration),
    policy,
  );
  const kept = applyDurationBounds(candidates, bounds);

  return {
    kept,
    mode,
    bounds,
    removed: candidates.length - kept.length,
  };
}

/**
 * Policy for the archetype configs, which all carry the same four fields.
 */
export function policyFromConfig(config: {
  useAdaptiveFilter: boolean;
  minDuration: number;
  maxDuration: number;
  iqrMultiplier: number;
}): DurationFilterPolicy {
  return {
    mode: config.useAdaptiveFilter ? "adaptive" : "fixed",
    minDuration: config.minDuration,
    maxDuration: config.maxDuration,
    iqrMultiplier: config.iqrMultiplier,
  };
}

/**
 * Drop transition strides at the ends of a trial (acceleration/deceleration).
 */
export function removeTransitionSegments<T>(
  segments: readonly T[],
  skipFirst: number,
  skipLast: number,
): T[] {
  if (segments.length <= skipFirst + skipLast) return [];
  return segments.slice(skipFirst, segments.length - skipLast);
}
