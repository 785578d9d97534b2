/**
 * BoundaryResolver
 * ================
 *
 * Turns a posture crossing into a transfer window. Two strategies share one
 * interface:
 *
 * - motion: joint velocity settles below threshold on each side of the
 *   crossing for part of the stable window (half by default)
 * - force:  posture has been confidently held for the full stable window
 *
 * The caller picks one per recording with {@link selectBoundaryStrategy};
 * neither strategy clamps to the neighbouring crossings, the segmenter does.
 *
 * @module segmentation/BoundaryResolver
 */

import type { Run } from "./EdgeFinder";
import { TRANSFER_POSTURES, type PostureSample } from "./PostureStateMachine";
import type { TransferKind } from "./types";

export interface BoundarySearch {
  kind: TransferKind;
  crossingIndex: number;
  /** Previous crossing, or 0 */
  lowerLimit: number;
  /** Next crossing, or the last sample */
  upperLimit: number;
}

export interface BoundaryStrategy {
  readonly source: "motion" | "force";
  resolve(search: BoundarySearch): Run;
}

// ============================================================================
// MOTION
// ============================================================================

export interface MotionBoundaryOptions {
  /** Smoothed max-abs joint velocity */
  speed: readonly number[];
  velocityThreshold: number;
  minStableSamples: number;
  stableFraction: number;
  marginBefore: number;
  marginAfter: number;
}

export function createMotionBoundaryStrategy(
  options: MotionBoundaryOptions,
): BoundaryStrategy {
  const { speed, velocityThreshold, minStableSamples } = options;
  const n = speed.length;
  const required = Math.floor(options.stableFraction * minStableSamples);
  const isStill = (i: number) => speed[i] < velocityThreshold;

  // Still samples counted from j away from the crossing, at most minStableSamples
  const stillRun = (j: number, step: 1 | -1): number => {
    let count = 0;
    for (let k = j; k >= 0 && k < n && count < minStableSamples; k += step) {
      if (!isStill(k)) break;
      count++;
    }
    return count;
  };

  return {
    source: "motion",
    resolve({ crossingIndex, lowerLimit, upperLimit }) {
      let onset = crossingIndex;
      for (let j = crossingIndex; j >= Math.max(0, lowerLimit); j--) {
        if (isStill(j) && stillRun(j, -1) >= required) {
          onset = j;
          break;
        }
      }

      let offset = crossingIndex;
      for (let j = crossingIndex; j <= Math.min(n - 1, upperLimit); j++) {
        if (isStill(j) && stillRun(j, 1) >= required) {
          offset = j;
          break;
        }
      }

      return {
        start: onset - options.marginBefore,
        end: offset + options.marginAfter,
      };
    },
  };
}

// ============================================================================
// FORCE ONLY
// ============================================================================

export interface ForceBoundaryOptions {
  posture: readonly PostureSample[];
  minStableSamples: number;
  stableFraction: number;
}

export function createForceBoundaryStrategy(
  options: ForceBoundaryOptions,
): BoundaryStrategy {
  const { posture } = options;
  const n = posture.length;
  const required = Math.max(
    1,
    Math.round(options.stableFraction * options.minStableSamples),
  );

  const heldFrom = (first: number, state: PostureSample["state"]): boolean => {
    if (first < 0 || first + required > n) return false;
    for (let k = first; k < first + required; k++) {
      if (!posture[k].confident || posture[k].state !== state) return false;
    }
    return true;
  };

  return {
    source: "force",
    resolve({ kind, crossingIndex, lowerLimit, upperLimit }) {
      const { before, after } = TRANSFER_POSTURES[kind];

      // Nearest sample that ends a held run of the old posture
      let start = lowerLimit;
      for (let j = crossingIndex - 1; j >= lowerLimit; j--) {
        if (heldFrom(j - required + 1, before)) {
          start = j;
          break;
        }
      }

      // Nearest sample that starts a held run of the new posture
      let end = upperLimit;
      for (let j = crossingIndex; j <= upperLimit; j++) {
        if (heldFrom(j, after)) {
          end = j;
          break;
        }
      }

      return { start, end };
    },
  };
}

// ============================================================================
// SELECTION
// ============================================================================

/**
 * Motion-based when any velocity channel was recorded, force-only otherwise.
 */
export function selectBoundaryStrategy(
  motion: MotionBoundaryOptions | null,
  force: ForceBoundaryOptions,
): BoundaryStrategy {
  return motion
    ? createMotionBoundaryStrategy(motion)
    : createForceBoundaryStrategy(force);
}
