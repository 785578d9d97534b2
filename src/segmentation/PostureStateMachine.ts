/**
 * PostureStateMachine
 * ===================
 *
 * Coarse sitting/standing classification from smoothed total vertical force,
 * with a hysteresis band between the two thresholds. Inside the band the
 * previous state carries forward; before the first confident sample the
 * state is "transition".
 *
 * The classifier is a pure fold over the force samples.
 *
 * @module segmentation/PostureStateMachine
 */

import type { TransferKind } from "./types";

export type PostureState = "unknown" | "transition" | "sitting" | "standing";

export interface PostureSample {
  state: PostureState;
  /** Force was outside the hysteresis band at this sample */
  confident: boolean;
}

export interface PostureThresholds {
  /** Below this the subject is sitting */
  sitting: number;
  /** Above this the subject is standing */
  standing: number;
}

export interface PostureTransition {
  kind: TransferKind;
  /** First sample in the new state */
  index: number;
}

/**
 * One step of the fold.
 */
export function nextPosture(
  previous: PostureState,
  force: number,
  thresholds: PostureThresholds,
): PostureSample {
  if (force > thresholds.standing) return { state: "standing", confident: true };
  if (force < thresholds.sitting) return { state: "sitting", confident: true };
  return {
    state: previous === "unknown" ? "transition" : previous,
    confident: false,
  };
}

export function classifyPosture(
  force: readonly number[],
  thresholds: PostureThresholds,
): PostureSample[] {
  return force.reduce<PostureSample[]>((samples, value) => {
    const previous = samples[samples.length - 1]?.state ?? "unknown";
    samples.push(nextPosture(previous, value, thresholds));
    return samples;
  }, []);
}

/**
 * Direct sitting <-> standing flips. Passing through "transition" (only
 * possible before the first confident sample) is not a transfer.
 */
export function findPostureTransitions(
  samples: readonly PostureSample[],
): PostureTransition[] {
  const transitions: PostureTransition[] = [];
  for (let i = 1; i < samples.length; i++) {
    const from = samples[i - 1].state;
    const to = samples[i].state;
    if (from === "sitting" && to === "standing") {
      transitions.push({ kind: "sit_to_stand", index: i });
    } else if (from === "standing" && to === "sitting") {
      transitions.push({ kind: "stand_to_sit", index: i });
    }
  }
  return transitions;
}

/** Posture held before and after each transfer kind */
export const TRANSFER_POSTURES: Readonly<
  Record<TransferKind, { before: PostureState; after: PostureState }>
> = {
  sit_to_stand: { before: "sitting", after: "standing" },
  stand_to_sit: { before: "standing", after: "sitting" },
};
