/**
 * Segmentation Types
 * ==================
 *
 * Shared input/output shapes for every segmentation archetype.
 *
 * @module segmentation/types
 */

// ============================================================================
// INPUT
// ============================================================================

/**
 * Time-ordered samples with named numeric channels.
 * `time` is in seconds and strictly increasing; every channel has one value
 * per timestamp.
 */
export interface SignalTable {
  time: readonly number[];
  channels: Readonly<Record<string, readonly number[]>>;
}

export type Limb = "left" | "right";

/** Inclusive time window (seconds) */
export interface TimeWindow {
  start: number;
  end: number;
}

// ============================================================================
// SEGMENTS
// ============================================================================

export type SegmentKind =
  | "gait_cycle"
  | "jump_cycle"
  | "standing_action"
  | "sit_to_stand"
  | "stand_to_sit";

export const SEGMENT_KINDS: readonly SegmentKind[] = [
  "gait_cycle",
  "jump_cycle",
  "standing_action",
  "sit_to_stand",
  "stand_to_sit",
];

interface SegmentBase {
  /** Sample offset of the first sample (inclusive) */
  readonly startIndex: number;
  /** Sample offset of the last sample; meaning is archetype-specific */
  readonly endIndex: number;
  readonly startTime: number;
  readonly endTime: number;
  /** endTime - startTime, seconds */
  readonly duration: number;
}

export interface GaitCycleSegment extends SegmentBase {
  readonly kind: "gait_cycle";
  readonly limb: Limb;
  readonly eventSource: "heel_strike_percent" | "vertical_force";
}

export interface JumpCycleSegment extends SegmentBase {
  readonly kind: "jump_cycle";
  /** Duration of the flight that ends the cycle (s) */
  readonly flightDuration: number;
  readonly flightStartIndex: number;
  /** First ground sample after that flight (== endIndex) */
  readonly flightEndIndex: number;
  /** Ground contact between the two landings' flights (s) */
  readonly groundContactDuration: number;
}

export type StandingAction = "squat" | "lunge";

export interface StandingActionSegment extends SegmentBase {
  readonly kind: "standing_action";
  readonly action: StandingAction;
  readonly motionStartIndex: number;
  readonly motionEndIndex: number;
}

export type TransferKind = "sit_to_stand" | "stand_to_sit";

export interface TransferSegment extends SegmentBase {
  readonly kind: TransferKind;
  readonly midTime: number;
  /** Sample where the posture state flipped */
  readonly crossingIndex: number;
  readonly crossingTime: number;
  readonly boundarySource: "motion" | "force";
}

export type Segment =
  | GaitCycleSegment
  | JumpCycleSegment
  | StandingActionSegment
  | TransferSegment;

// ============================================================================
// RESULT
// ============================================================================

export type DurationFilterMode = "fixed" | "adaptive";

export interface DurationBounds {
  lower: number;
  upper: number;
}

export interface DurationFilterReport {
  /** Policy actually applied (adaptive falls back to fixed below 4 candidates) */
  mode: DurationFilterMode;
  bounds: DurationBounds;
  removed: number;
}

export interface SegmentationResult<S extends Segment = Segment> {
  /** False when the required input was missing or malformed */
  found: boolean;
  segments: readonly S[];
  counts: Record<SegmentKind, number>;
  filter: DurationFilterReport | null;
}

// ============================================================================
// HELPERS
// ============================================================================

export function countByKind(
  segments: readonly Segment[],
): Record<SegmentKind, number> {
  const counts: Record<SegmentKind, number> = {
    gait_cycle: 0,
    jump_cycle: 0,
    standing_action: 0,
    sit_to_stand: 0,
    stand_to_sit: 0,
  };
  for (const segment of segments) {
    counts[segment.kind] += 1;
  }
  return counts;
}

export function notFound<S extends Segment>(): SegmentationResult<S> {
  return {
    found: false,
    segments: [],
    counts: countByKind([]),
    filter: null,
  };
}

export function buildResult<S extends Segment>(
  segments: readonly S[],
  filter: DurationFilterReport | null,
): SegmentationResult<S> {
  return {
    found: true,
    segments,
    counts: countByKind(segments),
    filter,
  };
}
