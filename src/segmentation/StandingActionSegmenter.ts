/**
 * StandingActionSegmenter
 * =======================
 *
 * Standing -> action -> standing segmentation.
 *
 * Jumps are segmented landing to landing from summed vertical force: a
 * flight is a run of samples below the flight threshold, and each cycle
 * spans the ground contact after one flight plus the next flight.
 *
 * Squats and lunges have no flight. They are bursts of joint motion,
 * expanded on each side to the nearest quiet standing sample.
 *
 * @module segmentation/StandingActionSegmenter
 */

import { segmentationLog } from "../lib/logger";
import {
  maxAbsAcross,
  movingAverage,
  secondsToSamples,
} from "../lib/signal/SignalProcessor";
import {
  DEFAULT_JUMP_CONFIG,
  DEFAULT_STANDING_ACTION_CONFIG,
  type JumpConfig,
  type StandingActionConfig,
} from "./config";
import { filterByDuration, policyFromConfig } from "./DurationOutlierFilter";
import { findRuns, type Run } from "./EdgeFinder";
import {
  inspectSignalTable,
  isBodyWeightScaled,
  presentColumns,
  resolveSampleRate,
  sumColumns,
} from "./signalTable";
import {
  buildResult,
  notFound,
  type JumpCycleSegment,
  type SegmentationResult,
  type SignalTable,
  type StandingAction,
  type StandingActionSegment,
} from "./types";

const log = segmentationLog.child("StandingAction");

// ============================================================================
// FLIGHTS
// ============================================================================

export interface Flight {
  /** First sample below the flight threshold */
  takeoffIndex: number;
  /** First sample back on the ground */
  landingIndex: number;
  duration: number;
}

/**
 * Flight phases in a smoothed total-force signal.
 *
 * A run still airborne at the last sample has no landing and is dropped, as
 * is any flight of fewer samples than `minFlightDuration` at `sampleRate`.
 */
export function detectFlights(
  time: readonly number[],
  smoothedForce: readonly number[],
  threshold: number,
  minFlightDuration: number,
  sampleRate: number,
): Flight[] {
  const last = smoothedForce.length - 1;
  const minFlightSamples = secondsToSamples(minFlightDuration, sampleRate);

  return findRuns(smoothedForce.map((value) => value < threshold))
    .filter((run) => run.end < last)
    .filter((run) => run.end + 1 - run.start >= minFlightSamples)
    .map((run) => {
      const landingIndex = run.end + 1;
      return {
        takeoffIndex: run.start,
        landingIndex,
        duration: time[landingIndex] - time[run.start],
      };
    });
}

// ============================================================================
// JUMP
// ============================================================================

/**
 * Segment repeated jumps from bilateral vertical force.
 *
 * A cycle starts at one landing and ends at the next landing. The ground
 * contact between them must span at least `minGroundContact` worth of
 * samples; a shorter gap is a stutter within the same flight, and that pair
 * yields no cycle.
 */
export function segmentJumpCycles(
  input: SignalTable,
  config: JumpConfig = DEFAULT_JUMP_CONFIG,
): SegmentationResult<JumpCycleSegment> {
  const { table, issues } = inspectSignalTable(input);
  if (!table) {
    log.warn("Malformed signal table", issues);
    return notFound();
  }

  const total = sumColumns(table, config.leftForceColumn, config.rightForceColumn);
  if (!total) {
    log.debug("Jump segmentation needs both vertical force channels");
    return notFound();
  }

  const { time } = table;
  const sampleRate = resolveSampleRate(table, config.fallbackSampleRate);
  const threshold = isBodyWeightScaled(total)
    ? config.flightThresholdBodyWeight
    : config.flightThreshold;
  const smoothed = movingAverage(
    total,
    Math.max(1, secondsToSamples(config.smoothWindow, sampleRate)),
  );

  const flights = detectFlights(
    time,
    smoothed,
    threshold,
    config.minFlightDuration,
    sampleRate,
  );
  const minContactSamples = secondsToSamples(config.minGroundContact, sampleRate);

  const candidates: JumpCycleSegment[] = [];
  for (let i = 0; i + 1 < flights.length; i++) {
    const previous = flights[i];
    const next = flights[i + 1];

    if (next.takeoffIndex - previous.landingIndex < minContactSamples) continue;

    const startIndex = previous.landingIndex;
    const endIndex = next.landingIndex;
    candidates.push({
      kind: "jump_cycle",
      startIndex,
      endIndex,
      startTime: time[startIndex],
      endTime: time[endIndex],
      duration: time[endIndex] - time[startIndex],
      flightDuration: next.duration,
      flightStartIndex: next.takeoffIndex,
      flightEndIndex: next.landingIndex,
      groundContactDuration: time[next.takeoffIndex] - time[startIndex],
    });
  }

  const { kept, mode, bounds, removed } = filterByDuration(
    candidates,
    policyFromConfig(config),
  );
  log.debug(
    `${flights.length} flights, ${candidates.length} cycles, ${kept.length} kept`,
  );

  return buildResult(kept, { mode, bounds, removed });
}

// ============================================================================
// SQUAT / LUNGE
// ============================================================================

export interface StandingActionOptions {
  action: StandingAction;
}

/**
 * Segment squats or lunges from joint angular velocity and total force.
 *
 * Every motion burst (velocity above threshold) is widened backward and
 * forward to the nearest sample that is both loaded (force above the
 * standing threshold) and still (velocity below threshold), then padded by
 * the margins. Windows that overlap after widening belong to one repetition
 * and are merged.
 *
 * Without any of the configured velocity channels there is nothing to
 * detect motion from, and the result is `found: false`.
 */
export function segmentStandingActions(
  input: SignalTable,
  options: StandingActionOptions,
  config: StandingActionConfig = DEFAULT_STANDING_ACTION_CONFIG,
): SegmentationResult<StandingActionSegment> {
  const { table, issues } = inspectSignalTable(input);
  if (!table) {
    log.warn("Malformed signal table", issues);
    return notFound();
  }

  const total = sumColumns(table, config.leftForceColumn, config.rightForceColumn);
  const velocities = presentColumns(table, config.velocityColumns);
  if (!total || velocities.length === 0) {
    log.debug(`No force or velocity channels for ${options.action}`);
    return notFound();
  }

  const { time } = table;
  const n = time.length;
  const sampleRate = resolveSampleRate(table, config.fallbackSampleRate);
  const window = Math.max(1, secondsToSamples(config.smoothWindow, sampleRate));

  const force = movingAverage(total, window);
  const speed = movingAverage(maxAbsAcross(velocities, n), window);
  const standingThreshold = isBodyWeightScaled(total)
    ? config.standingThresholdBodyWeight
    : config.standingThreshold;

  const isQuietStanding = (i: number): boolean =>
    force[i] > standingThreshold && speed[i] < config.velocityThreshold;

  const marginBefore = secondsToSamples(config.marginBefore, sampleRate);
  const marginAfter = secondsToSamples(config.marginAfter, sampleRate);

  const bursts = findRuns(speed.map((value) => value > config.velocityThreshold));
  const windows: (Run & { motion: Run })[] = [];

  for (const burst of bursts) {
    let start = burst.start;
    for (let j = burst.start; j >= 0; j--) {
      if (isQuietStanding(j)) {
        start = j;
        break;
      }
    }

    let end = Math.min(n - 1, burst.end + 1);
    for (let j = end; j < n; j++) {
      if (isQuietStanding(j)) {
        end = j;
        break;
      }
    }

    const padded = {
      start: Math.max(0, start - marginBefore),
      end: Math.min(n - 1, end + marginAfter),
    };

    const previous = windows[windows.length - 1];
    if (previous && padded.start <= previous.end) {
      previous.end = Math.max(previous.end, padded.end);
      previous.motion.end = burst.end;
    } else {
      windows.push({ ...padded, motion: { ...burst } });
    }
  }

  const candidates: StandingActionSegment[] = windows
    .map((w) => ({
      kind: "standing_action" as const,
      action: options.action,
      startIndex: w.start,
      endIndex: w.end,
      startTime: time[w.start],
      endTime: time[w.end],
      duration: time[w.end] - time[w.start],
      motionStartIndex: w.motion.start,
      motionEndIndex: w.motion.end,
    }))
    .filter((segment) => segment.duration > 0);

  const { kept, mode, bounds, removed } = filterByDuration(
    candidates,
    policyFromConfig(config),
  );
  log.debug(
    `${bursts.length} motion bursts, ${candidates.length} ${options.action} windows, ${kept.length} kept`,
  );

  return buildResult(kept, { mode, bounds, removed });
}
