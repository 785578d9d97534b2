/**
 * GaitCycleSegmenter
 * ==================
 *
 * Heel strike to heel strike segmentation, one limb at a time.
 *
 * Primary source is a per-limb heel-strike percentage channel that climbs
 * through the duty cycle and reads 0 at the event. When a recording only has
 * vertical force per foot, heel strikes are taken from upward crossings of a
 * contact threshold instead.
 *
 * Missing channels and malformed tables give `found: false`.
 *
 * @module segmentation/GaitCycleSegmenter
 */

import { segmentationLog } from "../lib/logger";
import { movingAverage, maxValue } from "../lib/signal/SignalProcessor";
import { DEFAULT_GAIT_CONFIG, type GaitConfig } from "./config";
import {
  filterByDuration,
  policyFromConfig,
  removeTransitionSegments,
} from "./DurationOutlierFilter";
import { findFallingEdges, findRisingEdges } from "./EdgeFinder";
import {
  indicesInWindow,
  inspectSignalTable,
  isBodyWeightScaled,
  readColumn,
  resolveSampleRate,
} from "./signalTable";
import {
  buildResult,
  notFound,
  type GaitCycleSegment,
  type Limb,
  type SegmentationResult,
  type SignalTable,
  type TimeWindow,
} from "./types";

const log = segmentationLog.child("Gait");

// ============================================================================
// TYPES
// ============================================================================

export interface GaitSegmentationOptions {
  limb: Limb;
  /** Only heel strikes inside this window are used */
  window?: TimeWindow;
}

export interface FirstHeelStrike {
  /** null when neither limb strikes in the window, or both strike together */
  limb: Limb | null;
  time: number | null;
}

// ============================================================================
// HEEL STRIKE EVENTS
// ============================================================================

/**
 * Heel-strike events in a percentage channel: the first non-zero sample after
 * a zero sample, restricted to `range`.
 */
export function findHeelStrikeEvents(
  percent: readonly number[],
  range?: readonly number[],
): number[] {
  return findFallingEdges(
    percent.map((value) => value === 0),
    range,
  );
}

/**
 * Which limb heel-strikes first inside `window`.
 */
export function determineFirstHeelStrike(
  input: SignalTable,
  window: TimeWindow,
  config: GaitConfig = DEFAULT_GAIT_CONFIG,
): FirstHeelStrike {
  const undetermined: FirstHeelStrike = { limb: null, time: null };
  const { table } = inspectSignalTable(input);
  if (!table) return undetermined;

  const firstStrikeTime = (limb: Limb): number => {
    const percent = readColumn(table, config.heelStrikeColumns[limb]);
    if (!percent) return Infinity;

    const range = indicesInWindow(table.time, window);
    if (range.length === 0) return Infinity;

    const events = findHeelStrikeEvents(percent, range);
    if (events.length === 0) return Infinity;

    // Step back onto the sample that still reads 0
    return table.time[Math.max(0, events[0] - 1)];
  };

  const left = firstStrikeTime("left");
  const right = firstStrikeTime("right");

  if (right < left) return { limb: "right", time: right };
  if (left < right) return { limb: "left", time: left };
  return undetermined;
}

// ============================================================================
// SEGMENTATION
// ============================================================================

function finishGait(
  candidates: GaitCycleSegment[],
  config: GaitConfig,
): SegmentationResult<GaitCycleSegment> {
  const trimmed = removeTransitionSegments(
    candidates,
    config.skipFirst,
    config.skipLast,
  );
  const { kept, mode, bounds, removed } = filterByDuration(
    trimmed,
    policyFromConfig(config),
  );

  log.debug(
    `${kept.length} of ${candidates.length} strides kept (${mode} bounds ${bounds.lower.toFixed(2)}-${bounds.upper.toFixed(2)}s)`,
  );

  return buildResult(kept, { mode, bounds, removed });
}

/**
 * Segment one limb's strides from its heel-strike percentage channel.
 *
 * Each stride starts on the heel-strike sample and ends on the sample before
 * the next heel-strike sample, so strides on one limb never overlap.
 */
export function segmentGaitCycles(
  input: SignalTable,
  options: GaitSegmentationOptions,
  config: GaitConfig = DEFAULT_GAIT_CONFIG,
): SegmentationResult<GaitCycleSegment> {
  const { table, issues } = inspectSignalTable(input);
  if (!table) {
    log.warn("Malformed signal table", issues);
    return notFound();
  }

  const column = config.heelStrikeColumns[options.limb];
  const percent = readColumn(table, column);
  if (!percent) {
    log.debug(`No heel-strike channel "${column}"`);
    return notFound();
  }

  const range = indicesInWindow(table.time, options.window);
  const events = findHeelStrikeEvents(percent, range);
  if (events.length < 2) return buildResult([], null);

  const candidates: GaitCycleSegment[] = [];
  for (let i = 0; i < events.length - 1; i++) {
    const startIndex = Math.max(0, events[i] - 1);
    const endIndex = Math.max(0, events[i + 1] - 2);

    if (endIndex - startIndex + 1 < config.minCycleSamples) continue;
    if (maxValue(percent.slice(startIndex, endIndex + 1)) < config.minPeakPercent) {
      continue;
    }

    const startTime = table.time[startIndex];
    const endTime = table.time[endIndex];
    if (endTime <= startTime) continue;

    candidates.push({
      kind: "gait_cycle",
      limb: options.limb,
      eventSource: "heel_strike_percent",
      startIndex,
      endIndex,
      startTime,
      endTime,
      duration: endTime - startTime,
    });
  }

  return finishGait(candidates, config);
}

/**
 * Segment one limb's strides from its vertical force when no heel-strike
 * channel was recorded. A heel strike is an upward crossing of the contact
 * threshold; strikes closer than `minContactInterval` to the previous one are
 * ignored.
 */
export function segmentGaitCyclesFromForce(
  input: SignalTable,
  options: Pick<GaitSegmentationOptions, "limb">,
  config: GaitConfig = DEFAULT_GAIT_CONFIG,
): SegmentationResult<GaitCycleSegment> {
  const { table, issues } = inspectSignalTable(input);
  if (!table) {
    log.warn("Malformed signal table", issues);
    return notFound();
  }

  const column = config.forceColumns[options.limb];
  const force = readColumn(table, column);
  if (!force) {
    log.debug(`No vertical force channel "${column}"`);
    return notFound();
  }

  const sampleRate = resolveSampleRate(table, config.fallbackSampleRate);
  const threshold = isBodyWeightScaled(force)
    ? config.contactThresholdBodyWeight
    : config.contactThreshold;

  const smoothed = movingAverage(force, config.smoothingSamples);
  const rising = findRisingEdges(smoothed.map((value) => value > threshold));

  const minInterval = Math.max(
    1,
    Math.floor(config.minContactInterval * sampleRate),
  );
  const strikes: number[] = [];
  for (const index of rising) {
    const previous = strikes[strikes.length - 1];
    if (previous === undefined || index - previous >= minInterval) {
      strikes.push(index);
    }
  }

  const candidates: GaitCycleSegment[] = [];
  for (let i = 0; i < strikes.length - 1; i++) {
    const startIndex = strikes[i];
    const endIndex = strikes[i + 1] - 1;
    const startTime = table.time[startIndex];
    const endTime = table.time[endIndex];
    if (endTime <= startTime) continue;

    candidates.push({
      kind: "gait_cycle",
      limb: options.limb,
      eventSource: "vertical_force",
      startIndex,
      endIndex,
      startTime,
      endTime,
      duration: endTime - startTime,
    });
  }

  return finishGait(candidates, config);
}
