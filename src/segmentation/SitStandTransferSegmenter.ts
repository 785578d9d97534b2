/**
 * SitStandTransferSegmenter
 * =========================
 *
 * Sit-to-stand and stand-to-sit transfers from two signals:
 *
 * 1. Posture from smoothed total vertical force (hysteresis fold)
 * 2. Motion from smoothed max-abs joint velocity, when recorded
 *
 * Each sitting <-> standing crossing is widened to a window by the boundary
 * strategy, clamped between the neighbouring crossings, optionally trimmed at
 * the start, and the pooled candidates of both kinds go through one duration
 * filter.
 *
 * @module segmentation/SitStandTransferSegmenter
 */

import { segmentationLog } from "../lib/logger";
import {
  maxAbsAcross,
  movingAverage,
  secondsToSamples,
} from "../lib/signal/SignalProcessor";
import { selectBoundaryStrategy } from "./BoundaryResolver";
import { DEFAULT_SIT_STAND_CONFIG, type SitStandConfig } from "./config";
import { filterByDuration, policyFromConfig } from "./DurationOutlierFilter";
import { classifyPosture, findPostureTransitions } from "./PostureStateMachine";
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
  type SegmentationResult,
  type SignalTable,
  type TransferKind,
  type TransferSegment,
} from "./types";

const log = segmentationLog.child("SitStand");

export type TransferSelection = TransferKind | "both";

export function segmentSitStandTransfers(
  input: SignalTable,
  config: SitStandConfig = DEFAULT_SIT_STAND_CONFIG,
  transferType: TransferSelection = "both",
): SegmentationResult<TransferSegment> {
  const { table, issues } = inspectSignalTable(input);
  if (!table) {
    log.warn("Malformed signal table", issues);
    return notFound();
  }

  const total = sumColumns(table, config.leftForceColumn, config.rightForceColumn);
  if (!total) {
    log.debug("Transfer segmentation needs both vertical force channels");
    return notFound();
  }

  const { time } = table;
  const n = time.length;
  const sampleRate = resolveSampleRate(table, config.fallbackSampleRate);
  const window = Math.max(1, secondsToSamples(config.smoothWindow, sampleRate));

  const bodyWeight = isBodyWeightScaled(total);
  const posture = classifyPosture(movingAverage(total, window), {
    sitting: bodyWeight ? config.sittingThresholdBodyWeight : config.sittingThreshold,
    standing: bodyWeight
      ? config.standingThresholdBodyWeight
      : config.standingThreshold,
  });
  const transitions = findPostureTransitions(posture);
  if (transitions.length === 0) return buildResult([], null);

  const minStableSamples = secondsToSamples(config.minStableDuration, sampleRate);
  const velocities = presentColumns(table, config.velocityColumns);

  const strategy = selectBoundaryStrategy(
    velocities.length > 0
      ? {
          speed: movingAverage(maxAbsAcross(velocities, n), window),
          velocityThreshold: config.velocityThreshold,
          minStableSamples,
          stableFraction: config.motionStableFraction,
          marginBefore: secondsToSamples(config.marginBefore, sampleRate),
          marginAfter: secondsToSamples(config.marginAfter, sampleRate),
        }
      : null,
    {
      posture,
      minStableSamples,
      stableFraction: config.forceStableFraction,
    },
  );

  const candidates: TransferSegment[] = [];
  transitions.forEach((transition, t) => {
    if (transferType !== "both" && transition.kind !== transferType) return;

    const lowerLimit = t > 0 ? transitions[t - 1].index : 0;
    const upperLimit = t < transitions.length - 1 ? transitions[t + 1].index : n - 1;

    const raw = strategy.resolve({
      kind: transition.kind,
      crossingIndex: transition.index,
      lowerLimit,
      upperLimit,
    });

    const end = Math.min(Math.min(n - 1, raw.end), upperLimit);
    let start = Math.max(Math.max(0, raw.start), lowerLimit);
    start += Math.round(((end - start) * config.trimStartPercent) / 100);

    if (end - start <= config.minWindowSamples) return;

    candidates.push({
      kind: transition.kind,
      startIndex: start,
      endIndex: end,
      startTime: time[start],
      endTime: time[end],
      duration: time[end] - time[start],
      midTime: time[Math.floor((start + end) / 2)],
      crossingIndex: transition.index,
      crossingTime: time[transition.index],
      boundarySource: strategy.source,
    });
  });

  if (!config.filterByDuration) {
    log.debug(`${candidates.length} transfers (${strategy.source} boundaries, unfiltered)`);
    return buildResult(candidates, null);
  }

  // Both kinds share one duration population
  const { kept, mode, bounds, removed } = filterByDuration(
    candidates,
    policyFromConfig(config),
  );
  log.debug(
    `${transitions.length} crossings, ${candidates.length} candidates, ${kept.length} kept (${strategy.source} boundaries, ${mode} bounds ${bounds.lower.toFixed(2)}-${bounds.upper.toFixed(2)}s)`,
  );

  return buildResult(kept, { mode, bounds, removed });
}
