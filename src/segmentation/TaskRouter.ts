/**
 * Task routing
 *
 * Maps canonical task names to a segmentation archetype and runs the
 * matching segmenter. Unknown tasks are treated as gait.
 *
 * @module segmentation/TaskRouter
 */

import {
  DEFAULT_GAIT_CONFIG,
  DEFAULT_JUMP_CONFIG,
  DEFAULT_SIT_STAND_CONFIG,
  DEFAULT_STANDING_ACTION_CONFIG,
  type GaitConfig,
  type JumpConfig,
  type SitStandConfig,
  type StandingActionConfig,
} from "./config";
import {
  segmentGaitCycles,
  segmentGaitCyclesFromForce,
} from "./GaitCycleSegmenter";
import { segmentSitStandTransfers } from "./SitStandTransferSegmenter";
import {
  segmentJumpCycles,
  segmentStandingActions,
} from "./StandingActionSegmenter";
import { inspectSignalTable, readColumn } from "./signalTable";
import {
  notFound,
  type Limb,
  type Segment,
  type SegmentationResult,
  type SignalTable,
  type TimeWindow,
} from "./types";

export type Archetype = "gait" | "standing_action" | "sit_stand";

export const TASK_ARCHETYPE_MAP: Readonly<Record<string, Archetype>> = {
  level_walking: "gait",
  incline_walking: "gait",
  decline_walking: "gait",
  stair_ascent: "gait",
  stair_descent: "gait",
  run: "gait",
  backward_walking: "gait",
  walk_backward: "gait",
  hop: "gait",

  jump: "standing_action",
  squat: "standing_action",
  lunge: "standing_action",

  sit_to_stand: "sit_stand",
  stand_to_sit: "sit_stand",
};

export interface TaskSegmentationOptions {
  /** Gait only; defaults to left */
  limb?: Limb;
  /** Gait only */
  window?: TimeWindow;
  gait?: GaitConfig;
  jump?: JumpConfig;
  standingAction?: StandingActionConfig;
  sitStand?: SitStandConfig;
}

export function archetypeForTask(task: string): Archetype {
  return Object.prototype.hasOwnProperty.call(TASK_ARCHETYPE_MAP, task)
    ? TASK_ARCHETYPE_MAP[task]
    : "gait";
}

export function segmentByTask(
  input: SignalTable,
  task: string,
  options: TaskSegmentationOptions = {},
): SegmentationResult<Segment> {
  switch (archetypeForTask(task)) {
    case "gait": {
      const config = options.gait ?? DEFAULT_GAIT_CONFIG;
      const limb = options.limb ?? "left";
      const { table } = inspectSignalTable(input);
      if (!table) return notFound();

      return readColumn(table, config.heelStrikeColumns[limb])
        ? segmentGaitCycles(table, { limb, window: options.window }, config)
        : segmentGaitCyclesFromForce(table, { limb }, config);
    }

    case "standing_action":
      if (task === "squat" || task === "lunge") {
        return segmentStandingActions(
          input,
          { action: task },
          options.standingAction ?? DEFAULT_STANDING_ACTION_CONFIG,
        );
      }
      return segmentJumpCycles(input, options.jump ?? DEFAULT_JUMP_CONFIG);

    case "sit_stand":
      return segmentSitStandTransfers(
        input,
        options.sitStand ?? DEFAULT_SIT_STAND_CONFIG,
        task === "sit_to_stand" || task === "stand_to_sit" ? task : "both",
      );
  }
}
