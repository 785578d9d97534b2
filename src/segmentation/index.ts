/**
 * Segmentation Module Barrel Export
 */
export {
  SEGMENT_KINDS,
  countByKind,
  type SignalTable,
  type Limb,
  type TimeWindow,
  type SegmentKind,
  type Segment,
  type GaitCycleSegment,
  type JumpCycleSegment,
  type StandingAction,
  type StandingActionSegment,
  type TransferKind,
  type TransferSegment,
  type DurationBounds,
  type DurationFilterMode,
  type DurationFilterReport,
  type SegmentationResult,
} from "./types";
export { ConfigurationError } from "./errors";
export {
  createGaitConfig,
  createJumpConfig,
  createStandingActionConfig,
  createSitStandConfig,
  DEFAULT_GAIT_CONFIG,
  DEFAULT_JUMP_CONFIG,
  DEFAULT_STANDING_ACTION_CONFIG,
  DEFAULT_SIT_STAND_CONFIG,
  type GaitConfig,
  type GaitConfigInput,
  type JumpConfig,
  type JumpConfigInput,
  type StandingActionConfig,
  type StandingActionConfigInput,
  type SitStandConfig,
  type SitStandConfigInput,
} from "./config";
export { inspectSignalTable, SignalTableSchema } from "./signalTable";

// Building blocks
export { findRuns, findRisingEdges, findFallingEdges, type Run } from "./EdgeFinder";
export {
  computeDurationBounds,
  filterByDuration,
  MIN_ADAPTIVE_CANDIDATES,
  type DurationFilterPolicy,
  type DurationFilterResult,
} from "./DurationOutlierFilter";
export {
  classifyPosture,
  findPostureTransitions,
  type PostureSample,
  type PostureState,
  type PostureTransition,
} from "./PostureStateMachine";

// Segmenters
export {
  segmentGaitCycles,
  segmentGaitCyclesFromForce,
  determineFirstHeelStrike,
  type FirstHeelStrike,
  type GaitSegmentationOptions,
} from "./GaitCycleSegmenter";
export {
  segmentJumpCycles,
  segmentStandingActions,
  type StandingActionOptions,
} from "./StandingActionSegmenter";
export { segmentSitStandTransfers, type TransferSelection } from "./SitStandTransferSegmenter";
export {
  segmentByTask,
  archetypeForTask,
  TASK_ARCHETYPE_MAP,
  type Archetype,
  type TaskSegmentationOptions,
} from "./TaskRouter";
