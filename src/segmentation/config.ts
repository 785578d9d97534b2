/**
 * Segmentation Configuration
 * ==========================
 *
 * One immutable parameter bundle per archetype. Thresholds are in Newtons
 * (or body weights for the *BodyWeight variants), velocities in deg/s and
 * durations in seconds. Defaults are compiled into the schemas; the factories
 * merge caller overrides, validate, and freeze.
 *
 * @module segmentation/config
 */

import { z } from "zod";
import { ConfigurationError } from "./errors";

// ============================================================================
// SHARED FIELDS
// ============================================================================

const DEFAULT_LEFT_FORCE_COLUMN = "grf_vertical_left";
const DEFAULT_RIGHT_FORCE_COLUMN = "grf_vertical_right";

const DEFAULT_VELOCITY_COLUMNS = [
  "hip_flexion_velocity_l",
  "hip_flexion_velocity_r",
  "knee_velocity_l",
  "knee_velocity_r",
  "ankle_velocity_l",
  "ankle_velocity_r",
];

/** Used when the time column cannot yield a sample rate */
const FALLBACK_SAMPLE_RATE_HZ = 100;

const seconds = (value: number) => z.number().finite().nonnegative().default(value);
const positiveSeconds = (value: number) => z.number().finite().positive().default(value);
const threshold = (value: number) => z.number().finite().nonnegative().default(value);
const columnName = z.string().min(1);
const fallbackSampleRate = z
  .number()
  .finite()
  .positive()
  .default(FALLBACK_SAMPLE_RATE_HZ);

const durationFilterFields = {
  minDuration: seconds(0),
  maxDuration: positiveSeconds(Number.MAX_VALUE),
  useAdaptiveFilter: z.boolean().default(true),
  iqrMultiplier: z.number().finite().positive().default(1.5),
};

function checkDurationBounds(
  value: { minDuration: number; maxDuration: number },
  ctx: z.RefinementCtx,
): void {
  if (value.minDuration > value.maxDuration) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["minDuration"],
      message: `minDuration (${value.minDuration}) exceeds maxDuration (${value.maxDuration})`,
    });
  }
}

function checkBand(
  lower: number,
  upper: number,
  path: string,
  ctx: z.RefinementCtx,
): void {
  if (lower >= upper) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: [path],
      message: `lower threshold (${lower}) must be below upper threshold (${upper})`,
    });
  }
}

// ============================================================================
// GAIT
// ============================================================================

export const GaitConfigSchema = z
  .object({
    /** Heel-strike percentage channel per limb (0 marks the event) */
    heelStrikeColumns: z
      .object({ left: columnName, right: columnName })
      .default({ left: "heel_strike_left", right: "heel_strike_right" }),
    /** Vertical force per limb, used when no percentage channel exists */
    forceColumns: z
      .object({ left: columnName, right: columnName })
      .default({
        left: DEFAULT_LEFT_FORCE_COLUMN,
        right: DEFAULT_RIGHT_FORCE_COLUMN,
      }),

    minCycleSamples: z.number().int().nonnegative().default(10),
    /** A real stride climbs at least this far through the duty cycle */
    minPeakPercent: z.number().min(0).max(100).default(50),

    contactThreshold: threshold(50),
    contactThresholdBodyWeight: threshold(0.05),
    minContactInterval: seconds(0.3),
    smoothingSamples: z.number().int().positive().default(5),

    skipFirst: z.number().int().nonnegative().default(0),
    skipLast: z.number().int().nonnegative().default(0),

    fallbackSampleRate,

    ...durationFilterFields,
    minDuration: seconds(0.4),
    maxDuration: positiveSeconds(2.5),
  })
  .superRefine(checkDurationBounds);

// ============================================================================
// JUMP (standing action with flight)
// ============================================================================

export const JumpConfigSchema = z
  .object({
    leftForceColumn: columnName.default(DEFAULT_LEFT_FORCE_COLUMN),
    rightForceColumn: columnName.default(DEFAULT_RIGHT_FORCE_COLUMN),

    smoothWindow: seconds(0.05),
    flightThreshold: threshold(50),
    flightThresholdBodyWeight: threshold(0.05),
    minFlightDuration: seconds(0.1),
    minGroundContact: seconds(0.1),

    fallbackSampleRate,

    ...durationFilterFields,
    minDuration: seconds(0.3),
    maxDuration: positiveSeconds(6.0),
  })
  .superRefine(checkDurationBounds);

// ============================================================================
// STANDING ACTION (squat, lunge)
// ============================================================================

export const StandingActionConfigSchema = z
  .object({
    leftForceColumn: columnName.default(DEFAULT_LEFT_FORCE_COLUMN),
    rightForceColumn: columnName.default(DEFAULT_RIGHT_FORCE_COLUMN),
    velocityColumns: z.array(columnName).default(DEFAULT_VELOCITY_COLUMNS),

    smoothWindow: seconds(0.05),
    standingThreshold: threshold(600),
    standingThresholdBodyWeight: threshold(0.8),
    velocityThreshold: threshold(25),
    marginBefore: seconds(0.05),
    marginAfter: seconds(0.05),

    fallbackSampleRate,

    ...durationFilterFields,
    minDuration: seconds(0.5),
    maxDuration: positiveSeconds(4.0),
  })
  .superRefine(checkDurationBounds);

// ============================================================================
// SIT <-> STAND
// ============================================================================

export const SitStandConfigSchema = z
  .object({
    leftForceColumn: columnName.default(DEFAULT_LEFT_FORCE_COLUMN),
    rightForceColumn: columnName.default(DEFAULT_RIGHT_FORCE_COLUMN),
    velocityColumns: z.array(columnName).default(DEFAULT_VELOCITY_COLUMNS),

    smoothWindow: seconds(0.3),
    standingThreshold: threshold(600),
    sittingThreshold: threshold(400),
    standingThresholdBodyWeight: threshold(0.8),
    sittingThresholdBodyWeight: threshold(0.5),
    velocityThreshold: threshold(15),

    minStableDuration: seconds(0.3),
    /** Share of the stable window required by the motion-based search */
    motionStableFraction: z.number().gt(0).max(1).default(0.5),
    /** Share of the stable window required by the force-only fallback */
    forceStableFraction: z.number().gt(0).max(1).default(1),

    marginBefore: seconds(0.1),
    marginAfter: seconds(0.1),
    trimStartPercent: z.number().min(0).lt(100).default(0),
    minWindowSamples: z.number().int().nonnegative().default(10),

    filterByDuration: z.boolean().default(true),
    fallbackSampleRate,

    ...durationFilterFields,
    minDuration: seconds(0.3),
    maxDuration: positiveSeconds(5.0),
  })
  .superRefine((value, ctx) => {
    checkDurationBounds(value, ctx);
    checkBand(value.sittingThreshold, value.standingThreshold, "sittingThreshold", ctx);
    checkBand(
      value.sittingThresholdBodyWeight,
      value.standingThresholdBodyWeight,
      "sittingThresholdBodyWeight",
      ctx,
    );
  });

// ============================================================================
// TYPES & FACTORIES
// ============================================================================

export type GaitConfig = Readonly<z.output<typeof GaitConfigSchema>>;
export type GaitConfigInput = z.input<typeof GaitConfigSchema>;

export type JumpConfig = Readonly<z.output<typeof JumpConfigSchema>>;
export type JumpConfigInput = z.input<typeof JumpConfigSchema>;

export type StandingActionConfig = Readonly<
  z.output<typeof StandingActionConfigSchema>
>;
export type StandingActionConfigInput = z.input<
  typeof StandingActionConfigSchema
>;

export type SitStandConfig = Readonly<z.output<typeof SitStandConfigSchema>>;
export type SitStandConfigInput = z.input<typeof SitStandConfigSchema>;

function freezeDeep<T>(value: T): Readonly<T> {
  if (typeof value === "object" && value !== null) {
    for (const nested of Object.values(value)) freezeDeep(nested);
    Object.freeze(value);
  }
  return value;
}

function parseConfig<Out, In>(
  schema: z.ZodType<Out, z.ZodTypeDef, In>,
  context: string,
  overrides: In,
): Readonly<Out> {
  const parsed = schema.safeParse(overrides);
  if (!parsed.success) {
    throw ConfigurationError.fromZod(context, parsed.error);
  }
  return freezeDeep(parsed.data);
}

export function createGaitConfig(overrides: GaitConfigInput = {}): GaitConfig {
  return parseConfig(GaitConfigSchema, "gait configuration", overrides);
}

export function createJumpConfig(overrides: JumpConfigInput = {}): JumpConfig {
  return parseConfig(JumpConfigSchema, "jump configuration", overrides);
}

export function createStandingActionConfig(
  overrides: StandingActionConfigInput = {},
): StandingActionConfig {
  return parseConfig(
    StandingActionConfigSchema,
    "standing action configuration",
    overrides,
  );
}

export function createSitStandConfig(
  overrides: SitStandConfigInput = {},
): SitStandConfig {
  return parseConfig(SitStandConfigSchema, "sit-stand configuration", overrides);
}

export const DEFAULT_GAIT_CONFIG: GaitConfig = createGaitConfig();
export const DEFAULT_JUMP_CONFIG: JumpConfig = createJumpConfig();
export const DEFAULT_STANDING_ACTION_CONFIG: StandingActionConfig =
  createStandingActionConfig();
export const DEFAULT_SIT_STAND_CONFIG: SitStandConfig = createSitStandConfig();
