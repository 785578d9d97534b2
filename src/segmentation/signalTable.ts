/**
 * Signal table access
 * ===================
 *
 * Shape validation and column helpers shared by the segmenters. A table that
 * fails validation is treated as "not found" by callers, never thrown.
 *
 * Channels may carry NaN gaps. A column with any non-finite sample reads as
 * absent, so only the columns a segmenter actually uses can reject a trial.
 *
 * @module segmentation/signalTable
 */

import { z } from "zod";
import { segmentationLog } from "../lib/logger";
import { estimateSampleRate, maxValue } from "../lib/signal/SignalProcessor";
import type { SignalTable, TimeWindow } from "./types";

/** Force signals whose peak stays below this are taken to be in body weights */
const BODY_WEIGHT_SCALE_LIMIT = 10;

const log = segmentationLog.child("SignalTable");

export const SignalTableSchema = z
  .object({
    time: z.array(z.number().finite()),
    channels: z.record(z.string(), z.array(z.union([z.number(), z.nan()]))),
  })
  .superRefine((table, ctx) => {
    for (let i = 1; i < table.time.length; i++) {
      if (table.time[i] <= table.time[i - 1]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["time", i],
          message: "time must be strictly increasing",
        });
        return;
      }
    }
    for (const [name, values] of Object.entries(table.channels)) {
      if (values.length !== table.time.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["channels", name],
          message: `expected ${table.time.length} samples, got ${values.length}`,
        });
      }
    }
  });

/**
 * Validate an incoming table. Returns null (with the reason) when the shape is
 * wrong so batch callers can skip the trial.
 */
export function inspectSignalTable(
  input: unknown,
): { table: SignalTable; issues: null } | { table: null; issues: string[] } {
  const parsed = SignalTableSchema.safeParse(input);
  if (!parsed.success) {
    return {
      table: null,
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      ),
    };
  }
  return { table: parsed.data, issues: null };
}

/**
 * A column by name. Null when it is missing or has non-finite samples.
 */
export function readColumn(
  table: SignalTable,
  name: string,
): readonly number[] | null {
  if (!Object.prototype.hasOwnProperty.call(table.channels, name)) return null;

  const column = table.channels[name];
  if (!column.every(Number.isFinite)) {
    log.warn(`Channel "${name}" has non-finite samples; ignoring it`);
    return null;
  }
  return column;
}

/**
 * Sample-by-sample sum of two columns (bilateral vertical force).
 * Null when either column is missing.
 */
export function sumColumns(
  table: SignalTable,
  first: string,
  second: string,
): number[] | null {
  const a = readColumn(table, first);
  const b = readColumn(table, second);
  if (!a || !b) return null;
  return a.map((value, i) => value + b[i]);
}

/**
 * The subset of `names` present in the table, in the given order.
 */
export function presentColumns(
  table: SignalTable,
  names: readonly string[],
): (readonly number[])[] {
  const columns: (readonly number[])[] = [];
  for (const name of names) {
    const column = readColumn(table, name);
    if (column) columns.push(column);
  }
  return columns;
}

export function resolveSampleRate(
  table: SignalTable,
  fallbackSampleRate: number,
): number {
  return estimateSampleRate(table.time) ?? fallbackSampleRate;
}

export function isBodyWeightScaled(signal: readonly number[]): boolean {
  return signal.length > 0 && maxValue(signal) < BODY_WEIGHT_SCALE_LIMIT;
}

/**
 * Indices of the samples with `window.start <= time <= window.end`,
 * or every index when no window is given.
 */
export function indicesInWindow(
  time: readonly number[],
  window?: TimeWindow,
): number[] {
  const indices: number[] = [];
  for (let i = 0; i < time.length; i++) {
    if (!window || (time[i] >= window.start && time[i] <= window.end)) {
      indices.push(i);
    }
  }
  return indices;
}
