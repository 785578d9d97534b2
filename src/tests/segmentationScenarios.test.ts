/**
 * Segmentation Scenarios
 * ======================
 *
 * End-to-end checks of the three archetypes on synthetic recordings at
 * 100 Hz.
 */

import { describe, it, expect } from "vitest";
import {
  createGaitConfig,
  segmentGaitCycles,
  segmentGaitCyclesFromForce,
  segmentJumpCycles,
  segmentSitStandTransfers,
} from "../segmentation";
import {
  bilateralTable,
  heelStrikePercent,
  heelStrikeTable,
  jumpForce,
  repeat,
  sitToStandForce,
} from "./fixtures/syntheticSignals";

describe("Segmentation scenarios", () => {
  it("should find two landing-to-landing cycles in three jumps", () => {
    // 2 s at 700 N, 0.3 s at 0 N, three times over, then 2 s at 700 N
    const result = segmentJumpCycles(bilateralTable(jumpForce(3, 200, 30, 700)));

    expect(result.segments).toHaveLength(2);
    for (const cycle of result.segments) {
      // The smoothing window shortens each flight by 0.04 s
      expect(cycle.flightDuration).toBeCloseTo(0.26, 10);
      expect(Math.abs(cycle.flightDuration - 0.3)).toBeLessThan(0.05);
      expect(cycle.startIndex).toBeLessThan(cycle.endIndex);
    }
    expect(result.segments[0].endIndex).toBe(result.segments[1].startIndex);
  });

  it("should find no events in constant standing", () => {
    const table = bilateralTable(repeat(700, 1000));

    expect(segmentJumpCycles(table).segments).toHaveLength(0);
    expect(segmentGaitCyclesFromForce(table, { limb: "left" }).segments).toHaveLength(0);
    expect(segmentSitStandTransfers(table).segments).toHaveLength(0);
  });

  it("should fall back to force-only boundaries without velocity", () => {
    const result = segmentSitStandTransfers(bilateralTable(sitToStandForce()));

    expect(result.segments).toHaveLength(1);
    const [transfer] = result.segments;
    expect(transfer.kind).toBe("sit_to_stand");
    expect(transfer.boundarySource).toBe("force");
    // Stable sitting before the 2-3 s rise, stable standing after the crossing
    expect(transfer.startTime).toBeGreaterThanOrEqual(2);
    expect(transfer.startTime).toBeLessThan(transfer.crossingTime);
    expect(transfer.endTime).toBeLessThanOrEqual(3);
  });

  it("should reject the one outlying stride with adaptive bounds", () => {
    // Ten strides of 0.95-1.05 s and one of 5.0 s
    const strides = [96, 98, 99, 100, 101, 501, 101, 102, 103, 104, 106];
    const result = segmentGaitCycles(
      heelStrikeTable(heelStrikePercent(strides)),
      { limb: "left" },
      createGaitConfig({ maxDuration: 6 }),
    );

    expect(result.filter?.mode).toBe("adaptive");
    expect(result.filter?.removed).toBe(1);
    expect(result.segments).toHaveLength(10);
    expect(result.segments.every((s) => s.duration < 1.1)).toBe(true);
  });
});
