import { describe, it, expect } from "vitest";
import {
  bilateralTable,
  concat,
  heelStrikePercent,
  heelStrikeTable,
  jumpForce,
  repeat,
  sitStandSitForce,
  timeAxis,
} from "../tests/fixtures/syntheticSignals";
import { archetypeForTask, segmentByTask, TASK_ARCHETYPE_MAP } from "./TaskRouter";

describe("TaskRouter", () => {
  describe("archetypeForTask", () => {
    it("should map canonical tasks to their archetype", () => {
      expect(archetypeForTask("level_walking")).toBe("gait");
      expect(archetypeForTask("stair_descent")).toBe("gait");
      expect(archetypeForTask("jump")).toBe("standing_action");
      expect(archetypeForTask("lunge")).toBe("standing_action");
      expect(archetypeForTask("stand_to_sit")).toBe("sit_stand");
      expect(Object.keys(TASK_ARCHETYPE_MAP)).toHaveLength(14);
    });

    it("should default unknown tasks to gait", () => {
      expect(archetypeForTask("tai_chi")).toBe("gait");
      expect(archetypeForTask("constructor")).toBe("gait");
    });
  });

  describe("segmentByTask", () => {
    it("should use the heel-strike channel for gait when present", () => {
      const table = heelStrikeTable(heelStrikePercent([101, 101, 101]));
      const result = segmentByTask(table, "incline_walking");

      expect(result.counts.gait_cycle).toBe(3);
      expect(result.segments.every((s) => s.kind === "gait_cycle")).toBe(true);
    });

    it("should fall back to vertical force for gait", () => {
      const stride = concat(repeat(800, 70), repeat(0, 40));
      const force = concat(repeat(0, 20), stride, stride, stride, stride);
      const result = segmentByTask(
        { time: timeAxis(force.length), channels: { grf_vertical_right: force } },
        "run",
        { limb: "right" },
      );

      expect(result.counts.gait_cycle).toBe(3);
      expect(result.segments[0]).toMatchObject({
        kind: "gait_cycle",
        limb: "right",
        eventSource: "vertical_force",
      });
    });

    it("should segment jumps", () => {
      const result = segmentByTask(bilateralTable(jumpForce()), "jump");
      expect(result.counts.jump_cycle).toBe(2);
    });

    it("should need velocity for squats", () => {
      const result = segmentByTask(bilateralTable(repeat(700, 300)), "squat");
      expect(result.found).toBe(false);
    });

    it("should keep only the transfer kind named by the task", () => {
      const result = segmentByTask(bilateralTable(sitStandSitForce()), "sit_to_stand");

      expect(result.counts.sit_to_stand).toBe(1);
      expect(result.counts.stand_to_sit).toBe(0);
    });

    it("should report not found for a malformed gait table", () => {
      const result = segmentByTask({ time: [1, 0], channels: {} }, "level_walking");
      expect(result.found).toBe(false);
    });
  });
});
