import { describe, it, expect } from "vitest";
import { DEFAULT_GAIT_CONFIG } from "./config";
import {
  applyDurationBounds,
  computeDurationBounds,
  filterByDuration,
  policyFromConfig,
  removeTransitionSegments,
  type DurationFilterPolicy,
} from "./DurationOutlierFilter";
import { ConfigurationError } from "./errors";

// ============================================================================
// TEST UTILITIES
// ============================================================================

const withDurations = (durations: number[]) =>
  durations.map((duration, id) => ({ id, duration }));

const adaptive: DurationFilterPolicy = {
  mode: "adaptive",
  minDuration: 0,
  maxDuration: 10,
};

describe("DurationOutlierFilter", () => {
  describe("fixed bounds", () => {
    it("should keep durations inside [min, max] inclusive", () => {
      const result = filterByDuration(withDurations([0.2, 0.3, 1, 2.5, 3]), {
        mode: "fixed",
        minDuration: 0.3,
        maxDuration: 2.5,
      });

      expect(result.kept.map((c) => c.duration)).toEqual([0.3, 1, 2.5]);
      expect(result.removed).toBe(2);
      expect(result.mode).toBe("fixed");
      expect(result.bounds).toEqual({ lower: 0.3, upper: 2.5 });
    });
  });

  describe("adaptive bounds", () => {
    it("should fall back to fixed bounds below four candidates", () => {
      const result = filterByDuration(withDurations([0.1, 1, 9]), {
        ...adaptive,
        minDuration: 0.5,
      });

      expect(result.mode).toBe("fixed");
      expect(result.kept.map((c) => c.id)).toEqual([1, 2]);
    });

    it("should reject a duration beyond Q3 + 1.5 IQR", () => {
      const durations = [0.95, 0.97, 0.98, 0.99, 1.0, 5.0, 1.0, 1.01, 1.02, 1.03, 1.05];
      const result = filterByDuration(withDurations(durations), adaptive);

      // Q1 = 0.985, Q3 = 1.025, IQR = 0.04
      expect(result.mode).toBe("adaptive");
      expect(result.bounds.lower).toBeCloseTo(0.925, 10);
      expect(result.bounds.upper).toBeCloseTo(1.085, 10);
      expect(result.removed).toBe(1);
      expect(result.kept.map((c) => c.id)).toEqual([0, 1, 2, 3, 4, 6, 7, 8, 9, 10]);
    });

    it("should never widen past the absolute floor and ceiling", () => {
      const { bounds } = computeDurationBounds([1, 2, 3, 4, 5, 6], {
        mode: "adaptive",
        minDuration: 2,
        maxDuration: 5,
      });
      expect(bounds).toEqual({ lower: 2, upper: 5 });
    });

    it("should keep identical durations when the IQR is zero", () => {
      const result = filterByDuration(withDurations([1, 1, 1, 1]), adaptive);
      expect(result.bounds).toEqual({ lower: 1, upper: 1 });
      expect(result.kept).toHaveLength(4);
    });

    it("should remove nothing when the reported bounds are applied again", () => {
      const durations = [0.95, 0.97, 0.98, 0.99, 1.0, 5.0, 1.0, 1.01, 1.02, 1.03, 1.05];
      const first = filterByDuration(withDurations(durations), adaptive);
      const again = applyDurationBounds(first.kept, first.bounds);
      expect(again).toEqual(first.kept);
    });

    it("should not modify the candidates", () => {
      const candidates = withDurations([1, 2, 3, 4, 50]);
      const snapshot = JSON.parse(JSON.stringify(candidates));
      const result = filterByDuration(candidates, adaptive);
      expect(candidates).toEqual(snapshot);
      expect(result.kept[0]).toBe(candidates[0]);
    });
  });

  describe("policy", () => {
    it("should reject inverted bounds", () => {
      expect(() =>
        filterByDuration([], { mode: "fixed", minDuration: 2, maxDuration: 1 }),
      ).toThrow(ConfigurationError);
    });

    it("should reject a non-positive IQR multiplier", () => {
      expect(() =>
        computeDurationBounds([1, 2, 3, 4], { ...adaptive, iqrMultiplier: 0 }),
      ).toThrow(/iqrMultiplier must be > 0/);
    });

    it("should derive the policy from an archetype config", () => {
      expect(policyFromConfig(DEFAULT_GAIT_CONFIG)).toEqual({
        mode: "adaptive",
        minDuration: 0.4,
        maxDuration: 2.5,
        iqrMultiplier: 1.5,
      });
    });
  });

  describe("removeTransitionSegments", () => {
    it("should drop the requested number of segments at each end", () => {
      expect(removeTransitionSegments([1, 2, 3, 4, 5], 1, 1)).toEqual([2, 3, 4]);
      expect(removeTransitionSegments([1, 2, 3], 0, 0)).toEqual([1, 2, 3]);
    });

    it("should return nothing when every segment would be dropped", () => {
      expect(removeTransitionSegments([1, 2], 1, 1)).toEqual([]);
    });
  });
});
