import { describe, it, expect } from "vitest";
import { findFallingEdges, findRisingEdges, findRuns } from "./EdgeFinder";

const T = true;
const F = false;

describe("EdgeFinder", () => {
  describe("findRuns", () => {
    it("should return nothing for an empty signal", () => {
      expect(findRuns([])).toEqual([]);
    });

    it("should report runs touching either boundary", () => {
      expect(findRuns([T, T, F, T])).toEqual([
        { start: 0, end: 1 },
        { start: 3, end: 3 },
      ]);
      expect(findRuns([T, T, T])).toEqual([{ start: 0, end: 2 }]);
    });

    it("should return nothing when no sample is set", () => {
      expect(findRuns([F, F, F])).toEqual([]);
    });
  });

  describe("findRisingEdges", () => {
    it("should mark the first true sample of each run after the first sample", () => {
      expect(findRisingEdges([F, T, T, F, T])).toEqual([1, 4]);
      expect(findRisingEdges([T, F])).toEqual([]);
    });
  });

  describe("findFallingEdges", () => {
    it("should mark the first false sample after a true one", () => {
      expect(findFallingEdges([T, T, F, T, F])).toEqual([2, 4]);
    });

    it("should only consider pairs inside the search range", () => {
      const flags = [T, T, F, T, F];
      expect(findFallingEdges(flags, [0, 1, 2])).toEqual([2]);
      expect(findFallingEdges(flags, [3, 4])).toEqual([4]);
      expect(findFallingEdges(flags, [2, 3])).toEqual([]);
      expect(findFallingEdges(flags, [])).toEqual([]);
    });
  });
});
