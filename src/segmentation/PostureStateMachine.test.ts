import { describe, it, expect } from "vitest";
import {
  classifyPosture,
  findPostureTransitions,
  nextPosture,
} from "./PostureStateMachine";

const thresholds = { sitting: 400, standing: 600 };

describe("PostureStateMachine", () => {
  it("should carry the previous state through the hysteresis band", () => {
    const samples = classifyPosture([500, 300, 500, 700, 500, 300], thresholds);

    expect(samples).toEqual([
      { state: "transition", confident: false },
      { state: "sitting", confident: true },
      { state: "sitting", confident: false },
      { state: "standing", confident: true },
      { state: "standing", confident: false },
      { state: "sitting", confident: true },
    ]);
  });

  it("should treat the thresholds themselves as inside the band", () => {
    expect(nextPosture("sitting", 600, thresholds)).toEqual({
      state: "sitting",
      confident: false,
    });
    expect(nextPosture("standing", 400, thresholds)).toEqual({
      state: "standing",
      confident: false,
    });
  });

  it("should find transfers at the first sample in the new state", () => {
    const samples = classifyPosture([500, 300, 500, 700, 500, 300], thresholds);

    expect(findPostureTransitions(samples)).toEqual([
      { kind: "sit_to_stand", index: 3 },
      { kind: "stand_to_sit", index: 5 },
    ]);
  });

  it("should not report leaving the initial transition state", () => {
    const samples = classifyPosture([500, 700, 700], thresholds);
    expect(findPostureTransitions(samples)).toEqual([]);
  });

  it("should classify an empty signal as nothing", () => {
    expect(classifyPosture([], thresholds)).toEqual([]);
  });
});
