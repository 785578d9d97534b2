import { afterEach, describe, it, expect, vi } from "vitest";
import { createLogger } from "./logger";
import { segmentSitStandTransfers } from "../segmentation/SitStandTransferSegmenter";

describe("logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should prefix warnings with the nested logger name", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    createLogger("Segmentation").child("Jump").warn("Malformed signal table", ["time: Required"]);

    expect(warn).toHaveBeenCalledWith("[Segmentation:Jump] Malformed signal table", [
      "time: Required",
    ]);
  });

  it("should warn when a segmenter is given a malformed table", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const result = segmentSitStandTransfers({ time: [0, 0.01], channels: { a: [1] } });

    expect(result.found).toBe(false);
    expect(warn).toHaveBeenCalledWith("[Segmentation:SitStand] Malformed signal table", [
      "channels.a: expected 2 samples, got 1",
    ]);
  });
});
