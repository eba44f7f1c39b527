import { describe, it, expect } from "vitest";
import { StepRangeError } from "../errors.js";
import { resolveWindow } from "../view_window.js";

describe("resolveWindow", () => {
  it("returns every valid window unchanged", () => {
    const total = 6;
    for (let start = 1; start <= total; start += 1) {
      for (let end = start; end <= total; end += 1) {
        expect(resolveWindow({ start, end }, total)).toEqual({ start, end });
      }
    }
  });

  it("reads end = 0 as the last available step", () => {
    expect(resolveWindow({ start: 1, end: 0 }, 5)).toEqual({ start: 1, end: 5 });
    expect(resolveWindow({ start: 3, end: 0 }, 5)).toEqual({ start: 3, end: 5 });
  });

  it("rejects an end past the last step", () => {
    expect(() => resolveWindow({ start: 1, end: 6 }, 5)).toThrow(StepRangeError);
    expect(() => resolveWindow({ start: 1, end: 6 }, 5)).toThrow("End value cannot exceed final step value");
  });

  it("rejects a start below 1", () => {
    expect(() => resolveWindow({ start: 0, end: 5 }, 5)).toThrow("Starting index cannot be lower than 1");
  });

  it("rejects an end before the start", () => {
    expect(() => resolveWindow({ start: 4, end: 2 }, 5)).toThrow("Starting index cannot preceed ending");
  });

  it("rejects a start past the data when end defaults", () => {
    expect(() => resolveWindow({ start: 7, end: 0 }, 5)).toThrow(StepRangeError);
  });
});
