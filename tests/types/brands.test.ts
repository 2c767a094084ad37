import { describe, it, expect } from "@jest/globals";

import {
  MAX_TAP_COUNT,
  assertDurationNs,
  assertPressure,
  assertScaleFactor,
  assertTapCount,
  clampPressure,
  createDurationNs,
  createPressure,
  createScaleFactor,
  createTapCount,
  durationFromMs,
  incrementTapCount,
  isDurationNs,
  isPressure,
  isScaleFactor,
  isTapCount,
} from "../../src/types/brands";

describe("brands.ts", () => {
  it("constructors accept valid inputs and brand correctly", () => {
    expect(createDurationNs(0)).toBe(0);
    expect(createScaleFactor(1.25)).toBe(1.25);
    expect(createTapCount(MAX_TAP_COUNT)).toBe(255);
    expect(createPressure(1)).toBe(1);
  });

  it("constructors reject invalid inputs", () => {
    expect(() => createDurationNs(-1)).toThrow(
      "DurationNs must be a non-negative finite number",
    );
    expect(() => createDurationNs(Number.POSITIVE_INFINITY)).toThrow();
    expect(() => createScaleFactor(0)).toThrow(
      "ScaleFactor must be a positive finite number",
    );
    expect(() => createScaleFactor(Number.NaN)).toThrow();
    expect(() => createTapCount(256)).toThrow(
      "TapCount must be an integer from 0 to 255",
    );
    expect(() => createTapCount(1.5)).toThrow();
    expect(() => createPressure(1.01)).toThrow(
      "Pressure must be a finite number from 0 to 1",
    );
  });

  it("guards narrow unknown values", () => {
    expect(isDurationNs(5)).toBe(true);
    expect(isDurationNs("5")).toBe(false);
    expect(isScaleFactor(2)).toBe(true);
    expect(isScaleFactor(-2)).toBe(false);
    expect(isTapCount(3)).toBe(true);
    expect(isTapCount(-1)).toBe(false);
    expect(isPressure(0.5)).toBe(true);
    expect(isPressure(null)).toBe(false);
  });

  it("assertions throw for invalid values", () => {
    expect(() => assertDurationNs(-5)).toThrow("Not a valid DurationNs");
    expect(() => assertScaleFactor(0)).toThrow("Not a valid ScaleFactor");
    expect(() => assertTapCount(300)).toThrow("Not a valid TapCount");
    expect(() => assertPressure(2)).toThrow("Not a valid Pressure");
    expect(() => assertPressure(0.3)).not.toThrow();
  });

  it("durationFromMs converts to whole nanoseconds", () => {
    expect(durationFromMs(500)).toBe(500_000_000);
    expect(durationFromMs(0.0000004)).toBe(0);
  });

  it("incrementTapCount saturates", () => {
    expect(incrementTapCount(createTapCount(1))).toBe(2);
    expect(incrementTapCount(createTapCount(MAX_TAP_COUNT))).toBe(255);
  });

  it("clampPressure keeps readings in range", () => {
    expect(clampPressure(1.7)).toBe(1);
    expect(clampPressure(-0.2)).toBe(0);
    expect(clampPressure(Number.NaN)).toBe(0);
    expect(clampPressure(0.25)).toBe(0.25);
  });
});
