import {
  ZERO_TIMESTAMP,
  assertTimestamp,
  createTimestamp,
  isTimestamp,
  maxTimestamp,
  performanceClock,
  sinceEpoch,
} from "@/types/timestamp";

describe("Timestamp", () => {
  describe("createTimestamp", () => {
    test("accepts zero", () => {
      expect(createTimestamp(0)).toBe(0);
      expect(ZERO_TIMESTAMP).toBe(0);
    });

    test("creates timestamp from a large number", () => {
      const largeNumber = Number.MAX_SAFE_INTEGER;
      expect(createTimestamp(largeNumber)).toBe(largeNumber);
    });

    test("throws error for negative number", () => {
      expect(() => createTimestamp(-1)).toThrow(
        "Timestamp must be a finite, non-negative number.",
      );
    });

    test("throws error for infinity and NaN", () => {
      expect(() => createTimestamp(Number.POSITIVE_INFINITY)).toThrow(
        "Timestamp must be a finite, non-negative number.",
      );
      expect(() => createTimestamp(Number.NaN)).toThrow(
        "Timestamp must be a finite, non-negative number.",
      );
    });
  });

  describe("sinceEpoch", () => {
    test("converts elapsed milliseconds to nanoseconds", () => {
      expect(sinceEpoch(1016, 1000)).toBe(16_000_000);
    });

    test("rounds sub-nanosecond remainders", () => {
      expect(sinceEpoch(1000.0000004, 1000)).toBe(0);
      expect(sinceEpoch(0.25, 0)).toBe(250_000);
    });

    test("clamps instants before the epoch to zero", () => {
      expect(sinceEpoch(900, 1000)).toBe(0);
    });
  });

  describe("ordering", () => {
    test("maxTimestamp picks the later instant", () => {
      const a = createTimestamp(10);
      const b = createTimestamp(20);
      expect(maxTimestamp(a, b)).toBe(b);
      expect(maxTimestamp(b, a)).toBe(b);
    });
  });

  describe("guards", () => {
    test("isTimestamp", () => {
      expect(isTimestamp(0)).toBe(true);
      expect(isTimestamp(-1)).toBe(false);
      expect(isTimestamp("1")).toBe(false);
    });

    test("assertTimestamp", () => {
      expect(() => assertTimestamp(Number.NaN)).toThrow("Not a Timestamp.");
      expect(() => assertTimestamp(5)).not.toThrow();
    });
  });

  test("performanceClock reads performance.now", () => {
    const before = performance.now();
    const reading = performanceClock();
    expect(reading).toBeGreaterThanOrEqual(before);
  });
});
