// timestamp.ts
import { NANOS_PER_MILLI } from "./brands";

declare const TimestampBrand: unique symbol;

/** Nanoseconds since the first event a reducer observed. Never wall-clock. */
export type Timestamp = number & { readonly [TimestampBrand]: true };

/** Monotonic time source in milliseconds, shaped like `performance.now`. */
export type Clock = () => number;

// Constructors / guards
export function createTimestamp(value: number): Timestamp {
  if (value < 0 || !Number.isFinite(value)) {
    throw new Error("Timestamp must be a finite, non-negative number.");
  }
  return value as Timestamp;
}

export function isTimestamp(n: unknown): n is Timestamp {
  return typeof n === "number" && n >= 0 && Number.isFinite(n);
}

export function assertTimestamp(n: unknown): asserts n is Timestamp {
  if (!isTimestamp(n)) throw new Error("Not a Timestamp.");
}

export const ZERO_TIMESTAMP: Timestamp = createTimestamp(0);

export const performanceClock: Clock = () => performance.now();

/** Elapsed nanoseconds between an epoch and `nowMs`, both read from the same clock. */
export function sinceEpoch(nowMs: number, epochMs: number): Timestamp {
  const elapsed = Math.round((nowMs - epochMs) * NANOS_PER_MILLI);
  return createTimestamp(Math.max(0, elapsed));
}

export function maxTimestamp(a: Timestamp, b: Timestamp): Timestamp {
  return a >= b ? a : b;
}
