// Branded primitive types for type safety and domain modeling

// Duration in nanoseconds - for time intervals/deltas on the reducer clock
declare const DurationNsBrand: unique symbol;
export type DurationNs = number & { readonly [DurationNsBrand]: true };

// Display scale factor - physical pixels per logical pixel
declare const ScaleFactorBrand: unique symbol;
export type ScaleFactor = number & { readonly [ScaleFactorBrand]: true };

// Repeat count attached to pointer events - 0 means "not counted"
declare const TapCountBrand: unique symbol;
export type TapCount = number & { readonly [TapCountBrand]: true };

// Normalized contact pressure in [0, 1]
declare const PressureBrand: unique symbol;
export type Pressure = number & { readonly [PressureBrand]: true };

export const NANOS_PER_MILLI = 1_000_000;
export const MAX_TAP_COUNT = 255;

// DurationNs constructors and guards
export function createDurationNs(value: number): DurationNs {
  if (value < 0 || !Number.isFinite(value)) {
    throw new Error("DurationNs must be a non-negative finite number");
  }
  return value as DurationNs;
}

export function isDurationNs(n: unknown): n is DurationNs {
  return typeof n === "number" && n >= 0 && Number.isFinite(n);
}

export function assertDurationNs(n: unknown): asserts n is DurationNs {
  if (!isDurationNs(n)) throw new Error("Not a valid DurationNs");
}

export function durationFromMs(ms: number): DurationNs {
  return createDurationNs(Math.round(ms * NANOS_PER_MILLI));
}

// ScaleFactor constructors and guards
export function createScaleFactor(value: number): ScaleFactor {
  if (value <= 0 || !Number.isFinite(value)) {
    throw new Error("ScaleFactor must be a positive finite number");
  }
  return value as ScaleFactor;
}

export function isScaleFactor(n: unknown): n is ScaleFactor {
  return typeof n === "number" && n > 0 && Number.isFinite(n);
}

export function assertScaleFactor(n: unknown): asserts n is ScaleFactor {
  if (!isScaleFactor(n)) throw new Error("Not a valid ScaleFactor");
}

// TapCount constructors and guards
export function createTapCount(value: number): TapCount {
  if (!Number.isInteger(value) || value < 0 || value > MAX_TAP_COUNT) {
    throw new Error(`TapCount must be an integer from 0 to ${MAX_TAP_COUNT}`);
  }
  return value as TapCount;
}

export function isTapCount(n: unknown): n is TapCount {
  return (
    typeof n === "number" && Number.isInteger(n) && n >= 0 && n <= MAX_TAP_COUNT
  );
}

export function assertTapCount(n: unknown): asserts n is TapCount {
  if (!isTapCount(n)) throw new Error("Not a valid TapCount");
}

/** Next count in a cluster; saturates like an 8-bit counter. */
export function incrementTapCount(count: TapCount): TapCount {
  return createTapCount(Math.min(MAX_TAP_COUNT, count + 1));
}

// Pressure constructors and guards
export function createPressure(value: number): Pressure {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new Error("Pressure must be a finite number from 0 to 1");
  }
  return value as Pressure;
}

export function isPressure(n: unknown): n is Pressure {
  return typeof n === "number" && Number.isFinite(n) && n >= 0 && n <= 1;
}

export function assertPressure(n: unknown): asserts n is Pressure {
  if (!isPressure(n)) throw new Error("Not a valid Pressure");
}

/** Platform force readings can overshoot; clamp instead of rejecting. */
export function clampPressure(value: number): Pressure {
  if (Number.isNaN(value)) return createPressure(0);
  return createPressure(Math.min(1, Math.max(0, value)));
}

export const NO_TAP_COUNT: TapCount = createTapCount(0);
export const DEFAULT_SCALE_FACTOR: ScaleFactor = createScaleFactor(1);
