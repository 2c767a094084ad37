// Reducer settings: defaults plus coercion of untrusted partial settings
// (e.g. parsed JSON). Invalid fields fall back to their defaults.

import {
  createDurationNs,
  createScaleFactor,
  durationFromMs,
  isDurationNs,
  isScaleFactor,
  type DurationNs,
  type ScaleFactor,
} from "../types/brands";

export type TapSettings = Readonly<{
  /** Max logical distance between presses of one cluster (exclusive). */
  slopRadius: number;
  /** How long after a release the next press still joins the cluster. */
  windowNs: DurationNs;
  /** Drop clusters held longer than this; `undefined` never drops a held press. */
  maxPressNs: DurationNs | undefined;
}>;

export type ReducerSettings = Readonly<{
  /** Physical pixels per logical pixel until the window reports one. */
  scaleFactor: ScaleFactor | undefined;
  tap: TapSettings;
}>;

export const DEFAULT_TAP_SETTINGS: TapSettings = {
  maxPressNs: undefined,
  slopRadius: 4,
  windowNs: durationFromMs(500),
};

export const DEFAULT_REDUCER_SETTINGS: ReducerSettings = {
  scaleFactor: undefined,
  tap: DEFAULT_TAP_SETTINGS,
};

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null;
}

function isPositiveNumber(x: unknown): x is number {
  return typeof x === "number" && Number.isFinite(x) && x > 0;
}

export function coerceScaleFactor(value: unknown): ScaleFactor | undefined {
  if (value === undefined) return undefined;
  if (isScaleFactor(value)) return createScaleFactor(value);
  console.warn("Invalid scaleFactor:", value);
  return undefined;
}

export function coerceTapSettings(value: unknown): TapSettings {
  if (value === undefined) return DEFAULT_TAP_SETTINGS;
  if (!isRecord(value)) {
    console.warn("Invalid tap settings:", value);
    return DEFAULT_TAP_SETTINGS;
  }

  let slopRadius = DEFAULT_TAP_SETTINGS.slopRadius;
  const rawRadius = value["slopRadius"];
  if (isPositiveNumber(rawRadius)) {
    slopRadius = rawRadius;
  } else if (rawRadius !== undefined) {
    console.warn("Invalid slopRadius:", rawRadius);
  }

  let windowNs = DEFAULT_TAP_SETTINGS.windowNs;
  const rawWindow = value["windowNs"];
  if (isDurationNs(rawWindow)) {
    windowNs = createDurationNs(rawWindow);
  } else if (rawWindow !== undefined) {
    console.warn("Invalid windowNs:", rawWindow);
  }

  let maxPressNs = DEFAULT_TAP_SETTINGS.maxPressNs;
  const rawMaxPress = value["maxPressNs"];
  if (isPositiveNumber(rawMaxPress)) {
    maxPressNs = createDurationNs(rawMaxPress);
  } else if (rawMaxPress !== undefined) {
    console.warn("Invalid maxPressNs:", rawMaxPress);
  }

  return { maxPressNs, slopRadius, windowNs };
}

export function resolveReducerSettings(partial: unknown): ReducerSettings {
  if (partial === undefined) return DEFAULT_REDUCER_SETTINGS;
  if (!isRecord(partial)) {
    console.warn("Invalid reducer settings:", partial);
    return DEFAULT_REDUCER_SETTINGS;
  }
  return {
    scaleFactor: coerceScaleFactor(partial["scaleFactor"]),
    tap: coerceTapSettings(partial["tap"]),
  };
}
