import type { KeyboardEvent } from "../keyboard/types";
import type { PointerEvent } from "../pointer/types";
import type { Clock } from "../types/timestamp";

/** Normalized result of one raw window event; `undefined` means irrelevant. */
export type UiEvent =
  | Readonly<{ kind: "keyboard"; event: KeyboardEvent }>
  | Readonly<{ kind: "pointer"; event: PointerEvent }>;

/** Plain-number settings as a host would pass them; validated on construction. */
export type ReducerSettingsInput = Partial<{
  scaleFactor: number;
  tap: Partial<{
    slopRadius: number;
    windowNs: number;
    maxPressNs: number;
  }>;
}>;

export type WindowEventReducerOptions = Readonly<{
  settings?: ReducerSettingsInput;
  /** Milliseconds, monotonic. Defaults to `performance.now`. */
  clock?: Clock;
}>;
