import { NO_TAP_COUNT, clampPressure, type TapCount } from "../types/brands";
import { ZERO_TIMESTAMP } from "../types/timestamp";

import { NO_BUTTONS } from "./buttons";
import { PRIMARY_POINTER_ID } from "./types";

import type { PointerInfo, PointerState } from "./types";
import type { Modifiers } from "../keyboard/modifiers";

export const PRIMARY_MOUSE: PointerInfo = {
  persistentDeviceId: undefined,
  pointerId: PRIMARY_POINTER_ID,
  pointerType: "mouse",
};

/** Idle state: origin, no buttons, no pressure, uncounted. */
export function createPointerState(modifiers: Modifiers): PointerState {
  return {
    buttons: NO_BUTTONS,
    count: NO_TAP_COUNT,
    modifiers,
    position: { x: 0, y: 0 },
    pressure: clampPressure(0),
    time: ZERO_TIMESTAMP,
  };
}

export function withCount(state: PointerState, count: TapCount): PointerState {
  return { ...state, count };
}
