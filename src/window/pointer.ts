import {
  MAX_POINTER_BUTTON,
  POINTER_BUTTON,
  createPointerButton,
  type PointerButton,
} from "../pointer/buttons";
import { isPointerId, type Point, type PointerId } from "../pointer/types";
import { clampPressure, type Pressure, type ScaleFactor } from "../types/brands";

import type { PhysicalPosition, RawMouseButton, Touch } from "./types";

// Calibrated force is roughly 0..2 on the platforms that report it
const CALIBRATED_FORCE_SCALE = 0.5;
// Contact present, force not measured
const UNMEASURED_PRESSURE = 0.5;
// Id 1 is the primary mouse; contacts start above it
const TOUCH_POINTER_ID_OFFSET = 2;
// Raw `other` buttons below this overlap the named ones
const FIRST_EXTRA_RAW_BUTTON = 6;

/**
 * Map a raw mouse button onto the semantic button set. Buttons the set
 * cannot represent yield `undefined`.
 */
export function tryFromRawButton(
  button: RawMouseButton,
): PointerButton | undefined {
  switch (button) {
    case "left":
      return POINTER_BUTTON.primary;
    case "right":
      return POINTER_BUTTON.secondary;
    case "middle":
      return POINTER_BUTTON.auxiliary;
    case "back":
      return POINTER_BUTTON.x1;
    case "forward":
      return POINTER_BUTTON.x2;
    default: {
      const { other } = button;
      if (
        !Number.isInteger(other) ||
        other < FIRST_EXTRA_RAW_BUTTON ||
        other > MAX_POINTER_BUTTON
      ) {
        return undefined;
      }
      return createPointerButton(other);
    }
  }
}

export function toLogical(
  position: PhysicalPosition,
  scaleFactor: ScaleFactor,
): Point {
  return { x: position.x / scaleFactor, y: position.y / scaleFactor };
}

export function touchPressure(touch: Touch): Pressure {
  if (touch.phase === "ended" || touch.phase === "cancelled") {
    return clampPressure(0);
  }
  if (touch.force === undefined) return clampPressure(UNMEASURED_PRESSURE);
  switch (touch.force.kind) {
    case "calibrated":
      return clampPressure(touch.force.force * CALIBRATED_FORCE_SCALE);
    case "normalized":
      return clampPressure(touch.force.value);
  }
}

export function touchPointerId(id: number): PointerId | undefined {
  if (!Number.isSafeInteger(id) || id < 0) return undefined;
  const pointerId = id + TOUCH_POINTER_ID_OFFSET;
  return isPointerId(pointerId) ? pointerId : undefined;
}
