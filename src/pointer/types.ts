import type { PointerButton, PointerButtons } from "./buttons";
import type { Modifiers } from "../keyboard/modifiers";
import type { Pressure, TapCount } from "../types/brands";
import type { Timestamp } from "../types/timestamp";

/** Stable handle for one contact or device interaction. Always >= 1. */
declare const PointerIdBrand: unique symbol;
export type PointerId = number & { readonly [PointerIdBrand]: true };

export function createPointerId(value: number): PointerId {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new Error("PointerId must be a positive safe integer");
  }
  return value as PointerId;
}

export function isPointerId(n: unknown): n is PointerId {
  return typeof n === "number" && Number.isSafeInteger(n) && n >= 1;
}

/** The synthetic pointer standing for the system mouse cursor. */
export const PRIMARY_POINTER_ID: PointerId = createPointerId(1);

export type PointerType = "mouse" | "touch" | "pen" | "unknown";

export type PointerInfo = Readonly<{
  pointerId: PointerId | undefined;
  /** Stable hardware identifier; platform translation never fills it yet. */
  persistentDeviceId: number | undefined;
  pointerType: PointerType;
}>;

/** Logical-pixel position. */
export type Point = Readonly<{ x: number; y: number }>;

export type PointerState = Readonly<{
  time: Timestamp;
  position: Point;
  modifiers: Modifiers;
  buttons: PointerButtons;
  pressure: Pressure;
  count: TapCount;
}>;

export type ScrollDelta =
  | Readonly<{ kind: "line"; x: number; y: number }>
  | Readonly<{ kind: "pixel"; x: number; y: number }>;

export type PointerButtonUpdate = Readonly<{
  pointer: PointerInfo;
  button: PointerButton | undefined;
  state: PointerState;
}>;

export type PointerUpdate = Readonly<{
  pointer: PointerInfo;
  current: PointerState;
  coalesced: ReadonlyArray<PointerState>;
  predicted: ReadonlyArray<PointerState>;
}>;

export type PointerScrollUpdate = Readonly<{
  pointer: PointerInfo;
  delta: ScrollDelta;
  state: PointerState;
}>;

export type PointerEvent =
  | ({ type: "down" } & PointerButtonUpdate)
  | ({ type: "up" } & PointerButtonUpdate)
  | ({ type: "move" } & PointerUpdate)
  | { type: "cancel"; pointer: PointerInfo }
  | { type: "enter"; pointer: PointerInfo }
  | { type: "leave"; pointer: PointerInfo }
  | ({ type: "scroll" } & PointerScrollUpdate);

export type PointerEventType = PointerEvent["type"];
