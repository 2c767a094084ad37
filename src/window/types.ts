/**
 * Raw window events as the host windowing layer delivers them. Positions
 * and pixel deltas are physical pixels; nothing here is normalized yet.
 */

export type ElementState = "pressed" | "released";

export type PhysicalPosition = Readonly<{ x: number; y: number }>;

export type RawMouseButton =
  | "left"
  | "right"
  | "middle"
  | "back"
  | "forward"
  | Readonly<{ other: number }>;

export type MouseScrollDelta =
  | Readonly<{ kind: "line"; x: number; y: number }>
  | Readonly<{ kind: "pixel"; x: number; y: number }>;

export type TouchPhase = "started" | "moved" | "ended" | "cancelled";

export type Force =
  | Readonly<{
      kind: "calibrated";
      force: number;
      maxPossibleForce: number;
      altitudeAngle: number | undefined;
    }>
  | Readonly<{ kind: "normalized"; value: number }>;

export type Touch = Readonly<{
  phase: TouchPhase;
  location: PhysicalPosition;
  force: Force | undefined;
  /** Platform contact id, unique among simultaneous contacts. */
  id: number;
}>;

/** Modifier flags in the platform's own naming. */
export type ModifiersState = Readonly<{
  shift: boolean;
  control: boolean;
  alt: boolean;
  super: boolean;
}>;

export type RawKeyLocation = "standard" | "left" | "right" | "numpad";

export type RawKeyEvent = Readonly<{
  logicalKey: string;
  physicalKey: string;
  location: RawKeyLocation;
  state: ElementState;
  repeat: boolean;
  text: string | undefined;
}>;

export type WindowEvent =
  | { type: "modifiersChanged"; modifiers: ModifiersState }
  | { type: "keyboardInput"; event: RawKeyEvent; isSynthetic: boolean }
  | { type: "cursorEntered" }
  | { type: "cursorLeft" }
  | { type: "cursorMoved"; position: PhysicalPosition }
  | { type: "mouseInput"; state: ElementState; button: RawMouseButton }
  | { type: "mouseWheel"; delta: MouseScrollDelta }
  | { type: "touch"; touch: Touch }
  | { type: "scaleFactorChanged"; scaleFactor: number }
  | { type: "resized"; width: number; height: number }
  | { type: "moved"; position: PhysicalPosition }
  | { type: "focused"; focused: boolean }
  | { type: "occluded"; occluded: boolean }
  | { type: "closeRequested" }
  | { type: "redrawRequested" }
  | { type: "destroyed" };

export type WindowEventType = WindowEvent["type"];
