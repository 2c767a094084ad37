import {
  coerceScaleFactor,
  coerceTapSettings,
  resolveReducerSettings,
} from "../config/settings";
import { NO_MODIFIERS, type Modifiers } from "../keyboard/modifiers";
import { NO_BUTTONS, withButton, withoutButton } from "../pointer/buttons";
import { PRIMARY_MOUSE, createPointerState } from "../pointer/event";
import { TapCounter } from "../tap/counter";
import {
  DEFAULT_SCALE_FACTOR,
  NO_TAP_COUNT,
  type ScaleFactor,
} from "../types/brands";
import {
  ZERO_TIMESTAMP,
  maxTimestamp,
  performanceClock,
  sinceEpoch,
  type Clock,
  type Timestamp,
} from "../types/timestamp";
import { fromModifiersState, fromRawKeyEvent } from "../window/keyboard";
import {
  toLogical,
  touchPointerId,
  touchPressure,
  tryFromRawButton,
} from "../window/pointer";

import type {
  ReducerSettingsInput,
  UiEvent,
  WindowEventReducerOptions,
} from "./types";
import type {
  PointerEvent,
  PointerInfo,
  PointerState,
  ScrollDelta,
} from "../pointer/types";
import type { TapMachineState, TapState } from "../tap/machine";
import type {
  ElementState,
  MouseScrollDelta,
  RawMouseButton,
  Touch,
  WindowEvent,
} from "../window/types";

const pointer = (event: PointerEvent): UiEvent => ({ event, kind: "pointer" });

/**
 * Stateful translator from raw window events to normalized pointer and
 * keyboard events.
 *
 * Keep one instance per window and feed it that window's events in the
 * order they arrive. Tracks modifiers, the primary mouse pointer (position,
 * held buttons), the scale factor and a reducer-local clock, and runs every
 * pointer event through a {@link TapCounter}.
 */
export class WindowEventReducer {
  private modifiers: Modifiers = NO_MODIFIERS;
  private primaryState: PointerState = createPointerState(NO_MODIFIERS);
  private scaleFactor: ScaleFactor | undefined;
  private firstInstant: number | undefined;
  private lastTime: Timestamp = ZERO_TIMESTAMP;
  private readonly counter: TapCounter;
  private readonly clock: Clock;

  constructor(options: WindowEventReducerOptions = {}) {
    const settings = resolveReducerSettings(options.settings);
    this.scaleFactor = settings.scaleFactor;
    this.counter = new TapCounter(settings.tap);
    this.clock = options.clock ?? performanceClock;
  }

  /** Translate one raw event; `undefined` for events with no normalized form. */
  reduce(event: WindowEvent): UiEvent | undefined {
    const time = this.now();
    this.primaryState = { ...this.primaryState, time };

    switch (event.type) {
      case "modifiersChanged":
        this.modifiers = fromModifiersState(event.modifiers);
        this.primaryState = {
          ...this.primaryState,
          modifiers: this.modifiers,
        };
        return undefined;
      case "keyboardInput":
        return {
          event: fromRawKeyEvent(event.event, this.modifiers),
          kind: "keyboard",
        };
      case "cursorEntered":
        return pointer(
          this.counter.attachCount({ pointer: PRIMARY_MOUSE, type: "enter" }),
        );
      case "cursorLeft":
        return pointer(
          this.counter.attachCount({ pointer: PRIMARY_MOUSE, type: "leave" }),
        );
      case "cursorMoved":
        this.primaryState = {
          ...this.primaryState,
          position: toLogical(event.position, this.currentScaleFactor()),
        };
        return pointer(
          this.counter.attachCount({
            coalesced: [],
            current: this.primaryState,
            pointer: PRIMARY_MOUSE,
            predicted: [],
            type: "move",
          }),
        );
      case "mouseInput":
        return pointer(this.handleMouseInput(event.state, event.button));
      case "mouseWheel":
        return pointer({
          delta: this.toScrollDelta(event.delta),
          pointer: PRIMARY_MOUSE,
          state: this.primaryState,
          type: "scroll",
        });
      case "touch":
        return pointer(this.handleTouch(event.touch, time));
      case "scaleFactorChanged":
        this.setScaleFactor(event.scaleFactor);
        return undefined;
      default:
        return undefined;
    }
  }

  /** Prime the physical-to-logical factor before the window reports one. */
  setScaleFactor(value: number): void {
    const scaleFactor = coerceScaleFactor(value);
    if (scaleFactor !== undefined) this.scaleFactor = scaleFactor;
  }

  getScaleFactor(): number {
    return this.currentScaleFactor();
  }

  getModifiers(): Modifiers {
    return this.modifiers;
  }

  /** Last known state of the mouse cursor. */
  getPrimaryState(): PointerState {
    return { ...this.primaryState };
  }

  getTapState(): { state: TapMachineState; taps: ReadonlyArray<TapState> } {
    return this.counter.getState();
  }

  /** Replace the tap thresholds; omitted fields take their defaults. */
  updateTapSettings(settings: ReducerSettingsInput["tap"]): void {
    this.counter.updateSettings(coerceTapSettings(settings));
  }

  private now(): Timestamp {
    const nowMs = this.clock();
    if (this.firstInstant === undefined) this.firstInstant = nowMs;
    // A clock that steps backwards must not reorder events
    this.lastTime = maxTimestamp(
      this.lastTime,
      sinceEpoch(nowMs, this.firstInstant),
    );
    return this.lastTime;
  }

  private currentScaleFactor(): ScaleFactor {
    return this.scaleFactor ?? DEFAULT_SCALE_FACTOR;
  }

  private handleMouseInput(
    state: ElementState,
    rawButton: RawMouseButton,
  ): PointerEvent {
    const button = tryFromRawButton(rawButton);
    if (button !== undefined) {
      this.primaryState = {
        ...this.primaryState,
        buttons:
          state === "pressed"
            ? withButton(this.primaryState.buttons, button)
            : withoutButton(this.primaryState.buttons, button),
      };
    }
    return this.counter.attachCount({
      button,
      pointer: PRIMARY_MOUSE,
      state: this.primaryState,
      type: state === "pressed" ? "down" : "up",
    });
  }

  private toScrollDelta(delta: MouseScrollDelta): ScrollDelta {
    if (delta.kind === "line") return delta;
    const logical = toLogical(delta, this.currentScaleFactor());
    return { kind: "pixel", x: logical.x, y: logical.y };
  }

  private handleTouch(touch: Touch, time: Timestamp): PointerEvent {
    const info: PointerInfo = {
      persistentDeviceId: undefined,
      pointerId: touchPointerId(touch.id),
      pointerType: "touch",
    };
    const state: PointerState = {
      buttons: NO_BUTTONS,
      count: NO_TAP_COUNT,
      modifiers: this.modifiers,
      position: toLogical(touch.location, this.currentScaleFactor()),
      pressure: touchPressure(touch),
      time,
    };

    switch (touch.phase) {
      case "started":
        return this.counter.attachCount({
          button: undefined,
          pointer: info,
          state,
          type: "down",
        });
      case "moved":
        return this.counter.attachCount({
          coalesced: [],
          current: state,
          pointer: info,
          predicted: [],
          type: "move",
        });
      case "ended":
        return this.counter.attachCount({
          button: undefined,
          pointer: info,
          state,
          type: "up",
        });
      case "cancelled":
        return this.counter.attachCount({ pointer: info, type: "cancel" });
    }
  }
}
