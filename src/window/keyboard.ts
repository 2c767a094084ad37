import { modifiersFrom, type Modifiers } from "../keyboard/modifiers";

import type { KeyboardEvent } from "../keyboard/types";
import type { ModifiersState, RawKeyEvent } from "./types";

export function fromModifiersState(state: ModifiersState): Modifiers {
  return modifiersFrom({
    alt: state.alt,
    control: state.control,
    meta: state.super,
    shift: state.shift,
  });
}

/** Key mapping already happened upstream; this only reshapes and attaches modifiers. */
export function fromRawKeyEvent(
  event: RawKeyEvent,
  modifiers: Modifiers,
): KeyboardEvent {
  return {
    code: event.physicalKey,
    isComposing: false,
    key: event.logicalKey,
    location: event.location,
    modifiers,
    repeat: event.repeat,
    state: event.state === "pressed" ? "down" : "up",
  };
}
