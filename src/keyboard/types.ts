import type { Modifiers } from "./modifiers";

export type KeyState = "down" | "up";

export type KeyLocation = "standard" | "left" | "right" | "numpad";

/**
 * Cross-platform keyboard event. `key` is the logical key value and `code`
 * the physical key code, both as the platform layer already mapped them.
 */
export type KeyboardEvent = Readonly<{
  state: KeyState;
  key: string;
  code: string;
  location: KeyLocation;
  modifiers: Modifiers;
  repeat: boolean;
  isComposing: boolean;
}>;
