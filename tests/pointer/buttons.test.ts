import { describe, it, expect } from "@jest/globals";

import {
  NO_BUTTONS,
  POINTER_BUTTON,
  createPointerButton,
  hasButton,
  isPointerButton,
  withButton,
  withoutButton,
} from "@/pointer/buttons";

describe("pointer buttons", () => {
  it("validates button indices", () => {
    expect(createPointerButton(31)).toBe(31);
    expect(() => createPointerButton(32)).toThrow(
      "PointerButton must be an integer from 0 to 31",
    );
    expect(isPointerButton(0)).toBe(true);
    expect(isPointerButton(-1)).toBe(false);
    expect(isPointerButton(2.5)).toBe(false);
  });

  it("adds and removes buttons without touching the original set", () => {
    const primary = withButton(NO_BUTTONS, POINTER_BUTTON.primary);
    const both = withButton(primary, POINTER_BUTTON.secondary);

    expect(primary).toBe(1);
    expect(both).toBe(3);
    expect(withoutButton(both, POINTER_BUTTON.primary)).toBe(2);
    expect(withButton(both, POINTER_BUTTON.primary)).toBe(3);
    expect(hasButton(both, POINTER_BUTTON.secondary)).toBe(true);
    expect(hasButton(both, POINTER_BUTTON.auxiliary)).toBe(false);
  });

  it("keeps the highest button as an unsigned bit", () => {
    const b32 = createPointerButton(31);
    const set = withButton(NO_BUTTONS, b32);

    expect(set).toBe(2 ** 31);
    expect(hasButton(set, b32)).toBe(true);
    expect(withoutButton(set, b32)).toBe(0);
  });
});
