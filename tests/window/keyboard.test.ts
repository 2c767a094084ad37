import { describe, it, expect } from "@jest/globals";

import { NO_MODIFIERS } from "@/keyboard/modifiers";
import { fromModifiersState, fromRawKeyEvent } from "@/window/keyboard";

describe("window keyboard translation", () => {
  it("maps super to meta", () => {
    expect(
      fromModifiersState({
        alt: false,
        control: false,
        shift: false,
        super: true,
      }),
    ).toBe(8);
    expect(
      fromModifiersState({
        alt: true,
        control: true,
        shift: true,
        super: true,
      }),
    ).toBe(15);
  });

  it("reshapes a raw key event", () => {
    expect(
      fromRawKeyEvent(
        {
          location: "left",
          logicalKey: "Shift",
          physicalKey: "ShiftLeft",
          repeat: false,
          state: "released",
          text: undefined,
        },
        NO_MODIFIERS,
      ),
    ).toEqual({
      code: "ShiftLeft",
      isComposing: false,
      key: "Shift",
      location: "left",
      modifiers: 0,
      repeat: false,
      state: "up",
    });
  });
});
