// Pointer buttons and the immutable set of currently held buttons

/** Bit index of a button, 0 (primary) through 31 (b32). */
declare const PointerButtonBrand: unique symbol;
export type PointerButton = number & { readonly [PointerButtonBrand]: true };

/** 32-bit set of held buttons. */
declare const PointerButtonsBrand: unique symbol;
export type PointerButtons = number & { readonly [PointerButtonsBrand]: true };

export type NamedPointerButton =
  | "primary"
  | "secondary"
  | "auxiliary"
  | "x1"
  | "x2"
  | "penEraser";

export const MAX_POINTER_BUTTON = 31;

export function createPointerButton(index: number): PointerButton {
  if (!Number.isInteger(index) || index < 0 || index > MAX_POINTER_BUTTON) {
    throw new Error(
      `PointerButton must be an integer from 0 to ${MAX_POINTER_BUTTON}`,
    );
  }
  return index as PointerButton;
}

export function isPointerButton(n: unknown): n is PointerButton {
  return (
    typeof n === "number" &&
    Number.isInteger(n) &&
    n >= 0 &&
    n <= MAX_POINTER_BUTTON
  );
}

export const POINTER_BUTTON: Readonly<Record<NamedPointerButton, PointerButton>> =
  {
    auxiliary: createPointerButton(2),
    penEraser: createPointerButton(5),
    primary: createPointerButton(0),
    secondary: createPointerButton(1),
    x1: createPointerButton(3),
    x2: createPointerButton(4),
  };

export const NO_BUTTONS: PointerButtons = 0 as PointerButtons;

function bitOf(button: PointerButton): number {
  return (1 << button) >>> 0;
}

export function withButton(
  set: PointerButtons,
  button: PointerButton,
): PointerButtons {
  return ((set | bitOf(button)) >>> 0) as PointerButtons;
}

export function withoutButton(
  set: PointerButtons,
  button: PointerButton,
): PointerButtons {
  return ((set & ~bitOf(button)) >>> 0) as PointerButtons;
}

export function hasButton(set: PointerButtons, button: PointerButton): boolean {
  return (set & bitOf(button)) !== 0;
}
