// Modifier keys held while an event was produced, packed into a bitset

declare const ModifiersBrand: unique symbol;
export type Modifiers = number & { readonly [ModifiersBrand]: true };

export type ModifierKey = "shift" | "control" | "alt" | "meta";

const MODIFIER_BITS: Readonly<Record<ModifierKey, number>> = {
  alt: 1 << 2,
  control: 1 << 1,
  meta: 1 << 3,
  shift: 1 << 0,
};

const ALL_BITS = 0b1111;

export const ALL_MODIFIER_KEYS: ReadonlyArray<ModifierKey> = [
  "shift",
  "control",
  "alt",
  "meta",
] as const;

export function createModifiers(bits: number): Modifiers {
  if (!Number.isInteger(bits) || bits < 0 || (bits & ~ALL_BITS) !== 0) {
    throw new Error("Modifiers must be a combination of known modifier bits");
  }
  return bits as Modifiers;
}

export function isModifiers(n: unknown): n is Modifiers {
  return (
    typeof n === "number" &&
    Number.isInteger(n) &&
    n >= 0 &&
    (n & ~ALL_BITS) === 0
  );
}

export const NO_MODIFIERS: Modifiers = createModifiers(0);

export function modifiersFrom(
  keys: Readonly<Partial<Record<ModifierKey, boolean>>>,
): Modifiers {
  let bits = 0;
  for (const key of ALL_MODIFIER_KEYS) {
    if (keys[key] === true) bits |= MODIFIER_BITS[key];
  }
  return createModifiers(bits);
}

export function hasModifier(modifiers: Modifiers, key: ModifierKey): boolean {
  return (modifiers & MODIFIER_BITS[key]) !== 0;
}
