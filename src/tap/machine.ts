/*
 * Tap/click cluster state machine, built on robot3.
 *
 * The machine's context holds every active tap cluster. A cluster groups
 * consecutive presses that land close together in space and time; its
 * `count` is the repeat count (2 = double click) stamped on events.
 *
 * robot3 conventions used here:
 * - Context is immutable. Reducers return NEW context objects.
 * - Guards are pure predicates over (context, event).
 * - Several transitions may share an event; the first passing guard wins.
 *
 * STATE FLOW:
 * idle → tracking (on DOWN, a cluster now exists)
 * tracking → tracking (DOWN / UP / MOVE / FORGET that leaves clusters behind)
 * tracking → idle (FORGET that removes the last cluster)
 *
 * A cluster is "pressed" while downTime === upTime, i.e. between its
 * pointer's Down and the matching Up.
 */

import { createMachine, state, transition, guard, reduce } from "robot3";

import { DEFAULT_TAP_SETTINGS, type TapSettings } from "../config/settings";
import {
  createTapCount,
  incrementTapCount,
  type TapCount,
} from "../types/brands";

import type { PointerId } from "../pointer/types";
import type { Timestamp } from "../types/timestamp";
import type { Machine, MachineState, MachineStates } from "robot3";

export type TapMachineState = "idle" | "tracking";

export type TapState = Readonly<{
  /** Last pointer associated with the cluster. */
  pointerId: PointerId | undefined;
  downTime: Timestamp;
  /** Equals `downTime` while the pointer is still pressed. */
  upTime: Timestamp;
  count: TapCount;
  /** Logical position of the most recent Down that joined the cluster. */
  x: number;
  y: number;
}>;

export type TapContext = Readonly<{
  taps: ReadonlyArray<TapState>;
  settings: TapSettings;
  /** Count resolved by the last event, `undefined` when it matched no cluster. */
  lastCount: TapCount | undefined;
}>;

export type TapEvent =
  | {
      type: "DOWN";
      pointerId: PointerId | undefined;
      time: Timestamp;
      x: number;
      y: number;
    }
  | { type: "UP"; pointerId: PointerId | undefined; time: Timestamp }
  | { type: "MOVE"; pointerId: PointerId | undefined }
  | { type: "FORGET"; pointerId: PointerId | undefined }
  | { type: "UPDATE_CONFIG"; settings: TapSettings };

type TapEventType = TapEvent["type"];

export const isPressed = (tap: TapState): boolean =>
  tap.downTime === tap.upTime;

const withinSlop = (
  tap: TapState,
  x: number,
  y: number,
  settings: TapSettings,
): boolean => {
  const dx = tap.x - x;
  const dy = tap.y - y;
  return Math.sqrt(dx * dx + dy * dy) < settings.slopRadius;
};

const withinWindow = (
  tap: TapState,
  time: Timestamp,
  settings: TapSettings,
): boolean => tap.upTime + settings.windowNs > time;

/** Released and idle past the window, or held past `maxPressNs` when set. */
export const isExpired = (
  tap: TapState,
  reference: Timestamp,
  settings: TapSettings,
): boolean => {
  if (!isPressed(tap)) {
    return tap.upTime + settings.windowNs <= reference;
  }
  return (
    settings.maxPressNs !== undefined &&
    tap.downTime + settings.maxPressNs <= reference
  );
};

export const clearExpired = (
  taps: ReadonlyArray<TapState>,
  reference: Timestamp,
  settings: TapSettings,
): ReadonlyArray<TapState> =>
  taps.filter((tap) => !isExpired(tap, reference, settings));

// The pressed cluster of a pointer, else its oldest cluster
const findPointerTapIndex = (
  taps: ReadonlyArray<TapState>,
  pointerId: PointerId | undefined,
): number => {
  const pressed = taps.findIndex(
    (tap) => tap.pointerId === pointerId && isPressed(tap),
  );
  if (pressed !== -1) return pressed;
  return taps.findIndex((tap) => tap.pointerId === pointerId);
};

/*
 * GUARDS
 */

// Guard: FORGET would leave no cluster behind
const forgetsEveryTap = (ctx: TapContext, event: TapEvent): boolean =>
  event.type === "FORGET" &&
  ctx.taps.every((tap) => tap.pointerId === event.pointerId);

/*
 * REDUCERS - return new context, never mutate
 */

// Reducer: join the first matching cluster or open a new one, then purge
export const registerDown = (ctx: TapContext, event: TapEvent): TapContext => {
  if (event.type !== "DOWN") return ctx;
  const { settings } = ctx;

  const matched = ctx.taps.findIndex(
    (tap) =>
      withinSlop(tap, event.x, event.y, settings) &&
      withinWindow(tap, event.time, settings),
  );

  const previous = ctx.taps[matched];
  const joined: TapState = {
    count:
      previous === undefined
        ? createTapCount(1)
        : incrementTapCount(previous.count),
    downTime: event.time,
    pointerId: event.pointerId,
    upTime: event.time,
    x: event.x,
    y: event.y,
  };

  // A pointer has one press session at a time; an older one lost its Up.
  // Contacts without an id cannot be told apart, so none is evicted.
  const evicts = (tap: TapState): boolean =>
    event.pointerId !== undefined &&
    tap.pointerId === event.pointerId &&
    isPressed(tap);
  const taps: Array<TapState> = [];
  ctx.taps.forEach((tap, index) => {
    if (index === matched) {
      taps.push(joined);
    } else if (!evicts(tap)) {
      taps.push(tap);
    }
  });
  if (previous === undefined) taps.push(joined);

  return {
    ...ctx,
    lastCount: joined.count,
    taps: clearExpired(taps, event.time, settings),
  };
};

// Reducer: close the pointer's cluster and report its count
export const registerUp = (ctx: TapContext, event: TapEvent): TapContext => {
  if (event.type !== "UP") return ctx;
  const index = findPointerTapIndex(ctx.taps, event.pointerId);
  const tap = ctx.taps[index];
  if (tap === undefined) {
    return { ...ctx, lastCount: undefined };
  }
  const closed: TapState = { ...tap, upTime: event.time };
  return {
    ...ctx,
    lastCount: closed.count,
    taps: ctx.taps.map((existing, i) => (i === index ? closed : existing)),
  };
};

// Reducer: report the count of the pointer's open press session, if any
export const lookupMove = (ctx: TapContext, event: TapEvent): TapContext => {
  if (event.type !== "MOVE") return ctx;
  const tap = ctx.taps.find(
    (candidate) =>
      candidate.pointerId === event.pointerId && isPressed(candidate),
  );
  return { ...ctx, lastCount: tap?.count };
};

// Reducer: drop every cluster of a cancelled or departed pointer
export const forgetPointer = (ctx: TapContext, event: TapEvent): TapContext => {
  if (event.type !== "FORGET") return ctx;
  return {
    ...ctx,
    lastCount: undefined,
    taps: ctx.taps.filter((tap) => tap.pointerId !== event.pointerId),
  };
};

// Reducer: swap thresholds; existing clusters are judged by the new ones
export const updateConfig = (ctx: TapContext, event: TapEvent): TapContext => {
  if (event.type !== "UPDATE_CONFIG") return ctx;
  return { ...ctx, settings: event.settings };
};

/*
 * STATE BUILDERS
 */

const createIdleState = (): MachineState<TapEventType> =>
  state(
    transition("DOWN", "tracking", reduce(registerDown)),
    transition("UP", "idle", reduce(registerUp)),
    transition("MOVE", "idle", reduce(lookupMove)),
    transition("FORGET", "idle", reduce(forgetPointer)),
    transition("UPDATE_CONFIG", "idle", reduce(updateConfig)),
  );

const createTrackingState = (): MachineState<TapEventType> =>
  state(
    transition("DOWN", "tracking", reduce(registerDown)),
    transition("UP", "tracking", reduce(registerUp)),
    transition("MOVE", "tracking", reduce(lookupMove)),
    transition(
      "FORGET",
      "idle",
      guard(forgetsEveryTap),
      reduce(forgetPointer),
    ),
    transition("FORGET", "tracking", reduce(forgetPointer)),
    transition("UPDATE_CONFIG", "tracking", reduce(updateConfig)),
  );

type TapStatesObject = Record<TapMachineState, MachineState<TapEventType>>;
export type TapMachine = Machine<
  TapStatesObject,
  TapContext,
  TapMachineState,
  TapEventType
>;

export const createDefaultTapContext = (
  settings: TapSettings = DEFAULT_TAP_SETTINGS,
): TapContext => ({
  lastCount: undefined,
  settings,
  taps: [],
});

export const createTapMachine = (initialContext: TapContext): TapMachine => {
  const states = {
    idle: createIdleState(),
    tracking: createTrackingState(),
  } as const;

  // robot3 widens the event type to `string`; narrow it back at this boundary
  return createMachine(
    "idle" as const,
    states as unknown as MachineStates<TapStatesObject, TapEventType>,
    (_ctx: TapContext): TapContext => initialContext,
  ) as unknown as TapMachine;
};
