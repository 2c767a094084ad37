export { WindowEventReducer } from "./reducer/window-event-reducer";
export type {
  ReducerSettingsInput,
  UiEvent,
  WindowEventReducerOptions,
} from "./reducer/types";

export { TapCounter } from "./tap/counter";
export type { TapMachineState, TapState } from "./tap/machine";

export {
  DEFAULT_REDUCER_SETTINGS,
  DEFAULT_TAP_SETTINGS,
  resolveReducerSettings,
  type ReducerSettings,
  type TapSettings,
} from "./config/settings";

export * from "./pointer/buttons";
export * from "./pointer/event";
export * from "./pointer/types";
export * from "./keyboard/modifiers";
export type * from "./keyboard/types";
export type * from "./window/types";
export * from "./types/brands";
export * from "./types/timestamp";
