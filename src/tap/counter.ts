import { interpret } from "robot3";

import { DEFAULT_TAP_SETTINGS, type TapSettings } from "../config/settings";
import { withCount } from "../pointer/event";

import {
  createDefaultTapContext,
  createTapMachine,
  type TapContext,
  type TapEvent,
  type TapMachine,
  type TapMachineState,
  type TapState,
} from "./machine";

import type { PointerEvent } from "../pointer/types";
import type { TapCount } from "../types/brands";
import type { Service } from "robot3";

type TapService = Service<TapMachine>;

/*
 * TAP COUNTER - thin wrapper around the robot3 tap machine
 *
 * Translates pointer events into machine events, then stamps the count the
 * machine resolved onto a fresh copy of the pointer event.
 */
export class TapCounter {
  private service: TapService;
  private currentStateName: TapMachineState;

  constructor(settings: TapSettings = DEFAULT_TAP_SETTINGS) {
    this.currentStateName = "idle";
    this.service = this.createService(createDefaultTapContext(settings));
  }

  /**
   * Attach a repeat count to `event`. Down, Up and Move come back with a
   * counted state; Cancel and Leave forget the pointer's clusters; Enter
   * and Scroll pass through.
   */
  attachCount(event: PointerEvent): PointerEvent {
    switch (event.type) {
      case "down": {
        const count = this.send({
          pointerId: event.pointer.pointerId,
          time: event.state.time,
          type: "DOWN",
          x: event.state.position.x,
          y: event.state.position.y,
        });
        if (count === undefined) return event;
        return { ...event, state: withCount(event.state, count) };
      }
      case "up": {
        const count = this.send({
          pointerId: event.pointer.pointerId,
          time: event.state.time,
          type: "UP",
        });
        if (count === undefined) return event;
        return { ...event, state: withCount(event.state, count) };
      }
      case "move": {
        const count = this.send({
          pointerId: event.pointer.pointerId,
          type: "MOVE",
        });
        if (count === undefined) return event;
        return {
          ...event,
          coalesced: event.coalesced.map((state) => withCount(state, count)),
          current: withCount(event.current, count),
          predicted: event.predicted.map((state) => withCount(state, count)),
        };
      }
      case "cancel":
      case "leave":
        this.send({ pointerId: event.pointer.pointerId, type: "FORGET" });
        return event;
      case "enter":
      case "scroll":
        return event;
    }
  }

  updateSettings(settings: TapSettings): void {
    this.send({ settings, type: "UPDATE_CONFIG" });
  }

  getState(): { state: TapMachineState; taps: ReadonlyArray<TapState> } {
    return {
      state: this.currentStateName,
      taps: [...this.service.context.taps],
    };
  }

  /** Forget every cluster, keeping the current settings. */
  reset(): void {
    const { settings } = this.service.context;
    this.currentStateName = "idle";
    this.service = this.createService(createDefaultTapContext(settings));
  }

  private send(event: TapEvent): TapCount | undefined {
    this.service.send(event);
    return this.service.context.lastCount;
  }

  private createService(context: TapContext): TapService {
    return interpret(createTapMachine(context), (service) => {
      this.currentStateName = service.machine.state.name;
    });
  }
}
