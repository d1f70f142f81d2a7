import type { EffectColor, EffectState } from "@skirmish/shared";
import type { Logger } from "@skirmish/shared-servers";
import type { AbilityContext } from "../combat/types";
import type { CallbackRegistry } from "./callback-registry";
import type { EffectHandle } from "./effect-handle";

export type EffectLifecycle = "pending" | "active" | "complete";

export type CallbackTrigger =
  | { type: "on_complete" }
  | { type: "on_update"; offsetMs: number };

/** Context handed to a handler when its callback fires. */
export interface CallbackContext extends AbilityContext {
  effect: EffectHandle;
  firedAtMs: number;
}

export interface CallbackHandler {
  invoke(context: CallbackContext): void;
}

/** What a stage asks for when it attaches a callback to an effect. */
export interface CallbackRequest {
  handlerId: string;
  context: AbilityContext;
}

export interface ScheduledCallback {
  trigger: CallbackTrigger;
  handlerId: string;
  handler: CallbackHandler;
  context: AbilityContext;
  fireAtMs: number;
  sequence: number;
}

/** Visual parameters mirrored into the synced effect state. */
export interface EffectVisual {
  x: number;
  y: number;
  velocityX?: number;
  velocityY?: number;
  particleWidth?: number;
  particleHeight?: number;
  driftX?: number;
  driftY?: number;
  color?: EffectColor;
}

export interface EffectParams {
  ownerId: string;
  template: string;
  durationMs: number;
  visual?: EffectVisual;
}

/** Scheduler services an effect handle calls back into. */
export interface EffectBinding {
  readonly registry: CallbackRegistry;
  readonly logger: Logger;
  track(effect: EffectHandle): void;
  release(effect: EffectHandle): void;
}

/** Destination for live effect state, usually the zone's synced map. */
export interface SyncedEffectMap {
  set(effectId: string, state: EffectState): unknown;
  delete(effectId: string): unknown;
}
