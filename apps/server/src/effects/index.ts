export { CallbackRegistry, callbackKey } from "./callback-registry";
export { EffectHandle } from "./effect-handle";
export { EffectScheduler, type EffectSchedulerOptions } from "./effect-scheduler";
export type {
  CallbackContext,
  CallbackHandler,
  CallbackRequest,
  CallbackTrigger,
  EffectLifecycle,
  EffectParams,
  EffectVisual,
  ScheduledCallback,
  SyncedEffectMap,
} from "./types";
