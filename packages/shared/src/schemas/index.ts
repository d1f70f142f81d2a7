export { ActorState } from "./actor-state";
export { EffectState } from "./effect-state";
export { ZoneState } from "./zone-state";
