export {
  AbilityEngine,
  type AbilityActivationRejectReason,
  type AbilityActivationResult,
  type AbilityEngineOptions,
} from "./ability-engine";
export type {
  AbilityActivatedEvent,
  AbilityEvent,
  AbilityEventListener,
  AttackResolvedEvent,
  SelectionCancelledEvent,
  TargetRejectedEvent,
  TargetSelectedEvent,
} from "./ability-events";
export { ABILITY_SCRIPTS, registerDefaultAbilities } from "./ability-scripts";
export {
  CombatResolver,
  type AttackRequest,
  type AttackResolution,
  type CombatantLookup,
} from "./combat-resolver";
export { applyResourceDelta } from "./effects";
export { ATTACK_TARGET, CREATE_EXPLOSION, createStunGrenadeScript } from "./stun-grenade";
export { Targeter, type TargeterWorld } from "./targeter";
export type {
  AbilityActivationContext,
  AbilityContext,
  AbilityHost,
  AbilityScript,
} from "./types";
