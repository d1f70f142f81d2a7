import type {
  AbilityDefinition,
  TargetSelection,
  TargetSet,
} from "@skirmish/shared";
import type { EffectScheduler } from "../effects/effect-scheduler";
import type { CallbackHandler } from "../effects/types";
import type { ServerActor } from "../world/entities/server-actor";
import type { AttackRequest, AttackResolution } from "./combat-resolver";

/** Capabilities an ability script may use; supplied by the engine. */
export interface AbilityHost {
  readonly effects: EffectScheduler;
  getActor(actorId: string): ServerActor | undefined;
  isActorValid(actorId: string): boolean;
  /** Build and activate the free-point targeter described by the ability. */
  openTargeter(context: AbilityActivationContext): TargetSelection;
  resolveAttack(request: AttackRequest): AttackResolution;
}

/** Explicit per-activation context threaded through every stage. */
export interface AbilityActivationContext {
  casterId: string;
  ability: AbilityDefinition;
  host: AbilityHost;
}

export interface AbilityContext extends AbilityActivationContext {
  targets: TargetSet;
}

/**
 * Hooks the engine calls by name, plus the named callback handlers the
 * script's effects refer to.
 */
export interface AbilityScript {
  onActivate(context: AbilityActivationContext): void;
  onTargetSelect(context: AbilityContext): void;
  readonly handlers: Readonly<Record<string, CallbackHandler>>;
}
