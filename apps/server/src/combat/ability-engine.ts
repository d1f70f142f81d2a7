import {
  ConfigurationError,
  resolveTargeterConfig,
  validateAbilityDefinition,
  type AbilityDefinition,
  type Point,
  type SelectionCancelReason,
  type TargetSelection,
} from "@skirmish/shared";
import {
  logger as defaultLogger,
  type CombatCheck,
  type Logger,
} from "@skirmish/shared-servers";
import { CallbackRegistry } from "../effects/callback-registry";
import { EffectScheduler } from "../effects/effect-scheduler";
import type { ServerActor } from "../world/entities/server-actor";
import type { ServerZone } from "../world/zones/zone";
import type { AbilityEvent, AbilityEventListener } from "./ability-events";
import {
  CombatResolver,
  type AttackRequest,
  type AttackResolution,
} from "./combat-resolver";
import { Targeter } from "./targeter";
import type {
  AbilityActivationContext,
  AbilityContext,
  AbilityHost,
  AbilityScript,
} from "./types";

export interface AbilityEngineOptions {
  combatCheck: CombatCheck;
  logger?: Logger;
}

export type AbilityActivationRejectReason = "unknown_ability" | "invalid_caster";

export type AbilityActivationResult =
  | { accepted: false; reason: AbilityActivationRejectReason }
  | { accepted: true; targeterOpen: boolean };

interface RegisteredAbility {
  definition: AbilityDefinition;
  script: AbilityScript;
}

/**
 * Server-side engine that runs ability scripts: opens targeters, hands
 * selected targets to the script, drives the effect scheduler from the
 * zone tick, and resolves the attacks scripts request.
 */
export class AbilityEngine implements AbilityHost {
  readonly registry = new CallbackRegistry();
  readonly effects: EffectScheduler;
  private readonly combat: CombatResolver;
  private readonly abilities = new Map<string, RegisteredAbility>();
  private readonly targeters = new Map<string, Targeter>();
  private readonly listeners: AbilityEventListener[] = [];
  private readonly log: Logger;

  constructor(
    private readonly zone: ServerZone,
    options: AbilityEngineOptions,
  ) {
    this.log = options.logger ?? defaultLogger;
    this.effects = new EffectScheduler({
      registry: this.registry,
      logger: this.log,
      syncedEffects: zone.zoneState.effects,
    });
    this.combat = new CombatResolver(zone, options.combatCheck, this.log);
  }

  /**
   * Validate a definition and register its script's handlers. Authoring
   * mistakes throw here, before anything can be scheduled.
   */
  registerAbility(definition: AbilityDefinition, script: AbilityScript): void {
    validateAbilityDefinition(definition);
    if (this.abilities.has(definition.id)) {
      throw new ConfigurationError(`Ability '${definition.id}' is already registered`);
    }
    for (const [handlerId, handler] of Object.entries(script.handlers)) {
      this.registry.register(definition.id, handlerId, handler);
    }
    this.abilities.set(definition.id, { definition, script });
  }

  /** Register an ability event listener; duplicate listeners are ignored. */
  addEventListener(listener: AbilityEventListener): void {
    if (this.listeners.includes(listener)) {
      return;
    }
    this.listeners.push(listener);
  }

  /** Remove a previously registered ability event listener. */
  removeEventListener(listener: AbilityEventListener): void {
    for (let i = this.listeners.length - 1; i >= 0; i -= 1) {
      if (this.listeners[i] === listener) {
        this.listeners.splice(i, 1);
      }
    }
  }

  /** Run the ability's `on_activate` hook for a caster. */
  activate(casterId: string, abilityId: string): AbilityActivationResult {
    const registered = this.abilities.get(abilityId);
    if (!registered) {
      return { accepted: false, reason: "unknown_ability" };
    }
    if (!this.zone.isActorValid(casterId)) {
      return { accepted: false, reason: "invalid_caster" };
    }

    this.closeTargeter(casterId, "cancelled");
    this.log.debug({ abilityId, casterId }, "Activating ability");
    this.emit({ type: "ability_activated", abilityId, casterId });

    registered.script.onActivate({
      casterId,
      ability: registered.definition,
      host: this,
    });
    return { accepted: true, targeterOpen: this.targeters.has(casterId) };
  }

  /**
   * Offer a point to the caster's open targeter. Returns null when no
   * targeter is open. A valid point closes the targeter and runs the
   * ability's `on_target_select` hook.
   */
  selectTarget(casterId: string, selectedPoint: Point): TargetSelection | null {
    const targeter = this.targeters.get(casterId);
    if (!targeter) {
      return null;
    }

    const abilityId = targeter.ability.id;
    const selection = targeter.select(selectedPoint);
    switch (selection.status) {
      case "pending": {
        return selection;
      }
      case "rejected": {
        this.emit({
          type: "target_rejected",
          abilityId,
          casterId,
          point: selectedPoint,
          reason: selection.reason,
        });
        return selection;
      }
      case "cancelled": {
        this.targeters.delete(casterId);
        this.emitCancelled(abilityId, casterId, selection.reason);
        return selection;
      }
      case "selected": {
        this.targeters.delete(casterId);
        const registered = this.abilities.get(abilityId);
        if (!registered) {
          this.log.warn({ abilityId, casterId }, "Target selected for unregistered ability");
          return selection;
        }
        this.emit({
          type: "target_selected",
          abilityId,
          casterId,
          targets: selection.targetSet,
        });
        const context: AbilityContext = {
          casterId,
          ability: registered.definition,
          host: this,
          targets: selection.targetSet,
        };
        registered.script.onTargetSelect(context);
        return selection;
      }
    }
  }

  /** Close the caster's targeter; the attempt ends with no cost. */
  cancelTargeting(casterId: string): boolean {
    return this.closeTargeter(casterId, "cancelled");
  }

  hasOpenTargeter(casterId: string): boolean {
    return this.targeters.has(casterId);
  }

  openTargeter(context: AbilityActivationContext): TargetSelection {
    const config = resolveTargeterConfig(context.ability.targeting);
    const targeter = new Targeter(context.casterId, context.ability, config, this.zone);
    const selection = targeter.activate();
    if (selection.status === "cancelled") {
      this.emitCancelled(context.ability.id, context.casterId, selection.reason);
      return selection;
    }
    this.targeters.set(context.casterId, targeter);
    return selection;
  }

  resolveAttack(request: AttackRequest): AttackResolution {
    const resolution = this.combat.resolve(request);
    this.emit({ type: "attack_resolved", request, resolution });
    return resolution;
  }

  getActor(actorId: string): ServerActor | undefined {
    return this.zone.getActor(actorId);
  }

  isActorValid(actorId: string): boolean {
    return this.zone.isActorValid(actorId);
  }

  /** Advance every active effect by one host tick. */
  fixedTick(deltaMs: number): void {
    this.effects.tick(deltaMs);
  }

  /** Drop the removed actor's targeter and every effect it owns. */
  onActorRemoved(actorId: string): void {
    this.closeTargeter(actorId, "caster_removed");
    this.effects.cancelOwnedBy(actorId);
  }

  dispose(): void {
    this.effects.cancelAll();
    for (const targeter of this.targeters.values()) {
      targeter.cancel();
    }
    this.targeters.clear();
    this.listeners.length = 0;
  }

  private closeTargeter(casterId: string, reason: SelectionCancelReason): boolean {
    const targeter = this.targeters.get(casterId);
    if (!targeter) {
      return false;
    }
    targeter.cancel();
    this.targeters.delete(casterId);
    this.emitCancelled(targeter.ability.id, casterId, reason);
    return true;
  }

  private emitCancelled(
    abilityId: string,
    casterId: string,
    reason: SelectionCancelReason,
  ): void {
    this.log.debug({ abilityId, casterId, reason }, "Target selection cancelled");
    this.emit({ type: "selection_cancelled", abilityId, casterId, reason });
  }

  /** Notify all registered ability event listeners. */
  private emit(event: AbilityEvent): void {
    for (const listener of this.listeners) {
      listener.onAbilityEvent(event);
    }
  }
}
