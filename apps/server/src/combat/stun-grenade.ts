import { computeProjectileKinematics, createTargetSet } from "@skirmish/shared";
import type { CallbackContext, CallbackHandler } from "../effects/types";
import type { AbilityContext, AbilityScript } from "./types";

export const CREATE_EXPLOSION = "create_explosion";
export const ATTACK_TARGET = "attack_target";

/**
 * Burst at the landing point. Every target gets its own attack callback at
 * the same offset, carrying a target set that holds only that actor.
 */
const createExplosion: CallbackHandler = {
  invoke(context: CallbackContext): void {
    const { casterId, ability, host, targets } = context;
    const { detonation } = ability;
    const center = targets.selectedPoint;

    const burst = host.effects.createEffect({
      ownerId: casterId,
      template: detonation.template,
      durationMs: detonation.durationMs,
      visual: {
        x: center.x - detonation.size / 2,
        y: center.y - detonation.size / 2,
        particleWidth: detonation.size,
        particleHeight: detonation.size,
      },
    });

    for (const actorId of targets.actorIds) {
      burst.addUpdateCallback(
        {
          handlerId: ATTACK_TARGET,
          context: {
            casterId,
            ability,
            host,
            targets: createTargetSet(center, [actorId]),
          },
        },
        detonation.attackOffsetMs,
      );
    }

    burst.activate();
  },
};

const attackTarget: CallbackHandler = {
  invoke(context: CallbackContext): void {
    const targetId = context.targets.actorIds[0];
    if (targetId === undefined) {
      return;
    }
    const { attack } = context.ability;
    context.host.resolveAttack({
      attackerId: context.casterId,
      targetId,
      defense: attack.defense,
      attack: attack.attack,
      baseAmount: attack.baseAmount,
      resource: attack.resource,
    });
  },
};

/**
 * Thrown grenade: a projectile flies from the caster to the chosen point,
 * bursts on landing, and rolls a reflex attack against everyone caught in
 * the blast radius.
 */
export const createStunGrenadeScript = (): AbilityScript => ({
  onActivate(context) {
    context.host.openTargeter(context);
  },

  onTargetSelect(context: AbilityContext) {
    const { casterId, ability, host, targets } = context;
    const caster = host.getActor(casterId);
    if (!caster) {
      return;
    }

    const { projectile } = ability;
    const origin = caster.position;
    const flight = computeProjectileKinematics(
      origin,
      targets.selectedPoint,
      projectile.speed,
      projectile.driftDamping,
    );

    const effect = host.effects.createEffect({
      ownerId: casterId,
      template: projectile.template,
      durationMs: flight.duration * 1000,
      visual: {
        x: origin.x,
        y: origin.y,
        velocityX: flight.velocity.x,
        velocityY: flight.velocity.y,
        particleWidth: projectile.particleSize,
        driftX: flight.counterDrift.x,
        driftY: flight.counterDrift.y,
        color: projectile.color,
      },
    });
    effect.addCompletionCallback({ handlerId: CREATE_EXPLOSION, context });
    effect.activate();
  },

  handlers: {
    [CREATE_EXPLOSION]: createExplosion,
    [ATTACK_TARGET]: attackTarget,
  },
});
