import {
  toAttackOutcome,
  type AttackKind,
  type AttackOutcome,
  type DefenseKind,
  type ResourcePool,
} from "@skirmish/shared";
import {
  logger as defaultLogger,
  type CombatCheck,
  type Logger,
} from "@skirmish/shared-servers";
import type { ServerActor } from "../world/entities/server-actor";
import { applyResourceDelta } from "./effects";

export interface AttackRequest {
  attackerId: string;
  targetId: string;
  defense: DefenseKind;
  attack: AttackKind;
  /** Signed amount for a plain hit, e.g. -2000. */
  baseAmount: number;
  resource: ResourcePool;
}

export type AttackResolution =
  | { status: "skipped_invalid_target"; targetId: string }
  | { status: "skipped_invalid_attacker"; targetId: string }
  | { status: "resolved"; targetId: string; outcome: AttackOutcome };

export interface CombatantLookup {
  getActor(actorId: string): ServerActor | undefined;
  getValidActor(actorId: string): ServerActor | undefined;
}

/**
 * Turns one attack into an outcome tier and applies its magnitude.
 * The target is re-validated on every call, so resolving against an actor
 * that has since died or left is a skip rather than an error.
 */
export class CombatResolver {
  constructor(
    private readonly combatants: CombatantLookup,
    private readonly check: CombatCheck,
    private readonly log: Logger = defaultLogger,
  ) {}

  resolve(request: AttackRequest): AttackResolution {
    const { targetId } = request;
    const target = this.combatants.getValidActor(targetId);
    if (!target) {
      this.log.debug({ targetId }, "Skipping attack on invalid target");
      return { status: "skipped_invalid_target", targetId };
    }

    const attacker = this.combatants.getActor(request.attackerId);
    if (!attacker) {
      this.log.debug(
        { attackerId: request.attackerId, targetId },
        "Skipping attack from missing attacker",
      );
      return { status: "skipped_invalid_attacker", targetId };
    }

    const hitKind = this.check(
      attacker.synced,
      target.synced,
      request.defense,
      request.attack,
    );
    const outcome = toAttackOutcome(hitKind, request.baseAmount);
    if (outcome.hitKind === "miss") {
      return { status: "resolved", targetId, outcome };
    }

    applyResourceDelta(target.synced, request.resource, outcome.magnitude);
    return { status: "resolved", targetId, outcome };
  }
}
