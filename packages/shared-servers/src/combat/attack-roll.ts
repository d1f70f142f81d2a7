import type {
  ActorState,
  AttackKind,
  DefenseKind,
  HitKind,
} from "@skirmish/shared";
import { logger as defaultLogger, type Logger } from "../logger";
import { rollPercentile, type Rng } from "./prng";

/**
 * Combat-check primitive: rolls one attack and reports its tier.
 */
export type CombatCheck = (
  attacker: ActorState,
  target: ActorState,
  defense: DefenseKind,
  attack: AttackKind,
) => HitKind;

/** Thresholds on `roll + accuracy - defense`. */
export interface AttackRules {
  grazePercentile: number;
  hitPercentile: number;
  critPercentile: number;
}

export const DEFAULT_ATTACK_RULES: AttackRules = {
  grazePercentile: 15,
  hitPercentile: 50,
  critPercentile: 100,
};

export const accuracyFor = (actor: ActorState, attack: AttackKind): number => {
  if (attack === "melee") {
    return actor.meleeAccuracy;
  }
  if (attack === "ranged") {
    return actor.rangedAccuracy;
  }
  return actor.spellAccuracy;
};

export const defenseFor = (actor: ActorState, defense: DefenseKind): number => {
  if (defense === "fortitude") {
    return actor.fortitude;
  }
  if (defense === "reflex") {
    return actor.reflex;
  }
  if (defense === "will") {
    return actor.will;
  }
  return actor.defense;
};

export const classifyAttackRoll = (
  rules: AttackRules,
  roll: number,
  accuracy: number,
  defense: number,
): HitKind => {
  if (roll + accuracy < defense) {
    return "miss";
  }

  const result = roll + accuracy - defense;
  if (result >= rules.critPercentile) {
    return "crit";
  }
  if (result >= rules.hitPercentile) {
    return "hit";
  }
  if (result >= rules.grazePercentile) {
    return "graze";
  }
  return "miss";
};

export const createAttackRoll = (
  rules: AttackRules,
  rng: Rng,
  log: Logger = defaultLogger,
): CombatCheck => {
  return (attacker, target, defense, attack) => {
    const roll = rollPercentile(rng);
    const accuracy = accuracyFor(attacker, attack);
    const defenseValue = defenseFor(target, defense);
    const hitKind = classifyAttackRoll(rules, roll, accuracy, defenseValue);
    log.debug(
      {
        attackerId: attacker.id,
        targetId: target.id,
        roll,
        accuracy,
        defense: defenseValue,
        hitKind,
      },
      "Attack roll",
    );
    return hitKind;
  };
};
