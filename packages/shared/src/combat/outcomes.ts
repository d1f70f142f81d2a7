export type HitKind = "miss" | "graze" | "hit" | "crit";

export type DefenseKind = "defense" | "fortitude" | "reflex" | "will";
export type AttackKind = "melee" | "ranged" | "spell";

/** Resource pools an attack may drain or restore. */
export type ResourcePool = "hp" | "ap" | "overflowAp";

export interface AttackOutcome {
  hitKind: HitKind;
  /** Signed amount applied to the target's resource pool; 0 on a miss. */
  magnitude: number;
}

export const computeAttackMagnitude = (hitKind: HitKind, baseAmount: number): number => {
  switch (hitKind) {
    case "miss": {
      return 0;
    }
    case "graze": {
      const halved = Math.trunc(baseAmount / 2);
      return halved === 0 ? 0 : halved;
    }
    case "hit": {
      return baseAmount;
    }
    case "crit": {
      return baseAmount * 2;
    }
  }
};

export const toAttackOutcome = (hitKind: HitKind, baseAmount: number): AttackOutcome => ({
  hitKind,
  magnitude: computeAttackMagnitude(hitKind, baseAmount),
});
