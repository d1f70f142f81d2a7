import { ActorState } from "@skirmish/shared";
import { describe, expect, it } from "vitest";
import {
  DEFAULT_ATTACK_RULES,
  accuracyFor,
  classifyAttackRoll,
  createAttackRoll,
  defenseFor,
} from "./attack-roll";
import { createRng, hashStringToUint32, rollPercentile, type Rng } from "./prng";

const createActor = (id: string, setup: (state: ActorState) => void = () => {}): ActorState => {
  const state = new ActorState();
  state.id = id;
  setup(state);
  return state;
};

const fixedRng =
  (value: number): Rng =>
  () =>
    value;

describe("classifyAttackRoll", () => {
  it("misses when the roll cannot beat defense", () => {
    expect(classifyAttackRoll(DEFAULT_ATTACK_RULES, 10, 0, 20)).toBe("miss");
  });

  it("misses below the graze percentile", () => {
    expect(classifyAttackRoll(DEFAULT_ATTACK_RULES, 34, 0, 20)).toBe("miss");
  });

  it("walks the tiers from graze to crit", () => {
    expect(classifyAttackRoll(DEFAULT_ATTACK_RULES, 35, 0, 20)).toBe("graze");
    expect(classifyAttackRoll(DEFAULT_ATTACK_RULES, 70, 0, 20)).toBe("hit");
    expect(classifyAttackRoll(DEFAULT_ATTACK_RULES, 100, 20, 20)).toBe("crit");
  });

  it("honors custom rules", () => {
    const rules = { grazePercentile: 5, hitPercentile: 10, critPercentile: 20 };

    expect(classifyAttackRoll(rules, 20, 0, 0)).toBe("crit");
    expect(classifyAttackRoll(rules, 12, 0, 0)).toBe("hit");
  });
});

describe("accuracy and defense lookup", () => {
  const actor = createActor("a", (state) => {
    state.meleeAccuracy = 1;
    state.rangedAccuracy = 2;
    state.spellAccuracy = 3;
    state.defense = 4;
    state.fortitude = 5;
    state.reflex = 6;
    state.will = 7;
  });

  it("reads the stat for each kind", () => {
    expect(accuracyFor(actor, "melee")).toBe(1);
    expect(accuracyFor(actor, "ranged")).toBe(2);
    expect(accuracyFor(actor, "spell")).toBe(3);
    expect(defenseFor(actor, "defense")).toBe(4);
    expect(defenseFor(actor, "fortitude")).toBe(5);
    expect(defenseFor(actor, "reflex")).toBe(6);
    expect(defenseFor(actor, "will")).toBe(7);
  });
});

describe("createAttackRoll", () => {
  const attacker = createActor("attacker", (state) => {
    state.rangedAccuracy = 10;
  });
  const target = createActor("target", (state) => {
    state.reflex = 10;
  });

  it("rolls through the rng", () => {
    expect(createAttackRoll(DEFAULT_ATTACK_RULES, fixedRng(0.99))(attacker, target, "reflex", "ranged")).toBe(
      "crit",
    );
    expect(createAttackRoll(DEFAULT_ATTACK_RULES, fixedRng(0.5))(attacker, target, "reflex", "ranged")).toBe(
      "hit",
    );
    expect(createAttackRoll(DEFAULT_ATTACK_RULES, fixedRng(0))(attacker, target, "reflex", "ranged")).toBe(
      "miss",
    );
  });

  it("uses the accuracy and defense named by the attack", () => {
    const check = createAttackRoll(DEFAULT_ATTACK_RULES, fixedRng(0.2));

    // roll 21 each time
    expect(check(attacker, target, "reflex", "ranged")).toBe("graze");
    expect(check(attacker, target, "will", "ranged")).toBe("graze");
    expect(check(attacker, target, "reflex", "melee")).toBe("miss");
  });
});

describe("prng", () => {
  it("repeats a sequence for the same seed", () => {
    const first = createRng(42);
    const second = createRng(42);
    const values = [first(), first(), first()];

    expect([second(), second(), second()]).toEqual(values);
    for (const value of values) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it("rolls percentiles between 1 and 100", () => {
    expect(rollPercentile(fixedRng(0))).toBe(1);
    expect(rollPercentile(fixedRng(0.999))).toBe(100);
  });

  it("hashes ids to stable seeds", () => {
    expect(hashStringToUint32("")).toBe(2_166_136_261);
    expect(hashStringToUint32("zone-a")).toBe(hashStringToUint32("zone-a"));
    expect(hashStringToUint32("zone-a")).not.toBe(hashStringToUint32("zone-b"));
  });
});
