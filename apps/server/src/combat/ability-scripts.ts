import { ABILITY_LIST, isAbilityId, type AbilityId } from "@skirmish/shared";
import type { AbilityEngine } from "./ability-engine";
import { createStunGrenadeScript } from "./stun-grenade";
import type { AbilityScript } from "./types";

export const ABILITY_SCRIPTS: Record<AbilityId, () => AbilityScript> = {
  stun_grenade: createStunGrenadeScript,
};

/** Register every built-in ability with its script. */
export const registerDefaultAbilities = (engine: AbilityEngine): void => {
  for (const definition of ABILITY_LIST) {
    if (!isAbilityId(definition.id)) {
      continue;
    }
    engine.registerAbility(definition, ABILITY_SCRIPTS[definition.id]());
  }
};
