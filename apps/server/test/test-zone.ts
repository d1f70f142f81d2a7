import {
  ABILITY_DEFINITIONS,
  ZoneState,
  createTargetSet,
  point,
  type AbilityDefinition,
  type HitKind,
  type TileCell,
} from "@skirmish/shared";
import type { CombatCheck } from "@skirmish/shared-servers";
import type { AbilityEvent, AbilityEventListener } from "../src/combat/ability-events";
import type { AbilityContext } from "../src/combat/types";
import type { ServerActor } from "../src/world/entities/server-actor";
import type { ActorSpawn } from "../src/world/zones/types";
import { ServerZone, ZoneData, createActorState } from "../src/world/zones/zone";

export interface TestZoneOptions {
  width?: number;
  height?: number;
  blockedTiles?: TileCell[];
  combatCheck?: CombatCheck;
}

/** Combat check that always lands on the same tier. */
export const fixedCheck =
  (hitKind: HitKind): CombatCheck =>
  () =>
    hitKind;

export const createTestZone = (options: TestZoneOptions = {}): ServerZone => {
  const zoneData = new ZoneData(
    "test-zone",
    options.width ?? 40,
    options.height ?? 40,
    options.blockedTiles ?? [],
  );
  return new ServerZone(zoneData, new ZoneState(), {
    combatCheck: options.combatCheck ?? fixedCheck("hit"),
  });
};

export const spawnActor = (zone: ServerZone, spawn: ActorSpawn): ServerActor => {
  return zone.addActor(createActorState(spawn));
};

/** Stun grenade under another id, with room to throw further. */
export const createLongGrenade = (maxRange = 30): AbilityDefinition => {
  const base: AbilityDefinition = ABILITY_DEFINITIONS.stun_grenade;
  return {
    ...base,
    id: "long_grenade",
    targeting: { ...base.targeting, maxRange },
  };
};

export const createHandlerContext = (
  zone: ServerZone,
  casterId = "caster",
): AbilityContext => ({
  casterId,
  ability: { ...ABILITY_DEFINITIONS.stun_grenade, id: "tracer" },
  host: zone.abilityEngine,
  targets: createTargetSet(point(0, 0), []),
});

export class RecordingListener implements AbilityEventListener {
  readonly events: AbilityEvent[] = [];

  onAbilityEvent(event: AbilityEvent): void {
    this.events.push(event);
  }

  get types(): string[] {
    return this.events.map((event) => event.type);
  }
}

export const runTicks = (zone: ServerZone, count: number): void => {
  for (let i = 0; i < count; i += 1) {
    zone.fixedTick();
  }
};
