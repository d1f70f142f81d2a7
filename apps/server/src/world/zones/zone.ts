import {
  ActorState,
  TICK_MS,
  ZoneState,
  footprintCells,
  type ObjectSize,
  type PassabilityQuery,
  type TargetCandidate,
  type TileCell,
} from "@skirmish/shared";
import {
  DEFAULT_ATTACK_RULES,
  createAttackRoll,
  createRng,
  hashStringToUint32,
  logger as defaultLogger,
  type CombatCheck,
  type Logger,
} from "@skirmish/shared-servers";
import { AbilityEngine } from "../../combat/ability-engine";
import { ServerActor } from "../entities/server-actor";
import type { ActorSpawn, ZoneDefinition } from "./types";

const tileKey = (x: number, y: number): string => `${x},${y}`;

/**
 * Static tile layout of a zone. Tiles outside the bounds or marked blocked
 * are impassable.
 */
export class ZoneData implements PassabilityQuery {
  private readonly blocked = new Set<string>();

  constructor(
    public readonly zoneId: string,
    public readonly width: number,
    public readonly height: number,
    blockedTiles: readonly TileCell[] = [],
  ) {
    for (const tile of blockedTiles) {
      this.blockTile(tile.x, tile.y);
    }
  }

  static fromDefinition(definition: ZoneDefinition): ZoneData {
    return new ZoneData(
      definition.id,
      definition.width,
      definition.height,
      definition.blockedTiles,
    );
  }

  blockTile(x: number, y: number): void {
    this.blocked.add(tileKey(x, y));
  }

  isTilePassable(x: number, y: number): boolean {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) {
      return false;
    }
    return !this.blocked.has(tileKey(x, y));
  }

  isPassable(footprint: ObjectSize, x: number, y: number): boolean {
    for (const cell of footprintCells(footprint, { x, y })) {
      if (!this.isTilePassable(cell.x, cell.y)) {
        return false;
      }
    }
    return true;
  }
}

export interface ServerZoneOptions {
  /** Replaces the default seeded attack roll. */
  combatCheck?: CombatCheck;
  rngSeed?: number;
  logger?: Logger;
}

export const createActorState = (spawn: ActorSpawn): ActorState => {
  const state = new ActorState();
  state.id = spawn.id;
  state.name = spawn.name ?? spawn.id;
  state.x = spawn.x;
  state.y = spawn.y;
  if (spawn.hp !== undefined) {
    state.maxHp = spawn.hp;
    state.currentHp = spawn.hp;
  }
  state.ap = spawn.ap ?? 0;
  state.meleeAccuracy = spawn.meleeAccuracy ?? 0;
  state.rangedAccuracy = spawn.rangedAccuracy ?? 0;
  state.spellAccuracy = spawn.spellAccuracy ?? 0;
  state.defense = spawn.defense ?? 0;
  state.fortitude = spawn.fortitude ?? 0;
  state.reflex = spawn.reflex ?? 0;
  state.will = spawn.will ?? 0;
  return state;
};

/**
 * Host world for the ability runtime. Owns actors and drives the ability
 * engine from the fixed tick. Everything else refers to actors by id and
 * looks them up here.
 */
export class ServerZone implements PassabilityQuery {
  public readonly actors = new Map<string, ServerActor>();
  public readonly abilityEngine: AbilityEngine;
  private serverTick = 0;
  private readonly log: Logger;

  constructor(
    public readonly zoneData: ZoneData,
    public readonly zoneState: ZoneState = new ZoneState(),
    options: ServerZoneOptions = {},
  ) {
    this.zoneState.zoneId = zoneData.zoneId;
    this.log = options.logger ?? defaultLogger;
    const combatCheck =
      options.combatCheck ??
      createAttackRoll(
        DEFAULT_ATTACK_RULES,
        createRng(options.rngSeed ?? hashStringToUint32(zoneData.zoneId)),
        this.log,
      );
    this.abilityEngine = new AbilityEngine(this, {
      combatCheck,
      logger: this.log,
    });
  }

  static fromDefinition(
    definition: ZoneDefinition,
    options: ServerZoneOptions = {},
  ): ServerZone {
    const zone = new ServerZone(ZoneData.fromDefinition(definition), new ZoneState(), options);
    for (const spawn of definition.actors) {
      zone.addActor(createActorState(spawn));
    }
    return zone;
  }

  get tick(): number {
    return this.serverTick;
  }

  addActor(state: ActorState): ServerActor {
    if (this.actors.has(state.id)) {
      throw new Error(`Actor ${state.id} is already in zone ${this.zoneData.zoneId}`);
    }
    const actor = new ServerActor(state);
    this.actors.set(state.id, actor);
    this.zoneState.actors.set(state.id, state);
    return actor;
  }

  /**
   * Remove an actor from the world. Its open targeter and every effect it
   * owns are cancelled; effects aimed at it re-check validity when they fire.
   */
  removeActor(actorId: string): boolean {
    if (!this.actors.delete(actorId)) {
      return false;
    }
    this.zoneState.actors.delete(actorId);
    this.abilityEngine.onActorRemoved(actorId);
    this.log.info({ actorId, zoneId: this.zoneData.zoneId }, "Actor left zone");
    return true;
  }

  getActor(actorId: string): ServerActor | undefined {
    return this.actors.get(actorId);
  }

  /** Present in the zone and alive. */
  getValidActor(actorId: string): ServerActor | undefined {
    const actor = this.actors.get(actorId);
    if (!actor || !actor.isAlive) {
      return undefined;
    }
    return actor;
  }

  isActorValid(actorId: string): boolean {
    return this.getValidActor(actorId) !== undefined;
  }

  isPassable(footprint: ObjectSize, x: number, y: number): boolean {
    return this.zoneData.isPassable(footprint, x, y);
  }

  /** Every valid actor, in the order they entered the zone. */
  collectTargetCandidates(): TargetCandidate[] {
    const candidates: TargetCandidate[] = [];
    for (const actor of this.actors.values()) {
      if (!actor.isAlive) {
        continue;
      }
      candidates.push({ id: actor.id, x: actor.synced.x, y: actor.synced.y });
    }
    return candidates;
  }

  fixedTick(tickMs: number = TICK_MS): void {
    this.serverTick += 1;
    this.abilityEngine.fixedTick(tickMs);
  }

  dispose(): void {
    this.abilityEngine.dispose();
  }
}
