import { Schema, MapSchema, type } from "@colyseus/schema";
import { ActorState } from "./actor-state";
import { EffectState } from "./effect-state";

/**
 * World state schema synced to clients.
 * Contains every actor and every live effect in the zone.
 */
export class ZoneState extends Schema {
  /** The zone ID this state represents. */
  @type("string") zoneId = "";

  @type({ map: ActorState }) actors = new MapSchema<ActorState>();

  @type({ map: EffectState }) effects = new MapSchema<EffectState>();
}
