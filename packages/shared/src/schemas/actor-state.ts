import { Schema, type } from "@colyseus/schema";

/**
 * Synced actor state. Positions are tile-space centers.
 */
export class ActorState extends Schema {
  /** Unique actor instance identifier. */
  @type("string") id = "";

  /** Display name. */
  @type("string") name = "";

  /** Center X position. */
  @type("float32") x = 0;

  /** Center Y position. */
  @type("float32") y = 0;

  @type("int32") currentHp = 100;

  @type("int32") maxHp = 100;

  /** Action points available this turn. */
  @type("int32") ap = 0;

  /** AP carried into (or, when negative, taken from) the next turn. */
  @type("int32") overflowAp = 0;

  @type("int16") meleeAccuracy = 0;

  @type("int16") rangedAccuracy = 0;

  @type("int16") spellAccuracy = 0;

  @type("int16") defense = 0;

  @type("int16") fortitude = 0;

  @type("int16") reflex = 0;

  @type("int16") will = 0;
}
