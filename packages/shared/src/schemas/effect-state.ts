import { Schema, type } from "@colyseus/schema";

/**
 * Synced state for a live timed effect. Clients evaluate the position as
 * `x + velocityX * t` using the elapsed time in seconds.
 */
export class EffectState extends Schema {
  @type("string") id = "";

  /** Particle/animation template name. */
  @type("string") template = "";

  /** Actor whose removal cancels this effect. */
  @type("string") ownerId = "";

  @type("float64") durationMs = 0;

  @type("float64") elapsedMs = 0;

  @type("float32") x = 0;

  @type("float32") y = 0;

  @type("float32") velocityX = 0;

  @type("float32") velocityY = 0;

  @type("float32") particleWidth = 1;

  @type("float32") particleHeight = 1;

  /** Per-particle drift relative to the effect origin. */
  @type("float32") driftX = 0;

  @type("float32") driftY = 0;

  @type("float32") red = 1;

  @type("float32") green = 1;

  @type("float32") blue = 1;
}
