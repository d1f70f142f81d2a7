import { DEFAULT_DRIFT_DAMPING, MIN_TRAVEL_SECONDS } from "../constants";
import { distanceBetween, type Point } from "../geometry";
import { ConfigurationError } from "./errors";

export interface Velocity {
  x: number;
  y: number;
}

export interface ProjectileKinematics {
  /** Straight-line distance from origin to destination. */
  distance: number;
  /** Travel time in seconds; never zero. */
  duration: number;
  /** World units per second along each axis. */
  velocity: Velocity;
  /**
   * Velocity for child particles riding the projectile head so they stay
   * put in world space, damped by the drift constant.
   */
  counterDrift: Velocity;
}

export const computeProjectileKinematics = (
  origin: Point,
  destination: Point,
  speed: number,
  driftDamping: number = DEFAULT_DRIFT_DAMPING,
): ProjectileKinematics => {
  if (!Number.isFinite(speed) || speed <= 0) {
    throw new ConfigurationError(`Projectile speed must be positive, got ${speed}`);
  }
  if (!Number.isFinite(driftDamping) || driftDamping <= 0) {
    throw new ConfigurationError(
      `Drift damping must be positive, got ${driftDamping}`,
    );
  }

  const distance = distanceBetween(origin, destination);
  if (distance === 0) {
    return {
      distance,
      duration: MIN_TRAVEL_SECONDS,
      velocity: { x: 0, y: 0 },
      counterDrift: { x: 0, y: 0 },
    };
  }

  const duration = distance / speed;
  const velocity = {
    x: (destination.x - origin.x) / duration,
    y: (destination.y - origin.y) / duration,
  };

  return {
    distance,
    duration,
    velocity,
    counterDrift: {
      x: -velocity.x / driftDamping,
      y: -velocity.y / driftDamping,
    },
  };
};

/** Position of a body that started at `origin` after `seconds` of travel. */
export const positionAt = (
  origin: Point,
  velocity: Velocity,
  seconds: number,
): Point => ({
  x: origin.x + velocity.x * seconds,
  y: origin.y + velocity.y * seconds,
});
