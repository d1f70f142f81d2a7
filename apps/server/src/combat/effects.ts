import type { ActorState, ResourcePool } from "@skirmish/shared";

const clamp = (value: number, min: number, max: number): number => {
  return Math.min(max, Math.max(min, value));
};

/**
 * Apply a signed delta to one resource pool as a single mutation.
 * HP stays within [0, maxHp], AP never drops below zero, and overflow AP
 * may go negative to eat into the next turn.
 */
export const applyResourceDelta = (
  target: ActorState,
  pool: ResourcePool,
  delta: number,
): void => {
  if (delta === 0) {
    return;
  }
  if (pool === "hp") {
    target.currentHp = clamp(target.currentHp + delta, 0, target.maxHp);
    return;
  }
  if (pool === "ap") {
    target.ap = Math.max(0, target.ap + delta);
    return;
  }
  target.overflowAp += delta;
};
