import { logger as defaultLogger, type Logger } from "@skirmish/shared-servers";
import type { CallbackRegistry } from "./callback-registry";
import { EffectHandle } from "./effect-handle";
import type { EffectBinding, EffectParams, SyncedEffectMap } from "./types";

export interface EffectSchedulerOptions {
  registry: CallbackRegistry;
  logger?: Logger;
  /** Receives the synced state of every active effect. */
  syncedEffects?: SyncedEffectMap;
}

/**
 * Owns every active effect in a zone and drives their clocks from the host
 * tick. Each effect keeps its own timeline; there is no shared clock.
 */
export class EffectScheduler {
  private readonly active = new Map<string, EffectHandle>();
  private readonly binding: EffectBinding;
  private readonly syncedEffects?: SyncedEffectMap;
  private nextEffectId = 1;

  constructor(options: EffectSchedulerOptions) {
    this.syncedEffects = options.syncedEffects;
    this.binding = {
      registry: options.registry,
      logger: options.logger ?? defaultLogger,
      track: (effect) => this.track(effect),
      release: (effect) => this.release(effect),
    };
  }

  /** Create a pending effect. It is not ticked until `activate()` is called. */
  createEffect(params: EffectParams): EffectHandle {
    const id = `effect-${this.nextEffectId}`;
    this.nextEffectId += 1;
    return new EffectHandle(id, params, this.binding);
  }

  /**
   * Advance every effect that was active when the tick began. Effects
   * activated by a handler during this tick start on the next one.
   */
  tick(deltaMs: number): void {
    const effects = [...this.active.values()];
    for (const effect of effects) {
      effect.advance(deltaMs);
    }
  }

  get(effectId: string): EffectHandle | undefined {
    return this.active.get(effectId);
  }

  get activeCount(): number {
    return this.active.size;
  }

  cancel(effectId: string): boolean {
    const effect = this.active.get(effectId);
    if (!effect) {
      return false;
    }
    return effect.cancel();
  }

  /** Cancel every active effect owned by an actor; returns how many stopped. */
  cancelOwnedBy(ownerId: string): number {
    let cancelled = 0;
    for (const effect of [...this.active.values()]) {
      if (effect.ownerId === ownerId && effect.cancel()) {
        cancelled += 1;
      }
    }
    if (cancelled > 0) {
      this.binding.logger.debug({ ownerId, cancelled }, "Cancelled owned effects");
    }
    return cancelled;
  }

  cancelAll(): void {
    for (const effect of [...this.active.values()]) {
      effect.cancel();
    }
  }

  private track(effect: EffectHandle): void {
    this.active.set(effect.id, effect);
    this.syncedEffects?.set(effect.id, effect.synced);
  }

  private release(effect: EffectHandle): void {
    this.active.delete(effect.id);
    this.syncedEffects?.delete(effect.id);
  }
}
