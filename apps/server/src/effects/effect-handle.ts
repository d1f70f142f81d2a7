import { ConfigurationError, EffectState } from "@skirmish/shared";
import type {
  CallbackRequest,
  CallbackTrigger,
  EffectBinding,
  EffectLifecycle,
  EffectParams,
  ScheduledCallback,
} from "./types";

const buildSyncedState = (id: string, params: EffectParams): EffectState => {
  const state = new EffectState();
  state.id = id;
  state.template = params.template;
  state.ownerId = params.ownerId;
  state.durationMs = params.durationMs;

  const visual = params.visual;
  if (visual) {
    state.x = visual.x;
    state.y = visual.y;
    state.velocityX = visual.velocityX ?? 0;
    state.velocityY = visual.velocityY ?? 0;
    state.particleWidth = visual.particleWidth ?? 1;
    state.particleHeight = visual.particleHeight ?? state.particleWidth;
    state.driftX = visual.driftX ?? 0;
    state.driftY = visual.driftY ?? 0;
    if (visual.color) {
      state.red = visual.color.red;
      state.green = visual.color.green;
      state.blue = visual.color.blue;
    }
  }
  return state;
};

/**
 * One timed effect instance with its own clock.
 *
 * Callbacks are registered while the handle is pending. After `activate()`
 * the scheduler advances the clock each tick and fires every callback once,
 * in fire-time order with ties kept in registration order. Reaching the
 * duration, or being cancelled, moves the handle to `complete`; a cancelled
 * handle drops whatever had not fired yet.
 */
export class EffectHandle {
  readonly ownerId: string;
  readonly template: string;
  readonly durationMs: number;
  readonly synced: EffectState;

  private lifecycle: EffectLifecycle = "pending";
  private elapsed = 0;
  private callbacks: ScheduledCallback[] = [];
  private nextCallbackIndex = 0;
  private nextSequence = 0;

  constructor(
    readonly id: string,
    params: EffectParams,
    private readonly binding: EffectBinding,
  ) {
    if (!Number.isFinite(params.durationMs) || params.durationMs <= 0) {
      throw new ConfigurationError(
        `Effect '${params.template}' duration must be positive, got ${params.durationMs}`,
      );
    }
    this.ownerId = params.ownerId;
    this.template = params.template;
    this.durationMs = params.durationMs;
    this.synced = buildSyncedState(id, params);
  }

  get state(): EffectLifecycle {
    return this.lifecycle;
  }

  get elapsedMs(): number {
    return this.elapsed;
  }

  /** Callbacks registered but not yet fired. */
  get pendingCallbackCount(): number {
    return this.callbacks.length - this.nextCallbackIndex;
  }

  /** Fire once when the clock reaches the effect's duration. */
  addCompletionCallback(request: CallbackRequest): ScheduledCallback {
    return this.register({ type: "on_complete" }, this.durationMs, request);
  }

  /** Fire once when the clock reaches `offsetMs`. */
  addUpdateCallback(request: CallbackRequest, offsetMs: number): ScheduledCallback {
    return this.register({ type: "on_update", offsetMs }, offsetMs, request);
  }

  activate(): void {
    if (this.lifecycle !== "pending") {
      throw new Error(`Effect ${this.id} cannot be activated while ${this.lifecycle}`);
    }
    this.callbacks.sort((a, b) => {
      if (a.fireAtMs !== b.fireAtMs) {
        return a.fireAtMs - b.fireAtMs;
      }
      return a.sequence - b.sequence;
    });
    this.lifecycle = "active";
    this.binding.track(this);
  }

  /**
   * Advance the clock and fire due callbacks. No-op unless active.
   */
  advance(deltaMs: number): void {
    if (this.lifecycle !== "active") {
      return;
    }

    const step = Number.isFinite(deltaMs) ? Math.max(0, deltaMs) : 0;
    this.elapsed = Math.min(this.durationMs, this.elapsed + step);
    this.synced.elapsedMs = this.elapsed;

    while (this.nextCallbackIndex < this.callbacks.length) {
      const callback = this.callbacks[this.nextCallbackIndex];
      if (callback.fireAtMs > this.elapsed) {
        break;
      }
      this.nextCallbackIndex += 1;
      this.fire(callback);
      if (this.lifecycle !== "active") {
        // A handler cancelled this effect.
        return;
      }
    }

    if (this.elapsed >= this.durationMs) {
      this.finish();
    }
  }

  /**
   * Stop the effect without firing anything further. Returns false when it
   * had already completed.
   */
  cancel(): boolean {
    if (this.lifecycle === "complete") {
      return false;
    }
    const wasTracked = this.lifecycle === "active";
    this.lifecycle = "complete";
    this.callbacks = [];
    this.nextCallbackIndex = 0;
    if (wasTracked) {
      this.binding.release(this);
    }
    return true;
  }

  private register(
    trigger: CallbackTrigger,
    fireAtMs: number,
    request: CallbackRequest,
  ): ScheduledCallback {
    if (this.lifecycle !== "pending") {
      throw new Error(
        `Effect ${this.id} is ${this.lifecycle}; callbacks must be registered before activate()`,
      );
    }
    if (!Number.isFinite(fireAtMs) || fireAtMs < 0 || fireAtMs > this.durationMs) {
      throw new ConfigurationError(
        `Callback '${request.handlerId}' at ${fireAtMs}ms falls outside effect '${this.template}' (${this.durationMs}ms)`,
      );
    }

    const handler = this.binding.registry.resolve(
      request.context.ability.id,
      request.handlerId,
    );
    const callback: ScheduledCallback = {
      trigger,
      handlerId: request.handlerId,
      handler,
      context: request.context,
      fireAtMs,
      sequence: this.nextSequence,
    };
    this.nextSequence += 1;
    this.callbacks.push(callback);
    return callback;
  }

  private fire(callback: ScheduledCallback): void {
    try {
      callback.handler.invoke({
        ...callback.context,
        effect: this,
        firedAtMs: callback.fireAtMs,
      });
    } catch (error) {
      this.binding.logger.error(
        {
          err: error,
          effectId: this.id,
          template: this.template,
          handlerId: callback.handlerId,
          fireAtMs: callback.fireAtMs,
        },
        "Effect callback failed",
      );
    }
  }

  private finish(): void {
    this.lifecycle = "complete";
    this.callbacks = [];
    this.nextCallbackIndex = 0;
    this.binding.release(this);
  }
}
