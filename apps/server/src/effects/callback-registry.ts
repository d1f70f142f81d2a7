import { ConfigurationError } from "@skirmish/shared";
import type { CallbackHandler } from "./types";

export const callbackKey = (abilityId: string, handlerId: string): string =>
  `${abilityId}:${handlerId}`;

/**
 * Maps stable `ability:handler` identifiers to handler objects.
 * Lookups happen when a callback is registered, not when it fires.
 */
export class CallbackRegistry {
  private readonly handlers = new Map<string, CallbackHandler>();

  register(abilityId: string, handlerId: string, handler: CallbackHandler): void {
    const key = callbackKey(abilityId, handlerId);
    if (this.handlers.has(key)) {
      throw new ConfigurationError(`Callback handler '${key}' is already registered`);
    }
    this.handlers.set(key, handler);
  }

  has(abilityId: string, handlerId: string): boolean {
    return this.handlers.has(callbackKey(abilityId, handlerId));
  }

  resolve(abilityId: string, handlerId: string): CallbackHandler {
    const key = callbackKey(abilityId, handlerId);
    const handler = this.handlers.get(key);
    if (!handler) {
      throw new ConfigurationError(`No callback handler registered for '${key}'`);
    }
    return handler;
  }
}
