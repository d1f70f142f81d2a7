import {
  point,
  type AbilityActivateRequest,
  type TargetCancelRequest,
  type TargetSelectRequest,
  type TargetSelection,
} from "@skirmish/shared";
import type { AbilityActivationResult } from "../combat/ability-engine";
import type { ServerActor } from "../world/entities/server-actor";
import type { ServerZone } from "../world/zones/zone";

export type ClientCommand =
  | AbilityActivateRequest
  | TargetSelectRequest
  | TargetCancelRequest;

export interface ClientCommandContext<T extends ClientCommand> {
  data: T;
  actor: ServerActor;
  zone: ServerZone;
}

/** A command naming an actor other than its sender is ignored. */
const isOwnActor = (data: ClientCommand, actor: ServerActor): boolean => {
  return data.actorId === actor.id;
};

/**
 * Starts an ability for the sending actor.
 *
 * @param context - input context for an activate command.
 */
export const activateAbilityCommand = ({
  data,
  actor,
  zone,
}: ClientCommandContext<AbilityActivateRequest>): AbilityActivationResult => {
  if (!isOwnActor(data, actor)) {
    return { accepted: false, reason: "invalid_caster" };
  }
  return zone.abilityEngine.activate(actor.id, data.abilityId);
};

export const selectTargetCommand = ({
  data,
  actor,
  zone,
}: ClientCommandContext<TargetSelectRequest>): TargetSelection | null => {
  if (!isOwnActor(data, actor)) {
    return null;
  }
  return zone.abilityEngine.selectTarget(actor.id, point(data.x, data.y));
};

export const cancelTargetingCommand = ({
  data,
  actor,
  zone,
}: ClientCommandContext<TargetCancelRequest>): boolean => {
  if (!isOwnActor(data, actor)) {
    return false;
  }
  return zone.abilityEngine.cancelTargeting(actor.id);
};
