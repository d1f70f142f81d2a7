import type {
  Point,
  SelectionCancelReason,
  SelectionRejectReason,
  TargetSet,
} from "@skirmish/shared";
import type { AttackRequest, AttackResolution } from "./combat-resolver";

/** Emitted when a caster starts an ability. */
export interface AbilityActivatedEvent {
  type: "ability_activated";
  abilityId: string;
  casterId: string;
}

/** Emitted when a targeter produced a target set. */
export interface TargetSelectedEvent {
  type: "target_selected";
  abilityId: string;
  casterId: string;
  targets: TargetSet;
}

/** Emitted when a selected point fails range or passability. */
export interface TargetRejectedEvent {
  type: "target_rejected";
  abilityId: string;
  casterId: string;
  point: Point;
  reason: SelectionRejectReason;
}

/** Emitted when an activation ends without a target set. */
export interface SelectionCancelledEvent {
  type: "selection_cancelled";
  abilityId: string;
  casterId: string;
  reason: SelectionCancelReason;
}

/** Emitted for every attack an ability resolves, skipped ones included. */
export interface AttackResolvedEvent {
  type: "attack_resolved";
  request: AttackRequest;
  resolution: AttackResolution;
}

/** AbilityEngine event union. */
export type AbilityEvent =
  | AbilityActivatedEvent
  | TargetSelectedEvent
  | TargetRejectedEvent
  | SelectionCancelledEvent
  | AttackResolvedEvent;

/** Listener interface for receiving AbilityEngine events. */
export interface AbilityEventListener {
  onAbilityEvent(event: AbilityEvent): void;
}
