/** Client asks to start an ability. */
export interface AbilityActivateRequest {
  type: "ability_activate";
  actorId: string;
  abilityId: string;
}

/** Client offers a point to its open targeter. */
export interface TargetSelectRequest {
  type: "target_select";
  actorId: string;
  x: number;
  y: number;
}

export interface TargetCancelRequest {
  type: "target_cancel";
  actorId: string;
}
