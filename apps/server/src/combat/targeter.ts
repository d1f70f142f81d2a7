import {
  resolveTargetSelection,
  type AbilityDefinition,
  type PassabilityQuery,
  type Point,
  type ResolvedTargeterConfig,
  type TargetCandidate,
  type TargetSelection,
} from "@skirmish/shared";
import type { ServerActor } from "../world/entities/server-actor";

/** World queries a targeter needs while it is open. */
export interface TargeterWorld extends PassabilityQuery {
  getValidActor(actorId: string): ServerActor | undefined;
  collectTargetCandidates(): TargetCandidate[];
}

/**
 * Free-point targeter bound to one caster. Stays open across rejected
 * points and closes on a selection or a cancel.
 */
export class Targeter {
  private open = true;

  constructor(
    readonly casterId: string,
    readonly ability: AbilityDefinition,
    private readonly config: ResolvedTargeterConfig,
    private readonly world: TargeterWorld,
  ) {}

  /** Check that some point can be chosen at all. */
  activate(): TargetSelection {
    return this.settle(this.resolve());
  }

  select(selectedPoint: Point): TargetSelection {
    if (!this.open) {
      return { status: "cancelled", reason: "cancelled" };
    }
    return this.settle(this.resolve(selectedPoint));
  }

  cancel(): TargetSelection {
    this.open = false;
    return { status: "cancelled", reason: "cancelled" };
  }

  private resolve(selectedPoint?: Point): TargetSelection {
    const caster = this.world.getValidActor(this.casterId);
    if (!caster) {
      return { status: "cancelled", reason: "caster_removed" };
    }

    return resolveTargetSelection(
      {
        caster: { id: caster.id, x: caster.synced.x, y: caster.synced.y },
        config: this.config,
        passability: this.world,
        candidates: this.world.collectTargetCandidates(),
      },
      selectedPoint,
    );
  }

  private settle(selection: TargetSelection): TargetSelection {
    if (selection.status === "selected" || selection.status === "cancelled") {
      this.open = false;
    }
    return selection;
  }
}
