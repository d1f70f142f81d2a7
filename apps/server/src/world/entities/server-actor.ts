import { point, type ActorState, type Point } from "@skirmish/shared";

/**
 * Server-only wrapper around an actor's synced state.
 */
export class ServerActor {
  constructor(public synced: ActorState) {}

  get id(): string {
    return this.synced.id;
  }

  get position(): Point {
    return point(this.synced.x, this.synced.y);
  }

  get isAlive(): boolean {
    return this.synced.currentHp > 0;
  }
}
