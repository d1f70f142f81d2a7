import type { TileCell } from "@skirmish/shared";

/** Initial stats for an actor placed by a zone definition. */
export interface ActorSpawn {
  id: string;
  name?: string;
  x: number;
  y: number;
  hp?: number;
  ap?: number;
  meleeAccuracy?: number;
  rangedAccuracy?: number;
  spellAccuracy?: number;
  defense?: number;
  fortitude?: number;
  reflex?: number;
  will?: number;
}

/** Tile layout and starting actors for a zone. */
export interface ZoneDefinition {
  id: string;
  width: number;
  height: number;
  blockedTiles: TileCell[];
  actors: ActorSpawn[];
}
