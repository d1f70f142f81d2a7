export * from "./combat";
export * from "./effects";
export * from "./commands/commands";
export { ServerActor } from "./world/entities/server-actor";
export type { ActorSpawn, ZoneDefinition } from "./world/zones/types";
export {
  ServerZone,
  ZoneData,
  createActorState,
  type ServerZoneOptions,
} from "./world/zones/zone";
export { openZone } from "./world/zones/zone-lifecycle";
export {
  DefaultZoneLoader,
  ZoneDataLoader,
  ZoneDefinitionError,
  parseZoneDefinition,
} from "./world/zones/zone-loader";
