import { registerDefaultAbilities } from "../../combat/ability-scripts";
import { ServerZone, type ServerZoneOptions } from "./zone";
import { DefaultZoneLoader, type ZoneDataLoader } from "./zone-loader";

/**
 * Load a zone definition, spawn its actors and register the built-in
 * abilities on its engine.
 */
export const openZone = async (
  zoneId: string,
  loader: ZoneDataLoader = new DefaultZoneLoader(),
  options: ServerZoneOptions = {},
): Promise<ServerZone> => {
  const definition = await loader.load(zoneId);
  const zone = ServerZone.fromDefinition(definition, options);
  registerDefaultAbilities(zone.abilityEngine);
  return zone;
};
