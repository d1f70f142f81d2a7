import { readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { TileCell } from "@skirmish/shared";
import { logger } from "@skirmish/shared-servers";
import type { ActorSpawn, ZoneDefinition } from "./types";

export class ZoneDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ZoneDefinitionError";
  }
}

type JsonObject = Record<string, unknown>;

const isObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readNumber = (source: JsonObject, key: string, where: string): number => {
  const value = source[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ZoneDefinitionError(`${where}.${key} must be a finite number`);
  }
  return value;
};

const readOptionalNumber = (
  source: JsonObject,
  key: string,
  where: string,
): number | undefined => {
  if (source[key] === undefined) {
    return undefined;
  }
  return readNumber(source, key, where);
};

const readString = (source: JsonObject, key: string, where: string): string => {
  const value = source[key];
  if (typeof value !== "string" || value.length === 0) {
    throw new ZoneDefinitionError(`${where}.${key} must be a non-empty string`);
  }
  return value;
};

const readArray = (source: JsonObject, key: string, where: string): unknown[] => {
  const value = source[key];
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ZoneDefinitionError(`${where}.${key} must be an array`);
  }
  return value;
};

const parseTile = (value: unknown, where: string): TileCell => {
  if (!isObject(value)) {
    throw new ZoneDefinitionError(`${where} must be an object`);
  }
  return { x: readNumber(value, "x", where), y: readNumber(value, "y", where) };
};

const parseSpawn = (value: unknown, where: string): ActorSpawn => {
  if (!isObject(value)) {
    throw new ZoneDefinitionError(`${where} must be an object`);
  }
  const name = value.name;
  if (name !== undefined && typeof name !== "string") {
    throw new ZoneDefinitionError(`${where}.name must be a string`);
  }
  return {
    id: readString(value, "id", where),
    name,
    x: readNumber(value, "x", where),
    y: readNumber(value, "y", where),
    hp: readOptionalNumber(value, "hp", where),
    ap: readOptionalNumber(value, "ap", where),
    meleeAccuracy: readOptionalNumber(value, "meleeAccuracy", where),
    rangedAccuracy: readOptionalNumber(value, "rangedAccuracy", where),
    spellAccuracy: readOptionalNumber(value, "spellAccuracy", where),
    defense: readOptionalNumber(value, "defense", where),
    fortitude: readOptionalNumber(value, "fortitude", where),
    reflex: readOptionalNumber(value, "reflex", where),
    will: readOptionalNumber(value, "will", where),
  };
};

/** Validate parsed zone JSON into a definition. */
export const parseZoneDefinition = (value: unknown): ZoneDefinition => {
  if (!isObject(value)) {
    throw new ZoneDefinitionError("Zone definition must be an object");
  }
  const id = readString(value, "id", "zone");
  const width = readNumber(value, "width", id);
  const height = readNumber(value, "height", id);
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new ZoneDefinitionError(`${id} dimensions must be positive integers`);
  }

  return {
    id,
    width,
    height,
    blockedTiles: readArray(value, "blockedTiles", id).map((tile, index) =>
      parseTile(tile, `${id}.blockedTiles[${index}]`),
    ),
    actors: readArray(value, "actors", id).map((spawn, index) =>
      parseSpawn(spawn, `${id}.actors[${index}]`),
    ),
  };
};

export abstract class ZoneDataLoader {
  abstract load(zoneId: string): Promise<ZoneDefinition>;
}

export class DefaultZoneLoader extends ZoneDataLoader {
  private static readonly ZONES_ASSET_PATH = fileURLToPath(
    new URL("../../../zones", import.meta.url),
  );

  constructor(private readonly zonesPath: string = DefaultZoneLoader.ZONES_ASSET_PATH) {
    super();
  }

  async load(zoneId: string): Promise<ZoneDefinition> {
    try {
      return await this.loadZoneDefinitionFromAssets(zoneId);
    } catch (error) {
      logger.error({ err: error, zoneId }, "Failed to load zone definition");
      throw error;
    }
  }

  protected getZoneAssetsPath(): string {
    return this.zonesPath;
  }

  protected async loadZoneDefinitionFromAssets(zoneId: string): Promise<ZoneDefinition> {
    const zonePath = path.resolve(this.getZoneAssetsPath(), `${zoneId}.zone.json`);
    const json = await readFile(zonePath, "utf8");
    const parsed: unknown = JSON.parse(json);
    return parseZoneDefinition(parsed);
  }
}
