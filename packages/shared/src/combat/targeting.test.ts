import { describe, expect, it } from "vitest";
import { point } from "../geometry";
import { ABILITY_DEFINITIONS } from "./abilities";
import { ConfigurationError } from "./errors";
import {
  footprintCells,
  objectSizeContains,
  parseObjectSize,
  tryParseObjectSize,
} from "./object-size";
import {
  collectTargetsInShape,
  createTargetSet,
  resolveTargeterConfig,
  resolveTargetShape,
  resolveTargetSelection,
  type PassabilityQuery,
  type ResolveTargetsParams,
  type TargetCandidate,
} from "./targeting";

const openGround: PassabilityQuery = { isPassable: () => true };
const solidRock: PassabilityQuery = { isPassable: () => false };

const caster: TargetCandidate = { id: "caster", x: 5, y: 5 };

const countingPassability = (
  passable: (x: number, y: number) => boolean,
): PassabilityQuery & { calls: number } => {
  const query = {
    calls: 0,
    isPassable: (_footprint: unknown, x: number, y: number): boolean => {
      query.calls += 1;
      return passable(x, y);
    },
  };
  return query;
};

const createParams = (
  overrides: Partial<ResolveTargetsParams> = {},
): ResolveTargetsParams => ({
  caster,
  config: resolveTargeterConfig(ABILITY_DEFINITIONS.stun_grenade.targeting),
  passability: openGround,
  candidates: [caster],
  ...overrides,
});

describe("object sizes", () => {
  it("parses square and round ids", () => {
    expect(parseObjectSize("2by3")).toEqual({ id: "2by3", width: 2, height: 3, round: false });
    expect(parseObjectSize("7by7round")).toEqual({
      id: "7by7round",
      width: 7,
      height: 7,
      round: true,
    });
  });

  it("rejects malformed ids", () => {
    expect(tryParseObjectSize("0by3")).toBeNull();
    expect(tryParseObjectSize("3by3square")).toBeNull();
    expect(() => parseObjectSize("bogus")).toThrow(ConfigurationError);
    expect(() => parseObjectSize("bogus")).toThrow("No object size 'bogus' found");
  });

  it("includes the boundary of a round footprint", () => {
    const size = parseObjectSize("7by7round");
    const center = point(10, 5);

    expect(objectSizeContains(size, center, point(13.5, 5))).toBe(true);
    expect(objectSizeContains(size, center, point(13.6, 5))).toBe(false);
    expect(objectSizeContains(size, center, point(13, 8))).toBe(false);
    expect(objectSizeContains(size, center, point(12, 7))).toBe(true);
  });

  it("treats square footprints as boxes", () => {
    const size = parseObjectSize("3by3");

    expect(objectSizeContains(size, point(0, 0), point(1.5, -1.5))).toBe(true);
    expect(objectSizeContains(size, point(0, 0), point(1.5, 1.6))).toBe(false);
  });

  it("lists the tiles under a footprint", () => {
    expect(footprintCells(parseObjectSize("1by1"), point(4.6, 7.2))).toEqual([{ x: 4, y: 7 }]);

    const square = footprintCells(parseObjectSize("3by3"), point(5, 5));
    expect(square).toHaveLength(9);
    expect(square[0]).toEqual({ x: 4, y: 4 });
    expect(square[8]).toEqual({ x: 6, y: 6 });

    const round = footprintCells(parseObjectSize("4by4round"), point(5, 5));
    expect(round).toHaveLength(12);
    expect(round).not.toContainEqual({ x: 4, y: 4 });
    expect(round).toContainEqual({ x: 5, y: 4 });
  });
});

describe("resolveTargeterConfig", () => {
  it("defaults the passable footprint to a single tile", () => {
    const config = resolveTargeterConfig({
      maxRange: 4,
      shape: { type: "circle", radius: 2 },
    });

    expect(config.passableFootprint?.id).toBe("1by1");
  });

  it("allows the passability check to be disabled", () => {
    const config = resolveTargeterConfig({
      maxRange: 4,
      passableFootprint: null,
      shape: { type: "circle", radius: 2 },
    });

    expect(config.passableFootprint).toBeNull();
  });

  it("rejects bad ranges and radii", () => {
    expect(() =>
      resolveTargeterConfig({ maxRange: 0, shape: { type: "circle", radius: 2 } }),
    ).toThrow(ConfigurationError);
    expect(() =>
      resolveTargeterConfig({ maxRange: 4, shape: { type: "circle", radius: -1 } }),
    ).toThrow(ConfigurationError);
  });

  it("caps the max range", () => {
    expect(resolveTargeterConfig({ maxRange: 256 }).maxRange).toBe(256);
    expect(() => resolveTargeterConfig({ maxRange: 300 })).toThrow(
      "Targeter max range must be in (0, 256], got 300",
    );
  });

  it("defaults the shape to a single target", () => {
    expect(resolveTargeterConfig({ maxRange: 4 }).shape).toEqual({ type: "single" });
  });
});

describe("resolveTargetSelection", () => {
  it("stays pending until a point is chosen", () => {
    expect(resolveTargetSelection(createParams())).toEqual({ status: "pending" });
  });

  it("cancels when no point in range is passable", () => {
    expect(resolveTargetSelection(createParams({ passability: solidRock }))).toEqual({
      status: "cancelled",
      reason: "no_valid_point",
    });
  });

  it("checks a chosen point on its own even when nothing else is passable", () => {
    expect(resolveTargetSelection(createParams({ passability: solidRock }), point(6, 5))).toEqual({
      status: "rejected",
      reason: "impassable",
    });
  });

  it("lets a sub-tile range target the caster's own position", () => {
    const offGrid: TargetCandidate = { id: "caster", x: 5.5, y: 5.5 };
    const params = createParams({
      caster: offGrid,
      candidates: [offGrid],
      config: resolveTargeterConfig({ maxRange: 0.4 }),
    });

    expect(resolveTargetSelection(params)).toEqual({ status: "pending" });
    expect(resolveTargetSelection(params, point(5.5, 5.5))).toEqual({
      status: "selected",
      targetSet: { selectedPoint: { x: 5.5, y: 5.5 }, actorIds: ["caster"] },
    });
    expect(resolveTargetSelection(params, point(6.5, 5.5))).toEqual({
      status: "rejected",
      reason: "out_of_range",
    });
  });

  it("stops scanning at the first selectable point", () => {
    const passability = countingPassability(() => true);
    const params = createParams({
      passability,
      config: resolveTargeterConfig({ maxRange: 200 }),
    });

    expect(resolveTargetSelection(params)).toEqual({ status: "pending" });
    expect(passability.calls).toBe(1);
  });

  it("scans outward from the caster in rings", () => {
    const passability = countingPassability((x, y) => x === 7 && y === 5);

    expect(resolveTargetSelection(createParams({ passability }))).toEqual({ status: "pending" });
    expect(passability.calls).toBe(19);
  });

  it("checks only the chosen point when selecting", () => {
    const passability = countingPassability(() => true);
    const params = createParams({
      passability,
      config: resolveTargeterConfig({ maxRange: 200 }),
    });

    expect(resolveTargetSelection(params, point(150, 5)).status).toBe("selected");
    expect(passability.calls).toBe(1);
  });

  it("finds a single passable tile anywhere in range", () => {
    const onlyOneTile: PassabilityQuery = {
      isPassable: (_footprint, x, y) => x === 9 && y === 9,
    };

    expect(resolveTargetSelection(createParams({ passability: onlyOneTile }))).toEqual({
      status: "pending",
    });
  });

  it("accepts a point exactly at max range", () => {
    const selection = resolveTargetSelection(createParams(), point(5, 17));

    expect(selection.status).toBe("selected");
  });

  it("rejects points past max range", () => {
    expect(resolveTargetSelection(createParams(), point(5, 17.5))).toEqual({
      status: "rejected",
      reason: "out_of_range",
    });
  });

  it("rejects impassable points", () => {
    const wall: PassabilityQuery = { isPassable: (_footprint, x) => x !== 8 };

    expect(resolveTargetSelection(createParams({ passability: wall }), point(8, 5))).toEqual({
      status: "rejected",
      reason: "impassable",
    });
  });

  it("rejects non-finite points", () => {
    expect(resolveTargetSelection(createParams(), point(Number.NaN, 5))).toEqual({
      status: "rejected",
      reason: "invalid_point",
    });
  });

  it("collects actors in the blast in candidate order", () => {
    const candidates: TargetCandidate[] = [
      { id: "d", x: 12, y: 7 },
      { id: "a", x: 10, y: 5 },
      { id: "c", x: 13, y: 8 },
      { id: "b", x: 13.5, y: 5 },
    ];

    const selection = resolveTargetSelection(createParams({ candidates }), point(10, 5));

    expect(selection).toEqual({
      status: "selected",
      targetSet: { selectedPoint: { x: 10, y: 5 }, actorIds: ["d", "a", "b"] },
    });
  });

  it("selects with an empty target set when the blast is empty", () => {
    const selection = resolveTargetSelection(createParams({ candidates: [] }), point(5, 15));

    expect(selection).toEqual({
      status: "selected",
      targetSet: { selectedPoint: { x: 5, y: 15 }, actorIds: [] },
    });
  });
});

describe("target shapes", () => {
  it("includes the rim of a circle", () => {
    const candidates: TargetCandidate[] = [
      { id: "rim", x: 2, y: 0 },
      { id: "outside", x: 2, y: 0.5 },
    ];

    expect(collectTargetsInShape(candidates, point(0, 0), { type: "circle", radius: 2 })).toEqual([
      "rim",
    ]);
  });

  it("matches only the first actor on the chosen tile for a single target", () => {
    const candidates: TargetCandidate[] = [
      { id: "a", x: 7.2, y: 7.9 },
      { id: "b", x: 7.5, y: 7.5 },
      { id: "c", x: 8, y: 7 },
    ];

    expect(collectTargetsInShape(candidates, point(7.5, 7.5), { type: "single" })).toEqual([
      "a",
    ]);
  });

  it("includes the edges of a line", () => {
    const line = resolveTargetShape({ type: "line", size: "2by2", origin: point(0, 0) });
    const candidates: TargetCandidate[] = [
      { id: "edge", x: 5, y: 1 },
      { id: "wide", x: 5, y: 1.1 },
      { id: "behind", x: -1, y: 0 },
      { id: "past_end", x: 11.5, y: 0 },
    ];

    expect(collectTargetsInShape(candidates, point(10, 0), line)).toEqual(["edge", "behind"]);
  });

  it("runs a line from the caster unless an origin is given", () => {
    const candidates: TargetCandidate[] = [
      { id: "a", x: 5, y: 7 },
      { id: "b", x: 5.6, y: 7 },
      { id: "c", x: 5, y: 11 },
    ];
    const params = createParams({
      candidates,
      config: resolveTargeterConfig({ maxRange: 12, shape: { type: "line", size: "1by1" } }),
    });

    expect(resolveTargetSelection(params, point(5, 10))).toEqual({
      status: "selected",
      targetSet: { selectedPoint: { x: 5, y: 10 }, actorIds: ["a"] },
    });
  });

  it("includes the edges of a cone", () => {
    const cone = resolveTargetShape({
      type: "cone",
      radius: 5,
      angle: Math.PI / 2,
      origin: point(0, 0),
    });
    const candidates: TargetCandidate[] = [
      { id: "edge", x: 3, y: 3 },
      { id: "side", x: 0, y: 3 },
      { id: "wide", x: 3, y: 3.2 },
      { id: "far", x: 6, y: 0 },
      { id: "rim", x: 5, y: 0 },
    ];

    expect(collectTargetsInShape(candidates, point(5, 0), cone)).toEqual(["edge", "rim"]);
  });

  it("validates line and cone shapes", () => {
    expect(() => resolveTargetShape({ type: "line", size: "wide" })).toThrow(
      "No object size 'wide' found",
    );
    expect(() =>
      resolveTargetShape({ type: "line", size: "1by1", origin: point(Number.NaN, 0) }),
    ).toThrow("Line origin must be a finite point");
    expect(() => resolveTargetShape({ type: "cone", radius: 0, angle: 1 })).toThrow(
      "Cone radius must be positive, got 0",
    );
    expect(() => resolveTargetShape({ type: "cone", radius: 3, angle: 7 })).toThrow(
      "Cone angle must not exceed 2π, got 7",
    );
  });

  it("freezes target sets", () => {
    const targets = createTargetSet(point(1, 2), ["a"]);

    expect(Object.isFrozen(targets)).toBe(true);
    expect(Object.isFrozen(targets.actorIds)).toBe(true);
    expect(Object.isFrozen(targets.selectedPoint)).toBe(true);
  });
});
