import {
  DEFAULT_PASSABLE_FOOTPRINT,
  MAX_TARGETER_RANGE,
  SHAPE_ANGLE_TOLERANCE,
} from "../constants";
import { distanceBetween, isFinitePoint, point, type Point } from "../geometry";
import { ConfigurationError } from "./errors";
import {
  objectSizeContains,
  parseObjectSize,
  type ObjectSize,
} from "./object-size";

export interface TargetCandidate {
  id: string;
  x: number;
  y: number;
}

/**
 * Area gathered around the selected point. `line` and `cone` run from an
 * origin, the caster's position unless one is given; a cone's `angle` is
 * its full aperture in radians.
 */
export type TargetShape =
  | { type: "single" }
  | { type: "object_size"; size: string }
  | { type: "circle"; radius: number }
  | { type: "line"; size: string; origin?: Point }
  | { type: "cone"; radius: number; angle: number; origin?: Point };

export type ResolvedTargetShape =
  | { type: "single" }
  | { type: "object_size"; size: ObjectSize }
  | { type: "circle"; radius: number }
  | { type: "line"; size: ObjectSize; origin: Point | null }
  | { type: "cone"; radius: number; angle: number; origin: Point | null };

/** Authoring-time targeter settings for a free-point ability. */
export interface TargeterConfig {
  maxRange: number;
  /** Footprint that must be passable at the chosen point; null disables the check. */
  passableFootprint?: string | null;
  /** Defaults to `single`. */
  shape?: TargetShape;
}

export interface ResolvedTargeterConfig {
  maxRange: number;
  passableFootprint: ObjectSize | null;
  shape: ResolvedTargetShape;
}

export interface PassabilityQuery {
  isPassable(footprint: ObjectSize, x: number, y: number): boolean;
}

/** Selected point plus weak actor references, in shape discovery order. */
export interface TargetSet {
  readonly selectedPoint: Point;
  readonly actorIds: readonly string[];
}

export type SelectionRejectReason = "out_of_range" | "impassable" | "invalid_point";
export type SelectionCancelReason = "no_valid_point" | "cancelled" | "caster_removed";

export type TargetSelection =
  | { status: "pending" }
  | { status: "rejected"; reason: SelectionRejectReason }
  | { status: "cancelled"; reason: SelectionCancelReason }
  | { status: "selected"; targetSet: TargetSet };

export interface ResolveTargetsParams {
  caster: TargetCandidate;
  config: ResolvedTargeterConfig;
  passability: PassabilityQuery;
  candidates: readonly TargetCandidate[];
}

const requirePositive = (value: number, label: string): void => {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${label} must be positive, got ${value}`);
  }
};

const resolveOrigin = (origin: Point | undefined, label: string): Point | null => {
  if (origin === undefined) {
    return null;
  }
  if (!isFinitePoint(origin)) {
    throw new ConfigurationError(`${label} origin must be a finite point`);
  }
  return point(origin.x, origin.y);
};

export function resolveTargetShape(shape: TargetShape): ResolvedTargetShape {
  switch (shape.type) {
    case "single": {
      return { type: "single" };
    }
    case "object_size": {
      return { type: "object_size", size: parseObjectSize(shape.size) };
    }
    case "circle": {
      requirePositive(shape.radius, "Circle radius");
      return { type: "circle", radius: shape.radius };
    }
    case "line": {
      return {
        type: "line",
        size: parseObjectSize(shape.size),
        origin: resolveOrigin(shape.origin, "Line"),
      };
    }
    case "cone": {
      requirePositive(shape.radius, "Cone radius");
      requirePositive(shape.angle, "Cone angle");
      if (shape.angle > Math.PI * 2) {
        throw new ConfigurationError(`Cone angle must not exceed 2π, got ${shape.angle}`);
      }
      return {
        type: "cone",
        radius: shape.radius,
        angle: shape.angle,
        origin: resolveOrigin(shape.origin, "Cone"),
      };
    }
    default: {
      throw new ConfigurationError("Unknown target shape");
    }
  }
}

export function resolveTargeterConfig(config: TargeterConfig): ResolvedTargeterConfig {
  if (
    !Number.isFinite(config.maxRange) ||
    config.maxRange <= 0 ||
    config.maxRange > MAX_TARGETER_RANGE
  ) {
    throw new ConfigurationError(
      `Targeter max range must be in (0, ${MAX_TARGETER_RANGE}], got ${config.maxRange}`,
    );
  }

  const footprintId =
    config.passableFootprint === undefined
      ? DEFAULT_PASSABLE_FOOTPRINT
      : config.passableFootprint;

  return {
    maxRange: config.maxRange,
    passableFootprint: footprintId === null ? null : parseObjectSize(footprintId),
    shape: resolveTargetShape(config.shape ?? { type: "single" }),
  };
}

/** Distance from `position` to the segment `start`..`end`. */
const distanceToSegment = (start: Point, end: Point, position: Point): number => {
  const dx = end.x - start.x;
  const dy = end.y - start.y;
  const lengthSquared = dx * dx + dy * dy;
  if (lengthSquared === 0) {
    return distanceBetween(start, position);
  }
  const along = ((position.x - start.x) * dx + (position.y - start.y) * dy) / lengthSquared;
  const t = Math.min(1, Math.max(0, along));
  return distanceBetween({ x: start.x + t * dx, y: start.y + t * dy }, position);
};

const coneContains = (
  radius: number,
  angle: number,
  origin: Point,
  aim: Point,
  position: Point,
): boolean => {
  const distance = distanceBetween(origin, position);
  if (distance > radius) {
    return false;
  }
  const aimLength = distanceBetween(origin, aim);
  // No direction to face: the cone covers its whole radius.
  if (distance === 0 || aimLength === 0) {
    return true;
  }
  const dot =
    (position.x - origin.x) * (aim.x - origin.x) + (position.y - origin.y) * (aim.y - origin.y);
  const cosine = Math.min(1, Math.max(-1, dot / (distance * aimLength)));
  return Math.acos(cosine) <= angle / 2 + SHAPE_ANGLE_TOLERANCE;
};

/**
 * Whether `position` falls in the shape placed at `center`. Every boundary
 * is inclusive. A `single` shape matches positions on the center's tile.
 */
export function shapeContains(
  shape: ResolvedTargetShape,
  center: Point,
  position: Point,
  origin: Point = center,
): boolean {
  switch (shape.type) {
    case "single": {
      return (
        Math.floor(position.x) === Math.floor(center.x) &&
        Math.floor(position.y) === Math.floor(center.y)
      );
    }
    case "object_size": {
      return objectSizeContains(shape.size, center, position);
    }
    case "circle": {
      return distanceBetween(center, position) <= shape.radius;
    }
    case "line": {
      const start = shape.origin ?? origin;
      return distanceToSegment(start, center, position) <= shape.size.width / 2;
    }
    case "cone": {
      const start = shape.origin ?? origin;
      return coneContains(shape.radius, shape.angle, start, center, position);
    }
  }
}

/** Ids of candidates inside the shape, in candidate order. */
export function collectTargetsInShape(
  candidates: readonly TargetCandidate[],
  center: Point,
  shape: ResolvedTargetShape,
  origin: Point = center,
): string[] {
  const targets: string[] = [];
  for (const candidate of candidates) {
    if (shapeContains(shape, center, candidate, origin)) {
      targets.push(candidate.id);
      if (shape.type === "single") {
        break;
      }
    }
  }
  return targets;
}

export function checkSelectablePoint(
  params: Omit<ResolveTargetsParams, "candidates">,
  selected: Point,
): SelectionRejectReason | null {
  if (!isFinitePoint(selected)) {
    return "invalid_point";
  }

  const { caster, config, passability } = params;
  if (distanceBetween(caster, selected) > config.maxRange) {
    return "out_of_range";
  }

  const footprint = config.passableFootprint;
  if (footprint && !passability.isPassable(footprint, selected.x, selected.y)) {
    return "impassable";
  }

  return null;
}

/**
 * Whether any point could be selected: the caster's own position first, then
 * whole-tile points in rings around it, stopping at the first hit.
 */
export function hasSelectablePoint(
  params: Omit<ResolveTargetsParams, "candidates">,
): boolean {
  const { caster, config } = params;
  if (checkSelectablePoint(params, caster) === null) {
    return true;
  }

  const originX = Math.round(caster.x);
  const originY = Math.round(caster.y);
  const reach = Math.ceil(config.maxRange) + 1;

  for (let ring = 0; ring <= reach; ring += 1) {
    for (let y = originY - ring; y <= originY + ring; y += 1) {
      const onEdgeRow = y === originY - ring || y === originY + ring;
      const step = onEdgeRow ? 1 : ring * 2;
      for (let x = originX - ring; x <= originX + ring; x += step) {
        if (checkSelectablePoint(params, { x, y }) === null) {
          return true;
        }
      }
    }
  }
  return false;
}

export function createTargetSet(
  selectedPoint: Point,
  actorIds: readonly string[],
): TargetSet {
  return Object.freeze({
    selectedPoint: point(selectedPoint.x, selectedPoint.y),
    actorIds: Object.freeze([...actorIds]),
  });
}

/**
 * Without a point, reports whether the targeter can be used at all
 * (`pending`) or not (`cancelled`). With a point, checks only that point.
 */
export function resolveTargetSelection(
  params: ResolveTargetsParams,
  selectedPoint?: Point,
): TargetSelection {
  if (!selectedPoint) {
    return hasSelectablePoint(params)
      ? { status: "pending" }
      : { status: "cancelled", reason: "no_valid_point" };
  }

  const rejectReason = checkSelectablePoint(params, selectedPoint);
  if (rejectReason) {
    return { status: "rejected", reason: rejectReason };
  }

  const actorIds = collectTargetsInShape(
    params.candidates,
    selectedPoint,
    params.config.shape,
    params.caster,
  );
  return { status: "selected", targetSet: createTargetSet(selectedPoint, actorIds) };
}
