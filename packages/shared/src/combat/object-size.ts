import { ConfigurationError } from "./errors";
import type { Point } from "../geometry";

/**
 * Rectangular or round footprint measured in tiles, identified by ids such
 * as `1by1`, `3by3` or `7by7round`.
 */
export interface ObjectSize {
  id: string;
  width: number;
  height: number;
  round: boolean;
}

export interface TileCell {
  x: number;
  y: number;
}

const OBJECT_SIZE_PATTERN = /^(\d+)by(\d+)(round)?$/;

export const tryParseObjectSize = (id: string): ObjectSize | null => {
  const match = OBJECT_SIZE_PATTERN.exec(id);
  if (!match) {
    return null;
  }
  const width = Number.parseInt(match[1], 10);
  const height = Number.parseInt(match[2], 10);
  if (width <= 0 || height <= 0) {
    return null;
  }
  return { id, width, height, round: match[3] !== undefined };
};

export const parseObjectSize = (id: string): ObjectSize => {
  const size = tryParseObjectSize(id);
  if (!size) {
    throw new ConfigurationError(`No object size '${id}' found`);
  }
  return size;
};

/**
 * Whether `position` lies inside the footprint centered on `center`.
 * Boundaries are inclusive for both round and square footprints.
 */
export const objectSizeContains = (
  size: ObjectSize,
  center: Point,
  position: Point,
): boolean => {
  const halfWidth = size.width / 2;
  const halfHeight = size.height / 2;
  const dx = position.x - center.x;
  const dy = position.y - center.y;

  if (size.round) {
    const nx = dx / halfWidth;
    const ny = dy / halfHeight;
    return nx * nx + ny * ny <= 1;
  }

  return Math.abs(dx) <= halfWidth && Math.abs(dy) <= halfHeight;
};

/** Tiles covered by the footprint when it is placed on the tile under `anchor`. */
export const footprintCells = (size: ObjectSize, anchor: Point): TileCell[] => {
  const startX = Math.floor(anchor.x) - Math.floor((size.width - 1) / 2);
  const startY = Math.floor(anchor.y) - Math.floor((size.height - 1) / 2);
  const halfWidth = size.width / 2;
  const halfHeight = size.height / 2;
  const cells: TileCell[] = [];

  for (let row = 0; row < size.height; row += 1) {
    for (let column = 0; column < size.width; column += 1) {
      if (size.round) {
        const nx = (column - (size.width - 1) / 2) / halfWidth;
        const ny = (row - (size.height - 1) / 2) / halfHeight;
        if (nx * nx + ny * ny > 1) {
          continue;
        }
      }
      cells.push({ x: startX + column, y: startY + row });
    }
  }

  return cells;
};
