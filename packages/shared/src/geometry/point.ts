/** Immutable 2D world coordinate. */
export interface Point {
  readonly x: number;
  readonly y: number;
}

export const point = (x: number, y: number): Point => Object.freeze({ x, y });

export const distanceBetween = (a: Point, b: Point): number => {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  return Math.sqrt(dx * dx + dy * dy);
};

export const isFinitePoint = (value: Point): boolean =>
  Number.isFinite(value.x) && Number.isFinite(value.y);
