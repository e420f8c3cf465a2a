import type { Point } from '../../../../shared/types';
import { InternalInvariantError } from './errors';
import type { PixelGrid } from './grid';

/**
 * Compass directions in clockwise order, starting at north.
 * Rows grow southwards, columns eastwards.
 */
export enum Direction {
  North = 0,
  NorthEast,
  East,
  SouthEast,
  South,
  SouthWest,
  West,
  NorthWest,
}

export const DIRECTION_COUNT = 8;

const DX = [0, 1, 1, 1, 0, -1, -1, -1];
const DY = [-1, -1, 0, 1, 1, 1, 0, -1];

/** Signature shared by {@link activeNeighbor} and replacement probes */
export type NeighborProbe = (grid: PixelGrid<number>, point: Point, direction: Direction) => Point | null;

export function clockwise(direction: Direction): Direction {
  return (direction + 1) % DIRECTION_COUNT;
}

export function counterClockwise(direction: Direction): Direction {
  return (direction + DIRECTION_COUNT - 1) % DIRECTION_COUNT;
}

export function step(point: Point, direction: Direction): Point {
  return { x: point.x + DX[direction], y: point.y + DY[direction] };
}

/**
 * Neighbor of `point` in `direction` if it lies inside the grid and holds a non-zero value
 */
export const activeNeighbor: NeighborProbe = (grid, point, direction) => {
  const next = step(point, direction);
  const value = grid.tryGet(next.y, next.x);
  return value !== undefined && value !== 0 ? next : null;
};

/**
 * Compass direction of `to` as seen from `from`.
 * Only the signs of the offsets matter, so non-adjacent points map to the
 * octant they fall in.
 */
export function directionBetween(from: Point, to: Point): Direction {
  if (from.x === to.x && from.y === to.y) {
    throw new InternalInvariantError(`No direction between identical points (${from.x}, ${from.y})`);
  }

  if (from.y === to.y) {
    return from.x < to.x ? Direction.East : Direction.West;
  }

  if (from.y < to.y) {
    if (from.x === to.x) return Direction.South;
    return from.x < to.x ? Direction.SouthEast : Direction.SouthWest;
  }

  if (from.x === to.x) return Direction.North;
  return from.x < to.x ? Direction.NorthEast : Direction.NorthWest;
}
