import simplify from 'simplify-js';
import type { ContourNode, ContourTree, ContourType, Point, RetrievalMode } from '../../../../shared/types';
import {
  Direction,
  DIRECTION_COUNT,
  activeNeighbor,
  clockwise,
  counterClockwise,
  directionBetween,
} from './direction';
import type { NeighborProbe } from './direction';
import { InternalInvariantError } from './errors';
import type { PixelGrid } from './grid';

export interface ContourOptions {
  /** Which borders end up in the returned tree (default 'tree') */
  retrieval?: RetrievalMode;
  /** Probe used while walking a border; defaults to {@link activeNeighbor} */
  neighborProbe?: NeighborProbe;
}

export interface ExtractionStats {
  /** Borders kept in the full tree */
  borders: number;
  /** Borders discarded because the walk ran out of neighbors */
  degenerate: number;
}

export interface ExtractionResult {
  tree: ContourTree;
  stats: ExtractionStats;
}

/**
 * Outcome of walking one border.
 * 'isolated' means the start pixel has no foreground neighbor and forms the
 * whole border.
 */
export type BorderWalk = 'closed' | 'isolated' | 'degenerate';

// What a border id on the marker grid refers to
interface BorderRef {
  type: ContourType;
  index: number;
  parent: number;
}

/**
 * Extract the border tree of a binary grid using topological border following.
 * Non-zero input pixels are foreground. The input grid is not modified.
 */
export function extractContours(grid: PixelGrid<number>, options: ContourOptions = {}): ContourTree {
  return extractContoursWithStats(grid, options).tree;
}

export function extractContoursWithStats(grid: PixelGrid<number>, options: ContourOptions = {}): ExtractionResult {
  const probe = options.neighborProbe ?? activeNeighbor;
  const root: ContourNode = { index: 0, type: 'background', points: [], parent: -1, children: [] };
  const nodes: ContourNode[] = [root];
  const stats: ExtractionStats = { borders: 0, degenerate: 0 };

  if (grid.isEmpty()) {
    return { tree: { nodes }, stats };
  }

  // Border ids are written here instead of into the caller's grid
  const markers = grid.map<number>(value => (value !== 0 ? 1 : 0), 0);
  const lastColumn = markers.width - 1;
  const borders = new Map<number, BorderRef>([[1, { type: 'background', index: 0, parent: -1 }]]);
  let nbd = 1;

  for (let y = 0; y < markers.height; y++) {
    let lnbd = 1;

    for (let x = 0; x < markers.width; x++) {
      const f = markers.get(y, x);
      const isOuter = f === 1 && (x === 0 || markers.get(y, x - 1) === 0);
      const isHole = !isOuter && f >= 1 && (x === lastColumn || markers.get(y, x + 1) === 0);

      if (isOuter || isHole) {
        if (isHole && f > 1) {
          lnbd = f;
        }
        nbd++;

        const type: ContourType = isOuter ? 'outer' : 'hole';
        const enclosing = borders.get(lnbd);
        if (!enclosing) {
          throw new InternalInvariantError(`Border ${lnbd} was never registered`);
        }

        const parent = resolveParent(type, enclosing);
        const node: ContourNode = { index: nodes.length, type, points: [], parent, children: [] };
        nodes.push(node);
        nodes[parent].children.push(node.index);

        const start: Point = { x, y };
        const from: Point = { x: isOuter ? x - 1 : x + 1, y };
        const walk = followBorder(markers, start, from, node.points, nbd, probe);

        if (walk === 'degenerate') {
          nodes.pop();
          nodes[parent].children.pop();
          markers.set(y, x, -nbd);
          // Later lookups of a discarded id land on its would-be parent
          borders.set(nbd, { type: nodes[parent].type, index: parent, parent: nodes[parent].parent });
          stats.degenerate++;
          console.warn(`Discarded degenerate ${type} border ${nbd} starting at (${x}, ${y})`);
        } else {
          if (walk === 'isolated') {
            node.points.push(start);
            markers.set(y, x, -nbd);
          }
          borders.set(nbd, { type, index: node.index, parent });
          stats.borders++;
        }
      }

      const marker = markers.get(y, x);
      if (marker !== 0 && marker !== 1) {
        lnbd = Math.abs(marker);
      }
    }
  }

  console.log(`Extracted ${stats.borders} borders (${stats.degenerate} degenerate)`);
  return { tree: applyRetrieval({ nodes }, options.retrieval ?? 'tree'), stats };
}

/**
 * Parent of a new border given the border last met on the scan row.
 * Outer and hole borders alternate with depth.
 */
function resolveParent(type: ContourType, enclosing: BorderRef): number {
  // The root has no parent of its own
  const enclosingParent = enclosing.parent >= 0 ? enclosing.parent : 0;

  if (type === 'outer') {
    return enclosing.type === 'outer' ? enclosingParent : enclosing.index;
  }
  return enclosing.type === 'outer' ? enclosing.index : enclosingParent;
}

/**
 * Walk one border starting at `start`, entered from the background pixel `from`.
 * Visited pixels are appended to `points` and marked with the border id.
 */
export function followBorder(
  markers: PixelGrid<number>,
  start: Point,
  from: Point,
  points: Point[],
  nbd: number,
  probe: NeighborProbe = activeNeighbor,
): BorderWalk {
  let direction = directionBetween(start, from);
  let trace = clockwise(direction);
  let first: Point | null = null;

  while (trace !== direction) {
    first = probe(markers, start, trace);
    if (first) break;
    trace = clockwise(trace);
  }

  if (!first) {
    return 'isolated';
  }

  let previous = first;
  let current = start;
  const examined = new Array<boolean>(DIRECTION_COUNT).fill(false);

  for (;;) {
    direction = directionBetween(current, previous);
    trace = counterClockwise(direction);
    examined.fill(false);

    let next: Point | null = null;
    for (let attempt = 0; attempt < DIRECTION_COUNT; attempt++) {
      next = probe(markers, current, trace);
      if (next) break;
      examined[trace] = true;
      trace = counterClockwise(trace);
    }

    if (!next) {
      return 'degenerate';
    }

    points.push(current);
    markBorderPixel(markers, current, examined, nbd);

    if (samePoint(next, start) && samePoint(current, first)) {
      return 'closed';
    }

    previous = current;
    current = next;
  }
}

function markBorderPixel(markers: PixelGrid<number>, point: Point, examined: boolean[], nbd: number): void {
  const value = markers.get(point.y, point.x);
  const crossesEast = value !== 0 && (point.x === markers.width - 1 || examined[Direction.East]);

  if (crossesEast) {
    markers.set(point.y, point.x, -nbd);
  } else if (value === 1) {
    markers.set(point.y, point.x, nbd);
  }
}

function samePoint(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y;
}

function applyRetrieval(tree: ContourTree, mode: RetrievalMode): ContourTree {
  const [root, ...borders] = tree.nodes;

  switch (mode) {
    case 'tree':
      return tree;

    case 'list':
      return {
        nodes: [
          { ...root, children: borders.map(node => node.index) },
          ...borders.map(node => ({ ...node, parent: 0, children: [] })),
        ],
      };

    case 'external': {
      const outermost = root.children.map(index => tree.nodes[index]).filter(node => node.type === 'outer');
      return {
        nodes: [
          { ...root, children: outermost.map((_, i) => i + 1) },
          ...outermost.map((node, i) => ({ ...node, index: i + 1, parent: 0, children: [] })),
        ],
      };
    }
  }
}

/**
 * Point lists of every border in depth-first order, root excluded
 */
export function contourPoints(tree: ContourTree): Point[][] {
  const result: Point[][] = [];
  const visit = (index: number): void => {
    const node = tree.nodes[index];
    if (node.type !== 'background') {
      result.push(node.points);
    }
    node.children.forEach(visit);
  };

  if (tree.nodes.length > 0) {
    visit(0);
  }
  return result;
}

/**
 * Paint contour points into a grid
 */
export function drawContours(grid: PixelGrid<number>, contours: Point[][], value: number): void {
  for (const contour of contours) {
    for (const point of contour) {
      grid.set(point.y, point.x, value);
    }
  }
}

/**
 * Simplify every border using Douglas-Peucker algorithm.
 * Returns a new tree; the input tree is left untouched.
 */
export function simplifyContours(tree: ContourTree, epsilon: number): ContourTree {
  if (epsilon <= 0) return tree;

  return {
    nodes: tree.nodes.map(node => ({
      ...node,
      points: simplifyPoints(node.points, epsilon),
    })),
  };
}

function simplifyPoints(points: Point[], epsilon: number): Point[] {
  if (points.length <= 2) return points;

  const simplified = simplify(points.map(p => ({ x: p.x, y: p.y })), epsilon, true); // High quality
  return simplified.map(p => ({ x: p.x, y: p.y }));
}
