import { PixelGrid } from '../apps/server/src/trace/grid';
import type { ContourTree } from '../shared/types';

export type Rng = () => number;

/** Seeded mulberry32 generator so fixtures are reproducible */
export function createPRNG(seed: number): Rng {
  return () => {
    seed |= 0;
    seed = (seed + 0x6d2b79f5) | 0;
    let t = Math.imul(seed ^ (seed >>> 15), 1 | seed);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomRows(seed: number, height: number, width: number, density: number): number[][] {
  const rng = createPRNG(seed);
  const rows: number[][] = [];
  for (let y = 0; y < height; y++) {
    const row: number[] = [];
    for (let x = 0; x < width; x++) {
      row.push(rng() < density ? 1 : 0);
    }
    rows.push(row);
  }
  return rows;
}

export const gridOf = (rows: number[][]): PixelGrid<number> => PixelGrid.fromRows(rows, 0);

/**
 * Canonical form of a labeling: sorted pixel-key lists, one per label.
 * Two labelings with the same partition compare equal whatever their label numbers.
 */
export function partition(labels: PixelGrid<number>): string[][] {
  const groups = new Map<number, string[]>();
  for (let y = 0; y < labels.height; y++) {
    for (let x = 0; x < labels.width; x++) {
      const label = labels.get(y, x);
      if (label === 0) continue;
      const group = groups.get(label) ?? [];
      group.push(`${x},${y}`);
      groups.set(label, group);
    }
  }
  return [...groups.values()].map(group => group.sort()).sort((a, b) => a[0].localeCompare(b[0]));
}

/** Foreground pixels with at least one background (or off-grid) 4-neighbor */
export function boundaryKeys(rows: number[][]): string[] {
  const keys: string[] = [];
  rows.forEach((row, y) => {
    row.forEach((value, x) => {
      if (value === 0) return;
      const neighbors = [rows[y - 1]?.[x], rows[y + 1]?.[x], row[x - 1], row[x + 1]];
      if (neighbors.some(neighbor => neighbor === undefined || neighbor === 0)) {
        keys.push(`${x},${y}`);
      }
    });
  });
  return keys.sort();
}

export function nonZeroKeys(grid: PixelGrid<number>): string[] {
  const keys: string[] = [];
  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      if (grid.get(y, x) !== 0) keys.push(`${x},${y}`);
    }
  }
  return keys.sort();
}

/**
 * Structural problems of a contour tree; empty when the tree is well formed
 */
export function treeProblems(tree: ContourTree): string[] {
  const problems: string[] = [];
  const { nodes } = tree;

  if (nodes.length === 0 || nodes[0].type !== 'background' || nodes[0].parent !== -1) {
    return ['missing background root'];
  }

  nodes.forEach((node, index) => {
    if (node.index !== index) problems.push(`node ${index} has index ${node.index}`);
    if (index > 0 && node.type === 'background') problems.push(`extra root at ${index}`);
    if (index === 0) return;

    const parent = nodes[node.parent];
    if (!parent) {
      problems.push(`node ${index} has no parent`);
      return;
    }
    if (parent.children.filter(child => child === index).length !== 1) {
      problems.push(`parent ${node.parent} does not list ${index} exactly once`);
    }
    if (node.type === 'hole' && parent.type !== 'outer') {
      problems.push(`hole ${index} sits under ${parent.type}`);
    }
    if (node.type === 'outer' && parent.type === 'outer') {
      problems.push(`outer ${index} sits under outer`);
    }
  });

  nodes.forEach((node, index) => {
    node.children.forEach(child => {
      if (nodes[child]?.parent !== index) problems.push(`child ${child} does not point back to ${index}`);
    });
  });

  // Every node reachable exactly once from the root
  const seen = new Set<number>();
  const stack = [0];
  while (stack.length > 0) {
    const index = stack.pop() ?? 0;
    if (seen.has(index)) {
      problems.push(`node ${index} reached twice`);
      continue;
    }
    seen.add(index);
    stack.push(...nodes[index].children);
  }
  if (seen.size !== nodes.length) problems.push(`${nodes.length - seen.size} nodes unreachable`);

  return problems;
}
