import type { ComponentInfo, Connectivity, LabelingStrategy } from '../../../../shared/types';
import { PixelGrid } from './grid';

export interface LabelingOptions {
  connectivity?: Connectivity;
  strategy?: LabelingStrategy;
}

export interface LabelingResult {
  /** Same dimensions as the input, 0 = background */
  labels: PixelGrid<number>;
  count: number;
}

const NEIGHBORS_4: ReadonlyArray<[number, number]> = [
  [-1, 0], [0, -1], [0, 1], [1, 0],
];

const NEIGHBORS_8: ReadonlyArray<[number, number]> = [
  [-1, -1], [-1, 0], [-1, 1],
  [0, -1],           [0, 1],
  [1, -1],  [1, 0],  [1, 1],
];

// Already-visited neighbors in a row-major scan
const CAUSAL_4: ReadonlyArray<[number, number]> = [[-1, 0], [0, -1]];
const CAUSAL_8: ReadonlyArray<[number, number]> = [[-1, -1], [-1, 0], [-1, 1], [0, -1]];

/**
 * Label the connected components of a grid.
 * Non-zero pixels are foreground; neighbors join a component only when they
 * hold the same value. Both strategies yield the same partition, but label
 * numbers can differ between them.
 */
export function labelComponents(grid: PixelGrid<number>, options: LabelingOptions = {}): LabelingResult {
  const connectivity = options.connectivity ?? 8;
  const strategy = options.strategy ?? 'flood';

  if (grid.isEmpty()) {
    return { labels: new PixelGrid<number>(0, 0, 0), count: 0 };
  }

  return strategy === 'two-pass'
    ? labelTwoPass(grid, connectivity)
    : labelFloodFill(grid, connectivity);
}

/**
 * Breadth-first flood labeling.
 * Labels are consecutive, in row-major order of each component's first pixel.
 */
export function labelFloodFill(grid: PixelGrid<number>, connectivity: Connectivity = 8): LabelingResult {
  const { width, height } = grid;
  const labels = new PixelGrid<number>(height, width, 0);
  const work = grid.clone();
  const offsets = connectivity === 4 ? NEIGHBORS_4 : NEIGHBORS_8;
  const queue: number[] = [];
  let current = 0;

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const value = work.get(y, x);
      if (value === 0) continue;

      current++;
      work.set(y, x, 0);
      labels.set(y, x, current);
      queue.length = 0;
      queue.push(y * width + x);

      // Pixels are cleared when enqueued, so each enters the queue once
      for (let head = 0; head < queue.length; head++) {
        const cy = Math.floor(queue[head] / width);
        const cx = queue[head] % width;

        for (const [dy, dx] of offsets) {
          const ny = cy + dy;
          const nx = cx + dx;
          if (work.tryGet(ny, nx) !== value) continue;

          work.set(ny, nx, 0);
          labels.set(ny, nx, current);
          queue.push(ny * width + nx);
        }
      }
    }
  }

  return { labels, count: current };
}

/**
 * Union of provisional labels, resolved to the smallest member of each class
 */
export class EquivalenceClasses {
  private parent: number[] = [0];

  /** Register a fresh label and return it */
  mint(): number {
    const label = this.parent.length;
    this.parent.push(label);
    return label;
  }

  get size(): number {
    return this.parent.length - 1;
  }

  find(label: number): number {
    let root = label;
    while (this.parent[root] !== root) {
      root = this.parent[root];
    }
    // Path compression
    while (this.parent[label] !== root) {
      const next = this.parent[label];
      this.parent[label] = root;
      label = next;
    }
    return root;
  }

  /** Record that all given labels belong to one class */
  merge(labels: number[]): void {
    if (labels.length < 2) return;

    let root = this.find(labels[0]);
    for (let i = 1; i < labels.length; i++) {
      const other = this.find(labels[i]);
      if (other === root) continue;
      // Keep the smaller label as the root so it becomes the representative
      if (other < root) {
        this.parent[root] = other;
        root = other;
      } else {
        this.parent[other] = root;
      }
    }
  }

  /** Number of distinct classes */
  countClasses(): number {
    let count = 0;
    for (let label = 1; label < this.parent.length; label++) {
      if (this.find(label) === label) count++;
    }
    return count;
  }
}

/**
 * Two-pass labeling with an equivalence table.
 * Final labels are the minimal provisional label of each class, so they are
 * not necessarily consecutive.
 */
export function labelTwoPass(grid: PixelGrid<number>, connectivity: Connectivity = 8): LabelingResult {
  const { width, height } = grid;
  const labels = new PixelGrid<number>(height, width, 0);
  const classes = new EquivalenceClasses();
  const causal = connectivity === 4 ? CAUSAL_4 : CAUSAL_8;

  // First pass: provisional labels
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const value = grid.get(y, x);
      if (value === 0) continue;

      const neighborLabels: number[] = [];
      for (const [dy, dx] of causal) {
        if (grid.tryGet(y + dy, x + dx) !== value) continue;
        const label = labels.get(y + dy, x + dx);
        if (label !== 0 && !neighborLabels.includes(label)) {
          neighborLabels.push(label);
        }
      }

      if (neighborLabels.length === 0) {
        labels.set(y, x, classes.mint());
        continue;
      }

      labels.set(y, x, Math.min(...neighborLabels));
      classes.merge(neighborLabels);
    }
  }

  // Second pass: collapse each class to its representative
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const label = labels.get(y, x);
      if (label !== 0) {
        labels.set(y, x, classes.find(label));
      }
    }
  }

  return { labels, count: classes.countClasses() };
}

/**
 * Area and bounding box of every label present in a label grid, sorted by label
 */
export function componentStats(labels: PixelGrid<number>): ComponentInfo[] {
  const stats = new Map<number, ComponentInfo>();

  for (let y = 0; y < labels.height; y++) {
    for (let x = 0; x < labels.width; x++) {
      const label = labels.get(y, x);
      if (label === 0) continue;

      const info = stats.get(label);
      if (!info) {
        stats.set(label, { label, area: 1, bounds: { minX: x, minY: y, maxX: x, maxY: y } });
        continue;
      }

      info.area++;
      info.bounds.minX = Math.min(info.bounds.minX, x);
      info.bounds.maxX = Math.max(info.bounds.maxX, x);
      info.bounds.maxY = Math.max(info.bounds.maxY, y);
    }
  }

  return [...stats.values()].sort((a, b) => a.label - b.label);
}
