import type { Connectivity } from '../../../../shared/types';
import { PixelGrid } from './grid';
import { componentStats, labelComponents } from './labeling';

/**
 * Raster preparation for the topology core.
 * Turns caller grids of arbitrary small integers into {0, 1} grids.
 */

export interface BinarizeOptions {
  /** Values >= threshold are foreground (default 1) */
  threshold?: number;
  /** Swap foreground and background */
  invert?: boolean;
}

/**
 * Binarize nested rows using a threshold
 */
export function binarize(rows: number[][], options: BinarizeOptions = {}): PixelGrid<number> {
  const threshold = options.threshold ?? 1;
  const invert = options.invert ?? false;

  return PixelGrid.fromRows(rows, 0).map(value => ((value >= threshold) !== invert ? 1 : 0), 0);
}

export function countForeground(grid: PixelGrid<number>): number {
  let count = 0;
  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      if (grid.get(y, x) !== 0) count++;
    }
  }
  return count;
}

/**
 * Remove small speckles/noise based on connected component area.
 * Returns a new grid; components with fewer than `minArea` pixels become background.
 */
export function removeSpeckles(grid: PixelGrid<number>, minArea: number, connectivity: Connectivity = 8): PixelGrid<number> {
  if (minArea <= 1 || grid.isEmpty()) {
    return grid.clone();
  }

  const { labels } = labelComponents(grid, { connectivity });
  const small = new Set(
    componentStats(labels)
      .filter(component => component.area < minArea)
      .map(component => component.label),
  );

  if (small.size > 0) {
    console.log(`Removed ${small.size} speckles smaller than ${minArea}px`);
  }

  return grid.map((value, row, col) => (small.has(labels.get(row, col)) ? 0 : value), 0);
}
