import { extractContoursWithStats, simplifyContours } from './contour';
import { GridTooLargeError } from './errors';
import type { PixelGrid } from './grid';
import { componentStats, labelComponents } from './labeling';
import { binarize, countForeground, removeSpeckles } from './raster';
import type {
  AnalysisMetrics,
  ComponentsRequest,
  Connectivity,
  ComponentsResponse,
  ContoursRequest,
  ContoursResponse,
} from '../../../../shared/types';

export interface PipelineLimits {
  maxGridPixels: number;
}

const DEFAULT_LIMITS: PipelineLimits = { maxGridPixels: 4_000_000 };

interface PreparedGrid {
  grid: PixelGrid<number>;
  preprocessing: number;
}

/**
 * Binarize and despeckle the request grid
 */
function prepareGrid(
  request: ComponentsRequest | ContoursRequest,
  limits: PipelineLimits,
  connectivity: Connectivity = 8,
): PreparedGrid {
  const start = Date.now();
  const pixels = request.grid.reduce((total, row) => total + row.length, 0);
  if (pixels > limits.maxGridPixels) {
    throw new GridTooLargeError(pixels, limits.maxGridPixels);
  }

  let grid = binarize(request.grid, { threshold: request.threshold, invert: request.invert });
  if (request.despeckleAreaMin !== undefined) {
    grid = removeSpeckles(grid, request.despeckleAreaMin, connectivity);
  }

  return { grid, preprocessing: Date.now() - start };
}

function buildMetrics(grid: PixelGrid<number>, preprocessing: number, analysis: number): AnalysisMetrics {
  return {
    width: grid.width,
    height: grid.height,
    foregroundPixels: countForeground(grid),
    timings: {
      preprocessing,
      analysis,
      total: preprocessing + analysis,
    },
  };
}

/**
 * Label the connected components of a request grid
 */
export function analyzeComponents(request: ComponentsRequest, limits: PipelineLimits = DEFAULT_LIMITS): ComponentsResponse {
  const connectivity = request.connectivity ?? 8;
  const { grid, preprocessing } = prepareGrid(request, limits, connectivity);

  const start = Date.now();
  const { labels, count } = labelComponents(grid, { connectivity, strategy: request.strategy });
  const components = componentStats(labels);
  const analysis = Date.now() - start;

  console.log(`Labeled ${grid.width}x${grid.height} grid: ${count} components (${connectivity}-connected)`);

  return {
    labels: labels.toRows(),
    count,
    components,
    metrics: buildMetrics(grid, preprocessing, analysis),
  };
}

/**
 * Extract the border tree of a request grid
 */
export function analyzeContours(request: ContoursRequest, limits: PipelineLimits = DEFAULT_LIMITS): ContoursResponse {
  const { grid, preprocessing } = prepareGrid(request, limits);

  const start = Date.now();
  const { tree, stats } = extractContoursWithStats(grid, { retrieval: request.retrieval });
  const simplified = simplifyContours(tree, request.epsilon ?? 0);
  const analysis = Date.now() - start;

  const pointCount = simplified.nodes.reduce((total, node) => total + node.points.length, 0);

  return {
    tree: simplified,
    degenerateBorders: stats.degenerate,
    metrics: {
      ...buildMetrics(grid, preprocessing, analysis),
      borderCount: simplified.nodes.length - 1,
      pointCount,
    },
  };
}
