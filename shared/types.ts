/**
 * Shared TypeScript types for the pixel topology API
 */

export type Connectivity = 4 | 8;

export type LabelingStrategy = 'flood' | 'two-pass';

export type ContourType = 'outer' | 'hole' | 'background';

/** How much of the border tree an extraction returns */
export type RetrievalMode = 'tree' | 'list' | 'external';

export interface Point {
  /** Column */
  x: number;
  /** Row */
  y: number;
}

export interface ContourNode {
  /** Position of this node in {@link ContourTree.nodes} */
  index: number;
  type: ContourType;
  /** Boundary pixels in tracing order */
  points: Point[];
  /** Parent node index (-1 for the root) */
  parent: number;
  /** Child node indices */
  children: number[];
}

export interface ContourTree {
  /** nodes[0] is always the background root */
  nodes: ContourNode[];
}

export interface ComponentInfo {
  label: number;
  area: number;
  bounds: {
    minX: number;
    minY: number;
    maxX: number;
    maxY: number;
  };
}

interface GridRequest {
  /** Row-major pixel values */
  grid: number[][];
  /** Values >= threshold are foreground (default 1) */
  threshold?: number;
  /** Treat values below the threshold as foreground */
  invert?: boolean;
  /** Drop components smaller than this many pixels */
  despeckleAreaMin?: number;
}

export interface ComponentsRequest extends GridRequest {
  connectivity?: Connectivity;
  strategy?: LabelingStrategy;
}

export interface ContoursRequest extends GridRequest {
  retrieval?: RetrievalMode;
  /** Douglas-Peucker tolerance in pixels (0 keeps every point) */
  epsilon?: number;
}

export interface AnalysisMetrics {
  width: number;
  height: number;
  foregroundPixels: number;
  timings: {
    preprocessing: number;
    analysis: number;
    total: number;
  };
}

export interface ComponentsResponse {
  labels: number[][];
  count: number;
  components: ComponentInfo[];
  metrics: AnalysisMetrics;
}

export interface ContoursResponse {
  tree: ContourTree;
  /** Borders discarded because the walk could not continue */
  degenerateBorders: number;
  metrics: AnalysisMetrics & {
    borderCount: number;
    pointCount: number;
  };
}

export interface ErrorResponse {
  error: string;
  details?: unknown;
  code?: string;
}
