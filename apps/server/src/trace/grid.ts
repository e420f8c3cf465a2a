import { OutOfRangeError } from './errors';

/**
 * Row-major 2-D buffer with bounds-checked access.
 * `tryGet` is the non-throwing accessor used by all border probes.
 */
export class PixelGrid<T> {
  private data: T[];
  private rows: number;
  private cols: number;

  constructor(height: number, width: number, fill: T) {
    this.rows = Math.max(0, height);
    this.cols = Math.max(0, width);
    this.data = new Array<T>(this.rows * this.cols).fill(fill);
  }

  /**
   * Build a grid from nested rows.
   * Empty or ragged input yields an empty grid so callers treat it as a no-op.
   */
  static fromRows<T>(rows: T[][], fill: T): PixelGrid<T> {
    const height = rows.length;
    const width = height > 0 ? rows[0].length : 0;

    if (height === 0 || width === 0) {
      return new PixelGrid<T>(0, 0, fill);
    }

    if (rows.some(row => row.length !== width)) {
      console.warn(`Ignoring ragged grid: expected ${height} rows of width ${width}`);
      return new PixelGrid<T>(0, 0, fill);
    }

    const grid = new PixelGrid<T>(height, width, fill);
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        grid.data[y * width + x] = rows[y][x];
      }
    }
    return grid;
  }

  get width(): number {
    return this.cols;
  }

  get height(): number {
    return this.rows;
  }

  get size(): number {
    return this.data.length;
  }

  isEmpty(): boolean {
    return this.data.length === 0;
  }

  contains(row: number, col: number): boolean {
    return row >= 0 && row < this.rows && col >= 0 && col < this.cols;
  }

  get(row: number, col: number): T {
    if (!this.contains(row, col)) {
      throw new OutOfRangeError(row, col, this.rows, this.cols);
    }
    return this.data[row * this.cols + col];
  }

  tryGet(row: number, col: number): T | undefined {
    return this.contains(row, col) ? this.data[row * this.cols + col] : undefined;
  }

  set(row: number, col: number, value: T): void {
    if (!this.contains(row, col)) {
      throw new OutOfRangeError(row, col, this.rows, this.cols);
    }
    this.data[row * this.cols + col] = value;
  }

  /** Reallocate to new dimensions; previous contents are discarded */
  resize(height: number, width: number, fill: T): void {
    this.rows = Math.max(0, height);
    this.cols = Math.max(0, width);
    this.data = new Array<T>(this.rows * this.cols).fill(fill);
  }

  clear(fill: T): void {
    this.data.fill(fill);
  }

  clone(): PixelGrid<T> {
    const copy = new PixelGrid<T>(0, 0, this.data[0]);
    copy.rows = this.rows;
    copy.cols = this.cols;
    copy.data = this.data.slice();
    return copy;
  }

  map<U>(fn: (value: T, row: number, col: number) => U, fill: U): PixelGrid<U> {
    const out = new PixelGrid<U>(this.rows, this.cols, fill);
    for (let y = 0; y < this.rows; y++) {
      for (let x = 0; x < this.cols; x++) {
        out.data[y * this.cols + x] = fn(this.data[y * this.cols + x], y, x);
      }
    }
    return out;
  }

  toRows(): T[][] {
    const result: T[][] = [];
    for (let y = 0; y < this.rows; y++) {
      result.push(this.data.slice(y * this.cols, (y + 1) * this.cols));
    }
    return result;
  }
}
