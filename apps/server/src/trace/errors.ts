/**
 * Errors raised by the topology core and the service around it.
 * Every error carries a stable `code` that the API forwards to clients.
 */
export class TopologyError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class OutOfRangeError extends TopologyError {
  constructor(row: number, col: number, height: number, width: number) {
    super(`Pixel (${row}, ${col}) is outside a ${height}x${width} grid`, 'OUT_OF_RANGE');
  }
}

/** Contract violation inside the border tracer; aborts the extraction */
export class InternalInvariantError extends TopologyError {
  constructor(message: string) {
    super(message, 'INTERNAL_INVARIANT');
  }
}

export class GridTooLargeError extends TopologyError {
  constructor(pixels: number, limit: number) {
    super(`Grid has ${pixels} pixels, limit is ${limit}`, 'GRID_TOO_LARGE');
  }
}
