/** Thrown at construction when a grid dimension is not a positive integer. */
export class InvalidDimensionsError extends Error {
  constructor(readonly width: number, readonly height: number) {
    super(`Grid dimensions must be positive integers, got ${width}x${height}`);
    this.name = "InvalidDimensionsError";
  }
}

/** Thrown when a coordinate or buffer index falls outside the grid. */
export class IndexOutOfBoundsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "IndexOutOfBoundsError";
  }

  static forCoordinates(row: number, col: number, width: number, height: number): IndexOutOfBoundsError {
    return new IndexOutOfBoundsError(
      `Cell (${row}, ${col}) is outside the ${width}x${height} grid`,
    );
  }

  static forIndex(index: number, length: number): IndexOutOfBoundsError {
    return new IndexOutOfBoundsError(`Index ${index} is outside [0, ${length})`);
  }
}

/** Thrown when a cell view is read after the grid it came from has changed. */
export class StaleViewError extends Error {
  constructor() {
    super("Cell view was read after the grid was mutated; take a new view");
    this.name = "StaleViewError";
  }
}
