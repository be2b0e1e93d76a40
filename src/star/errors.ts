/**
 * Errors raised while resolving a star before anything is drawn
 */

export class StarError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StarError";
  }
}

/** Malformed or conflicting arguments (both step and edgeLength, non-finite values) */
export class InvalidArgumentsError extends StarError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentsError";
  }
}

export class InvalidVerticesError extends StarError {
  constructor(public readonly vertices: number) {
    super(`vertices must be an integer of at least 3, got ${vertices}`);
    this.name = "InvalidVerticesError";
  }
}

export class InvalidStepError extends StarError {
  constructor(
    public readonly step: number,
    public readonly vertices: number
  ) {
    super(
      `step must be an integer whose magnitude is between 1 and ${vertices - 1}, got ${step}`
    );
    this.name = "InvalidStepError";
  }
}

/**
 * The requested hull edge cannot reach between two neighbouring star points.
 * `minimum` is the shortest edge length that can.
 */
export class EdgeTooShortError extends StarError {
  constructor(
    public readonly edgeLength: number,
    public readonly minimum: number
  ) {
    super(
      `edgeLength should be at least ${minimum.toFixed(2)}, got ${edgeLength}`
    );
    this.name = "EdgeTooShortError";
  }
}
