/**
 * Errors raised by strict-mode validation.
 *
 * The integrator does not throw by default; these are only raised when a
 * step runs with `strict: true`.
 */

export class SimulationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SimulationError';
  }
}

/** Array or matrix dimensions do not match the number of cells. */
export class InvalidShapeError extends SimulationError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidShapeError';
  }
}

/** A scalar argument or force-term option is out of range. */
export class InvalidParameterError extends SimulationError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidParameterError';
  }
}

/** A step produced NaN or infinite positions or forces. */
export class NonFiniteResultError extends SimulationError {
  constructor(message: string) {
    super(message);
    this.name = 'NonFiniteResultError';
  }
}
