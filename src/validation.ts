/**
 * Strict-mode checks for a step.
 *
 * None of these run unless `strict` is requested; the default integrator
 * path lets malformed input propagate as NaN/Infinity.
 */

import type { ForceTerm, Matrix, Positions } from './types.ts';
import {
  InvalidParameterError,
  InvalidShapeError,
  NonFiniteResultError,
} from './errors.ts';

export function validatePositions(positions: Positions): void {
  if (positions.length % 2 !== 0) {
    throw new InvalidShapeError(
      `Positions must hold (y, x) pairs, got ${positions.length} values`
    );
  }
  assertFinite(positions, 'Input positions', InvalidParameterError);
}

export function validateDeltaT(deltaT: number): void {
  if (!Number.isFinite(deltaT) || deltaT < 0) {
    throw new InvalidParameterError(`deltaT must be finite and >= 0, got ${deltaT}`);
  }
}

/**
 * Checks a force term's options against the number of cells.
 *
 * @param index - Position of the term in the list, for error messages
 */
export function validateForceTerm(term: ForceTerm, count: number, index: number): void {
  const label = `Force term ${index}`;

  // Function.length counts the distance matrix plus declared parameters
  const arity = term.force.length - 1;
  if (term.params.length < arity) {
    throw new InvalidParameterError(
      `${label} expects ${arity} parameters, got ${term.params.length}`
    );
  }

  if (Number.isNaN(term.minRange) || Number.isNaN(term.maxRange)) {
    throw new InvalidParameterError(`${label} has a NaN range bound`);
  }
  if (term.minRange > term.maxRange) {
    throw new InvalidParameterError(
      `${label} has minRange ${term.minRange} above maxRange ${term.maxRange}`
    );
  }

  if (term.mask !== undefined) {
    if (term.mask.size !== count || term.mask.data.length !== count * count) {
      throw new InvalidShapeError(
        `${label} mask is ${term.mask.size}x${term.mask.size}, expected ${count}x${count}`
      );
    }
  }

  if (term.noiseStdev !== undefined && !(term.noiseStdev >= 0)) {
    throw new InvalidParameterError(`${label} noiseStdev must be >= 0, got ${term.noiseStdev}`);
  }
  if (term.noiseBound !== undefined && !(term.noiseBound >= 0)) {
    throw new InvalidParameterError(`${label} noiseBound must be >= 0, got ${term.noiseBound}`);
  }
}

/**
 * Checks that a force function returned a matrix of the right size.
 */
export function validateForceResult(result: Matrix, count: number, index: number): void {
  if (result.size !== count || result.data.length !== count * count) {
    throw new InvalidShapeError(
      `Force term ${index} returned a ${result.size}x${result.size} matrix, expected ${count}x${count}`
    );
  }
}

export function assertFinite(
  values: Float64Array,
  label: string,
  ErrorType: new (message: string) => Error = NonFiniteResultError
): void {
  for (let k = 0; k < values.length; k += 1) {
    if (!Number.isFinite(values[k])) {
      throw new ErrorType(`${label} contain a non-finite value at cell ${Math.floor(k / 2)}`);
    }
  }
}
