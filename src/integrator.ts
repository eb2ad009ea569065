/**
 * Force integrator.
 *
 * Each call advances all cells by one fixed timestep:
 *
 * 1. DISTANCES
 *    - Pairwise displacement (dx, dy) and Euclidean distance matrices
 *
 * 2. FORCE TERMS (per term, in order)
 *    - Evaluate the force law on the full distance matrix
 *    - Add Gaussian noise, optionally clipped to [-bound, bound]
 *    - Zero pairs outside [minRange, maxRange] and pairs the mask excludes
 *    - Decompose the scalar force along the displacement: Fx = F·dx/d
 *    - Sum over neighbors into the per-cell (y, x) accumulator
 *
 * 3. EULER UPDATE
 *    - pos' = pos + Δt · F
 *
 * Self-pairs are skipped in the decomposition so their zero distance is
 * never used as a divisor. Contributions from different terms are summed,
 * so term order only matters for which noise samples each term receives.
 */

import type {
  ForceTerm,
  Matrix,
  Positions,
  StepOptions,
  StepResult,
} from './types.ts';
import { getDistances } from './distance.ts';
import { offDiagonalMask, rowSums, zeros } from './matrix.ts';
import { gaussianMatrix } from './noise.ts';
import { cellCount } from './positions.ts';
import {
  assertFinite,
  validateDeltaT,
  validateForceResult,
  validateForceTerm,
  validatePositions,
} from './validation.ts';

/**
 * Evaluates one force term and returns its scalar force matrix after
 * noise, range cutoffs and masking.
 *
 * The returned matrix is a copy; the force function's output is not
 * modified.
 */
export function evaluateForceTerm(
  term: ForceTerm,
  dist: Matrix,
  random: () => number = Math.random
): Matrix {
  const raw = term.force(dist, ...term.params);
  const n = dist.size;
  const forces: Matrix = { size: raw.size, data: new Float64Array(raw.data) };
  const f = forces.data;
  const d = dist.data;

  // Noise is only drawn when a standard deviation is configured;
  // a bound on its own does nothing.
  if (term.noiseStdev !== undefined) {
    const noise = gaussianMatrix(n, term.noiseStdev, random, term.noiseBound).data;
    for (let k = 0; k < f.length; k += 1) {
      f[k] += noise[k];
    }
  }

  // Range cutoffs: both boundaries are in range
  for (let k = 0; k < f.length; k += 1) {
    if (d[k] < term.minRange || d[k] > term.maxRange) {
      f[k] = 0;
    }
  }

  if (term.mask !== undefined) {
    const mask = term.mask.data;
    for (let k = 0; k < f.length; k += 1) {
      if (!mask[k]) f[k] = 0;
    }
  }

  return forces;
}

/**
 * Advances cell positions by one timestep.
 *
 * The input array is not modified; new arrays are returned for both the
 * positions and the applied forces.
 *
 * @param positions - Interleaved [y0, x0, y1, x1, ...]
 * @param forceTerms - Force terms whose contributions are summed
 * @param deltaT - Euler timestep
 * @param options - Noise source and strict validation
 * @returns Updated positions and the net (y, x) force on each cell
 *
 * @example
 * const spring = createForceTerm('hooke', { dist0: 1, k: 1 })
 * let pos = fromPoints([[0, 0], [0, 3]])
 * for (let t = 0; t < 100; t += 1) {
 *   pos = step(pos, [spring], 0.1).positions
 * }
 */
export function step(
  positions: Positions,
  forceTerms: readonly ForceTerm[],
  deltaT: number,
  options: StepOptions = {}
): StepResult {
  const strict = options.strict ?? false;
  const random = options.random ?? Math.random;
  const n = cellCount(positions);

  if (strict) {
    validatePositions(positions);
    validateDeltaT(deltaT);
    forceTerms.forEach((term, index) => validateForceTerm(term, n, index));
  }

  const { dx, dy, dist } = getDistances(positions);
  const selfMask = offDiagonalMask(n).data;
  const force = new Float64Array(n * 2);

  forceTerms.forEach((term, index) => {
    const scalar = evaluateForceTerm(term, dist, random);
    if (strict) validateForceResult(scalar, n, index);

    // Component matrices; the diagonal stays zero
    const f = scalar.data;
    const fxPair = zeros(n);
    const fyPair = zeros(n);
    for (let k = 0; k < n * n; k += 1) {
      if (!selfMask[k]) continue;
      fxPair.data[k] = (f[k] * dx.data[k]) / dist.data[k];
      fyPair.data[k] = (f[k] * dy.data[k]) / dist.data[k];
    }

    const fx = rowSums(fxPair);
    const fy = rowSums(fyPair);
    for (let i = 0; i < n; i += 1) {
      force[i * 2] += fy[i];
      force[i * 2 + 1] += fx[i];
    }
  });

  const next = new Float64Array(n * 2);
  for (let k = 0; k < n * 2; k += 1) {
    next[k] = positions[k] + deltaT * force[k];
  }

  if (strict) {
    assertFinite(force, 'Forces');
    assertFinite(next, 'Positions');
  }

  return { positions: next, forces: force };
}
