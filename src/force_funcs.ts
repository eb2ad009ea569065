/**
 * Force laws F = f(dist, ...params).
 *
 * Each function is evaluated element-wise on the pairwise distance matrix
 * and returns a new matrix of scalar radial forces. Displacements point
 * from cell i toward cell j, so a positive force pulls the pair together
 * and a negative force pushes it apart.
 *
 * The exponential and anharmonic forces pair with the potentials in
 * `potential_funcs.ts`.
 */

import type { Matrix } from './types.ts';
import { map } from './matrix.ts';

/**
 * Hooke's law spring.
 *
 * Formula: F = k · (d - d₀)
 *
 * Stretched springs (d > d₀) pull cells together, compressed springs push
 * them apart.
 *
 * @param dist0 - Resting length of the spring
 * @param k - Spring constant
 */
export function hookeForce(dist: Matrix, dist0: number, k: number): Matrix {
  return map(dist, (d) => k * (d - dist0));
}

/**
 * Exponential decay force matching `expDecayPotential`.
 *
 * Formula: F = -e · p₀ · exp(-e · (d - d₀))
 *
 * @param dist0 - Distance at which the potential equals pot0
 * @param pot0 - Potential at dist0
 * @param e - Decay exponent
 */
export function expDecayForce(
  dist: Matrix,
  dist0: number,
  pot0: number,
  e: number
): Matrix {
  return map(dist, (d) => -e * pot0 * Math.exp(-e * (d - dist0)));
}

/**
 * Negative exponential force matching `expNegPotential`.
 *
 * Formula: F = e · p₀ · exp(-e · (d - d₀))
 *
 * @param dist0 - Distance at which the potential equals -pot0
 * @param pot0 - Depth of the potential well
 * @param e - Decay exponent
 */
export function expNegForce(
  dist: Matrix,
  dist0: number,
  pot0: number,
  e: number
): Matrix {
  return map(dist, (d) => e * pot0 * Math.exp(-e * (d - dist0)));
}

/**
 * Anharmonic oscillator force matching `anharmonicPotential`.
 *
 * Formula: F = p₀ · (e₁ · (d₀/d)^e₁ - m · e₂ · (d₀/d)^e₂) / d   for d > 0
 *
 * Returns 0 where d = 0.
 *
 * @param dist0 - Location of the potential extremum for m = 2, e1/e2 = 2
 * @param pot0 - Potential scale
 * @param m - Weight of the attractive term
 * @param e1 - Exponent of the repulsive term
 * @param e2 - Exponent of the attractive term
 */
export function anharmonicForce(
  dist: Matrix,
  dist0: number,
  pot0: number,
  m: number,
  e1: number,
  e2: number
): Matrix {
  return map(dist, (d) => {
    if (!(d > 0)) return 0;
    const ratio = dist0 / d;
    return (pot0 * (e1 * Math.pow(ratio, e1) - m * e2 * Math.pow(ratio, e2))) / d;
  });
}
