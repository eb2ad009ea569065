/**
 * Potential-energy landscapes E = f(dist, ...params).
 *
 * These are not used by the integrator. They describe the energy landscape
 * behind each force law and are handy when choosing parameters.
 */

import type { Matrix } from './types.ts';
import { map } from './matrix.ts';

/**
 * Hooke's law spring potential: E = ½ · k · (d - d₀)²
 */
export function hookePotential(dist: Matrix, dist0: number, k: number): Matrix {
  return map(dist, (d) => 0.5 * k * (d - dist0) * (d - dist0));
}

/**
 * Exponential decay from pot0 at dist0 towards 0.
 *
 * Formula: E = p₀ · exp(-e · (d - d₀))
 */
export function expDecayPotential(
  dist: Matrix,
  dist0: number,
  pot0: number,
  e: number
): Matrix {
  return map(dist, (d) => pot0 * Math.exp(-e * (d - dist0)));
}

/**
 * Negative exponential rising from -pot0 at dist0 towards 0.
 *
 * Formula: E = p₀ - p₀ · exp(-e · (d - d₀))
 */
export function expNegPotential(
  dist: Matrix,
  dist0: number,
  pot0: number,
  e: number
): Matrix {
  return map(dist, (d) => pot0 - pot0 * Math.exp(-e * (d - dist0)));
}

/**
 * Anharmonic oscillator potential.
 *
 * Formula: E = -p₀ · ((d₀/d)^e₁ - m · (d₀/d)^e₂)   for d > 0, else 0
 *
 * With m = 2 and e1 = 2·e2 the extremum sits at d = d₀, where E = p₀.
 * See https://en.wikipedia.org/wiki/Anharmonicity
 */
export function anharmonicPotential(
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
    return -pot0 * (Math.pow(ratio, e1) - m * Math.pow(ratio, e2));
  });
}
