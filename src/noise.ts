/**
 * Random number generation for force noise and cell spawning.
 */

import type { Matrix } from './types.ts';
import { zeros } from './matrix.ts';

/**
 * Creates a deterministic pseudo-random number generator.
 *
 * Uses a Linear Congruential Generator (LCG) with the Numerical Recipes
 * constants:
 * - a = 1664525 (multiplier)
 * - c = 1013904223 (increment)
 * - m = 2^32 (modulus, implicit via >>> 0)
 *
 * The same seed always produces the same sequence.
 *
 * @param seed - Initial seed value (integer)
 * @returns Function that returns the next number in [0, 1)
 */
export function createRng(seed: number): () => number {
  let state = seed >>> 0;

  return () => {
    state = (1664525 * state + 1013904223) >>> 0;
    return state / 4294967296; // 2^32
  };
}

/**
 * Seed for the force-noise stream of a run.
 *
 * Spawning and noise must not share a sequence, otherwise the uniforms that
 * placed the cells would come back as the first noise samples. XOR with the
 * 32-bit golden-ratio constant gives a distinct stream for every seed.
 */
export function deriveNoiseSeed(seed: number): number {
  return ((seed >>> 0) ^ 0x9e3779b9) >>> 0;
}

/**
 * Creates a standard normal sampler driven by a uniform source.
 *
 * Box–Muller transform: two uniforms produce two independent normals.
 * The second value of each pair is kept and returned by the next call.
 *
 * @param random - Uniform source in [0, 1)
 * @returns Function that returns the next N(0, 1) sample
 */
export function createGaussian(random: () => number): () => number {
  let spare: number | undefined;

  return () => {
    if (spare !== undefined) {
      const value = spare;
      spare = undefined;
      return value;
    }

    // 1 - u maps [0, 1) to (0, 1], keeping log() finite
    const u1 = 1 - random();
    const u2 = random();
    const r = Math.sqrt(-2 * Math.log(u1));
    const theta = 2 * Math.PI * u2;

    spare = r * Math.sin(theta);
    return r * Math.cos(theta);
  };
}

/**
 * Clamps a value to [-bound, bound].
 */
export function clip(value: number, bound: number): number {
  if (value > bound) return bound;
  if (value < -bound) return -bound;
  return value;
}

/**
 * Draws an N×N matrix of independent zero-mean Gaussian samples.
 *
 * Samples are drawn in row-major order. When `bound` is given, every
 * sample is clipped to [-bound, bound].
 *
 * @param size - Matrix dimension N
 * @param stdev - Standard deviation of each sample
 * @param random - Uniform source in [0, 1)
 * @param bound - Optional symmetric clamp
 */
export function gaussianMatrix(
  size: number,
  stdev: number,
  random: () => number,
  bound?: number
): Matrix {
  const out = zeros(size);
  const normal = createGaussian(random);
  const data = out.data;

  for (let k = 0; k < data.length; k += 1) {
    const sample = normal() * stdev;
    data[k] = bound === undefined ? sample : clip(sample, bound);
  }

  return out;
}
