/**
 * Named force laws and a helper for building force terms from them.
 *
 * Each law pairs a force function with its potential and lists its
 * parameters in the order the functions expect them.
 */

import type { BoolMatrix, ForceFunction, ForceTerm, PotentialFunction } from './types.ts';
import { InvalidParameterError } from './errors.ts';
import {
  anharmonicForce,
  expDecayForce,
  expNegForce,
  hookeForce,
} from './force_funcs.ts';
import {
  anharmonicPotential,
  expDecayPotential,
  expNegPotential,
  hookePotential,
} from './potential_funcs.ts';

/**
 * Named parameters for each force law.
 */
export type ForceLawParams = {
  hooke: { dist0: number; k: number };
  expDecay: { dist0: number; pot0: number; e: number };
  expNeg: { dist0: number; pot0: number; e: number };
  anharmonic: { dist0: number; pot0: number; m: number; e1: number; e2: number };
};

export type ForceLawName = keyof ForceLawParams;

export interface ForceLaw {
  force: ForceFunction;
  potential: PotentialFunction;

  /** Parameter names in positional order */
  paramNames: readonly string[];
}

export const FORCE_LAWS: Record<ForceLawName, ForceLaw> = {
  hooke: {
    force: hookeForce,
    potential: hookePotential,
    paramNames: ['dist0', 'k'],
  },
  expDecay: {
    force: expDecayForce,
    potential: expDecayPotential,
    paramNames: ['dist0', 'pot0', 'e'],
  },
  expNeg: {
    force: expNegForce,
    potential: expNegPotential,
    paramNames: ['dist0', 'pot0', 'e'],
  },
  anharmonic: {
    force: anharmonicForce,
    potential: anharmonicPotential,
    paramNames: ['dist0', 'pot0', 'm', 'e1', 'e2'],
  },
};

/**
 * Range, mask and noise settings for a force term.
 * Ranges default to [0, Infinity]; the rest default to absent.
 */
export interface ForceTermOptions {
  minRange?: number;
  maxRange?: number;
  mask?: BoolMatrix;
  noiseStdev?: number;
  noiseBound?: number;
}

/**
 * Orders named parameters positionally for a law.
 *
 * @throws InvalidParameterError if a parameter is missing or not a number
 */
export function lawParams<N extends ForceLawName>(
  law: N,
  params: ForceLawParams[N]
): number[] {
  const named: Readonly<Record<string, number>> = params;
  return FORCE_LAWS[law].paramNames.map((name) => {
    const value = named[name];
    if (typeof value !== 'number') {
      throw new InvalidParameterError(`Force law "${law}" is missing parameter "${name}"`);
    }
    return value;
  });
}

/**
 * Builds a force term for one of the named laws.
 *
 * @example
 * const spring = createForceTerm('hooke', { dist0: 1, k: 0.5 }, { maxRange: 3 })
 */
export function createForceTerm<N extends ForceLawName>(
  law: N,
  params: ForceLawParams[N],
  options: ForceTermOptions = {}
): ForceTerm {
  const term: ForceTerm = {
    force: FORCE_LAWS[law].force,
    params: lawParams(law, params),
    minRange: options.minRange ?? 0,
    maxRange: options.maxRange ?? Infinity,
  };

  if (options.mask !== undefined) term.mask = options.mask;
  if (options.noiseStdev !== undefined) term.noiseStdev = options.noiseStdev;
  if (options.noiseBound !== undefined) term.noiseBound = options.noiseBound;

  return term;
}
