/**
 * Interaction masks restrict a force term to particular cell pairings,
 * e.g. adhesion only between cells of the same type.
 */

import type { BoolMatrix } from './types.ts';
import { boolMatrix } from './matrix.ts';

/**
 * Mask selecting pairs whose types are {a, b}, in either order.
 *
 * The result is symmetric. With `a === b` it selects same-type pairs of
 * that type only. The diagonal follows the same rule; self-pairs never
 * contribute force regardless of the mask.
 *
 * @param types - Type label of each cell, indexed like the positions
 *
 * @example
 * // Heterotypic repulsion between 'epi' and 'mes' cells
 * const mask = createTypeMask(types, 'epi', 'mes')
 */
export function createTypeMask<T>(types: readonly T[], a: T, b: T): BoolMatrix {
  const n = types.length;
  const mask = boolMatrix(n);

  for (let i = 0; i < n; i += 1) {
    for (let j = 0; j < n; j += 1) {
      const ti = types[i];
      const tj = types[j];
      if ((ti === a && tj === b) || (ti === b && tj === a)) {
        mask.data[i * n + j] = 1;
      }
    }
  }

  return mask;
}

/**
 * Mask selecting pairs of identical type, whatever the type.
 */
export function createSameTypeMask<T>(types: readonly T[]): BoolMatrix {
  const n = types.length;
  const mask = boolMatrix(n);

  for (let i = 0; i < n; i += 1) {
    for (let j = 0; j < n; j += 1) {
      if (types[i] === types[j]) mask.data[i * n + j] = 1;
    }
  }

  return mask;
}

/**
 * Logical negation of a mask.
 */
export function invertMask(mask: BoolMatrix): BoolMatrix {
  const out = boolMatrix(mask.size);
  for (let k = 0; k < mask.data.length; k += 1) {
    out.data[k] = mask.data[k] ? 0 : 1;
  }
  return out;
}
