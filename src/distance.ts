/**
 * Pairwise distances between all cells.
 *
 * Displacements are taken from cell i toward cell j, so `dx[i][j]` is
 * positive when cell j lies to the right of cell i. The diagonal of every
 * output is exactly zero. The computation is a pure function of the input
 * positions and allocates fresh matrices on every call.
 */

import type { Distances, Positions } from './types.ts';
import { zeros } from './matrix.ts';
import { cellCount } from './positions.ts';

/**
 * Computes x/y displacement and Euclidean distance matrices.
 *
 * Each unordered pair is visited once. The distance is written to both
 * triangles, which keeps `dist[i][j] === dist[j][i]` bit-exact.
 *
 * @param positions - Interleaved [y0, x0, y1, x1, ...]
 */
export function getDistances(positions: Positions): Distances {
  const n = cellCount(positions);
  const dx = zeros(n);
  const dy = zeros(n);
  const dist = zeros(n);

  for (let i = 0; i < n; i += 1) {
    const yi = positions[i * 2];
    const xi = positions[i * 2 + 1];

    for (let j = i + 1; j < n; j += 1) {
      const yj = positions[j * 2];
      const xj = positions[j * 2 + 1];
      const ddx = xj - xi;
      const ddy = yj - yi;
      const d = Math.sqrt(ddx * ddx + ddy * ddy);

      const ij = i * n + j;
      const ji = j * n + i;

      dx.data[ij] = ddx;
      dx.data[ji] = xi - xj;
      dy.data[ij] = ddy;
      dy.data[ji] = yi - yj;
      dist.data[ij] = d;
      dist.data[ji] = d;
    }
  }

  return { dx, dy, dist };
}
