/**
 * Dense square matrix helpers.
 *
 * All pairwise quantities in the simulation are N×N matrices stored as flat
 * row-major typed arrays. Loops iterate rows in the outer loop and columns in
 * the inner loop so that memory is walked sequentially.
 */

import type { BoolMatrix, Matrix } from './types.ts';

/**
 * Allocates a zero-filled N×N matrix.
 */
export function zeros(size: number): Matrix {
  return { size, data: new Float64Array(size * size) };
}

/**
 * Builds a matrix from nested rows. Intended for tests and small fixtures.
 */
export function fromRows(rows: readonly (readonly number[])[]): Matrix {
  const size = rows.length;
  const m = zeros(size);
  for (let i = 0; i < size; i += 1) {
    const row = rows[i];
    for (let j = 0; j < size; j += 1) {
      m.data[i * size + j] = row[j] ?? 0;
    }
  }
  return m;
}

/**
 * Converts a matrix back to nested rows.
 */
export function toRows(m: Matrix): number[][] {
  const rows: number[][] = [];
  for (let i = 0; i < m.size; i += 1) {
    rows.push(Array.from(m.data.subarray(i * m.size, (i + 1) * m.size)));
  }
  return rows;
}

/**
 * Reads entry (i, j).
 */
export function get(m: Matrix, i: number, j: number): number {
  return m.data[i * m.size + j];
}

/**
 * Applies `fn` to every entry, returning a new matrix of the same size.
 */
export function map(m: Matrix, fn: (value: number) => number): Matrix {
  const out = zeros(m.size);
  const src = m.data;
  const dst = out.data;
  for (let k = 0; k < src.length; k += 1) {
    dst[k] = fn(src[k]);
  }
  return out;
}

/**
 * Allocates a boolean matrix with every entry set to `value`.
 */
export function boolMatrix(size: number, value = false): BoolMatrix {
  const data = new Uint8Array(size * size);
  if (value) data.fill(1);
  return { size, data };
}

/**
 * Builds a boolean matrix from nested rows.
 */
export function boolFromRows(rows: readonly (readonly boolean[])[]): BoolMatrix {
  const size = rows.length;
  const m = boolMatrix(size);
  for (let i = 0; i < size; i += 1) {
    for (let j = 0; j < size; j += 1) {
      m.data[i * size + j] = rows[i][j] ? 1 : 0;
    }
  }
  return m;
}

/**
 * Mask that is true everywhere except on the diagonal.
 *
 * Used to keep self-pairs out of the force decomposition, where the
 * self-distance of zero would otherwise become a divisor.
 */
export function offDiagonalMask(size: number): BoolMatrix {
  const m = boolMatrix(size, true);
  for (let i = 0; i < size; i += 1) {
    m.data[i * size + i] = 0;
  }
  return m;
}

/**
 * Sums each row, returning one value per row.
 */
export function rowSums(m: Matrix): Float64Array {
  const n = m.size;
  const sums = new Float64Array(n);
  for (let i = 0; i < n; i += 1) {
    let acc = 0;
    const base = i * n;
    for (let j = 0; j < n; j += 1) {
      acc += m.data[base + j];
    }
    sums[i] = acc;
  }
  return sums;
}

/**
 * True when the matrix equals its transpose.
 */
export function isSymmetric(m: Matrix | BoolMatrix): boolean {
  const n = m.size;
  for (let i = 0; i < n; i += 1) {
    for (let j = i + 1; j < n; j += 1) {
      if (m.data[i * n + j] !== m.data[j * n + i]) return false;
    }
  }
  return true;
}
