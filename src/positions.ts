import type { Positions } from './types.ts';

/**
 * Packs [y, x] points into an interleaved position buffer.
 *
 * @example
 * const pos = fromPoints([[0, 0], [0, 3]]) // Float64Array [0, 0, 0, 3]
 */
export function fromPoints(points: readonly (readonly [number, number])[]): Positions {
  const out = new Float64Array(points.length * 2);
  for (let i = 0; i < points.length; i += 1) {
    out[i * 2] = points[i][0];
    out[i * 2 + 1] = points[i][1];
  }
  return out;
}

/**
 * Unpacks an interleaved position (or force) buffer into [y, x] points.
 */
export function toPoints(positions: Positions): [number, number][] {
  const count = cellCount(positions);
  const points: [number, number][] = new Array(count);
  for (let i = 0; i < count; i += 1) {
    points[i] = [positions[i * 2], positions[i * 2 + 1]];
  }
  return points;
}

/**
 * Number of cells described by a position buffer.
 */
export function cellCount(positions: Positions): number {
  return Math.floor(positions.length / 2);
}
