import { describe, expect, it } from 'vitest';
import { getDistances } from './distance.ts';
import { get, isSymmetric, toRows } from './matrix.ts';
import { fromPoints } from './positions.ts';

describe('getDistances', () => {
  // [y, x]
  const positions = fromPoints([
    [0, 0],
    [0, 3],
    [4, 0],
  ]);

  it('measures displacement from cell i toward cell j', () => {
    const { dx, dy } = getDistances(positions);

    expect(toRows(dx)).toEqual([
      [0, 3, 0],
      [-3, 0, -3],
      [0, 3, 0],
    ]);
    expect(toRows(dy)).toEqual([
      [0, 0, 4],
      [0, 0, 4],
      [-4, -4, 0],
    ]);
  });

  it('computes Euclidean distances', () => {
    const { dist } = getDistances(positions);

    expect(toRows(dist)).toEqual([
      [0, 3, 4],
      [3, 0, 5],
      [4, 5, 0],
    ]);
  });

  it('is symmetric with a zero diagonal', () => {
    const scattered = fromPoints([
      [0.3, -1.7],
      [2.9, 0.11],
      [-4.2, 5.5],
      [1e-3, 7.25],
    ]);
    const { dist } = getDistances(scattered);

    expect(isSymmetric(dist)).toBe(true);
    for (let i = 0; i < dist.size; i += 1) {
      expect(get(dist, i, i)).toBe(0);
    }
  });

  it('matches sqrt(dx² + dy²) exactly', () => {
    const scattered = fromPoints([
      [0.3, -1.7],
      [2.9, 0.11],
      [-4.2, 5.5],
    ]);
    const { dx, dy, dist } = getDistances(scattered);

    for (let k = 0; k < dist.data.length; k += 1) {
      expect(dist.data[k]).toBe(Math.sqrt(dx.data[k] ** 2 + dy.data[k] ** 2));
    }
  });

  it('handles a single cell', () => {
    const { dx, dy, dist } = getDistances(fromPoints([[2, 5]]));

    expect(toRows(dx)).toEqual([[0]]);
    expect(toRows(dy)).toEqual([[0]]);
    expect(toRows(dist)).toEqual([[0]]);
  });

  it('handles no cells', () => {
    const { dist } = getDistances(new Float64Array(0));

    expect(dist.size).toBe(0);
    expect(dist.data.length).toBe(0);
  });

  it('returns identical matrices for identical input', () => {
    const first = getDistances(positions);
    const second = getDistances(positions);

    expect(second.dist.data).toEqual(first.dist.data);
    expect(second.dx.data).toEqual(first.dx.data);
    expect(second.dy.data).toEqual(first.dy.data);
    expect(second.dist).not.toBe(first.dist);
  });
});
