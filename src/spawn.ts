/**
 * Cell spawning utilities.
 *
 * Cells are scattered uniformly over a disc by dart throwing: a candidate
 * point is drawn and kept only if it lies at least `minSpacing` from every
 * cell placed so far. Random placement avoids the lattices that sit in
 * force balance for many laws and never rearrange.
 */

import type { Positions, SimConfig, SpawnData, SpawnDisc } from './types.ts';
import { InvalidParameterError } from './errors.ts';
import { createRng } from './noise.ts';
import { fromPoints } from './positions.ts';

/**
 * Draws a point, as [y, x], uniformly over the disc.
 *
 * The radius takes the square root of a uniform so that the density per
 * unit area stays constant towards the rim.
 */
function samplePointInDisc(disc: SpawnDisc, rng: () => number): [number, number] {
  const r = disc.radius * Math.sqrt(rng());
  const theta = rng() * Math.PI * 2;

  return [disc.center.y + r * Math.sin(theta), disc.center.x + r * Math.cos(theta)];
}

function isFarFromAll(
  point: [number, number],
  placed: [number, number][],
  minSpacing: number
): boolean {
  for (const [y, x] of placed) {
    if (Math.hypot(point[0] - y, point[1] - x) < minSpacing) return false;
  }
  return true;
}

/**
 * Creates initial cell positions for a run.
 *
 * Explicit `initialPositions` take precedence. Otherwise `spawnCount` cells
 * are scattered over `spawnDisc`, each at least `minSpacing` from the
 * others. The generator is seeded from `config.seed`, so the same config
 * always spawns the same cells.
 *
 * @throws InvalidParameterError when a cell cannot be placed within
 * `maxAttempts` draws, which means the disc is too small for the count
 * and spacing
 *
 * @example
 * const spawn = createSpawnData(createConfig({ spawnCount: 10 }))
 * console.info(`Spawned ${spawn.count} cells`)
 */
export function createSpawnData(config: SimConfig): SpawnData {
  if (config.initialPositions !== undefined) {
    const positions: Positions = fromPoints(config.initialPositions);
    return { positions, count: config.initialPositions.length };
  }

  const { spawnDisc, minSpacing, maxAttempts } = config;
  const count = Math.max(0, Math.floor(config.spawnCount));
  const rng = createRng(config.seed);
  const points: [number, number][] = [];

  while (points.length < count) {
    let placed = false;

    for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
      const candidate = samplePointInDisc(spawnDisc, rng);
      if (isFarFromAll(candidate, points, minSpacing)) {
        points.push(candidate);
        placed = true;
        break;
      }
    }

    if (!placed) {
      throw new InvalidParameterError(
        `Could not place cell ${points.length + 1} of ${count} at spacing ${minSpacing} ` +
          `within radius ${spawnDisc.radius} after ${maxAttempts} attempts`
      );
    }
  }

  return { positions: fromPoints(points), count: points.length };
}
