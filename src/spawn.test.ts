import { describe, expect, it } from 'vitest';
import { createConfig } from './config.ts';
import { createSpawnData } from './spawn.ts';
import { toPoints } from './positions.ts';
import { InvalidParameterError } from './errors.ts';

describe('createSpawnData', () => {
  it('scatters the default number of cells', () => {
    const spawn = createSpawnData(createConfig());

    expect(spawn.count).toBe(36);
    expect(spawn.positions.length).toBe(72);
  });

  it('keeps every cell inside the disc', () => {
    const config = createConfig({
      spawnCount: 20,
      spawnDisc: { center: { x: 10, y: -5 }, radius: 3 },
    });
    const points = toPoints(createSpawnData(config).positions);

    expect(points).toHaveLength(20);
    for (const [y, x] of points) {
      expect(Math.hypot(y + 5, x - 10)).toBeLessThanOrEqual(3);
    }
  });

  it('keeps cells at least minSpacing apart', () => {
    const config = createConfig({
      spawnCount: 25,
      minSpacing: 0.8,
      spawnDisc: { center: { x: 0, y: 0 }, radius: 5 },
    });
    const points = toPoints(createSpawnData(config).positions);

    for (let i = 0; i < points.length; i += 1) {
      for (let j = i + 1; j < points.length; j += 1) {
        const d = Math.hypot(points[i][0] - points[j][0], points[i][1] - points[j][1]);
        expect(d).toBeGreaterThanOrEqual(0.8);
      }
    }
  });

  it('is reproducible for a seed', () => {
    const a = createSpawnData(createConfig({ seed: 7 }));
    const b = createSpawnData(createConfig({ seed: 7 }));
    const c = createSpawnData(createConfig({ seed: 8 }));

    expect(Array.from(b.positions)).toEqual(Array.from(a.positions));
    expect(Array.from(c.positions)).not.toEqual(Array.from(a.positions));
  });

  it('uses explicit initial positions when given', () => {
    const spawn = createSpawnData(
      createConfig({
        initialPositions: [
          [1, 2],
          [3, 4],
        ],
      })
    );

    expect(spawn.count).toBe(2);
    expect(Array.from(spawn.positions)).toEqual([1, 2, 3, 4]);
  });

  it('spawns nothing for a zero count', () => {
    expect(createSpawnData(createConfig({ spawnCount: 0 })).count).toBe(0);
  });

  it('rejects a disc too small for the count and spacing', () => {
    // Two cells 3 apart cannot fit in a disc of diameter 2
    const config = createConfig({
      spawnCount: 2,
      minSpacing: 3,
      spawnDisc: { center: { x: 0, y: 0 }, radius: 1 },
      maxAttempts: 10,
    });

    expect(() => createSpawnData(config)).toThrow(InvalidParameterError);
    expect(() => createSpawnData(config)).toThrow(
      'Could not place cell 2 of 2 at spacing 3 within radius 1 after 10 attempts'
    );
  });
});
