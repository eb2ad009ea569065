import { afterEach, describe, expect, it, vi } from 'vitest';
import { createConfig } from './config.ts';
import { createForceTerm } from './force_laws.ts';
import { createSim } from './sim.ts';
import { NonFiniteResultError } from './errors.ts';
import { boolFromRows } from './matrix.ts';
import { createRng, deriveNoiseSeed } from './noise.ts';

const pair = createConfig({
  deltaT: 0.1,
  initialPositions: [
    [0, 0],
    [0, 3],
  ],
});

const spring = createForceTerm('hooke', { dist0: 1, k: 1 });

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createSim', () => {
  it('starts from the spawned positions with zero force', () => {
    const sim = createSim(pair, [spring]);

    expect(sim.state.count).toBe(2);
    expect(sim.state.stepCount).toBe(0);
    expect(Array.from(sim.state.positions)).toEqual([0, 0, 0, 3]);
    expect(Array.from(sim.state.forces)).toEqual([0, 0, 0, 0]);
  });

  it('advances and stores each step', () => {
    const sim = createSim(pair, [spring]);
    const result = sim.step();

    expect(sim.state.stepCount).toBe(1);
    expect(sim.state.positions).toBe(result.positions);
    expect(Array.from(result.forces)).toEqual([0, 2, 0, -2]);
    expect(result.positions[1]).toBeCloseTo(0.2, 12);
    expect(result.positions[3]).toBeCloseTo(2.8, 12);
  });

  it('relaxes a stretched spring towards its rest length', () => {
    const sim = createSim(pair, [spring]);
    const { positions } = sim.run(200);

    expect(sim.state.stepCount).toBe(200);
    expect(positions[3] - positions[1]).toBeCloseTo(1, 6);
    // Equal and opposite forces keep the midpoint fixed
    expect((positions[1] + positions[3]) / 2).toBeCloseTo(1.5, 9);
  });

  it('returns the current state when running zero steps', () => {
    const sim = createSim(pair, [spring]);
    const result = sim.run(0);

    expect(sim.state.stepCount).toBe(0);
    expect(Array.from(result.positions)).toEqual([0, 0, 0, 3]);
    expect(result.positions).not.toBe(sim.state.positions);
  });

  it('restores the initial positions on reset', () => {
    const sim = createSim(pair, [spring]);
    sim.run(5);
    sim.reset();

    expect(sim.state.stepCount).toBe(0);
    expect(Array.from(sim.state.positions)).toEqual([0, 0, 0, 3]);
  });

  it('replays the same noise after reset', () => {
    const noisy = createForceTerm('hooke', { dist0: 1, k: 1 }, { noiseStdev: 0.5 });
    const sim = createSim(createConfig({ ...pair, seed: 3 }), [noisy]);

    const first = Array.from(sim.run(4).positions);
    sim.reset();
    const second = Array.from(sim.run(4).positions);

    expect(second).toEqual(first);
  });

  it('draws noise from a stream separate from the spawn seed', () => {
    const still = createForceTerm('hooke', { dist0: 1, k: 0 }, { noiseStdev: 1 });
    const sim = createSim(
      createConfig({
        seed: 5,
        initialPositions: [
          [0, 0],
          [0, 1],
        ],
      }),
      [still]
    );

    // Pair (0, 1) takes the second Box-Muller value of the first draw
    const spareFrom = (random: () => number): number => {
      const u1 = 1 - random();
      const u2 = random();
      return Math.sqrt(-2 * Math.log(u1)) * Math.sin(2 * Math.PI * u2);
    };
    const { forces } = sim.step();

    expect(forces[1]).toBe(spareFrom(createRng(deriveNoiseSeed(5))));
    expect(Math.abs(forces[1] - spareFrom(createRng(5)))).toBeGreaterThan(1e-3);
  });

  it('runs steps in strict mode when configured', () => {
    const sim = createSim(
      createConfig({
        strict: true,
        initialPositions: [
          [1, 1],
          [1, 1],
        ],
      }),
      [spring]
    );

    expect(() => sim.step()).toThrow(NonFiniteResultError);
  });

  it('logs spawn details and inert options when verbose', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const bounded = createForceTerm('hooke', { dist0: 1, k: 1 }, { noiseBound: 1 });

    const sim = createSim(createConfig({ ...pair, verbose: true }), [bounded]);
    sim.reset();

    expect(info).toHaveBeenNthCalledWith(1, 'Spawned 2 cells, 1 force terms');
    expect(info).toHaveBeenNthCalledWith(2, 'Simulation reset with 2 cells');
    expect(warn).toHaveBeenCalledWith('Force term 0: noiseBound is ignored without noiseStdev');
  });

  it('warns about one-sided masks when verbose', () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const oneSided = boolFromRows([
      [false, true],
      [false, false],
    ]);
    const symmetric = boolFromRows([
      [false, true],
      [true, false],
    ]);

    createSim(createConfig({ ...pair, verbose: true }), [
      createForceTerm('hooke', { dist0: 1, k: 1 }, { mask: symmetric }),
      createForceTerm('hooke', { dist0: 1, k: 1 }, { mask: oneSided }),
    ]);

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('Force term 1: mask is not symmetric');
  });

  it('stays silent by default', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    createSim(pair, [spring]).reset();

    expect(info).not.toHaveBeenCalled();
  });
});
