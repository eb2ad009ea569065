/**
 * Simulation factory and state management.
 *
 * `step` in integrator.ts is stateless. This module wraps it for callers
 * that want to hold a population and advance it repeatedly:
 * - Initial state creation from spawn data
 * - A seeded noise generator shared across steps
 * - Reset to the initial conditions
 *
 * Trajectories are not recorded here; callers read `state.positions`
 * or the returned StepResult after each step.
 */

import type { ForceTerm, Sim, SimConfig, SimState, SpawnData, StepResult } from './types.ts';
import { step as integrate } from './integrator.ts';
import { isSymmetric } from './matrix.ts';
import { createRng, deriveNoiseSeed } from './noise.ts';
import { createSpawnData } from './spawn.ts';

function createStateFromSpawn(spawn: SpawnData): SimState {
  return {
    positions: new Float64Array(spawn.positions),
    forces: new Float64Array(spawn.count * 2),
    count: spawn.count,
    stepCount: 0,
  };
}

/**
 * Flags force-term settings that are accepted but probably unintended:
 * a noise bound with no noise to bound, and one-sided masks, which let
 * i push j without j pushing back.
 */
function warnSuspiciousTerms(forceTerms: readonly ForceTerm[]): void {
  forceTerms.forEach((term, index) => {
    if (term.noiseBound !== undefined && term.noiseStdev === undefined) {
      console.warn(`Force term ${index}: noiseBound is ignored without noiseStdev`);
    }
    if (term.mask !== undefined && !isSymmetric(term.mask)) {
      console.warn(`Force term ${index}: mask is not symmetric`);
    }
  });
}

/**
 * Creates a simulation instance.
 *
 * @param config - Run configuration (see createConfig)
 * @param forceTerms - Force terms applied on every step
 * @returns Simulation interface for advancing and resetting the population
 *
 * @example
 * const types = ['a', 'a', 'b', 'b']
 * const sim = createSim(
 *   createConfig({ initialPositions: [[0, 0], [0, 1], [1, 0], [1, 1]] }),
 *   [
 *     createForceTerm('hooke', { dist0: 1, k: 0.5 }, { maxRange: 2 }),
 *     createForceTerm('expDecay', { dist0: 0, pot0: 1, e: 2 }, {
 *       mask: createTypeMask(types, 'a', 'b'),
 *     }),
 *   ]
 * )
 * sim.run(100)
 */
export function createSim(config: SimConfig, forceTerms: readonly ForceTerm[]): Sim {
  let spawn = createSpawnData(config);
  const state = createStateFromSpawn(spawn);
  let random = createRng(deriveNoiseSeed(config.seed));

  if (config.verbose) {
    console.info(`Spawned ${spawn.count} cells, ${forceTerms.length} force terms`);
    warnSuspiciousTerms(forceTerms);
  }

  /**
   * Restores the initial population and reseeds the noise generator.
   *
   * Spawn data is regenerated from the current config, so changes to
   * spawn settings take effect here.
   */
  function reset(): void {
    spawn = createSpawnData(config);
    const next = createStateFromSpawn(spawn);

    state.positions = next.positions;
    state.forces = next.forces;
    state.count = next.count;
    state.stepCount = 0;
    random = createRng(deriveNoiseSeed(config.seed));

    if (config.verbose) {
      console.info(`Simulation reset with ${state.count} cells`);
    }
  }

  function step(): StepResult {
    const result = integrate(state.positions, forceTerms, config.deltaT, {
      random,
      strict: config.strict,
    });

    state.positions = result.positions;
    state.forces = result.forces;
    state.stepCount += 1;

    return result;
  }

  /**
   * Advances several steps and returns the last result.
   * With steps <= 0 the current state is returned unchanged.
   */
  function run(steps: number): StepResult {
    let result: StepResult = {
      positions: new Float64Array(state.positions),
      forces: new Float64Array(state.forces),
    };
    for (let t = 0; t < steps; t += 1) {
      result = step();
    }
    return result;
  }

  return {
    step,
    run,
    reset,
    state,
    config,
    forceTerms,
  };
}
