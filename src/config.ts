/**
 * Configuration factory for a cell simulation run.
 */

import type { SimConfig } from './types.ts';

/**
 * Creates a new configuration object with default run parameters.
 *
 * The defaults scatter 36 cells at least 0.5 apart in a disc of radius 4
 * around the origin and step with Δt = 0.1, which is stable for spring
 * constants up to ~1.
 *
 * @param overrides - Values replacing the defaults
 * @returns A new SimConfig object
 */
export function createConfig(overrides: Partial<SimConfig> = {}): SimConfig {
  return {
    // === Time Integration ===
    deltaT: 0.1,

    // === Randomness ===
    seed: 42, // Same seed, same spawn and same noise

    // === Cell Spawning ===
    spawnCount: 36,
    spawnDisc: { center: { x: 0, y: 0 }, radius: 4 },
    minSpacing: 0.5, // Coincident cells give 0/0 directions
    maxAttempts: 100,

    // === Diagnostics ===
    strict: false,
    verbose: false,

    ...overrides,
  };
}
