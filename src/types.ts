/**
 * Type definitions for the cell force simulation.
 *
 * Cells are point-like entities in 2D space. Each timestep, every pair of
 * cells interacts through one or more force terms, each of which maps the
 * pairwise distance matrix to a matrix of scalar radial forces. The scalar
 * forces are decomposed along the displacement vectors, summed over all
 * neighbors, and integrated with a first-order (Euler) update.
 */

/**
 * Packed cell positions, interleaved as [y0, x0, y1, x1, ...].
 *
 * The row layout is (y, x) throughout the library: column 0 is the
 * y-coordinate and column 1 the x-coordinate. Index i always refers to
 * the same cell for the whole run.
 */
export type Positions = Float64Array;

/**
 * Dense square matrix of numbers in row-major order.
 * Entry (i, j) lives at `data[i * size + j]`.
 */
export interface Matrix {
  size: number;
  data: Float64Array;
}

/**
 * Dense square boolean matrix in row-major order (nonzero = true).
 */
export interface BoolMatrix {
  size: number;
  data: Uint8Array;
}

/**
 * Pairwise displacement and distance matrices for one set of positions.
 *
 * Displacements point from cell i toward cell j:
 * - `dx[i][j] = x_j - x_i`
 * - `dy[i][j] = y_j - y_i`
 * - `dist[i][j] = sqrt(dx² + dy²)`
 */
export interface Distances {
  dx: Matrix;
  dy: Matrix;
  dist: Matrix;
}

/**
 * A scalar force law evaluated element-wise on the distance matrix.
 *
 * Implementations must return a new matrix of the same size as `dist` and
 * must not modify `dist`. Extra scalar parameters follow the distance
 * matrix in a fixed order specific to each law.
 */
export type ForceFunction = (dist: Matrix, ...params: number[]) => Matrix;

/**
 * A potential-energy landscape evaluated element-wise on the distance matrix.
 * Not used by the integrator; useful for analysing force terms.
 */
export type PotentialFunction = (dist: Matrix, ...params: number[]) => Matrix;

/**
 * One pairwise-interaction rule contributing additively to the total force.
 */
export interface ForceTerm {
  /** Force law evaluated on the full distance matrix */
  force: ForceFunction;

  /** Extra parameters passed to `force` after the distance matrix */
  params: readonly number[];

  /** Pairs closer than this contribute nothing (the boundary itself is kept) */
  minRange: number;

  /** Pairs farther than this contribute nothing (the boundary itself is kept) */
  maxRange: number;

  /**
   * Optional interaction mask. Only pairs marked true are affected.
   * Absent means every pair interacts.
   */
  mask?: BoolMatrix;

  /**
   * Standard deviation of zero-mean Gaussian noise added to the raw force
   * matrix. Absent means no noise.
   */
  noiseStdev?: number;

  /**
   * Symmetric clamp applied to each noise sample, [-noiseBound, noiseBound].
   * Absent means unbounded. Has no effect unless `noiseStdev` is set.
   */
  noiseBound?: number;
}

/**
 * Output of one integration step.
 */
export interface StepResult {
  /** Updated positions [y0, x0, ...] */
  positions: Positions;

  /** Net force applied to each cell [fy0, fx0, ...] */
  forces: Positions;
}

/**
 * Optional behaviour switches for a single step.
 */
export interface StepOptions {
  /**
   * Uniform [0, 1) source used for noise sampling.
   * Defaults to Math.random.
   */
  random?: () => number;

  /**
   * Validate shapes, parameters and results, throwing on problems.
   * Off by default: malformed input propagates as NaN/Infinity.
   */
  strict?: boolean;
}

/**
 * Disc in which cells are scattered at the start of a run.
 *
 * @property center - Center of the disc (x, y)
 * @property radius - Disc radius; every spawned cell lies within it
 */
export interface SpawnDisc {
  center: { x: number; y: number };
  radius: number;
}

/**
 * Configuration for a simulation run driven by `createSim`.
 */
export interface SimConfig {
  /** Euler timestep used by every step */
  deltaT: number;

  /** Seed for the noise and spawn generators */
  seed: number;

  /**
   * Explicit starting positions as [y, x] pairs.
   * When set, the spawn disc is ignored.
   */
  initialPositions?: readonly (readonly [number, number])[];

  /** Number of cells scattered in the spawn disc */
  spawnCount: number;

  /** Where cells are scattered */
  spawnDisc: SpawnDisc;

  /** Smallest distance allowed between two spawned cells */
  minSpacing: number;

  /** Candidate points drawn per cell before spawning gives up */
  maxAttempts: number;

  /** Run every step with strict validation */
  strict: boolean;

  /** Log spawn/reset information to the console */
  verbose: boolean;
}

/**
 * Data returned from cell spawning.
 */
export interface SpawnData {
  /** Initial cell positions [y0, x0, ...] */
  positions: Positions;

  /** Number of spawned cells */
  count: number;
}

/**
 * Mutable state held by a running simulation.
 */
export interface SimState {
  /** Current cell positions */
  positions: Positions;

  /** Net forces from the most recent step (zeros before the first step) */
  forces: Positions;

  /** Number of cells */
  count: number;

  /** Number of steps taken since creation or the last reset */
  stepCount: number;
}

/**
 * Stateful simulation interface returned by `createSim`.
 */
export interface Sim {
  /** Advance one timestep and return its result */
  step: () => StepResult;

  /** Advance `steps` timesteps and return the final result */
  run: (steps: number) => StepResult;

  /** Restore initial positions and reseed the noise generator */
  reset: () => void;

  /** Direct access to simulation state */
  state: SimState;

  /** Direct access to configuration */
  config: SimConfig;

  /** Force terms applied every step */
  forceTerms: readonly ForceTerm[];
}
