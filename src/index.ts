export type {
  BoolMatrix,
  Distances,
  ForceFunction,
  ForceTerm,
  Matrix,
  Positions,
  PotentialFunction,
  Sim,
  SimConfig,
  SimState,
  SpawnData,
  SpawnDisc,
  StepOptions,
  StepResult,
} from './types.ts';

export { getDistances } from './distance.ts';
export { evaluateForceTerm, step } from './integrator.ts';
export {
  anharmonicForce,
  expDecayForce,
  expNegForce,
  hookeForce,
} from './force_funcs.ts';
export {
  anharmonicPotential,
  expDecayPotential,
  expNegPotential,
  hookePotential,
} from './potential_funcs.ts';
export { FORCE_LAWS, createForceTerm, lawParams } from './force_laws.ts';
export type {
  ForceLaw,
  ForceLawName,
  ForceLawParams,
  ForceTermOptions,
} from './force_laws.ts';
export { createSameTypeMask, createTypeMask, invertMask } from './masks.ts';
export {
  boolFromRows,
  boolMatrix,
  fromRows,
  get,
  isSymmetric,
  map,
  offDiagonalMask,
  rowSums,
  toRows,
  zeros,
} from './matrix.ts';
export { cellCount, fromPoints, toPoints } from './positions.ts';
export {
  clip,
  createGaussian,
  createRng,
  deriveNoiseSeed,
  gaussianMatrix,
} from './noise.ts';
export {
  InvalidParameterError,
  InvalidShapeError,
  NonFiniteResultError,
  SimulationError,
} from './errors.ts';
export { createConfig } from './config.ts';
export { createSpawnData } from './spawn.ts';
export { createSim } from './sim.ts';
