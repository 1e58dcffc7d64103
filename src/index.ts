export { startFlockingSystem, createSystemConfig } from "./system";
export type {
  FlockingSystem,
  FlockingSystemConfig,
  FlockingSystemOptions,
} from "./system";

export { createBoid, createIdSequence, snapshotBoid } from "./boids/boid";
export { createTickContext } from "./boids/context";
export type { TickContext, HeadingContext, MotionContext } from "./boids/context";
export { getControlDescriptors } from "./boids/controls";
export type { ControlDescriptor } from "./boids/controls";
export { steerFlock, moveFlock, stepFlock } from "./boids/flock";
export { moveBoid, wrapAxis, bounceAxis } from "./boids/motion";
export type { BoundaryPolicy } from "./boids/motion";
export { findNeighbors } from "./boids/neighbors";
export { adjustHeading, normalizeHeading } from "./boids/rules";
export {
  rootSeparation,
  squareSeparation,
  selectSeparation,
} from "./boids/separation";
export type { SeparationRule } from "./boids/separation";

export {
  separationModeKeywords,
  simulationKeywords,
} from "./boids/vocabulary/keywords";
export type { Boid, BoidSnapshot } from "./boids/vocabulary/schemas/entities";
export {
  DEFAULT_FLOCKING_PARAMETERS,
  DEFAULT_NUMERIC_PARAMETERS,
  flockingParametersSchema,
  parameterPatchSchema,
} from "./boids/vocabulary/schemas/parameters";
export type {
  FlockingParameters,
  ParameterPatch,
} from "./boids/vocabulary/schemas/parameters";
export type { SeparationMode, Vector2 } from "./boids/vocabulary/schemas/primitives";
export {
  simulationCommandSchema,
  simulationEventSchema,
} from "./boids/vocabulary/schemas/simulation";
export type {
  Observation,
  SimulationCommand,
  SimulationEvent,
} from "./boids/vocabulary/schemas/simulation";
export { worldConfigSchema } from "./boids/vocabulary/schemas/world";
export type { WorldConfig, WorldConfigInput } from "./boids/vocabulary/schemas/world";
export { createSeededRNG } from "./lib/seededRandom";
export type { DomainRNG } from "./lib/seededRandom";
