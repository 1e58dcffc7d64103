import type { HeadingContext, MotionContext } from "@/boids/context";
import { rootSeparation } from "@/boids/separation";
import type { Boid } from "@/boids/vocabulary/schemas/entities";
import {
  DEFAULT_FLOCKING_PARAMETERS,
  type FlockingParameters,
} from "@/boids/vocabulary/schemas/parameters";
import type { DomainRNG } from "@/lib/seededRandom";

export function makeBoid(
  id: string,
  x: number,
  y: number,
  headingX = 0,
  headingY = 0
): Boid {
  return { id, position: { x, y }, heading: { x: headingX, y: headingY } };
}

export function makeParameters(
  overrides: Partial<FlockingParameters> = {}
): FlockingParameters {
  return { ...DEFAULT_FLOCKING_PARAMETERS, ...overrides };
}

export function headingContext(
  overrides: Partial<FlockingParameters> = {},
  separation = rootSeparation
): HeadingContext {
  return { parameters: makeParameters(overrides), separation };
}

/**
 * RNG stub whose next() always returns `value`
 */
export function constantRng(value: number): DomainRNG {
  return {
    next: () => value,
    range: (min, max) => min + value * (max - min),
    angle: () => value * Math.PI * 2,
  };
}

export function motionContext(
  overrides: Partial<FlockingParameters> = {},
  options: { bound?: number; noiseEnabled?: boolean; noiseValue?: number } = {}
): MotionContext {
  return {
    parameters: makeParameters(overrides),
    bound: options.bound ?? 100,
    noiseEnabled: options.noiseEnabled ?? false,
    noise: constantRng(options.noiseValue ?? 0.5),
  };
}
