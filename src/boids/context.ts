import type { DomainRNG } from "@/lib/seededRandom";
import { selectSeparation, type SeparationRule } from "./separation";
import type { FlockingParameters } from "./vocabulary/schemas/parameters";

/**
 * Everything a boid may read during one tick.
 *
 * Built once at tick start from a frozen parameter snapshot, so a
 * parameter change made mid-tick cannot reach half of the population.
 */
export type TickContext = {
  tick: number;
  parameters: Readonly<FlockingParameters>;
  separation: SeparationRule;
  bound: number;
  noiseEnabled: boolean;
  noise: DomainRNG;
};

export type HeadingContext = Pick<TickContext, "parameters" | "separation">;

export type MotionContext = Pick<
  TickContext,
  "parameters" | "bound" | "noiseEnabled" | "noise"
>;

export function createTickContext(input: {
  tick: number;
  parameters: FlockingParameters;
  bound: number;
  noiseEnabled: boolean;
  noise: DomainRNG;
}): TickContext {
  const parameters = Object.freeze({ ...input.parameters });

  return {
    tick: input.tick,
    parameters,
    separation: selectSeparation(parameters.separationMode),
    bound: input.bound,
    noiseEnabled: input.noiseEnabled,
    noise: input.noise,
  };
}
