import { haltSystem, startSystem, type StartedSystem } from "braided";
import type { ParameterPatch } from "./boids/vocabulary/schemas/parameters";
import type { WorldConfigInput } from "./boids/vocabulary/schemas/world";
import { createWorldConfigResource } from "./resources/config";
import { engine } from "./resources/engine";
import { createParameterStoreResource } from "./resources/parameters";
import { randomness } from "./resources/randomness";
import { simulation } from "./resources/simulation";
import { time } from "./resources/time";
import { updateLoopResource } from "./resources/updateLoop";

export type FlockingSystemOptions = {
  world?: WorldConfigInput;
  parameters?: ParameterPatch;
};

export const createSystemConfig = (options: FlockingSystemOptions = {}) => ({
  config: createWorldConfigResource(options.world ?? {}),
  time,
  randomness,
  parameters: createParameterStoreResource(options.parameters ?? {}),
  engine,
  updateLoop: updateLoopResource,
  simulation,
});

export type FlockingSystemConfig = ReturnType<typeof createSystemConfig>;
export type FlockingSystem = StartedSystem<FlockingSystemConfig>;

/**
 * Start every resource and hand back the system with its halt function.
 * A resource that fails to start halts whatever did start, then rejects
 * with one line per failed resource.
 */
export async function startFlockingSystem(options: FlockingSystemOptions = {}) {
  const systemConfig = createSystemConfig(options);
  const { system, errors } = await startSystem(systemConfig);

  if (errors.size > 0) {
    await haltSystem(systemConfig, system).catch((error: unknown) => {
      console.error("[system] Halt after failed start also failed", error);
    });
    const details = Array.from(errors.entries())
      .map(([resourceId, error]) => `${resourceId}: ${error.message}`)
      .join(", ");
    throw new Error(`Flocking system failed to start: ${details}`);
  }

  console.log("[system] Started");

  return {
    system,
    halt: () => haltSystem(systemConfig, system),
  };
}
