import { createAtom } from "@/lib/state";
import { describeIssues } from "@/boids/vocabulary/schemas/parameters";
import {
  worldConfigSchema,
  type WorldConfig,
  type WorldConfigInput,
} from "@/boids/vocabulary/schemas/world";
import { defineResource, type StartedResource } from "braided";

/**
 * World config resource.
 *
 * Bound, population and seed are fixed once the system starts; the noise
 * toggle, the sensing-range view and the tick interval can change between
 * ticks.
 */
export const createWorldConfigResource = (input: WorldConfigInput) => {
  return defineResource({
    start: () => {
      const parsed = worldConfigSchema.safeParse(input);
      if (!parsed.success) {
        throw new Error(`Invalid world config: ${describeIssues(parsed.error)}`);
      }

      const config = createAtom<WorldConfig>(parsed.data);

      console.log(
        `[config] World ${parsed.data.bound}x${parsed.data.bound}, ${parsed.data.boidCount} boids`
      );

      const api = {
        getConfig: () => config.get(),
        toggleNoise: () => {
          config.update((current) => ({
            ...current,
            noiseEnabled: !current.noiseEnabled,
          }));
          return config.get().noiseEnabled;
        },
        toggleSensingRange: () => {
          config.update((current) => ({
            ...current,
            showSensingRange: !current.showSensingRange,
          }));
          return config.get().showSensingRange;
        },
        setTickInterval: (intervalMs: number) => {
          if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
            throw new Error(
              `Tick interval must be a positive number of milliseconds, got ${intervalMs}`
            );
          }
          config.update((current) => ({ ...current, tickIntervalMs: intervalMs }));
        },
      };

      return api;
    },
    halt: () => {},
  });
};

export type WorldConfigResource = StartedResource<
  ReturnType<typeof createWorldConfigResource>
>;
