import { defineResource, type StartedResource } from "braided";
import { produce } from "immer";
import type { StoreApi } from "zustand/vanilla";
import { createStore } from "zustand/vanilla";
import {
  DEFAULT_FLOCKING_PARAMETERS,
  DEFAULT_NUMERIC_PARAMETERS,
  describeIssues,
  flockingParametersSchema,
  parameterPatchSchema,
  type FlockingParameters,
  type ParameterPatch,
} from "@/boids/vocabulary/schemas/parameters";
import type { SeparationMode } from "@/boids/vocabulary/schemas/primitives";

export type ParameterState = {
  parameters: FlockingParameters;
  revision: number; // Bumped on every accepted change
};

export type ParameterStoreApi = StoreApi<ParameterState>;

/**
 * Merge a patch over the current parameters and validate the result.
 * Throws with every failing field listed; nothing is applied on failure.
 */
export function mergeParameters(
  current: FlockingParameters,
  patch: unknown
): FlockingParameters {
  const parsedPatch = parameterPatchSchema.safeParse(patch);
  if (!parsedPatch.success) {
    throw new Error(
      `Invalid flocking parameters: ${describeIssues(parsedPatch.error)}`
    );
  }

  const defined = Object.fromEntries(
    Object.entries(parsedPatch.data).filter(([, value]) => value !== undefined)
  );

  const merged = flockingParametersSchema.safeParse({ ...current, ...defined });
  if (!merged.success) {
    throw new Error(
      `Invalid flocking parameters: ${describeIssues(merged.error)}`
    );
  }
  return merged.data;
}

/**
 * Parameter store - the shared, simulation-wide tunables.
 *
 * The engine reads snapshot() once per tick; controllers write through
 * update/set/reset between ticks. Listeners hear every accepted change.
 */
export const createParameterStoreResource = (initial: ParameterPatch = {}) => {
  return defineResource({
    start: () => {
      const store = createStore<ParameterState>()(() => ({
        parameters: mergeParameters(DEFAULT_FLOCKING_PARAMETERS, initial),
        revision: 0,
      }));

      const commit = (next: FlockingParameters) => {
        store.setState((current) =>
          produce(current, (draft) => {
            draft.parameters = next;
            draft.revision += 1;
          })
        );
        return next;
      };

      const get = () => store.getState().parameters;

      const api = {
        store,
        get,
        getRevision: () => store.getState().revision,
        snapshot: (): Readonly<FlockingParameters> =>
          Object.freeze({ ...get() }),
        update: (patch: ParameterPatch) => commit(mergeParameters(get(), patch)),
        set: (parameters: FlockingParameters) => {
          const parsed = flockingParametersSchema.safeParse(parameters);
          if (!parsed.success) {
            throw new Error(
              `Invalid flocking parameters: ${describeIssues(parsed.error)}`
            );
          }
          return commit(parsed.data);
        },
        // Restores the tunables; bounce and separation mode are left alone
        reset: () => commit({ ...get(), ...DEFAULT_NUMERIC_PARAMETERS }),
        toggleBounce: () => commit({ ...get(), bounce: !get().bounce }),
        setSeparationMode: (mode: SeparationMode) =>
          commit(mergeParameters(get(), { separationMode: mode })),
        watch: (
          listener: (next: FlockingParameters, previous: FlockingParameters) => void
        ) =>
          store.subscribe((state, previousState) => {
            listener(state.parameters, previousState.parameters);
          }),
      };

      return api;
    },
    halt: () => {},
  });
};

export type ParameterStoreResource = StartedResource<
  ReturnType<typeof createParameterStoreResource>
>;
