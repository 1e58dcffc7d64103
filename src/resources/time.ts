import { createAtom } from "@/lib/state";
import { defineResource } from "braided";

/**
 * Time Resource - simulation time, counted in ticks.
 *
 * Wall-clock time never enters the simulation: elapsed time is the sum of
 * the tick intervals that actually ran, so a paused or manually stepped
 * run reports the same clock as a free-running one after the same ticks.
 */

export type TimeState = {
  tick: number; // Completed ticks
  elapsedMs: number; // Sum of tick intervals
};

export type TimeAPI = {
  getState: () => TimeState;
  getTick: () => number;
  // Record one completed tick of `intervalMs`
  advance: (intervalMs: number) => void;
  reset: () => void;
};

export type TimeResource = TimeAPI;

const initialState: TimeState = {
  tick: 0,
  elapsedMs: 0,
};

export const time = defineResource({
  start: (): TimeAPI => {
    const stateAtom = createAtom(initialState);

    return {
      getState: () => stateAtom.get(),
      getTick: () => stateAtom.get().tick,
      advance: (intervalMs: number) => {
        stateAtom.update((state) => ({
          tick: state.tick + 1,
          elapsedMs: state.elapsedMs + intervalMs,
        }));
      },
      reset: () => stateAtom.set(initialState),
    };
  },
  halt: () => {},
});
