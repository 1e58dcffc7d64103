import { defineResource, type StartedResource } from "braided";
import { createSubscription } from "@/lib/state";
import { createUpdateLoop } from "@/lib/updateLoop";
import type { WorldConfigResource } from "./config";
import type { FlockEngine } from "./engine";

export const updateLoopResource = defineResource({
  dependencies: ["engine", "config"],
  start: ({
    engine,
    config,
  }: {
    engine: FlockEngine;
    config: WorldConfigResource;
  }) => {
    const errorSubscription = createSubscription<Error>();

    const loop = createUpdateLoop({
      onStart: () => {
        console.log(
          `[updateLoop] Started (${config.getConfig().tickIntervalMs}ms interval)`
        );
      },
      onStop: () => {
        console.log("[updateLoop] Stopped");
      },
      onPause: () => {
        console.log("[updateLoop] Paused");
      },
      onResume: () => {
        console.log("[updateLoop] Resumed");
      },
      onTick: (manual) => {
        try {
          engine.tick();
        } catch (error) {
          const failure =
            error instanceof Error ? error : new Error(String(error));
          console.error("[updateLoop] Tick failed:", failure.message);
          // A failing tick would fail again on the next timer; stop here
          if (!manual) loop.stop();
          errorSubscription.notify(failure);
        }
      },
      getIntervalMs: () => config.getConfig().tickIntervalMs,
    });

    return {
      ...loop,
      watchErrors: errorSubscription.subscribe,
    };
  },
  halt: (loop) => {
    loop.stop();
  },
});

export type UpdateLoopResource = StartedResource<typeof updateLoopResource>;
