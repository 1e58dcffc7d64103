import { defineResource, type StartedResource } from "braided";
import { simulationKeywords } from "@/boids/vocabulary/keywords";
import { describeIssues } from "@/boids/vocabulary/schemas/parameters";
import {
  simulationCommandSchema,
  type SimulationCommand,
  type SimulationEvent,
} from "@/boids/vocabulary/schemas/simulation";
import { createChannel } from "@/lib/channels";
import type { WorldConfigResource } from "./config";
import type { FlockEngine } from "./engine";
import type { ParameterStoreResource } from "./parameters";
import {
  createSimulation,
  runCommand,
  type CommandHandlers,
} from "./simulation/core";
import type { UpdateLoopResource } from "./updateLoop";

function toErrorEvent(error: unknown, meta: unknown): SimulationEvent {
  return {
    type: simulationKeywords.events.error,
    error: error instanceof Error ? error.message : "Unknown error",
    meta,
  };
}

/**
 * Simulation gateway - the surface a renderer or control panel talks to.
 *
 * Commands go in, events come out. A command that fails validation or
 * throws in its handler becomes a `simulation/error` event; nothing here
 * throws back at the caller.
 */
export const simulation = defineResource({
  dependencies: ["engine", "parameters", "config", "updateLoop"],
  start: ({
    engine,
    parameters,
    config,
    updateLoop,
  }: {
    engine: FlockEngine;
    parameters: ParameterStoreResource;
    config: WorldConfigResource;
    updateLoop: UpdateLoopResource;
  }) => {
    const channel = createChannel<SimulationCommand, SimulationEvent>();

    const commandHandlers = {
      [simulationKeywords.commands.start]: () => {
        updateLoop.start();
      },
      [simulationKeywords.commands.stop]: () => {
        updateLoop.stop();
      },
      [simulationKeywords.commands.pause]: () => {
        updateLoop.pause();
      },
      [simulationKeywords.commands.resume]: () => {
        updateLoop.resume();
      },
      [simulationKeywords.commands.step]: () => {
        updateLoop.step();
      },
      [simulationKeywords.commands.setInterval]: (command) => {
        config.setTickInterval(command.intervalMs);
      },
      [simulationKeywords.commands.updateParameters]: (command) => {
        parameters.update(command.patch);
      },
      [simulationKeywords.commands.resetParameters]: () => {
        console.log("[simulation] Resetting parameters to defaults");
        parameters.reset();
      },
      [simulationKeywords.commands.toggleBounce]: () => {
        parameters.toggleBounce();
      },
      [simulationKeywords.commands.setSeparationMode]: (command) => {
        parameters.setSeparationMode(command.mode);
      },
      [simulationKeywords.commands.toggleSensingRange]: () => {
        config.toggleSensingRange();
      },
      [simulationKeywords.commands.toggleNoise]: () => {
        const enabled = config.toggleNoise();
        console.log(`[simulation] Noise ${enabled ? "on" : "off"}`);
      },
      [simulationKeywords.commands.resetEngine]: () => {
        engine.reset();
      },
    } satisfies CommandHandlers;

    const core = createSimulation(
      { simulationChannel: channel },
      {
        onInitialize: () => {
          console.log("[simulation] Initialized");
        },
        onCommand: (command, resolve) => {
          try {
            runCommand(commandHandlers, command.type, command);
          } catch (error) {
            resolve(toErrorEvent(error, command));
          }
        },
        onCleanup: () => {
          console.log("[simulation] Cleaned up");
        },
      }
    );

    const unwatchTicks = engine.watch((observation) => {
      channel.out.notify({
        type: simulationKeywords.events.ticked,
        observation,
      });
    });
    const unwatchParameters = parameters.watch((next) => {
      channel.out.notify({
        type: simulationKeywords.events.parametersChanged,
        parameters: next,
      });
    });
    const unwatchLoopErrors = updateLoop.watchErrors((error) => {
      channel.out.notify(toErrorEvent(error, { source: "updateLoop" }));
    });

    core.initialize();

    /**
     * Validate untyped input (a message from another process, a form)
     * before dispatching it synchronously
     */
    const send = (input: unknown) => {
      const parsed = simulationCommandSchema.safeParse(input);
      if (!parsed.success) {
        channel.out.notify({
          type: simulationKeywords.events.error,
          error: `Invalid command: ${describeIssues(parsed.error)}`,
          meta: input,
        });
        return false;
      }
      core.dispatchImmediate(parsed.data);
      return true;
    };

    return {
      send,
      dispatch: core.dispatch,
      dispatchImmediate: core.dispatchImmediate,
      watch: core.watch,
      observe: engine.observe,
      tick: engine.tick,
      isRunning: updateLoop.isRunning,
      isPaused: updateLoop.isPaused,
      cleanup: () => {
        unwatchTicks();
        unwatchParameters();
        unwatchLoopErrors();
        core.cleanup();
      },
    };
  },
  halt: ({ cleanup }) => {
    cleanup();
  },
});

export type SimulationResource = StartedResource<typeof simulation>;
