import type {
  SimulationCommand,
  SimulationEvent,
} from "@/boids/vocabulary/schemas/simulation";
import type { Channel } from "@/lib/channels";

/**
 * Higher-order simulation factory: wires a command handler to a channel.
 * Orchestration only, the handlers do the work.
 */

type SimulationDeps = {
  simulationChannel: Channel<SimulationCommand, SimulationEvent>;
};

type SimulationHandlers = {
  onInitialize: () => void;
  onCommand: (
    command: SimulationCommand,
    resolve: (output: SimulationEvent | undefined) => void
  ) => SimulationEvent | undefined | void;
  onCleanup: () => void;
};

export function createSimulation(
  deps: SimulationDeps,
  handlers: SimulationHandlers
) {
  const { simulationChannel: channel } = deps;
  const { onInitialize, onCommand, onCleanup } = handlers;
  let detachWorker: (() => void) | null = null;

  const initialize = () => {
    if (detachWorker) return;
    onInitialize();
    detachWorker = channel.work(onCommand);
  };

  const dispatchImmediate = (command: SimulationCommand) => {
    channel.put(command);
  };

  // Deferred to the next macrotask, so a command sent while a tick runs
  // lands between ticks
  const dispatch = (command: SimulationCommand) => {
    setTimeout(() => {
      dispatchImmediate(command);
    }, 0);
  };

  const cleanup = () => {
    if (detachWorker) {
      detachWorker();
      detachWorker = null;
    }
    channel.clear();
    onCleanup();
  };

  return {
    watch: channel.watch,
    cleanup,
    dispatch,
    initialize,
    dispatchImmediate,
  };
}

export type CommandsByType = {
  [Command in SimulationCommand as Command["type"]]: Command;
};

export type CommandHandlers = {
  [Key in keyof CommandsByType]: (command: CommandsByType[Key]) => void;
};

/**
 * Route a command to its handler; `type` and `command` stay correlated
 */
export function runCommand<Key extends keyof CommandsByType>(
  handlers: CommandHandlers,
  type: Key,
  command: CommandsByType[Key]
): void {
  handlers[type](command);
}

export type SimulationAPI = ReturnType<typeof createSimulation>;
