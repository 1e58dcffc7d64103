import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { simulationKeywords } from "@/boids/vocabulary/keywords";
import type {
  SimulationCommand,
  SimulationEvent,
} from "@/boids/vocabulary/schemas/simulation";
import { startFlockingSystem, type FlockingSystem } from "@/system";

describe("simulation gateway", () => {
  let system: FlockingSystem;
  let halt: () => Promise<unknown>;
  let events: SimulationEvent[];

  beforeEach(async () => {
    const started = await startFlockingSystem({
      world: { boidCount: 5, bound: 100, seed: "gateway" },
    });
    system = started.system;
    halt = started.halt;
    events = [];
    system.simulation.watch((event) => {
      events.push(event);
    });
  });

  afterEach(async () => {
    vi.useRealTimers();
    await halt();
  });

  it("emits a ticked event for a step", () => {
    expect(system.simulation.send({ type: "simulation/step" })).toBe(true);

    expect(events).toHaveLength(1);
    const [event] = events;
    expect(event.type).toBe(simulationKeywords.events.ticked);
    if (event.type === simulationKeywords.events.ticked) {
      expect(event.observation.tick).toBe(1);
      expect(event.observation.boids).toHaveLength(5);
    }
  });

  it("emits the new parameters after an update", () => {
    system.simulation.send({
      type: "parameters/update",
      patch: { alignmentWeight: 3 },
    });

    expect(events).toHaveLength(1);
    const [event] = events;
    expect(event.type).toBe(simulationKeywords.events.parametersChanged);
    if (event.type === simulationKeywords.events.parametersChanged) {
      expect(event.parameters.alignmentWeight).toBe(3);
    }
  });

  it("routes the mode toggles to the parameter store", () => {
    system.simulation.send({ type: "parameters/toggleBounce" });
    system.simulation.send({
      type: "parameters/setSeparationMode",
      mode: "square",
    });

    expect(system.parameters.get().bounce).toBe(true);
    expect(system.parameters.get().separationMode).toBe("square");
  });

  it("toggles the sensing-range view", () => {
    system.simulation.send({ type: "view/toggleSensingRange" });

    expect(system.simulation.observe().senseRange).toBe(50);
  });

  it("toggles noise in the world config", () => {
    system.simulation.send({ type: "world/toggleNoise" });
    expect(system.config.getConfig().noiseEnabled).toBe(false);

    system.simulation.send({ type: "world/toggleNoise" });
    expect(system.config.getConfig().noiseEnabled).toBe(true);
  });

  it("changes the tick interval of the update loop", () => {
    expect(
      system.simulation.send({ type: "simulation/setInterval", intervalMs: 50 })
    ).toBe(true);
    vi.useFakeTimers();

    system.simulation.send({ type: "simulation/start" });
    vi.advanceTimersByTime(49);
    expect(system.simulation.observe().tick).toBe(0);

    vi.advanceTimersByTime(1);
    expect(system.simulation.observe().tick).toBe(1);
    expect(system.time.getState().elapsedMs).toBe(50);

    system.simulation.send({ type: "simulation/stop" });
  });

  it("rejects a non-positive tick interval", () => {
    expect(
      system.simulation.send({ type: "simulation/setInterval", intervalMs: 0 })
    ).toBe(false);
    expect(events[0]).toMatchObject({
      type: simulationKeywords.events.error,
      error: "Invalid command: intervalMs: Number must be greater than 0",
    });

    const command = {
      type: simulationKeywords.commands.setInterval,
      intervalMs: -5,
    } satisfies SimulationCommand;
    system.simulation.dispatchImmediate(command);

    expect(events[1]).toEqual({
      type: simulationKeywords.events.error,
      error: "Tick interval must be a positive number of milliseconds, got -5",
      meta: command,
    });
    expect(system.config.getConfig().tickIntervalMs).toBe(20);
  });

  it("respawns on engine reset", () => {
    system.simulation.send({ type: "engine/reset" });

    expect(system.engine.getBoids()[0].id).toBe("boid-5");
  });

  it("reports a malformed command instead of throwing", () => {
    const command = { type: "parameters/update", patch: { velocity: -1 } };

    expect(system.simulation.send(command)).toBe(false);

    expect(events).toHaveLength(1);
    const [event] = events;
    expect(event.type).toBe(simulationKeywords.events.error);
    if (event.type === simulationKeywords.events.error) {
      expect(event.error).toMatch(/^Invalid command: patch\.velocity: /);
      expect(event.meta).toBe(command);
    }
  });

  it("reports an unknown command type", () => {
    expect(system.simulation.send({ type: "simulation/explode" })).toBe(false);

    expect(events).toHaveLength(1);
    expect(events[0].type).toBe(simulationKeywords.events.error);
  });

  it("turns a failing handler into an error event", () => {
    const command = {
      type: simulationKeywords.commands.updateParameters,
      patch: { velocity: -1 },
    } satisfies SimulationCommand;

    system.simulation.dispatchImmediate(command);

    expect(events).toHaveLength(1);
    const [event] = events;
    expect(event.type).toBe(simulationKeywords.events.error);
    if (event.type === simulationKeywords.events.error) {
      expect(event.error).toMatch(/^Invalid flocking parameters: velocity: /);
      expect(event.meta).toBe(command);
    }
    expect(system.parameters.get().velocity).toBe(5);
  });

  it("delivers deferred commands on the next macrotask", async () => {
    system.simulation.dispatch({ type: simulationKeywords.commands.step });
    expect(events).toHaveLength(0);

    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(events).toHaveLength(1);
    expect(system.simulation.observe().tick).toBe(1);
  });

  it("starts and stops the update loop", () => {
    system.simulation.send({ type: "simulation/start" });
    expect(system.simulation.isRunning()).toBe(true);

    system.simulation.send({ type: "simulation/pause" });
    expect(system.simulation.isPaused()).toBe(true);

    system.simulation.send({ type: "simulation/stop" });
    expect(system.simulation.isRunning()).toBe(false);
  });
});
