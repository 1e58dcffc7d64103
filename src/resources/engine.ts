import { defineResource } from "braided";
import { createBoid, createIdSequence, snapshotBoid } from "@/boids/boid";
import { createTickContext } from "@/boids/context";
import { stepFlock } from "@/boids/flock";
import { randomDomainKeywords } from "@/boids/vocabulary/keywords";
import type { Boid } from "@/boids/vocabulary/schemas/entities";
import type { Observation } from "@/boids/vocabulary/schemas/simulation";
import { createSubscription } from "@/lib/state";
import type { WorldConfigResource } from "./config";
import type { ParameterStoreResource } from "./parameters";
import type { RandomnessResource } from "./randomness";
import type { TimeResource } from "./time";

export type FlockEngine = {
  getBoids: () => readonly Boid[];
  // Run one pass-1/pass-2 cycle and return what observers would see
  tick: () => Observation;
  observe: () => Observation;
  // Fresh population with new ids; the tick counter restarts
  reset: () => void;
  watch: (listener: (observation: Observation) => void) => () => void;
};

export const engine = defineResource({
  dependencies: ["config", "randomness", "parameters", "time"],
  start: ({
    config,
    randomness,
    parameters,
    time,
  }: {
    config: WorldConfigResource;
    randomness: RandomnessResource;
    parameters: ParameterStoreResource;
    time: TimeResource;
  }): FlockEngine => {
    const nextId = createIdSequence();
    const tickSubscription = createSubscription<Observation>();
    let boids: Boid[] = [];

    const spawn = () => {
      const { bound, boidCount } = config.getConfig();
      const creationContext = {
        bound,
        velocity: parameters.get().velocity,
        rng: randomness.domain(randomDomainKeywords.spawning),
      };

      const spawned: Boid[] = [];
      for (let i = 0; i < boidCount; i++) {
        spawned.push(createBoid(nextId(), creationContext));
      }
      return spawned;
    };

    const observe = (): Observation => {
      const { showSensingRange } = config.getConfig();
      const observation: Observation = {
        tick: time.getTick(),
        boids: boids.map(snapshotBoid),
      };
      if (showSensingRange) {
        observation.senseRange = parameters.get().senseRange;
      }
      return observation;
    };

    const tick = () => {
      const world = config.getConfig();
      const context = createTickContext({
        tick: time.getTick() + 1,
        parameters: parameters.snapshot(),
        bound: world.bound,
        noiseEnabled: world.noiseEnabled,
        noise: randomness.domain(randomDomainKeywords.noise),
      });

      stepFlock(boids, context);
      time.advance(world.tickIntervalMs);

      const observation = observe();
      tickSubscription.notify(observation);
      return observation;
    };

    const reset = () => {
      boids = spawn();
      time.reset();
      console.log(`[engine] Reset with ${boids.length} boids`);
    };

    boids = spawn();
    console.log(
      `[engine] Spawned ${boids.length} boids (seed "${randomness.getMasterSeed()}")`
    );

    return {
      getBoids: () => boids,
      tick,
      observe,
      reset,
      watch: tickSubscription.subscribe,
    };
  },
  halt: () => {},
});
