import type { DomainRNG } from "@/lib/seededRandom";
import * as vec from "./vector";
import type { Boid, BoidSnapshot } from "./vocabulary/schemas/entities";

/**
 * Boid creation context - plane size, starting speed and a seeded stream
 */
export type BoidCreationContext = {
  bound: number;
  velocity: number;
  rng: DomainRNG;
};

/**
 * Create a boid at a random position, facing a random direction at
 * `velocity` speed
 */
export function createBoid(id: string, context: BoidCreationContext): Boid {
  const { bound, velocity, rng } = context;

  return {
    id,
    position: {
      x: rng.range(0, bound),
      y: rng.range(0, bound),
    },
    heading: vec.fromAngle(rng.angle(), velocity),
  };
}

/**
 * Ids are handed out in order and never reused by the same sequence
 */
export function createIdSequence(prefix = "boid") {
  let next = 0;
  return () => `${prefix}-${next++}`;
}

export function snapshotBoid(boid: Boid): BoidSnapshot {
  return {
    id: boid.id,
    position: vec.copy(boid.position),
    heading: vec.copy(boid.heading),
  };
}
