import { snapshotBoid } from "./boid";
import type { TickContext } from "./context";
import { moveBoid } from "./motion";
import { findNeighbors } from "./neighbors";
import { adjustHeading } from "./rules";
import type { Boid, BoidSnapshot } from "./vocabulary/schemas/entities";

/**
 * Pass 1 - steering.
 *
 * Every boid senses a frozen copy of the population taken before any
 * heading changes, so the outcome does not depend on iteration order.
 * Each iteration writes only its own boid's heading.
 */
export function steerFlock(boids: Boid[], context: TickContext): void {
  const snapshot: BoidSnapshot[] = boids.map(snapshotBoid);
  const { senseRange } = context.parameters;

  for (let i = 0; i < boids.length; i++) {
    const neighbors = findNeighbors(snapshot[i], snapshot, senseRange);
    adjustHeading(boids[i], neighbors, context);
  }
}

/**
 * Pass 2 - motion, with the headings pass 1 produced
 */
export function moveFlock(boids: Boid[], context: TickContext): void {
  for (const boid of boids) {
    moveBoid(boid, context);
  }
}

/**
 * One full tick: steer everybody, then move everybody
 */
export function stepFlock(boids: Boid[], context: TickContext): void {
  steerFlock(boids, context);
  moveFlock(boids, context);
}
