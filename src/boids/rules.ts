import type { HeadingContext } from "./context";
import { AXES, magnitude } from "./vector";
import type { Boid, BoidSnapshot } from "./vocabulary/schemas/entities";
import type { Vector2 } from "./vocabulary/schemas/primitives";

/**
 * Adjust a boid's heading from the boids it can sense.
 *
 * Per axis, over all neighbors:
 *   meanPosition - average neighbor position (cohesion target)
 *   meanHeading  - average neighbor heading (alignment)
 *   antiCrowd    - average separation contribution (see separation.ts)
 *
 *   heading = heading
 *           - separationWeight * antiCrowd
 *           + cohesionWeight * (meanPosition - position)
 *           + alignmentWeight * meanHeading
 *
 * Then, neighbors or not, the heading is rescaled to exactly `velocity`.
 * A zero heading stays zero: the boid stands still until a later tick's
 * rules push it off.
 *
 * Neighbors must come from the tick's pre-update snapshot, never from
 * boids whose heading was already adjusted this tick.
 */
export function adjustHeading(
  boid: Boid,
  neighbors: readonly BoidSnapshot[],
  context: HeadingContext
): void {
  const { parameters, separation } = context;

  if (neighbors.length > 0) {
    const meanPosition: Vector2 = { x: 0, y: 0 };
    const meanHeading: Vector2 = { x: 0, y: 0 };
    const antiCrowd: Vector2 = { x: 0, y: 0 };

    for (const other of neighbors) {
      for (const axis of AXES) {
        meanPosition[axis] += other.position[axis];
        meanHeading[axis] += other.heading[axis];
        antiCrowd[axis] += separation(
          boid.position[axis],
          other.position[axis],
          parameters.senseRange
        );
      }
    }

    const count = neighbors.length;
    for (const axis of AXES) {
      meanPosition[axis] /= count;
      meanHeading[axis] /= count;
      antiCrowd[axis] /= count;

      boid.heading[axis] =
        boid.heading[axis] -
        parameters.separationWeight * antiCrowd[axis] +
        parameters.cohesionWeight * (meanPosition[axis] - boid.position[axis]) +
        parameters.alignmentWeight * meanHeading[axis];
    }
  }

  normalizeHeading(boid, parameters.velocity);
}

/**
 * Rescale the heading to `velocity`, keeping its direction
 */
export function normalizeHeading(boid: Boid, velocity: number): void {
  const mag = magnitude(boid.heading);
  if (mag === 0) {
    boid.heading.x = 0;
    boid.heading.y = 0;
    return;
  }
  for (const axis of AXES) {
    boid.heading[axis] = (boid.heading[axis] * velocity) / mag;
  }
}
