import type { MotionContext } from "./context";
import { AXES, type Axis } from "./vector";
import type { Boid } from "./vocabulary/schemas/entities";

/**
 * Edge handling for one axis, run right after that axis moved.
 */
export type BoundaryPolicy = (boid: Boid, axis: Axis, bound: number) => void;

/**
 * Teleport to the opposite edge. A single correction, not a modulo: a boid
 * that travels further than `bound` in one tick stays out of range.
 *
 * Below zero the position is mirrored as `bound - position`, which lands
 * past the far edge by the overshoot (0.5 - 1 on a 100 plane gives 100.5).
 * The far-edge branch pulls it back in on a later tick.
 */
export const wrapAxis: BoundaryPolicy = (boid, axis, bound) => {
  if (boid.position[axis] > bound) {
    boid.position[axis] -= bound;
  } else if (boid.position[axis] < 0) {
    boid.position[axis] = bound - boid.position[axis];
  }
};

/**
 * Reflect the heading component. The position stays where it landed and
 * the reversed heading brings it back on the next tick.
 */
export const bounceAxis: BoundaryPolicy = (boid, axis, bound) => {
  if (boid.position[axis] > bound || boid.position[axis] < 0) {
    boid.heading[axis] = -boid.heading[axis];
  }
};

/**
 * Move a boid one tick along its heading.
 *
 * Per axis: integrate the position, then (if enabled) perturb the heading
 * by a uniform value in [-noiseAmount / 2, noiseAmount / 2), then apply the
 * boundary policy. The noise is not renormalized here; the next
 * adjustHeading call clamps the speed again.
 */
export function moveBoid(boid: Boid, context: MotionContext): void {
  const { parameters, bound, noiseEnabled, noise } = context;
  const boundary = parameters.bounce ? bounceAxis : wrapAxis;

  for (const axis of AXES) {
    boid.position[axis] += boid.heading[axis];

    if (noiseEnabled) {
      boid.heading[axis] +=
        noise.next() * parameters.noiseAmount - parameters.noiseAmount / 2;
    }

    boundary(boid, axis, bound);
  }
}
