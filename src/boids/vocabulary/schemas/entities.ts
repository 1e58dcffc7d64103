import { z } from "zod";
import { vectorSchema } from "./primitives";

/**
 * Boid - a single agent.
 *
 * `heading` is a velocity, not a unit vector: its magnitude is the current
 * speed. Behaviour parameters are not stored here, every boid reads the
 * tick's shared parameter snapshot.
 */
export const boidSchema = z.object({
  id: z.string(),
  position: vectorSchema,
  heading: vectorSchema,
});

export type Boid = z.infer<typeof boidSchema>;

/**
 * Read-only copy of a boid as seen by observers and by pass 1 of a tick
 */
export type BoidSnapshot = Readonly<{
  id: string;
  position: Readonly<{ x: number; y: number }>;
  heading: Readonly<{ x: number; y: number }>;
}>;
