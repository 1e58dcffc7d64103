import { z } from "zod";

/**
 * World Config - everything fixed for the lifetime of a running system.
 *
 * The plane is the square [0, bound] x [0, bound].
 */
export const worldConfigSchema = z.object({
  bound: z.number().finite().positive().default(1000),
  boidCount: z.number().int().nonnegative().default(50),
  seed: z.string().default("flock-42"), // Master seed for spawning and noise
  noiseEnabled: z.boolean().default(true),
  showSensingRange: z.boolean().default(false), // Observers get senseRange when on
  tickIntervalMs: z.number().finite().positive().default(20),
});

export type WorldConfig = z.infer<typeof worldConfigSchema>;
export type WorldConfigInput = z.input<typeof worldConfigSchema>;
