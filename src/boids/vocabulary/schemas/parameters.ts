import { z } from "zod";
import { separationModeKeywords } from "../keywords";
import { separationModeSchema } from "./primitives";

/**
 * Flocking Parameters - the simulation-wide tunables.
 *
 * Every boid observes the same values during a tick. The parameter store
 * validates through these schemas, so a value that breaks the geometry
 * (a non-positive sense range, a negative speed) never reaches the engine.
 */
export const flockingParametersSchema = z.object({
  senseRange: z.number().finite().positive(), // Neighbor radius (strict <)
  separationWeight: z.number().finite(),
  alignmentWeight: z.number().finite(),
  cohesionWeight: z.number().finite(),
  velocity: z.number().finite().nonnegative(), // Heading magnitude after each adjustment
  noiseAmount: z.number().finite().nonnegative(), // Full width of the per-axis perturbation
  bounce: z.boolean(), // true: reflect at edges, false: wrap
  separationMode: separationModeSchema,
});

export type FlockingParameters = z.infer<typeof flockingParametersSchema>;

export const parameterPatchSchema = flockingParametersSchema.partial().strict();

export type ParameterPatch = z.infer<typeof parameterPatchSchema>;

export type NumericParameter = {
  [Key in keyof FlockingParameters]: FlockingParameters[Key] extends number
    ? Key
    : never;
}[keyof FlockingParameters];

/**
 * What "reset to defaults" restores. The boundary and separation modes are
 * toggles, not tunables, and survive a reset.
 */
export const DEFAULT_NUMERIC_PARAMETERS = {
  senseRange: 50,
  separationWeight: 4.5,
  alignmentWeight: 2,
  cohesionWeight: 0.7,
  velocity: 5,
  noiseAmount: 1,
} as const satisfies Record<NumericParameter, number>;

export const DEFAULT_FLOCKING_PARAMETERS: FlockingParameters = {
  ...DEFAULT_NUMERIC_PARAMETERS,
  bounce: false,
  separationMode: separationModeKeywords.root,
};

/**
 * One line per failing field, e.g. "senseRange: Number must be greater than 0"
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}
