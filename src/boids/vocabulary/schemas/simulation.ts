import { z } from "zod";
import { simulationKeywords } from "../keywords";
import { vectorSchema, separationModeSchema } from "./primitives";
import { flockingParametersSchema, parameterPatchSchema } from "./parameters";

/**
 * Observation - what a renderer reads once per tick.
 * `senseRange` is only present while the sensing-range view is on.
 */
export const observationSchema = z.object({
  tick: z.number().int().nonnegative(),
  boids: z.array(
    z.object({
      id: z.string(),
      position: vectorSchema,
      heading: vectorSchema,
    })
  ),
  senseRange: z.number().optional(),
});

export type Observation = z.infer<typeof observationSchema>;

export const simulationCommandSchema = z.discriminatedUnion("type", [
  // Tick driver
  z.object({ type: z.literal(simulationKeywords.commands.start) }),
  z.object({ type: z.literal(simulationKeywords.commands.stop) }),
  z.object({ type: z.literal(simulationKeywords.commands.pause) }),
  z.object({ type: z.literal(simulationKeywords.commands.resume) }),
  z.object({ type: z.literal(simulationKeywords.commands.step) }),
  z.object({
    type: z.literal(simulationKeywords.commands.setInterval),
    intervalMs: z.number().finite().positive(),
  }),
  // Parameter channel
  z.object({
    type: z.literal(simulationKeywords.commands.updateParameters),
    patch: parameterPatchSchema,
  }),
  z.object({ type: z.literal(simulationKeywords.commands.resetParameters) }),
  z.object({ type: z.literal(simulationKeywords.commands.toggleBounce) }),
  z.object({
    type: z.literal(simulationKeywords.commands.setSeparationMode),
    mode: separationModeSchema,
  }),
  // View and world
  z.object({
    type: z.literal(simulationKeywords.commands.toggleSensingRange),
  }),
  z.object({ type: z.literal(simulationKeywords.commands.toggleNoise) }),
  z.object({ type: z.literal(simulationKeywords.commands.resetEngine) }),
]);

export type SimulationCommand = z.infer<typeof simulationCommandSchema>;

export const simulationEventSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal(simulationKeywords.events.ticked),
    observation: observationSchema,
  }),
  z.object({
    type: z.literal(simulationKeywords.events.parametersChanged),
    parameters: flockingParametersSchema,
  }),
  z.object({
    type: z.literal(simulationKeywords.events.error),
    error: z.string(),
    meta: z.unknown(),
  }),
]);

export type SimulationEvent = z.infer<typeof simulationEventSchema>;
