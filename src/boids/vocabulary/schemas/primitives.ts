import { z } from "zod";
import { separationModeKeywords } from "../keywords";

/**
 * Primitive schemas, no imports from other schema files.
 */

export const vectorSchema = z.object({
  x: z.number(),
  y: z.number(),
});

export type Vector2 = z.infer<typeof vectorSchema>;

export const separationModeSchema = z.enum([
  separationModeKeywords.root,
  separationModeKeywords.square,
]);

export type SeparationMode = z.infer<typeof separationModeSchema>;
