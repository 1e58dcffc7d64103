import { separationModeKeywords } from "./vocabulary/keywords";
import type { SeparationMode } from "./vocabulary/schemas/primitives";

/**
 * Separation contribution of one neighbor on one axis.
 *
 * Both rules take the boid's coordinate, the neighbor's coordinate and the
 * sense range. adjustHeading sums the contributions, averages them over
 * the neighbor count and subtracts the result, weighted.
 */
export type SeparationRule = (
  own: number,
  other: number,
  senseRange: number
) => number;

/**
 * Neighbors on the lower side pull the sum down, the others push it up,
 * by the square root of how far inside the range they are.
 */
export const rootSeparation: SeparationRule = (own, other, senseRange) => {
  // |Δ| < senseRange after neighbor filtering; clamp float noise at the edge
  const depth = Math.max(0, senseRange - Math.abs(own - other));
  return other < own ? -Math.sqrt(depth) : Math.sqrt(depth);
};

/**
 * Always negative whatever side the neighbor is on. Unlike the root rule
 * this one has no direction.
 */
export const squareSeparation: SeparationRule = (own, other, senseRange) => {
  const depth = senseRange - Math.abs(own - other);
  return -(depth * depth);
};

export const separationRules: Record<SeparationMode, SeparationRule> = {
  [separationModeKeywords.root]: rootSeparation,
  [separationModeKeywords.square]: squareSeparation,
};

export function selectSeparation(mode: SeparationMode): SeparationRule {
  return separationRules[mode];
}
