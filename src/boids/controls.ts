import { separationModeKeywords } from "./vocabulary/keywords";
import {
  DEFAULT_NUMERIC_PARAMETERS,
  type NumericParameter,
} from "./vocabulary/schemas/parameters";
import type { SeparationMode } from "./vocabulary/schemas/primitives";

/**
 * Slider hints for a control panel. Presentation only: the parameter
 * schema decides what is valid, not these ranges.
 */
export type ControlDescriptor = {
  parameter: NumericParameter;
  label: string;
  min: number;
  max: number;
  step: number;
  defaultValue: number;
};

const baseDescriptors: Omit<ControlDescriptor, "defaultValue">[] = [
  { parameter: "alignmentWeight", label: "Alignment Weight", min: 0, max: 40, step: 0.1 },
  { parameter: "separationWeight", label: "Separation Weight", min: 0, max: 100, step: 0.1 },
  { parameter: "cohesionWeight", label: "Coherence Weight", min: 0, max: 5, step: 0.01 },
  { parameter: "velocity", label: "Velocity", min: 0, max: 100, step: 0.1 },
  { parameter: "noiseAmount", label: "Noise Amount", min: 0, max: 40, step: 0.1 },
  { parameter: "senseRange", label: "Sensing Range", min: 0, max: 100, step: 0.1 },
];

/**
 * Square-mode separation grows with the square of the overlap, so its
 * weight needs a finer step
 */
export function getControlDescriptors(
  mode: SeparationMode = separationModeKeywords.root
): ControlDescriptor[] {
  return baseDescriptors.map((descriptor) => ({
    ...descriptor,
    step:
      descriptor.parameter === "separationWeight" &&
      mode === separationModeKeywords.square
        ? 0.01
        : descriptor.step,
    defaultValue: DEFAULT_NUMERIC_PARAMETERS[descriptor.parameter],
  }));
}
