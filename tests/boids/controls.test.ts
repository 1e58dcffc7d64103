import { describe, expect, it } from "vitest";
import { getControlDescriptors } from "@/boids/controls";

describe("getControlDescriptors", () => {
  it("describes every numeric parameter with its default", () => {
    const descriptors = getControlDescriptors();

    expect(
      descriptors.map(({ parameter, defaultValue }) => [parameter, defaultValue])
    ).toEqual([
      ["alignmentWeight", 2],
      ["separationWeight", 4.5],
      ["cohesionWeight", 0.7],
      ["velocity", 5],
      ["noiseAmount", 1],
      ["senseRange", 50],
    ]);
  });

  it("uses the slider ranges of the control panel", () => {
    const cohesion = getControlDescriptors().find(
      (descriptor) => descriptor.parameter === "cohesionWeight"
    );

    expect(cohesion).toEqual({
      parameter: "cohesionWeight",
      label: "Coherence Weight",
      min: 0,
      max: 5,
      step: 0.01,
      defaultValue: 0.7,
    });
  });

  it("refines the separation step in square mode", () => {
    const stepFor = (mode: "root" | "square") =>
      getControlDescriptors(mode).find(
        (descriptor) => descriptor.parameter === "separationWeight"
      )?.step;

    expect(stepFor("root")).toBe(0.1);
    expect(stepFor("square")).toBe(0.01);
  });
});
