/**
 * Vocabulary - string constants shared by schemas, handlers and tests.
 * Schemas build their enums and literals from these, never from raw strings.
 */

export const separationModeKeywords = {
  // sqrt(range - |Δ|), signed by which side the neighbor is on
  root: "root",
  // (range - |Δ|)², always subtracted
  square: "square",
} as const;

export const randomDomainKeywords = {
  spawning: "spawning",
  noise: "noise",
} as const;

export const simulationKeywords = {
  commands: {
    start: "simulation/start",
    stop: "simulation/stop",
    pause: "simulation/pause",
    resume: "simulation/resume",
    step: "simulation/step",
    setInterval: "simulation/setInterval",
    updateParameters: "parameters/update",
    resetParameters: "parameters/reset",
    toggleBounce: "parameters/toggleBounce",
    setSeparationMode: "parameters/setSeparationMode",
    toggleSensingRange: "view/toggleSensingRange",
    toggleNoise: "world/toggleNoise",
    resetEngine: "engine/reset",
  },
  events: {
    ticked: "simulation/ticked",
    parametersChanged: "parameters/changed",
    error: "simulation/error",
  },
} as const;
