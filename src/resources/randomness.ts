/**
 * Randomness Resource - seeded RNG streams for the whole system.
 *
 * Domains:
 * - spawning: initial positions and directions
 * - noise: per-tick heading perturbation
 *
 * @example
 * const spawning = randomness.domain(randomDomainKeywords.spawning);
 * spawning.range(0, bound);
 */

import { defineResource } from "braided";
import { createSeededRNG, type DomainRNG } from "@/lib/seededRandom";
import type { WorldConfigResource } from "./config";

export interface RandomnessResource {
  getMasterSeed(): string;

  /** Same stream object on every call for a given name */
  domain(name: string): DomainRNG;
}

export const randomness = defineResource({
  dependencies: ["config"],
  start: ({ config }: { config: WorldConfigResource }): RandomnessResource => {
    const { seed } = config.getConfig();
    const rng = createSeededRNG(seed);

    console.log(`[randomness] Initialized with seed: "${seed}"`);

    return {
      getMasterSeed: () => rng.getMasterSeed(),
      domain: (name: string) => rng.domain(name),
    };
  },
  halt: () => {
    // Streams hold no resources
  },
});
