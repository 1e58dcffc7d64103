/**
 * Seeded random streams.
 *
 * One master seed fans out into named domains ("spawning", "noise"), each
 * with its own independent sequence. Drawing noise never shifts where the
 * next population spawns, and the same seed always replays the same run.
 *
 * @example
 * const rng = createSeededRNG("flock-1");
 * const spawning = rng.domain("spawning");
 * spawning.range(0, 1000); // same value on every run with this seed
 */

/**
 * cyrb53 string hash, used to turn seeds and domain names into numbers
 */
function hashString(str: string): number {
  let h1 = 0xdeadbeef;
  let h2 = 0x41c6ce57;

  for (let i = 0; i < str.length; i++) {
    const ch = str.charCodeAt(i);
    h1 = Math.imul(h1 ^ ch, 2654435761);
    h2 = Math.imul(h2 ^ ch, 1597334677);
  }

  h1 = Math.imul(h1 ^ (h1 >>> 16), 2246822507);
  h1 ^= Math.imul(h2 ^ (h2 >>> 13), 3266489909);
  h2 = Math.imul(h2 ^ (h2 >>> 16), 2246822507);
  h2 ^= Math.imul(h1 ^ (h1 >>> 13), 3266489909);

  return 4294967296 * (2097151 & h2) + (h1 >>> 0);
}

/**
 * Mulberry32, values in [0, 1)
 */
function createPRNG(seed: number) {
  let state = seed;

  return function next(): number {
    state |= 0;
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export interface DomainRNG {
  /** Next value in [0, 1) */
  next(): number;

  /** Value in [min, max) */
  range(min: number, max: number): number;

  /** Direction in radians, [0, 2π) */
  angle(): number;
}

function createDomainRNG(seed: number): DomainRNG {
  const prng = createPRNG(seed);

  return {
    next: () => prng(),
    range: (min: number, max: number) => min + prng() * (max - min),
    angle: () => prng() * Math.PI * 2,
  };
}

export interface SeededRNG {
  getMasterSeed(): string;
  domain(name: string): DomainRNG;
  getDomains(): string[];
}

export function createSeededRNG(masterSeed: string | number): SeededRNG {
  const masterSeedStr = String(masterSeed);
  const domains = new Map<string, DomainRNG>();

  return {
    getMasterSeed: () => masterSeedStr,

    domain: (name: string) => {
      const existing = domains.get(name);
      if (existing) return existing;

      // Domain seed is the hash of "masterSeed:domainName"
      const created = createDomainRNG(hashString(`${masterSeedStr}:${name}`));
      domains.set(name, created);
      return created;
    },

    getDomains: () => Array.from(domains.keys()),
  };
}
