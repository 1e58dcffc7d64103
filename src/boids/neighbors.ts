import type { BoidSnapshot } from "./vocabulary/schemas/entities";

/**
 * Find every boid strictly inside the sense range of `boid`.
 *
 * Brute-force scan over the whole population. The axis-aligned check
 * rejects most far boids before the square root; the Euclidean check is
 * strict, so a boid exactly on the circle is not a neighbor. Self is
 * excluded by id, so a different boid sharing the same position still
 * counts.
 */
export function findNeighbors<T extends BoidSnapshot>(
  boid: BoidSnapshot,
  population: readonly T[],
  senseRange: number
): T[] {
  const neighbors: T[] = [];
  const { x, y } = boid.position;

  for (const other of population) {
    const dx = other.position.x - x;
    const dy = other.position.y - y;

    // Rough (but fast) check
    if (Math.abs(dx) >= senseRange || Math.abs(dy) >= senseRange) continue;

    if (Math.sqrt(dx * dx + dy * dy) >= senseRange) continue;

    if (other.id === boid.id) continue;

    neighbors.push(other);
  }

  return neighbors;
}
