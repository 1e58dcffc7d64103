import type { Vector2 } from "./vocabulary/schemas/primitives";

export const AXES = ["x", "y"] as const;

export type Axis = (typeof AXES)[number];

export function subtract(a: Vector2, b: Vector2): Vector2 {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function magnitude(v: Vector2): number {
  return Math.sqrt(v.x * v.x + v.y * v.y);
}

export function distance(a: Vector2, b: Vector2): number {
  return magnitude(subtract(a, b));
}

export function fromAngle(radians: number, length: number): Vector2 {
  return { x: Math.cos(radians) * length, y: Math.sin(radians) * length };
}

export function copy(v: Vector2): Vector2 {
  return { x: v.x, y: v.y };
}
