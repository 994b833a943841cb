import type { Vector2 } from "./types"

export const add = (a: Vector2, b: Vector2): Vector2 => ({
  x: a.x + b.x,
  y: a.y + b.y,
})

export const subtract = (a: Vector2, b: Vector2): Vector2 => ({
  x: a.x - b.x,
  y: a.y - b.y,
})

export const scale = (v: Vector2, s: number): Vector2 => ({
  x: v.x * s,
  y: v.y * s,
})

export const length = (v: Vector2): number => Math.sqrt(v.x * v.x + v.y * v.y)

/**
 * Unit vector in the direction of v. The zero vector normalizes to zero.
 */
export const normalize = (v: Vector2): Vector2 => {
  const len = length(v)
  if (len === 0) return { x: 0, y: 0 }
  return { x: v.x / len, y: v.y / len }
}

export const distance = (a: Vector2, b: Vector2): number =>
  length(subtract(a, b))

export const isFiniteVector = (v: Vector2): boolean =>
  Number.isFinite(v.x) && Number.isFinite(v.y)
