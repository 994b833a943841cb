import { InvalidTopologyError } from "./errors"
import type { GraphEdge, RandomSource } from "./types"

/** 0-1, 1-2, ..., (n-2)-(n-1) */
export const pathEdges = (n: number): GraphEdge[] => {
  const edges: GraphEdge[] = []
  for (let i = 0; i < n - 1; i++) edges.push({ a: i, b: i + 1 })
  return edges
}

/** Path edges closed with (n-1)-0. */
export const cycleEdges = (n: number): GraphEdge[] => {
  if (!Number.isInteger(n) || n < 3) {
    throw new InvalidTopologyError(`a cycle needs at least 3 nodes, got ${n}`)
  }
  return [...pathEdges(n), { a: n - 1, b: 0 }]
}

/**
 * `count` edges between random pairs of distinct nodes. Pairs may repeat
 * existing edges.
 */
export const randomChords = (
  n: number,
  count: number,
  random: RandomSource,
): GraphEdge[] => {
  if (!Number.isInteger(n) || n < 2) {
    throw new InvalidTopologyError(
      `random chords need at least 2 nodes, got ${n}`,
    )
  }
  const pick = () => Math.min(n - 1, Math.floor(random() * n))

  const edges: GraphEdge[] = []
  for (let i = 0; i < count; i++) {
    const a = pick()
    let b = pick()
    while (b === a) b = pick()
    edges.push({ a, b })
  }
  return edges
}
