import { InvalidTopologyError } from "./errors"
import type { GraphState } from "./GraphState"
import type { ForceParameters, Vector2 } from "./types"
import { scale, subtract } from "./vector"

const EPS = 1e-9
const GOLDEN_ANGLE = Math.PI * (3 - Math.sqrt(5))

export type ForceMap = Map<number, Vector2>

const createForceMap = (state: GraphState): ForceMap => {
  const forces: ForceMap = new Map()
  for (const id of state.nodes.keys()) forces.set(id, { x: 0, y: 0 })
  return forces
}

/**
 * Add (fx, fy) to a node's force. A contribution that is or would make the
 * total non-finite is dropped.
 */
const accumulate = (forces: ForceMap, id: number, fx: number, fy: number) => {
  const f = forces.get(id)
  if (!f) throw new InvalidTopologyError(`node ${id} does not exist`)
  const x = f.x + fx
  const y = f.y + fy
  if (!Number.isFinite(x) || !Number.isFinite(y)) return
  f.x = x
  f.y = y
}

/**
 * Coulomb-like repulsion between every pair of nodes, O(n²).
 * Magnitude: repulsionConstant / max(distance, minDistance)²
 */
export const computeRepulsionForces = (
  state: GraphState,
  params: ForceParameters,
  forces: ForceMap,
): void => {
  const nodes = Array.from(state.nodes.values())
  const k = params.repulsionConstant
  if (k === 0) return

  for (let i = 0; i < nodes.length; i++) {
    const ni = nodes[i]
    for (let j = i + 1; j < nodes.length; j++) {
      const nj = nodes[j]

      const dx = ni.position.x - nj.position.x
      const dy = ni.position.y - nj.position.y
      const dist = Math.hypot(dx, dy)
      if (!Number.isFinite(dist)) continue

      let ux: number
      let uy: number
      if (dist > EPS) {
        ux = dx / dist
        uy = dy / dist
      } else {
        // Coincident nodes: deterministic direction per pair
        const angle = GOLDEN_ANGLE * (ni.id * 31 + nj.id + 1)
        ux = Math.cos(angle)
        uy = Math.sin(angle)
      }

      const d = dist > params.minDistance ? dist : params.minDistance
      const mag = k / (d * d)
      if (!Number.isFinite(mag)) continue

      accumulate(forces, ni.id, ux * mag, uy * mag)
      accumulate(forces, nj.id, -ux * mag, -uy * mag)
    }
  }
}

/**
 * Hooke springs along edges, equal and opposite on both endpoints.
 * Magnitude: springConstant * (distance - springLength)
 */
export const computeSpringForces = (
  state: GraphState,
  params: ForceParameters,
  forces: ForceMap,
): void => {
  for (const { a, b } of state.edges) {
    const na = state.getNode(a)
    const nb = state.getNode(b)

    const dx = nb.position.x - na.position.x
    const dy = nb.position.y - na.position.y
    const dist = Math.hypot(dx, dy)
    if (dist <= EPS || !Number.isFinite(dist)) continue

    const mag = params.springConstant * (dist - params.springLength)
    if (!Number.isFinite(mag)) continue
    const fx = (dx / dist) * mag
    const fy = (dy / dist) * mag

    // Positive mag (stretched) pulls a toward b
    accumulate(forces, a, fx, fy)
    accumulate(forces, b, -fx, -fy)
  }
}

/**
 * Pull toward gravityCenter proportional to distance. No-op when disabled.
 */
export const computeGravityForces = (
  state: GraphState,
  params: ForceParameters,
  forces: ForceMap,
): void => {
  if (!params.gravityEnabled) return
  const k = params.gravityConstant

  for (const node of state.nodes.values()) {
    const f = scale(subtract(node.position, params.gravityCenter), -k)
    accumulate(forces, node.id, f.x, f.y)
  }
}

/**
 * Net force on every node. Pure: reads the state, never mutates or retains it.
 * Finite positions always yield finite forces.
 */
export const computeForces = (
  state: GraphState,
  params: ForceParameters,
): ForceMap => {
  const forces = createForceMap(state)
  computeRepulsionForces(state, params, forces)
  computeSpringForces(state, params, forces)
  computeGravityForces(state, params, forces)
  return forces
}
