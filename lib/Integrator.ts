import { NumericalInstabilityWarning } from "./errors"
import type { ForceMap } from "./ForceModel"
import type { GraphState } from "./GraphState"
import type { ForceParameters, Vector2 } from "./types"
import { isFiniteVector } from "./vector"

/**
 * Advance every node by one tick using semi-implicit Euler:
 *
 *   v' = (v + F / m * dt) * damping
 *   p' = p + v' * dt
 *
 * Nodes missing from `forces` receive zero force. A node whose new velocity or
 * position is non-finite keeps its previous position and has its velocity
 * reset to zero; the returned warnings describe each such node.
 */
export const step = (
  state: GraphState,
  forces: ForceMap,
  params: ForceParameters,
  tick = 0,
): NumericalInstabilityWarning[] => {
  const { timeStep: dt, damping } = params
  const warnings: NumericalInstabilityWarning[] = []

  for (const node of state.nodes.values()) {
    const f = forces.get(node.id)
    const fx = f ? f.x : 0
    const fy = f ? f.y : 0

    const velocity: Vector2 = {
      x: (node.velocity.x + (fx / node.mass) * dt) * damping,
      y: (node.velocity.y + (fy / node.mass) * dt) * damping,
    }
    const position: Vector2 = {
      x: node.position.x + velocity.x * dt,
      y: node.position.y + velocity.y * dt,
    }

    const velocityOk = isFiniteVector(velocity)
    const positionOk = isFiniteVector(position)

    if (!velocityOk || !positionOk) {
      const warning = new NumericalInstabilityWarning(
        node.id,
        velocityOk ? "position" : "velocity",
        tick,
      )
      console.warn(warning.message)
      warnings.push(warning)
      node.velocity = { x: 0, y: 0 }
      continue
    }

    node.velocity = velocity
    node.position = position
  }

  return warnings
}
