import type { GraphicsObject } from "graphics-debug"
import type { ForceLayoutSolver } from "../ForceLayoutSolver"
import { createGraphicsLayers, drawGraph } from "./visualizeGraphSnapshot"

export const visualizeForceLayoutSolver = (
  solver: ForceLayoutSolver,
): GraphicsObject => {
  const layers = createGraphicsLayers()
  const { state, params } = solver

  drawGraph(layers, state.getPositions(), state.edges, state.directed)

  // Velocity of each node, drawn as the distance covered in one tick
  for (const node of state.nodes.values()) {
    const { x, y } = node.position
    const { x: vx, y: vy } = node.velocity
    if (vx === 0 && vy === 0) continue

    layers.lines.push({
      points: [
        { x, y },
        { x: x + vx * params.timeStep, y: y + vy * params.timeStep },
      ],
      strokeColor: "red",
      layer: "velocity",
    })
  }

  if (params.gravityEnabled) {
    layers.points.push({
      x: params.gravityCenter.x,
      y: params.gravityCenter.y,
      color: "gray",
      label: "gravity center",
    })
  }

  return {
    ...layers,
    coordinateSystem: "cartesian",
    title: `force layout solver (iteration ${solver.iterations}, speed ${state
      .getTotalSpeed()
      .toFixed(4)})`,
  }
}
