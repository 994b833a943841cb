import type { GraphicsObject } from "graphics-debug"
import type { GraphStateView } from "../GraphState"
import type { ForceLayoutProblem, ForceParameters, Vector2 } from "../types"
import { createGraphicsLayers, drawGraph } from "./visualizeGraphSnapshot"

export const visualizeInputProblem = (
  problem: ForceLayoutProblem,
  state: GraphStateView,
  initialPositions: ReadonlyArray<{ id: number; position: Vector2 }>,
  params: ForceParameters,
): GraphicsObject => {
  const layers = createGraphicsLayers()
  const { bounds } = state

  // Draw spawn bounds
  layers.rects.push({
    center: {
      x: (bounds.minX + bounds.maxX) / 2,
      y: (bounds.minY + bounds.maxY) / 2,
    },
    width: bounds.maxX - bounds.minX,
    height: bounds.maxY - bounds.minY,
    stroke: "gray",
    label: "bounds",
  })

  drawGraph(layers, initialPositions, state.edges, state.directed)

  // Natural spring length around each node, as a scale reference
  if (params.springLength > 0) {
    for (const { position } of initialPositions) {
      layers.circles.push({
        center: { x: position.x, y: position.y },
        radius: params.springLength,
        stroke: "rgba(128, 128, 128, 0.3)",
      })
    }
  }

  return {
    ...layers,
    coordinateSystem: "cartesian",
    title: `force layout input (${problem.nodeCount} nodes, ${state.edges.length} edges)`,
  }
}
