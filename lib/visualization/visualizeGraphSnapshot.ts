import type { GraphicsObject } from "graphics-debug"
import type { GraphEdge, GraphSnapshot, Vector2 } from "../types"

export type GraphicsLayers = {
  points: NonNullable<GraphicsObject["points"]>
  lines: NonNullable<GraphicsObject["lines"]>
  rects: NonNullable<GraphicsObject["rects"]>
  circles: NonNullable<GraphicsObject["circles"]>
  arrows: NonNullable<GraphicsObject["arrows"]>
}

export const createGraphicsLayers = (): GraphicsLayers => ({
  points: [],
  lines: [],
  rects: [],
  circles: [],
  arrows: [],
})

const channel = (v: number) => Math.max(0, Math.min(255, v))

/** Red-to-green gradient by node id */
export const nodeColor = (id: number): string =>
  `rgb(${channel(255 - id * 8)}, ${channel(id * 8)}, 200)`

export const edgeLabel = (edge: GraphEdge, directed: boolean): string =>
  directed ? `${edge.a}->${edge.b}` : `${edge.a}-${edge.b}`

/**
 * Push one point per node and one line per edge, plus an arrow from a to b for
 * each edge of a directed graph. Edges whose endpoints are missing from
 * `positions` are skipped.
 */
export const drawGraph = (
  layers: GraphicsLayers,
  positions: ReadonlyArray<{ id: number; position: Vector2 }>,
  edges: ReadonlyArray<GraphEdge>,
  directed: boolean,
): void => {
  const positionMap = new Map(positions.map((n) => [n.id, n.position]))

  for (const edge of edges) {
    const start = positionMap.get(edge.a)
    const end = positionMap.get(edge.b)
    if (!start || !end) continue

    layers.lines.push({
      points: [
        { x: start.x, y: start.y },
        { x: end.x, y: end.y },
      ],
      strokeColor: "black",
      label: edgeLabel(edge, directed),
    })

    if (directed) {
      layers.arrows.push({
        start: { x: start.x, y: start.y },
        end: { x: end.x, y: end.y },
        color: "black",
      })
    }
  }

  for (const { id, position } of positions) {
    layers.points.push({
      x: position.x,
      y: position.y,
      color: nodeColor(id),
      label: String(id),
    })
  }
}

/**
 * Render a controller snapshot. Positions are simulation coordinates; the
 * snapshot's view state is left for the viewer to apply.
 */
export const visualizeGraphSnapshot = (
  snapshot: GraphSnapshot,
  title = "force layout",
): GraphicsObject => {
  const layers = createGraphicsLayers()
  drawGraph(layers, snapshot.nodes, snapshot.edges, snapshot.directed)

  return {
    ...layers,
    coordinateSystem: "cartesian",
    title: `${title} (tick ${snapshot.tickCount}, ${snapshot.status})`,
  }
}
