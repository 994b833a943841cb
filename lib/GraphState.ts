import { InvalidParametersError, InvalidTopologyError } from "./errors"
import { DEFAULT_BOUNDS, validateBounds } from "./parameters"
import { resolveRandomSource } from "./random"
import type {
  Bounds,
  EdgeInput,
  GraphEdge,
  GraphNode,
  RandomSource,
  ReadonlyGraphNode,
  Vector2,
} from "./types"
import { length } from "./vector"

export type GraphStateOptions = {
  directed?: boolean
  seed?: number
  random?: RandomSource
  /**
   * Mass of every node, or one mass per node id.
   * Default: 1
   */
  mass?: number | readonly number[]
}

const toEdge = (edge: EdgeInput): GraphEdge =>
  "a" in edge ? { a: edge.a, b: edge.b } : { a: edge[0], b: edge[1] }

const isNodeId = (id: number, nodeCount: number) =>
  Number.isInteger(id) && id >= 0 && id < nodeCount

/**
 * Validate and normalize an edge list against nodeCount.
 */
export const validateTopology = (
  nodeCount: number,
  edges: readonly EdgeInput[],
): GraphEdge[] => {
  if (!Number.isInteger(nodeCount) || nodeCount <= 0) {
    throw new InvalidTopologyError(
      `nodeCount must be a positive integer, got ${nodeCount}`,
    )
  }

  return edges.map((input, i) => {
    const edge = toEdge(input)
    if (!isNodeId(edge.a, nodeCount) || !isNodeId(edge.b, nodeCount)) {
      throw new InvalidTopologyError(
        `edge ${i} (${edge.a}, ${edge.b}) references a node outside [0, ${nodeCount})`,
      )
    }
    if (edge.a === edge.b) {
      throw new InvalidTopologyError(
        `edge ${i} (${edge.a}, ${edge.b}) connects a node to itself`,
      )
    }
    return Object.freeze(edge)
  })
}

const resolveMasses = (
  nodeCount: number,
  mass: GraphStateOptions["mass"],
): number[] => {
  const masses =
    mass === undefined
      ? new Array<number>(nodeCount).fill(1)
      : typeof mass === "number"
        ? new Array<number>(nodeCount).fill(mass)
        : [...mass]

  if (masses.length !== nodeCount) {
    throw new InvalidParametersError(
      `expected ${nodeCount} masses, got ${masses.length}`,
    )
  }
  for (const m of masses) {
    if (!Number.isFinite(m) || m <= 0) {
      throw new InvalidParametersError(`mass must be finite and > 0, got ${m}`)
    }
  }
  return masses
}

/**
 * Read side of a GraphState. Nothing reachable from it is writable.
 */
export interface GraphStateView {
  readonly nodes: ReadonlyMap<number, ReadonlyGraphNode>
  readonly edges: readonly GraphEdge[]
  readonly bounds: Readonly<Bounds>
  readonly directed: boolean
  readonly nodeCount: number
  getNode(id: number): ReadonlyGraphNode
  getTotalSpeed(): number
  getPositions(): Array<{ id: number; position: Vector2 }>
}

/**
 * Nodes and edges of one layout. Positions and velocities are mutated by the
 * integrator; everything else is fixed for the lifetime of the instance.
 */
export class GraphState implements GraphStateView {
  private constructor(
    readonly nodes: ReadonlyMap<number, GraphNode>,
    readonly edges: readonly GraphEdge[],
    readonly bounds: Readonly<Bounds>,
    readonly directed: boolean,
  ) {}

  static create(
    nodeCount: number,
    edges: readonly EdgeInput[],
    bounds: Bounds = DEFAULT_BOUNDS,
    opts: GraphStateOptions = {},
  ): GraphState {
    const validEdges = validateTopology(nodeCount, edges)
    const { minX, minY, maxX, maxY } = validateBounds(bounds)
    const masses = resolveMasses(nodeCount, opts.mass)
    const random = resolveRandomSource(opts)

    const nodes = new Map<number, GraphNode>()
    for (let id = 0; id < nodeCount; id++) {
      nodes.set(id, {
        id,
        position: {
          x: minX + random() * (maxX - minX),
          y: minY + random() * (maxY - minY),
        },
        velocity: { x: 0, y: 0 },
        mass: masses[id],
      })
    }

    return new GraphState(
      nodes,
      Object.freeze(validEdges),
      Object.freeze({ minX, minY, maxX, maxY }),
      opts.directed ?? false,
    )
  }

  get nodeCount(): number {
    return this.nodes.size
  }

  getNode(id: number): GraphNode {
    const node = this.nodes.get(id)
    if (!node) {
      throw new InvalidTopologyError(`node ${id} does not exist`)
    }
    return node
  }

  /** Sum of all node speeds; zero at rest. */
  getTotalSpeed(): number {
    let total = 0
    for (const node of this.nodes.values()) {
      total += length(node.velocity)
    }
    return total
  }

  /** (id, position) pairs in id order, copied. */
  getPositions(): Array<{ id: number; position: Vector2 }> {
    return Array.from(this.nodes.values(), (node) => ({
      id: node.id,
      position: { x: node.position.x, y: node.position.y },
    }))
  }
}
