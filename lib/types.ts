/**
 * ForceLayoutProblem
 *
 * A 2D force-directed graph layout.
 *
 * Core assumptions:
 * - Nodes are point masses identified by 0..nodeCount-1.
 * - Edges are springs between two distinct nodes.
 * - Every node repels every other node.
 */
export type ForceLayoutProblem = {
  nodeCount: number

  edges: EdgeInput[]

  /**
   * Only affects drawing (edge labels / arrowheads), never the physics.
   */
  directed?: boolean

  /**
   * Region initial positions are drawn from.
   * Default: [-2, 2] x [-2, 2]
   */
  bounds?: Bounds

  /**
   * Seed for initial placement. Omit for Math.random.
   */
  seed?: number

  parameters?: Partial<ForceParameters>

  solve: {
    maxSteps: number
    /**
     * The layout is considered settled once the sum of all node speeds
     * is at or below this value.
     */
    epsilonSpeed: number
  }
}

export type Vector2 = { x: number; y: number }

/** Axis-aligned bounding box */
export type Bounds = { minX: number; minY: number; maxX: number; maxY: number }

export type GraphNode = {
  readonly id: number
  position: Vector2
  velocity: Vector2
  readonly mass: number
}

/** A node as seen from outside the integrator */
export type ReadonlyGraphNode = {
  readonly id: number
  readonly position: Readonly<Vector2>
  readonly velocity: Readonly<Vector2>
  readonly mass: number
}

/**
 * Unordered pair of node ids.
 */
export type GraphEdge = {
  readonly a: number
  readonly b: number
}

export type EdgeInput = GraphEdge | readonly [number, number]

export type ForceParameters = {
  /**
   * Coulomb-like constant.
   * Repulsion ∝ repulsionConstant / distance²
   */
  repulsionConstant: number

  /**
   * Hooke constant.
   * Spring force = springConstant * (distance - springLength)
   */
  springConstant: number

  /** Natural (rest) length of every edge spring */
  springLength: number

  /**
   * Gravity force = gravityConstant * distance to gravityCenter
   */
  gravityConstant: number
  gravityEnabled: boolean
  gravityCenter: Vector2

  /**
   * Velocity multiplier applied every tick, in [0, 1).
   * - 0 = no momentum
   * - close to 1 = little energy loss
   */
  damping: number

  /** Simulation time advanced per tick */
  timeStep: number

  /**
   * Floor on pair distance for repulsion, so coincident nodes
   * receive a bounded force.
   */
  minDistance: number
}

export type ViewState = {
  /** Simulation units -> renderer units */
  scale: number
  pan: Vector2
}

export type SimulationStatus = "running" | "paused"

/**
 * Immutable view of a simulation for renderers. Read between ticks only.
 */
export type GraphSnapshot = {
  readonly nodes: ReadonlyArray<{ readonly id: number; readonly position: Vector2 }>
  readonly edges: ReadonlyArray<GraphEdge>
  readonly directed: boolean
  readonly view: ViewState
  readonly status: SimulationStatus
  readonly gravityEnabled: boolean
  readonly tickCount: number
}

export type RandomSource = () => number
