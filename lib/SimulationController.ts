import type { CommandResult, SimulationCommand } from "./commands"
import type { NumericalInstabilityWarning } from "./errors"
import { ForceLayoutSolver } from "./ForceLayoutSolver"
import { computeForces } from "./ForceModel"
import { GraphState, type GraphStateView } from "./GraphState"
import { step } from "./Integrator"
import { DEFAULT_BOUNDS, resolveForceParameters } from "./parameters"
import { resolveRandomSource } from "./random"
import type {
  Bounds,
  EdgeInput,
  ForceLayoutProblem,
  ForceParameters,
  GraphSnapshot,
  RandomSource,
  SimulationStatus,
  Vector2,
  ViewState,
} from "./types"

export type SimulationControllerOptions = {
  nodeCount: number
  edges: readonly EdgeInput[]
  directed?: boolean
  /** Default: [-2, 2] x [-2, 2] */
  bounds?: Bounds
  seed?: number
  random?: RandomSource
  parameters?: Partial<ForceParameters>
  mass?: number | readonly number[]
  startPaused?: boolean
  /** Relative scale change per zoom_in / zoom_out. Default: 0.05 */
  zoomStep?: number
  /** Default: 25 */
  initialScale?: number
}

export const MIN_SCALE = 0.1
export const MAX_SCALE = 1000

const DEFAULT_SETTLE: ForceLayoutProblem["solve"] = {
  maxSteps: 10_000,
  epsilonSpeed: 1e-3,
}

/**
 * Owns one GraphState and drives it one tick at a time.
 *
 * The host calls tick() once per frame and reads getSnapshot() between ticks.
 * Commands take effect at tick boundaries.
 */
export class SimulationController {
  private state: GraphState
  private readonly params: ForceParameters
  private readonly random: RandomSource
  private readonly bounds: Bounds
  private readonly zoomStep: number
  private status: SimulationStatus
  private view: ViewState
  private tickCount = 0

  constructor(private readonly opts: SimulationControllerOptions) {
    this.params = resolveForceParameters(opts.parameters)
    this.random = resolveRandomSource(opts)
    this.bounds = { ...(opts.bounds ?? DEFAULT_BOUNDS) }
    this.zoomStep = opts.zoomStep ?? 0.05
    this.status = opts.startPaused ? "paused" : "running"
    this.view = { scale: opts.initialScale ?? 25, pan: { x: 0, y: 0 } }
    this.state = this.createState()
  }

  private createState(): GraphState {
    const { nodeCount, edges, directed, mass } = this.opts
    return GraphState.create(nodeCount, edges, this.bounds, {
      directed,
      mass,
      random: this.random,
    })
  }

  get isPaused(): boolean {
    return this.status === "paused"
  }

  get gravityEnabled(): boolean {
    return this.params.gravityEnabled
  }

  getStatus(): SimulationStatus {
    return this.status
  }

  getTickCount(): number {
    return this.tickCount
  }

  getParameters(): Readonly<ForceParameters> {
    return this.params
  }

  /** Live state, read-only. Changes after the next tick. */
  getState(): GraphStateView {
    return this.state
  }

  getViewState(): ViewState {
    return { scale: this.view.scale, pan: { ...this.view.pan } }
  }

  getTotalSpeed(): number {
    return this.state.getTotalSpeed()
  }

  pause(): void {
    this.status = "paused"
  }

  resume(): void {
    this.status = "running"
  }

  togglePause(): void {
    this.status = this.status === "paused" ? "running" : "paused"
  }

  /**
   * Replace the state with a freshly randomized one of the same topology.
   * Running/paused status is unchanged.
   */
  restart(): void {
    this.state = this.createState()
    this.tickCount = 0
  }

  /**
   * One force computation and one integration step. No-op while paused.
   */
  tick(): NumericalInstabilityWarning[] {
    if (this.status === "paused") return []

    this.tickCount++
    const forces = computeForces(this.state, this.params)
    return step(this.state, forces, this.params, this.tickCount)
  }

  toggleGravity(): void {
    this.params.gravityEnabled = !this.params.gravityEnabled
  }

  /**
   * Multiply the view scale by (1 + delta), clamped to [MIN_SCALE, MAX_SCALE].
   * Has no effect on the physics.
   */
  setZoom(delta: number): void {
    if (!Number.isFinite(delta)) return
    const next = this.view.scale * (1 + delta)
    this.view.scale = Math.max(MIN_SCALE, Math.min(MAX_SCALE, next))
  }

  setPan(pan: Vector2): void {
    if (!Number.isFinite(pan.x) || !Number.isFinite(pan.y)) return
    this.view.pan = { x: pan.x, y: pan.y }
  }

  /**
   * Relax the current state until it settles, regardless of pause status.
   * Ticks run here count toward getTickCount().
   */
  settle(
    solve: ForceLayoutProblem["solve"] = DEFAULT_SETTLE,
  ): ForceLayoutSolver {
    const solver = new ForceLayoutSolver(
      {
        nodeCount: this.opts.nodeCount,
        edges: [...this.state.edges],
        directed: this.state.directed,
        bounds: this.bounds,
        parameters: this.params,
        solve,
      },
      this.state,
    )
    solver.solve()
    this.tickCount += solver.iterations
    return solver
  }

  getSnapshot(): GraphSnapshot {
    return Object.freeze({
      nodes: Object.freeze(
        this.state.getPositions().map((n) =>
          Object.freeze({ id: n.id, position: Object.freeze(n.position) }),
        ),
      ),
      edges: this.state.edges,
      directed: this.state.directed,
      view: Object.freeze({
        scale: this.view.scale,
        pan: Object.freeze({ ...this.view.pan }),
      }),
      status: this.status,
      gravityEnabled: this.params.gravityEnabled,
      tickCount: this.tickCount,
    })
  }

  /**
   * Apply one command. Anything that is not a known command is ignored.
   */
  dispatch(command: SimulationCommand | null | undefined): CommandResult {
    switch (command) {
      case "pause_toggle":
        this.togglePause()
        break
      case "restart":
        this.restart()
        break
      case "gravity_toggle":
        this.toggleGravity()
        break
      case "zoom_in":
        this.setZoom(this.zoomStep)
        break
      case "zoom_out":
        this.setZoom(-this.zoomStep)
        break
      case "quit":
        return { quit: true }
    }
    return { quit: false }
  }
}
