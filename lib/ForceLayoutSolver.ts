import { BaseSolver } from "@tscircuit/solver-utils"
import type { GraphicsObject } from "graphics-debug"
import { InvalidTopologyError } from "./errors"
import { computeForces } from "./ForceModel"
import { GraphState } from "./GraphState"
import { step } from "./Integrator"
import { resolveForceParameters } from "./parameters"
import type { ForceLayoutProblem, ForceParameters, Vector2 } from "./types"
import { visualizeForceLayoutSolver } from "./visualization/visualizeForceLayoutSolver"
import { visualizeInputProblem } from "./visualization/visualizeInputProblem"

/**
 * Runs the simulation until the sum of node speeds drops to
 * `solve.epsilonSpeed`, or fails after `solve.maxSteps` ticks.
 *
 * Pass an existing GraphState to relax it in place; otherwise one is created
 * from the problem (seeded when `seed` is set).
 */
export class ForceLayoutSolver extends BaseSolver {
  readonly params: ForceParameters
  readonly state: GraphState
  readonly initialPositions: ReadonlyArray<{ id: number; position: Vector2 }>

  instabilityCount = 0

  constructor(
    public input: ForceLayoutProblem,
    state?: GraphState,
  ) {
    super()
    this.MAX_ITERATIONS = input.solve.maxSteps
    this.params = resolveForceParameters(input.parameters)

    if (state && state.nodeCount !== input.nodeCount) {
      throw new InvalidTopologyError(
        `state has ${state.nodeCount} nodes, problem has ${input.nodeCount}`,
      )
    }
    this.state =
      state ??
      GraphState.create(input.nodeCount, input.edges, input.bounds, {
        seed: input.seed,
        directed: input.directed,
      })
    this.initialPositions = this.state.getPositions()
  }

  override _step(): void {
    if (this.solved) return

    const forces = computeForces(this.state, this.params)
    const warnings = step(this.state, forces, this.params, this.iterations)
    this.instabilityCount += warnings.length

    if (this.state.getTotalSpeed() <= this.input.solve.epsilonSpeed) {
      this.solved = true
    }
  }

  override visualize(): GraphicsObject {
    // iteration 0: show initial (input) layout
    if (this.iterations === 0) {
      return visualizeInputProblem(
        this.input,
        this.state,
        this.initialPositions,
        this.params,
      )
    }

    return visualizeForceLayoutSolver(this)
  }
}
