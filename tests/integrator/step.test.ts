import { afterEach, expect, test, vi } from "vitest"
import { NumericalInstabilityWarning } from "../../lib/errors"
import { GraphState } from "../../lib/GraphState"
import { step } from "../../lib/Integrator"
import { resolveForceParameters } from "../../lib/parameters"

afterEach(() => {
  vi.restoreAllMocks()
})

test("semi-implicit Euler: velocity first, then position", () => {
  const state = GraphState.create(1, [], undefined, { mass: 2 })
  const node = state.getNode(0)
  node.position = { x: 0, y: 1 }
  node.velocity = { x: 1, y: 0 }

  const params = resolveForceParameters({ timeStep: 0.5, damping: 0.5 })
  const warnings = step(state, new Map([[0, { x: 4, y: 0 }]]), params)

  // v' = (1 + 4 / 2 * 0.5) * 0.5 = 1, p' = 0 + 1 * 0.5
  expect(warnings).toEqual([])
  expect(node.velocity).toEqual({ x: 1, y: 0 })
  expect(node.position).toEqual({ x: 0.5, y: 1 })
})

test("missing force entry means zero force", () => {
  const state = GraphState.create(1, [])
  const node = state.getNode(0)
  node.position = { x: 1, y: 1 }
  node.velocity = { x: 2, y: -4 }

  const params = resolveForceParameters({ timeStep: 0.25, damping: 0.5 })
  step(state, new Map(), params)

  expect(node.velocity).toEqual({ x: 1, y: -2 })
  expect(node.position).toEqual({ x: 1.25, y: 0.5 })
})

test("non-finite velocity is reset and reported, other nodes keep moving", () => {
  const warn = vi.spyOn(console, "warn").mockImplementation(() => {})

  const state = GraphState.create(2, [])
  const bad = state.getNode(0)
  const good = state.getNode(1)
  bad.position = { x: 0, y: 0 }
  good.position = { x: 5, y: 5 }

  const params = resolveForceParameters({ timeStep: 0.5, damping: 0.5 })
  const warnings = step(
    state,
    new Map([
      [0, { x: Number.POSITIVE_INFINITY, y: 0 }],
      [1, { x: 4, y: 0 }],
    ]),
    params,
    17,
  )

  expect(warnings).toHaveLength(1)
  expect(warnings[0]).toBeInstanceOf(NumericalInstabilityWarning)
  expect(warnings[0].nodeId).toBe(0)
  expect(warnings[0].quantity).toBe("velocity")
  expect(warnings[0].tick).toBe(17)

  expect(bad.velocity).toEqual({ x: 0, y: 0 })
  expect(bad.position).toEqual({ x: 0, y: 0 })

  // v' = (0 + 4 * 0.5) * 0.5 = 1, p' = 5 + 0.5
  expect(good.velocity).toEqual({ x: 1, y: 0 })
  expect(good.position).toEqual({ x: 5.5, y: 5 })

  expect(warn).toHaveBeenCalledTimes(1)
  expect(warn).toHaveBeenCalledWith(
    "node 0 produced a non-finite velocity at tick 17; velocity reset to zero",
  )
})

test("position overflow is reported as position instability", () => {
  vi.spyOn(console, "warn").mockImplementation(() => {})

  const state = GraphState.create(1, [])
  const node = state.getNode(0)
  node.position = { x: Number.MAX_VALUE, y: 0 }
  node.velocity = { x: Number.MAX_VALUE, y: 0 }

  const warnings = step(
    state,
    new Map(),
    resolveForceParameters({ timeStep: 0.9, damping: 0.99 }),
  )

  expect(warnings.map((w) => w.quantity)).toEqual(["position"])
  expect(node.position).toEqual({ x: Number.MAX_VALUE, y: 0 })
  expect(node.velocity).toEqual({ x: 0, y: 0 })
})
