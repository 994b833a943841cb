import { expect, expectTypeOf, test } from "vitest"
import { SimulationController } from "../../lib/SimulationController"
import { cycleEdges } from "../../lib/topologies"
import type { Vector2 } from "../../lib/types"

const create = (startPaused = false) =>
  new SimulationController({
    nodeCount: 6,
    edges: cycleEdges(6),
    seed: 11,
    startPaused,
  })

test("starts running unless asked otherwise", () => {
  expect(create().getStatus()).toBe("running")
  expect(create(true).getStatus()).toBe("paused")
})

test("pause and resume are idempotent, toggle flips", () => {
  const sim = create()
  sim.pause()
  sim.pause()
  expect(sim.isPaused).toBe(true)
  sim.resume()
  sim.resume()
  expect(sim.isPaused).toBe(false)
  sim.togglePause()
  expect(sim.getStatus()).toBe("paused")
  sim.togglePause()
  expect(sim.getStatus()).toBe("running")
})

test("tick while paused leaves the state untouched", () => {
  const sim = create()
  for (let i = 0; i < 10; i++) sim.tick()
  sim.pause()

  const before = sim.getSnapshot()
  const velocities = [...sim.getState().nodes.values()].map((n) => ({
    ...n.velocity,
  }))
  expect(sim.tick()).toEqual([])

  expect(sim.getSnapshot()).toEqual(before)
  expect([...sim.getState().nodes.values()].map((n) => n.velocity)).toEqual(
    velocities,
  )
  expect(sim.getTickCount()).toBe(10)
})

test("pausing in between does not change the outcome", () => {
  const a = create()
  const b = create()

  for (let i = 0; i < 10; i++) a.tick()
  a.pause()
  for (let i = 0; i < 5; i++) a.tick()
  a.resume()
  for (let i = 0; i < 10; i++) a.tick()

  for (let i = 0; i < 20; i++) b.tick()

  expect(a.getSnapshot().nodes).toEqual(b.getSnapshot().nodes)
})

test("restart keeps topology, re-randomizes positions, zeroes velocities", () => {
  const sim = create(false)
  for (let i = 0; i < 50; i++) sim.tick()
  sim.pause()

  const before = sim.getSnapshot()
  sim.restart()
  const after = sim.getSnapshot()

  expect(after.nodes.map((n) => n.id)).toEqual([0, 1, 2, 3, 4, 5])
  expect(after.edges).toEqual(before.edges)
  expect(after.status).toBe("paused")
  expect(after.tickCount).toBe(0)
  for (let id = 0; id < 6; id++) {
    expect(after.nodes[id].position).not.toEqual(before.nodes[id].position)
    expect(sim.getState().getNode(id).velocity).toEqual({ x: 0, y: 0 })
  }
})

test("restart draws new positions from the same seeded stream", () => {
  const a = create()
  const b = create()
  a.restart()
  b.restart()
  expect(a.getSnapshot().nodes).toEqual(b.getSnapshot().nodes)
})

test("gravity toggle flips the flag in either state", () => {
  const sim = create(true)
  expect(sim.gravityEnabled).toBe(false)
  sim.toggleGravity()
  expect(sim.gravityEnabled).toBe(true)
  expect(sim.getParameters().gravityEnabled).toBe(true)
  sim.toggleGravity()
  expect(sim.getSnapshot().gravityEnabled).toBe(false)
})

test("zoom changes only the view", () => {
  const sim = create()
  const a = create()
  sim.setZoom(0.5)
  expect(sim.getViewState().scale).toBe(37.5)
  sim.setZoom(-0.2)
  expect(sim.getViewState().scale).toBe(30)

  for (let i = 0; i < 20; i++) {
    sim.tick()
    a.tick()
  }
  expect(sim.getSnapshot().nodes).toEqual(a.getSnapshot().nodes)
})

test("zoom is clamped and ignores non-finite deltas", () => {
  const sim = create()
  sim.setZoom(-0.99)
  sim.setZoom(-0.99)
  expect(sim.getViewState().scale).toBe(0.1)
  sim.setZoom(Number.NaN)
  expect(sim.getViewState().scale).toBe(0.1)
})

test("pan is part of the snapshot view", () => {
  const sim = create()
  sim.setPan({ x: 10, y: -3 })
  expect(sim.getSnapshot().view).toEqual({ scale: 25, pan: { x: 10, y: -3 } })
})

test("snapshots are frozen copies", () => {
  const sim = create()
  const snapshot = sim.getSnapshot()
  expect(Object.isFrozen(snapshot)).toBe(true)
  expect(Object.isFrozen(snapshot.nodes[0].position)).toBe(true)

  const x = snapshot.nodes[0].position.x
  sim.tick()
  expect(snapshot.nodes[0].position.x).toBe(x)
})

test("controllers are independent", () => {
  const a = create()
  const b = create()
  a.toggleGravity()
  a.setZoom(1)
  expect(b.gravityEnabled).toBe(false)
  expect(b.getViewState().scale).toBe(25)
})

test("getState exposes the live nodes read-only", () => {
  const sim = create()
  sim.tick()
  const node = sim.getState().getNode(2)

  expectTypeOf(node.position).toEqualTypeOf<Readonly<Vector2>>()
  expectTypeOf(node.velocity).toEqualTypeOf<Readonly<Vector2>>()
  expect(node.position).toEqual(sim.getSnapshot().nodes[2].position)
})
