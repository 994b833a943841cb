import { expect, test } from "vitest"
import { InvalidParametersError } from "../../lib/errors"
import {
  DEFAULT_FORCE_PARAMETERS,
  resolveForceParameters,
} from "../../lib/parameters"
import { createSeededRandom } from "../../lib/random"

test("defaults", () => {
  expect(resolveForceParameters()).toEqual({
    repulsionConstant: 1,
    springConstant: 10,
    springLength: 1,
    gravityConstant: 1,
    gravityEnabled: false,
    gravityCenter: { x: 0, y: 0 },
    damping: 0.9,
    timeStep: 0.05,
    minDistance: 0.01,
  })
})

test("overrides merge over defaults into a fresh object", () => {
  const params = resolveForceParameters({ springLength: 2 })
  expect(params.springLength).toBe(2)
  expect(params.springConstant).toBe(10)

  params.gravityEnabled = true
  params.gravityCenter.x = 4
  expect(DEFAULT_FORCE_PARAMETERS.gravityEnabled).toBe(false)
  expect(DEFAULT_FORCE_PARAMETERS.gravityCenter.x).toBe(0)
})

test("rejects out-of-range values", () => {
  expect(() => resolveForceParameters({ damping: 1 })).toThrow(
    "damping must be in [0, 1), got 1",
  )
  expect(() => resolveForceParameters({ damping: -0.1 })).toThrow(
    InvalidParametersError,
  )
  expect(() => resolveForceParameters({ timeStep: 0 })).toThrow(
    InvalidParametersError,
  )
  expect(() => resolveForceParameters({ minDistance: 0 })).toThrow(
    InvalidParametersError,
  )
  expect(() => resolveForceParameters({ springConstant: -1 })).toThrow(
    "springConstant must be a finite number >= 0, got -1",
  )
  expect(() =>
    resolveForceParameters({ repulsionConstant: Number.NaN }),
  ).toThrow(InvalidParametersError)
  expect(() =>
    resolveForceParameters({ gravityCenter: { x: Infinity, y: 0 } }),
  ).toThrow("gravityCenter must be finite")
})

test("seeded random is reproducible and in [0, 1)", () => {
  const a = createSeededRandom(123)
  const b = createSeededRandom(123)
  for (let i = 0; i < 100; i++) {
    const v = a()
    expect(v).toBe(b())
    expect(v).toBeGreaterThanOrEqual(0)
    expect(v).toBeLessThan(1)
  }
})
