import { InvalidParametersError } from "./errors"
import type { Bounds, ForceParameters } from "./types"

export const DEFAULT_FORCE_PARAMETERS: Readonly<ForceParameters> =
  Object.freeze({
    repulsionConstant: 1,
    springConstant: 10,
    springLength: 1,
    gravityConstant: 1,
    gravityEnabled: false,
    gravityCenter: Object.freeze({ x: 0, y: 0 }),
    damping: 0.9,
    timeStep: 0.05,
    minDistance: 0.01,
  })

export const DEFAULT_BOUNDS: Readonly<Bounds> = Object.freeze({
  minX: -2,
  minY: -2,
  maxX: 2,
  maxY: 2,
})

const NON_NEGATIVE_KEYS = [
  "repulsionConstant",
  "springConstant",
  "springLength",
  "gravityConstant",
] as const

/**
 * Merge overrides over the defaults and validate the result. Always returns a
 * fresh object so callers may mutate gravityEnabled.
 */
export const resolveForceParameters = (
  overrides: Partial<ForceParameters> = {},
): ForceParameters => {
  const params: ForceParameters = {
    ...DEFAULT_FORCE_PARAMETERS,
    ...overrides,
    gravityCenter: {
      ...(overrides.gravityCenter ?? DEFAULT_FORCE_PARAMETERS.gravityCenter),
    },
  }

  for (const key of NON_NEGATIVE_KEYS) {
    const value = params[key]
    if (!Number.isFinite(value) || value < 0) {
      throw new InvalidParametersError(
        `${key} must be a finite number >= 0, got ${value}`,
      )
    }
  }

  if (
    !Number.isFinite(params.damping) ||
    params.damping < 0 ||
    params.damping >= 1
  ) {
    throw new InvalidParametersError(
      `damping must be in [0, 1), got ${params.damping}`,
    )
  }

  if (!Number.isFinite(params.timeStep) || params.timeStep <= 0) {
    throw new InvalidParametersError(
      `timeStep must be a finite number > 0, got ${params.timeStep}`,
    )
  }

  if (!Number.isFinite(params.minDistance) || params.minDistance <= 0) {
    throw new InvalidParametersError(
      `minDistance must be a finite number > 0, got ${params.minDistance}`,
    )
  }

  if (
    !Number.isFinite(params.gravityCenter.x) ||
    !Number.isFinite(params.gravityCenter.y)
  ) {
    throw new InvalidParametersError("gravityCenter must be finite")
  }

  return params
}

export const validateBounds = (bounds: Bounds): Bounds => {
  const { minX, minY, maxX, maxY } = bounds
  if (![minX, minY, maxX, maxY].every(Number.isFinite)) {
    throw new InvalidParametersError("bounds must be finite")
  }
  if (minX > maxX || minY > maxY) {
    throw new InvalidParametersError(
      `bounds are inverted: (${minX}, ${minY}) .. (${maxX}, ${maxY})`,
    )
  }
  return bounds
}
