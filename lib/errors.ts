export const ForceLayoutErrorCode = {
  INVALID_TOPOLOGY: "INVALID_TOPOLOGY",
  INVALID_PARAMETERS: "INVALID_PARAMETERS",
} as const

export type ForceLayoutErrorCode =
  (typeof ForceLayoutErrorCode)[keyof typeof ForceLayoutErrorCode]

export class ForceLayoutError extends Error {
  readonly code: ForceLayoutErrorCode

  constructor(message: string, code: ForceLayoutErrorCode) {
    super(message)
    this.name = "ForceLayoutError"
    this.code = code
  }
}

/**
 * Malformed graph input: non-positive node count, an edge id outside
 * [0, nodeCount), or a self-loop.
 */
export class InvalidTopologyError extends ForceLayoutError {
  constructor(message: string) {
    super(message, ForceLayoutErrorCode.INVALID_TOPOLOGY)
    this.name = "InvalidTopologyError"
  }
}

export class InvalidParametersError extends ForceLayoutError {
  constructor(message: string) {
    super(message, ForceLayoutErrorCode.INVALID_PARAMETERS)
    this.name = "InvalidParametersError"
  }
}

/**
 * Recorded (not thrown) when integration produces a non-finite value for a
 * node. The node's velocity is reset to zero and its last finite position is
 * kept.
 */
export class NumericalInstabilityWarning {
  readonly name = "NumericalInstabilityWarning"

  constructor(
    readonly nodeId: number,
    readonly quantity: "position" | "velocity",
    readonly tick: number,
  ) {}

  get message(): string {
    return `node ${this.nodeId} produced a non-finite ${this.quantity} at tick ${this.tick}; velocity reset to zero`
  }
}
