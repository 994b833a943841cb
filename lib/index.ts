export * from "./types"
export * from "./vector"
export * from "./errors"
export * from "./random"
export * from "./parameters"
export * from "./topologies"
export * from "./commands"
export * from "./GraphState"
export * from "./ForceModel"
export * from "./Integrator"
export * from "./ForceLayoutSolver"
export * from "./SimulationController"
export * from "./visualization/visualizeGraphSnapshot"
export * from "./visualization/visualizeInputProblem"
export * from "./visualization/visualizeForceLayoutSolver"
