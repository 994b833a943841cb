/**
 * Discrete commands a host maps its input (keys, buttons, messages) onto.
 * `quit` is handled by the host's frame loop, not by the simulation.
 */
export const SIMULATION_COMMANDS = [
  "pause_toggle",
  "restart",
  "quit",
  "gravity_toggle",
  "zoom_in",
  "zoom_out",
] as const

export type SimulationCommand = (typeof SIMULATION_COMMANDS)[number]

export type CommandResult = {
  /** True when the host loop should stop */
  quit: boolean
}

const isSimulationCommand = (value: string): value is SimulationCommand =>
  SIMULATION_COMMANDS.some((command) => command === value)

/**
 * Parse a command name, case-insensitive. Unknown input yields null.
 */
export const parseCommand = (input: string): SimulationCommand | null => {
  const normalized = input.trim().toLowerCase()
  return isSimulationCommand(normalized) ? normalized : null
}
