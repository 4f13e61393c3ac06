export class SimulationParameterError extends Error {
  readonly parameter: string
  readonly value: unknown

  constructor(parameter: string, value: unknown, message: string) {
    super(message)
    this.name = 'SimulationParameterError'
    this.parameter = parameter
    this.value = value
  }
}
