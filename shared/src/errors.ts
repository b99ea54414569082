export type SimulationErrorCode = "invalid_configuration" | "invalid_argument";

export class SimulationError extends Error {
  readonly code: SimulationErrorCode;

  constructor(code: SimulationErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

// Rejected at construction: the engine is never created.
export class InvalidConfigurationError extends SimulationError {
  constructor(message: string) {
    super("invalid_configuration", message);
  }
}

// Rejected by advance() before any state is touched.
export class InvalidArgumentError extends SimulationError {
  constructor(message: string) {
    super("invalid_argument", message);
  }
}

export function isSimulationError(e: unknown): e is SimulationError {
  return e instanceof SimulationError;
}
