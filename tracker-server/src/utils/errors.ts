export type TrackerErrorCode =
  | "POSITION_NOT_FOUND"
  | "UNRECOGNIZED_STRATEGY"
  | "INVALID_POSITION";

export class TrackerError extends Error {
  constructor(
    readonly code: TrackerErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class PositionNotFoundError extends TrackerError {
  constructor(readonly positionId: string) {
    super("POSITION_NOT_FOUND", `Position not found: ${positionId}`);
  }
}

export class UnrecognizedStrategyError extends TrackerError {
  constructor(readonly strategy: string) {
    super("UNRECOGNIZED_STRATEGY", `Unrecognized strategy: ${strategy}`);
  }
}

export class InvalidPositionError extends TrackerError {
  constructor(message: string) {
    super("INVALID_POSITION", message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
