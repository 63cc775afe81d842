// Construction-time failures. Everything here is thrown before an object
// exists, never from a draw.

export type ConstructionErrorCode = 'INVALID_RANGE' | 'MISSING_PARAMETER' | 'INVALID_PARAMETER';

export class ConstructionError extends Error {
  readonly code: ConstructionErrorCode;

  constructor(code: ConstructionErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidRangeError extends ConstructionError {
  readonly start: number;
  readonly end: number;

  constructor(start: number, end: number) {
    super('INVALID_RANGE', `Invalid strip range [${start}, ${end}): need 0 <= start < end`);
    this.start = start;
    this.end = end;
  }
}

export class MissingParameterError extends ConstructionError {
  readonly parameter: string;

  constructor(parameter: string) {
    super('MISSING_PARAMETER', `Parameter "${parameter}" cannot be null`);
    this.parameter = parameter;
  }
}

export class InvalidParameterError extends ConstructionError {
  readonly parameter: string;

  constructor(parameter: string, reason: string) {
    super('INVALID_PARAMETER', `Parameter "${parameter}" ${reason}`);
    this.parameter = parameter;
  }
}

/** Thrown when a simulated sink is requested while running against hardware. */
export class SimulationContextError extends Error {
  constructor(mode: string) {
    super(`Simulated device cannot be created in "${mode}" mode`);
    this.name = 'SimulationContextError';
  }
}

/** Throws MissingParameterError for every entry whose value is null or undefined. */
export function requireParams(params: Record<string, unknown>): void {
  for (const [name, value] of Object.entries(params)) {
    if (value === null || value === undefined) {
      throw new MissingParameterError(name);
    }
  }
}
