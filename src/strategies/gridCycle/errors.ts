export type GridErrorCode =
  | 'invalid_configuration'
  | 'venue_unavailable'
  | 'order_rejected'
  | 'max_reduce_breached';

export class GridEngineError extends Error {
  readonly code: GridErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: GridErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class InvalidConfigurationError extends GridEngineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('invalid_configuration', message, details);
  }
}

export class VenueUnavailableError extends GridEngineError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super('venue_unavailable', `venue_unavailable:${operation}`, {
      cause: cause instanceof Error ? cause.message : String(cause),
    });
    this.operation = operation;
  }
}

export class OrderRejectedError extends GridEngineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('order_rejected', message, details);
  }
}

export class MaxReduceBreachedError extends GridEngineError {
  constructor(details: { cycleStartBalance: number; equity: number; threshold: number }) {
    super(
      'max_reduce_breached',
      `equity ${details.equity.toFixed(2)} fell more than ${details.threshold.toFixed(2)} below ${details.cycleStartBalance.toFixed(2)}`,
      details
    );
  }
}

/**
 * Wraps a venue call so transport failures surface as VenueUnavailableError.
 * Order rejections pass through untouched.
 */
export async function callVenue<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof GridEngineError) throw error;
    throw new VenueUnavailableError(operation, error);
  }
}
