/**
 * Application errors
 *
 * Every error that reaches the HTTP layer as a known condition extends AppError;
 * the global error handler maps `statusCode` and `code` onto the response.
 */

export class AppError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super('VALIDATION_ERROR', message, 400, details);
  }
}

export class UnknownSensorChannelError extends AppError {
  constructor(public readonly channel: string | undefined, allowed: readonly string[]) {
    super(
      'UNKNOWN_SENSOR_CHANNEL',
      channel
        ? `Unknown sensor channel "${channel}". Expected one of: ${allowed.join(', ')}`
        : `Sensor channel is required. Expected one of: ${allowed.join(', ')}`,
      400,
    );
  }
}

/**
 * A read from the verdict store failed. Distinct from an empty store.
 */
export class DataUnavailableError extends AppError {
  constructor(message = 'Verdict data is unavailable', cause?: unknown) {
    super('DATA_UNAVAILABLE', message, 503);
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class CorpusEmptyError extends AppError {
  constructor(public readonly failures: ReadonlyArray<{ file: string; reason: string }>) {
    super('CORPUS_EMPTY', 'No fault datasets could be loaded', 500, failures);
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super('CONFIG_ERROR', message, 500, details);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
