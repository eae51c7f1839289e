/**
 * Error taxonomy for the extractor.
 *
 * - ConfigurationError: fatal, raised before any remote call
 * - InputValidationError: a missing column (fatal) or a bad cell (per record)
 * - TransportError: the provider call failed after the single retry
 * - ExtractionError: the provider response did not have the expected shape
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly key?: string,
  ) {
    super(key ? `[${key}] ${message}` : message);
    this.name = 'ConfigurationError';
  }
}

export class InputValidationError extends Error {
  constructor(
    message: string,
    public readonly rowNumber?: number,
  ) {
    super(rowNumber === undefined ? message : `Row ${rowNumber}: ${message}`);
    this.name = 'InputValidationError';
  }
}

export class TransportError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

export class ExtractionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExtractionError';
  }
}

/**
 * Format error message from unknown error type
 */
export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
