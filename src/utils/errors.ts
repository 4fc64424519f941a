/**
 * Base error for failures raised by this tool. Carries the underlying error, if any.
 */
export class AppError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
  }
}

/**
 * Invalid input supplied by the caller (options, arguments).
 */
export class ValidationError extends AppError {}

/**
 * Missing or malformed configuration such as credentials.
 */
export class ConfigurationError extends AppError {}

/**
 * A call to the destination document store failed.
 */
export class DocumentStoreError extends AppError {}

/**
 * Extracts a readable message from any thrown value.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
