export type RegistryErrorCode =
  | 'INVALID_FORMAT'
  | 'NOT_FOUND'
  | 'ALREADY_EXISTS'
  | 'MALFORMED_CODE'
  | 'STORE_BUSY'
  | 'STORE_UNAVAILABLE'
  | 'STORE_CORRUPTION';

export class RegistryError extends Error {
  constructor(
    public code: RegistryErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** User-supplied code does not have a recognised shape. */
export class InvalidFormatError extends RegistryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_FORMAT', message, 400, details);
  }
}

export class NotFoundError extends RegistryError {
  constructor(public hashCode: string) {
    super('NOT_FOUND', `Hash code '${hashCode}' not found in database`, 404, { hashCode });
  }
}

export class AlreadyExistsError extends RegistryError {
  constructor(public hashCode: string) {
    super('ALREADY_EXISTS', `Hash ${hashCode} is already registered`, 409, { hashCode });
  }
}

/** Short-code derivation was handed something that is not a full code. */
export class MalformedCodeError extends RegistryError {
  constructor(value: string) {
    super('MALFORMED_CODE', `Cannot derive a short code from '${value}'`, 500, { value });
  }
}

export class StoreBusyError extends RegistryError {
  constructor(hashCode: string, attempts: number) {
    super('STORE_BUSY', `Could not acquire write lock for ${hashCode}`, 503, { hashCode, attempts });
  }
}

export class StoreUnavailableError extends RegistryError {
  constructor(message: string, cause?: unknown) {
    super('STORE_UNAVAILABLE', message, 503, {
      cause: cause instanceof Error ? cause.message : String(cause),
    });
  }
}

// Logged, never thrown
export class StoreCorruptionWarning extends RegistryError {
  constructor(public location: string, public reason: string) {
    super('STORE_CORRUPTION', `Skipping unreadable record at ${location}: ${reason}`, 500, { location, reason });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
