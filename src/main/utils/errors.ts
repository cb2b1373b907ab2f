export class GnssConfigError extends Error {
  constructor(
    message: string,
    public code?: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'GnssConfigError';
  }
}

export class ConnectionError extends GnssConfigError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONNECTION_ERROR', details);
    this.name = 'ConnectionError';
  }
}

export class UBXError extends GnssConfigError {
  constructor(message: string, details?: unknown) {
    super(message, 'UBX_ERROR', details);
    this.name = 'UBXError';
  }
}

/**
 * Raised while validating user input, before the channel is touched.
 * Never retried.
 */
export class PreflightError extends GnssConfigError {
  constructor(message: string, code: string, details?: unknown) {
    super(message, code, details);
    this.name = 'PreflightError';
  }
}

export class FieldOverflowError extends PreflightError {
  constructor(
    message: string,
    public field: string,
    public value: number
  ) {
    super(message, 'FIELD_OVERFLOW');
    this.name = 'FieldOverflowError';
  }
}

export class InvalidFieldError extends PreflightError {
  constructor(
    message: string,
    public field: string
  ) {
    super(message, 'INVALID_FIELD_NAME');
    this.name = 'InvalidFieldError';
  }
}

export class UnknownProfileError extends PreflightError {
  constructor(public profile: string) {
    super(`Unknown profile: ${profile}`, 'UNKNOWN_PROFILE');
    this.name = 'UnknownProfileError';
  }
}

export class InvalidOverrideError extends PreflightError {
  constructor(public override: string, reason: string) {
    super(`Invalid override "${override}": ${reason}`, 'INVALID_OVERRIDE');
    this.name = 'InvalidOverrideError';
  }
}

export class UsageError extends PreflightError {
  constructor(message: string) {
    super(message, 'USAGE');
    this.name = 'UsageError';
  }
}

export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  return String(error);
}
