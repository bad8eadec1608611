/**
 * Error taxonomy for the account lifecycle and credential engine.
 *
 * Every kind carries a stable `code` and the HTTP status the boundary layer
 * maps it to. The core never translates these; it throws the kind and lets
 * the caller decide.
 */

export class CredentialLifecycleError extends Error {
  constructor(
    public code: string,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CredentialLifecycleError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

export class NotFoundError extends CredentialLifecycleError {
  constructor(message = 'Account not found', details?: Record<string, unknown>) {
    super('NOT_FOUND', message, 404, details);
    this.name = 'NotFoundError';
  }
}

export class AlreadyActiveError extends CredentialLifecycleError {
  constructor(message = 'Account is already active', details?: Record<string, unknown>) {
    super('ALREADY_ACTIVE', message, 409, details);
    this.name = 'AlreadyActiveError';
  }
}

export class InvalidTokenError extends CredentialLifecycleError {
  constructor(message = 'Invalid token', details?: Record<string, unknown>, code = 'INVALID_TOKEN') {
    super(code, message, 401, details);
    this.name = 'InvalidTokenError';
  }
}

/**
 * An elapsed activation window or credential expiry.
 *
 * Extends InvalidTokenError: an expired credential is also an invalid one.
 */
export class ExpiredTokenError extends InvalidTokenError {
  constructor(message = 'Token has expired', details?: Record<string, unknown>) {
    super(message, details, 'TOKEN_EXPIRED');
    this.name = 'ExpiredTokenError';
  }
}

export class InactiveAccountError extends CredentialLifecycleError {
  constructor(message = 'Account is not active', details?: Record<string, unknown>) {
    super('INACTIVE_ACCOUNT', message, 403, details);
    this.name = 'InactiveAccountError';
  }
}

export class AuthenticationError extends CredentialLifecycleError {
  constructor(message = 'Authentication failed', details?: Record<string, unknown>) {
    super('AUTHENTICATION_FAILED', message, 401, details);
    this.name = 'AuthenticationError';
  }
}

export class MalformedClaimError extends CredentialLifecycleError {
  constructor(message = 'Malformed credential claim', details?: Record<string, unknown>) {
    super('MALFORMED_CLAIM', message, 401, details);
    this.name = 'MalformedClaimError';
  }
}

export class SigningError extends CredentialLifecycleError {
  constructor(message = 'Failed to sign credential', details?: Record<string, unknown>) {
    super('SIGNING_FAILED', message, 500, details);
    this.name = 'SigningError';
  }
}

/** Fatal at startup; never raised per request. */
export class KeyLoadError extends CredentialLifecycleError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('KEY_LOAD_FAILED', message, 500, details);
    this.name = 'KeyLoadError';
  }
}

export class DeliveryError extends CredentialLifecycleError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('DELIVERY_FAILED', message, 502, details);
    this.name = 'DeliveryError';
  }
}

export class ConfigurationError extends CredentialLifecycleError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', `Configuration error: ${message}`, 500, details);
    this.name = 'ConfigurationError';
  }
}

export class RequestValidationError extends CredentialLifecycleError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_REQUEST', message, 400, details);
    this.name = 'RequestValidationError';
  }
}

/**
 * Errors a client could use to probe which check failed during login or
 * refresh. The boundary collapses all of them into one response.
 */
export function isCredentialFailure(error: unknown): boolean {
  return (
    error instanceof NotFoundError ||
    error instanceof InactiveAccountError ||
    error instanceof AuthenticationError ||
    error instanceof InvalidTokenError ||
    error instanceof MalformedClaimError
  );
}

// Error sanitization for logging
export function sanitizeError(error: unknown): Record<string, unknown> {
  if (error instanceof CredentialLifecycleError) {
    return {
      type: 'CredentialLifecycleError',
      code: error.code,
      message: error.message,
      statusCode: error.statusCode,
      ...(process.env.NODE_ENV !== 'production' && { details: error.details }),
    };
  }

  if (error instanceof Error) {
    return {
      type: 'Error',
      message: error.message,
      name: error.name,
      ...(process.env.NODE_ENV === 'development' && { stack: error.stack }),
    };
  }

  return {
    type: 'Unknown',
    message: 'An unknown error occurred',
  };
}

export interface ErrorResponse {
  statusCode: number;
  body: {
    error: string;
    error_description: string;
    details?: Record<string, unknown>;
  };
}

/**
 * Map an error to a transport response.
 *
 * With `collapseCredentialFailures`, every error for which
 * {@link isCredentialFailure} holds becomes the same 401 `invalid_credentials`.
 */
export function createErrorResponse(
  error: unknown,
  options: { collapseCredentialFailures?: boolean } = {}
): ErrorResponse {
  if (options.collapseCredentialFailures && isCredentialFailure(error)) {
    return {
      statusCode: 401,
      body: {
        error: 'invalid_credentials',
        error_description: 'Invalid credentials',
      },
    };
  }

  if (error instanceof CredentialLifecycleError) {
    // Never expose internal failure messages for 5xx kinds
    const internal = error.statusCode >= 500;
    return {
      statusCode: error.statusCode,
      body: {
        error: error.code.toLowerCase(),
        error_description: internal ? 'Internal server error' : error.message,
        ...(process.env.NODE_ENV === 'development' && error.details && { details: error.details }),
      },
    };
  }

  return {
    statusCode: 500,
    body: {
      error: 'server_error',
      error_description: 'Internal server error',
    },
  };
}
