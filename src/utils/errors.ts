/**
 * Security error taxonomy for the AAA core.
 *
 * Every failure surfaced by the core is a SecurityError carrying a stable
 * code, the HTTP-equivalent status and a category. Callers branch on `code`,
 * the HTTP layer maps `statusCode` directly onto responses.
 */

export type SecurityErrorCategory =
  | 'authentication'
  | 'conflict'
  | 'token'
  | 'authorization'
  | 'validation'
  | 'not_found'
  | 'operational';

export type SecurityErrorCode =
  | 'INVALID_CREDENTIALS'
  | 'USER_DISABLED'
  | 'DUPLICATE_USER'
  | 'TOKEN_EXPIRED'
  | 'TOKEN_MALFORMED'
  | 'TOKEN_REVOKED'
  | 'TOKEN_REUSE_DETECTED'
  | 'MISSING_TOKEN'
  | 'FORBIDDEN'
  | 'VALIDATION_ERROR'
  | 'WEAK_PASSWORD'
  | 'USER_NOT_FOUND'
  | 'AUDIT_CAPACITY_EXCEEDED'
  | 'CONFIGURATION_ERROR';

const CATEGORY_BY_CODE: Record<SecurityErrorCode, SecurityErrorCategory> = {
  INVALID_CREDENTIALS: 'authentication',
  USER_DISABLED: 'authentication',
  DUPLICATE_USER: 'conflict',
  TOKEN_EXPIRED: 'token',
  TOKEN_MALFORMED: 'token',
  TOKEN_REVOKED: 'token',
  TOKEN_REUSE_DETECTED: 'token',
  MISSING_TOKEN: 'token',
  FORBIDDEN: 'authorization',
  VALIDATION_ERROR: 'validation',
  WEAK_PASSWORD: 'validation',
  USER_NOT_FOUND: 'not_found',
  AUDIT_CAPACITY_EXCEEDED: 'operational',
  CONFIGURATION_ERROR: 'operational',
};

export class SecurityError extends Error {
  public readonly category: SecurityErrorCategory;

  constructor(
    public readonly code: SecurityErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SecurityError';
    this.category = CATEGORY_BY_CODE[code];

    // Maintain proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SecurityError);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      category: this.category,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

export function createSecurityError(
  code: SecurityErrorCode,
  message: string,
  statusCode: number = 500,
  details?: Record<string, unknown>
): SecurityError {
  return new SecurityError(code, message, statusCode, details);
}

export function isSecurityError(error: unknown, code?: SecurityErrorCode): error is SecurityError {
  return error instanceof SecurityError && (code === undefined || error.code === code);
}

// Predefined security error types
export const SecurityErrors = {
  INVALID_CREDENTIALS: () =>
    createSecurityError('INVALID_CREDENTIALS', 'Invalid credentials', 401),

  USER_DISABLED: (userId: string) =>
    createSecurityError('USER_DISABLED', 'Account is disabled', 403, { userId }),

  DUPLICATE_USER: (email: string) =>
    createSecurityError('DUPLICATE_USER', 'Email already registered', 409, { email }),

  TOKEN_EXPIRED: (details?: Record<string, unknown>) =>
    createSecurityError('TOKEN_EXPIRED', 'Unauthorized: Token has expired', 401, details),

  TOKEN_MALFORMED: (reason: string) =>
    createSecurityError('TOKEN_MALFORMED', 'Unauthorized: Token is malformed', 401, { reason }),

  TOKEN_REVOKED: (jti: string) =>
    createSecurityError('TOKEN_REVOKED', 'Unauthorized: Token has been revoked', 401, { jti }),

  TOKEN_REUSE_DETECTED: (familyId: string) =>
    createSecurityError(
      'TOKEN_REUSE_DETECTED',
      'Unauthorized: Refresh token reuse detected, session family revoked',
      401,
      { familyId }
    ),

  MISSING_TOKEN: () =>
    createSecurityError(
      'MISSING_TOKEN',
      'Unauthorized: Missing Authorization header with Bearer token',
      401
    ),

  FORBIDDEN: (permission: string) =>
    createSecurityError('FORBIDDEN', `Forbidden: missing permission ${permission}`, 403, {
      permission,
    }),

  VALIDATION_ERROR: (message: string, details?: Record<string, unknown>) =>
    createSecurityError('VALIDATION_ERROR', message, 400, details),

  WEAK_PASSWORD: (reason: string) =>
    createSecurityError('WEAK_PASSWORD', `Password rejected: ${reason}`, 400),

  USER_NOT_FOUND: (userId: string) =>
    createSecurityError('USER_NOT_FOUND', 'User not found', 404, { userId }),

  AUDIT_CAPACITY_EXCEEDED: (maxRecords: number) =>
    createSecurityError(
      'AUDIT_CAPACITY_EXCEEDED',
      'Audit ledger is at capacity; request refused',
      503,
      { maxRecords }
    ),

  CONFIGURATION_ERROR: (message: string) =>
    createSecurityError('CONFIGURATION_ERROR', `Configuration error: ${message}`, 500),
} as const;

// Error sanitization for logging
export function sanitizeError(error: unknown): Record<string, unknown> {
  if (error instanceof SecurityError) {
    return {
      type: 'SecurityError',
      code: error.code,
      message: error.message,
      statusCode: error.statusCode,
      // Don't include details in production to prevent information leakage
      ...(process.env.NODE_ENV !== 'production' && { details: error.details }),
    };
  }

  if (error instanceof Error) {
    return {
      type: 'Error',
      message: error.message,
      name: error.name,
      // Only include stack trace in development
      ...(process.env.NODE_ENV === 'development' && { stack: error.stack }),
    };
  }

  return {
    type: 'Unknown',
    message: 'An unknown error occurred',
  };
}

// HTTP response helper
export function createErrorResponse(error: SecurityError): {
  statusCode: number;
  body: Record<string, unknown>;
} {
  return {
    statusCode: error.statusCode,
    body: {
      error: {
        code: error.code,
        message: error.message,
        // Only include details in development
        ...(process.env.NODE_ENV === 'development' && error.details && { details: error.details }),
      },
    },
  };
}
