/**
 * Core AAA Types
 *
 * Type definitions shared by the credential store, token service, permission
 * resolver, revocation registry and audit ledger.
 *
 * Architectural Rule: Core → HTTP
 * Files in src/core/ MUST NOT import from src/http/ or src/config/
 */

// ============================================================================
// Roles
// ============================================================================

/**
 * Closed set of platform roles. Reference data, never extended at runtime.
 */
export const ROLES = ['admin', 'instructor', 'student', 'staff'] as const;

export type Role = (typeof ROLES)[number];

/** Role given to self-registered accounts */
export const ROLE_STUDENT: Role = 'student';

export function isRole(value: unknown): value is Role {
  return typeof value === 'string' && (ROLES as readonly string[]).includes(value);
}

/**
 * Permission granted to a role that matches every requirement
 */
export const PERMISSION_WILDCARD = '*';

// ============================================================================
// Users
// ============================================================================

export type UserStatus = 'active' | 'disabled';

/**
 * User identity as seen outside the credential store (no password material)
 */
export interface User {
  id: string;
  email: string;
  fullName: string;
  role: Role;
  status: UserStatus;
  createdAt: Date;
  updatedAt: Date;
}

export interface RegisterInput {
  email: string;
  password: string;
  fullName?: string;
  /** Defaults to the configured default role */
  role?: Role;
}

export interface ProfileUpdate {
  email?: string;
  fullName?: string;
}

/**
 * Anything the permission resolver can authorize: a user, or token claims
 */
export interface RoleBearer {
  role: string;
}

// ============================================================================
// Tokens
// ============================================================================

export type TokenType = 'access' | 'refresh';

/**
 * Validated token claims. Times are NumericDate (epoch seconds).
 */
export interface TokenClaims {
  subject: string;
  role: Role;
  jti: string;
  familyId: string;
  type: TokenType;
  issuedAt: number;
  expiresAt: number;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  tokenType: 'bearer';
  familyId: string;
  /** Access token lifetime in seconds */
  expiresIn: number;
  accessExpiresAt: number;
  refreshExpiresAt: number;
}

export type RevocationScope = 'token' | 'family';

// ============================================================================
// Audit
// ============================================================================

export type AuditOutcome = 'success' | 'failure';

export type AuditSeverity = 'info' | 'warning' | 'critical';

/**
 * Well-known audit actions emitted by the core. External producers may record
 * their own action names through the ledger.
 */
export const AUDIT_ACTIONS = {
  REGISTER: 'register',
  LOGIN: 'login',
  LOGOUT: 'logout',
  TOKEN_REFRESH: 'token_refresh',
  TOKEN_REUSE_DETECTED: 'token_reuse_detected',
  TOKEN_REVOKE: 'token_revoke',
  ACCESS_DENIED: 'access_denied',
  ACCESS_GRANTED: 'access_granted',
  USER_UPDATE: 'user_update',
  ROLE_CHANGE: 'role_change',
  USER_DISABLE: 'user_disable',
  USER_ENABLE: 'user_enable',
  SECRET_RESOLVE: 'secret_resolve',
} as const;

export type AuditAction = (typeof AUDIT_ACTIONS)[keyof typeof AUDIT_ACTIONS];

/**
 * Event handed to the ledger; id and timestamp are assigned on append
 */
export interface AuditEvent {
  /** User id of the acting principal, null when unknown (e.g. failed login) */
  actor: string | null;
  action: AuditAction | (string & {});
  resource: string;
  outcome: AuditOutcome;
  /** Defaults to 'info' */
  severity?: AuditSeverity;
  detail?: Record<string, unknown>;
  ipAddress?: string;
}

/**
 * Appended, immutable audit record
 */
export interface AuditRecord {
  readonly id: number;
  readonly timestamp: Date;
  readonly actor: string | null;
  readonly action: string;
  readonly resource: string;
  readonly outcome: AuditOutcome;
  readonly severity: AuditSeverity;
  readonly detail: Readonly<Record<string, unknown>>;
  readonly ipAddress?: string;
}

export interface AuditFilters {
  actor?: string;
  action?: string;
  outcome?: AuditOutcome;
  severity?: AuditSeverity;
  resource?: string;
  /** Inclusive lower bound */
  from?: Date;
  /** Inclusive upper bound */
  to?: Date;
}

export interface AuditPagination {
  skip?: number;
  limit?: number;
}

// ============================================================================
// Request Context
// ============================================================================

/**
 * Caller context threaded through audited operations
 */
export interface RequestContext {
  /** User id of the caller performing the operation, if authenticated */
  actor?: string | null;
  ipAddress?: string;
}
