/**
 * Core Module Public API
 *
 * Architectural Rule: Core → HTTP. Nothing in src/core/ imports from src/http/
 * or src/config/.
 */

// ============================================================================
// Context
// ============================================================================

export { createCoreContext } from './context.js';
export type { CoreConfig, CoreContext, CoreContextOptions } from './context.js';

// ============================================================================
// Services
// ============================================================================

export { AuthenticationService } from './authentication-service.js';
export type {
  AuthenticationServiceDependencies,
  AuditQueryResult,
  LoginResult,
  UserWithPermissions,
} from './authentication-service.js';

export { TokenService, MIN_SECRET_LENGTH } from './token-service.js';
export type {
  RevokeOptions,
  SigningAlgorithm,
  TokenServiceConfig,
  TokenServiceDependencies,
} from './token-service.js';

export { InMemoryCredentialStore, normalizeEmail } from './credential-store.js';
export type { CredentialStore, CredentialStoreConfig } from './credential-store.js';

export { PermissionResolver, DEFAULT_ROLE_PERMISSIONS } from './permission-resolver.js';
export type { PermissionResolverOptions, RolePermissionMap } from './permission-resolver.js';

export { InMemoryRevocationRegistry, InMemoryConsumptionRegistry } from './revocation-registry.js';
export type {
  ConsumptionRegistry,
  RegistryOptions,
  RevocationEntry,
  RevocationRegistry,
} from './revocation-registry.js';

export { InMemoryTokenFamilyStore } from './token-family-store.js';
export type { FamilyMember, TokenFamilyStore } from './token-family-store.js';

export {
  AuditLedger,
  InMemoryAuditStorage,
  DEFAULT_MAX_RECORDS,
  DEFAULT_QUERY_LIMIT,
  MAX_QUERY_LIMIT,
} from './audit-ledger.js';
export type { AuditLedgerConfig, AuditRetentionPolicy, AuditStorage } from './audit-ledger.js';

// ============================================================================
// Types and Constants
// ============================================================================

export {
  ROLES,
  ROLE_STUDENT,
  PERMISSION_WILDCARD,
  AUDIT_ACTIONS,
  isRole,
} from './types.js';

export type {
  Role,
  User,
  UserStatus,
  RegisterInput,
  ProfileUpdate,
  RoleBearer,
  TokenType,
  TokenClaims,
  TokenPair,
  RevocationScope,
  AuditAction,
  AuditOutcome,
  AuditSeverity,
  AuditEvent,
  AuditRecord,
  AuditFilters,
  AuditPagination,
  RequestContext,
} from './types.js';
