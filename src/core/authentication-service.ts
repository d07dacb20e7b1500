/**
 * Authentication Service - Orchestrates Credentials, Tokens, Permissions and Audit
 *
 * This is the entry point other services and the HTTP layer call. It
 * coordinates:
 * - Credential verification (CredentialStore)
 * - Token lifecycle (TokenService)
 * - Authorization (PermissionResolver)
 * - Accounting (AuditLedger)
 *
 * CRITICAL POLICIES:
 * - register and login append exactly one audit record each, success or failure
 * - Failures are recorded before the error propagates
 * - Role changes and disabling revoke every live token family of the user
 * - Tokens are issued under the user's lock, against the current role and status
 */

import {
  AUDIT_ACTIONS,
  type AuditEvent,
  type AuditFilters,
  type AuditPagination,
  type AuditRecord,
  type ProfileUpdate,
  type RegisterInput,
  type RequestContext,
  type Role,
  type RoleBearer,
  type TokenClaims,
  type TokenPair,
  type User,
} from './types.js';
import type { CredentialStore } from './credential-store.js';
import type { TokenService, RevokeOptions } from './token-service.js';
import type { PermissionResolver } from './permission-resolver.js';
import type { AuditLedger } from './audit-ledger.js';
import { SecurityErrors, isSecurityError } from '../utils/errors.js';

// ============================================================================
// Types
// ============================================================================

export interface AuthenticationServiceDependencies {
  credentials: CredentialStore;
  tokens: TokenService;
  permissions: PermissionResolver;
  auditLedger: AuditLedger;

  /** Resources released by destroy(), e.g. registry sweepers */
  disposables?: Array<{ destroy(): void }>;
}

export interface LoginResult {
  user: User;
  tokens: TokenPair;
}

export interface UserWithPermissions extends User {
  permissions: string[];
}

export interface AuditQueryResult {
  records: AuditRecord[];
  total: number;
}

type PendingEvent = Omit<AuditEvent, 'outcome' | 'actor'> & { actor?: string | null };

// ============================================================================
// Authentication Service Class
// ============================================================================

/**
 * Usage:
 * ```typescript
 * const { auth } = createCoreContext(config);
 *
 * await auth.register({ email: 'alice@example.edu', password: 'pa55word' });
 * const { tokens } = await auth.login('alice@example.edu', 'pa55word');
 *
 * const claims = await auth.validate(tokens.accessToken);
 * auth.enforce(claims, 'read:grades', { actor: claims.subject });
 * ```
 */
export class AuthenticationService {
  private readonly credentials: CredentialStore;
  private readonly tokens: TokenService;
  private readonly permissions: PermissionResolver;
  private readonly auditLedger: AuditLedger;
  private readonly disposables: Array<{ destroy(): void }>;

  constructor(deps: AuthenticationServiceDependencies) {
    this.credentials = deps.credentials;
    this.tokens = deps.tokens;
    this.permissions = deps.permissions;
    this.auditLedger = deps.auditLedger;
    this.disposables = deps.disposables ?? [];
  }

  // ==========================================================================
  // Authentication
  // ==========================================================================

  async register(input: RegisterInput, context: RequestContext = {}): Promise<User> {
    return this.audited(
      {
        actor: context.actor,
        action: AUDIT_ACTIONS.REGISTER,
        resource: 'user',
        ipAddress: context.ipAddress,
      },
      () => this.credentials.register(input),
      (user) => ({ actor: context.actor ?? user.id, detail: { userId: user.id, role: user.role } })
    );
  }

  /**
   * Verify credentials and issue a token pair under a new family
   *
   * @throws SecurityError INVALID_CREDENTIALS, USER_DISABLED
   */
  async login(email: string, password: string, context: RequestContext = {}): Promise<LoginResult> {
    return this.audited(
      { action: AUDIT_ACTIONS.LOGIN, resource: 'session', ipAddress: context.ipAddress },
      async () => {
        const verified = await this.credentials.verify(email, password);

        // Under the user's lock: a role change or disable either lands before
        // this re-read, or waits until the new family is tracked and revocable
        return this.credentials.withUser(verified.id, async (user) => {
          if (user.status === 'disabled') {
            throw SecurityErrors.USER_DISABLED(user.id);
          }
          const tokens = await this.tokens.issue(user);
          return { user, tokens };
        });
      },
      ({ user, tokens }) => ({ actor: user.id, detail: { familyId: tokens.familyId } })
    );
  }

  async refresh(refreshToken: unknown, context: RequestContext = {}): Promise<TokenPair> {
    return this.tokens.refresh(refreshToken, context);
  }

  /**
   * Validate an access token. Writes nothing.
   */
  async validate(accessToken: unknown): Promise<TokenClaims> {
    return this.tokens.validate(accessToken, 'access');
  }

  /**
   * Revoke a token or its family
   *
   * With a `requester`, revoking another subject's token needs write:users.
   */
  async revoke(
    token: unknown,
    options: RevokeOptions = {},
    requester?: Pick<TokenClaims, 'subject' | 'role'>
  ): Promise<number> {
    if (requester) {
      // An unverifiable token is recorded and rejected by tokens.revoke()
      const target = await this.tokens.inspect(token).catch(() => null);
      if (target && target.subject !== requester.subject) {
        this.permissions.enforce(requester, 'write:users', {
          actor: requester.subject,
          ipAddress: options.ipAddress,
          resource: 'token',
        });
      }
    }
    return this.tokens.revoke(token, options);
  }

  /**
   * End the session the access token belongs to
   */
  async logout(claims: TokenClaims, context: RequestContext = {}): Promise<void> {
    const ctx = { actor: claims.subject, ipAddress: context.ipAddress };
    await this.tokens.revokeFamily(claims.familyId, 'logout', ctx);
    this.auditLedger.record({
      ...ctx,
      action: AUDIT_ACTIONS.LOGOUT,
      resource: 'session',
      outcome: 'success',
      detail: { familyId: claims.familyId },
    });
  }

  /**
   * End every session of the token's subject
   */
  async logoutAll(claims: TokenClaims, context: RequestContext = {}): Promise<void> {
    const ctx = { actor: claims.subject, ipAddress: context.ipAddress };
    await this.tokens.revokeSubject(claims.subject, 'logout_all', ctx);
    this.auditLedger.record({
      ...ctx,
      action: AUDIT_ACTIONS.LOGOUT,
      resource: 'session',
      outcome: 'success',
      detail: { scope: 'all' },
    });
  }

  // ==========================================================================
  // Authorization
  // ==========================================================================

  authorize(subject: RoleBearer, requiredPermission: string): boolean {
    return this.permissions.authorize(subject, requiredPermission);
  }

  enforce(
    subject: RoleBearer,
    requiredPermission: string,
    context: RequestContext & { resource?: string } = {}
  ): void {
    this.permissions.enforce(subject, requiredPermission, context);
  }

  permissionsFor(role: string): ReadonlySet<string> {
    return this.permissions.permissionsFor(role);
  }

  // ==========================================================================
  // User Administration
  // ==========================================================================

  async getUser(id: string): Promise<User> {
    const user = await this.credentials.findById(id);
    if (!user) {
      throw SecurityErrors.USER_NOT_FOUND(id);
    }
    return user;
  }

  async getUserWithPermissions(id: string): Promise<UserWithPermissions> {
    const user = await this.getUser(id);
    return { ...user, permissions: [...this.permissionsFor(user.role)].sort() };
  }

  async listUsers(): Promise<User[]> {
    return this.credentials.list();
  }

  async updateUser(id: string, update: ProfileUpdate, context: RequestContext = {}): Promise<User> {
    return this.audited(
      {
        actor: context.actor,
        action: AUDIT_ACTIONS.USER_UPDATE,
        resource: `user:${id}`,
        detail: { fields: Object.keys(update).sort() },
        ipAddress: context.ipAddress,
      },
      () => this.credentials.updateProfile(id, update)
    );
  }

  /**
   * Change a user's role. Tokens carry the role, so live families are revoked.
   */
  async changeRole(id: string, role: Role, context: RequestContext = {}): Promise<User> {
    return this.audited(
      {
        actor: context.actor,
        action: AUDIT_ACTIONS.ROLE_CHANGE,
        resource: `user:${id}`,
        detail: { role },
        ipAddress: context.ipAddress,
      },
      async () => {
        const user = await this.credentials.setRole(id, role);
        await this.tokens.revokeSubject(id, 'role_change', context);
        return user;
      }
    );
  }

  /**
   * Soft delete: the user can no longer log in and live sessions end
   */
  async disableUser(id: string, context: RequestContext = {}): Promise<User> {
    return this.audited(
      {
        actor: context.actor,
        action: AUDIT_ACTIONS.USER_DISABLE,
        resource: `user:${id}`,
        ipAddress: context.ipAddress,
      },
      async () => {
        const user = await this.credentials.setStatus(id, 'disabled');
        await this.tokens.revokeSubject(id, 'user_disabled', context);
        return user;
      }
    );
  }

  async enableUser(id: string, context: RequestContext = {}): Promise<User> {
    return this.audited(
      {
        actor: context.actor,
        action: AUDIT_ACTIONS.USER_ENABLE,
        resource: `user:${id}`,
        ipAddress: context.ipAddress,
      },
      () => this.credentials.setStatus(id, 'active')
    );
  }

  // ==========================================================================
  // Accounting
  // ==========================================================================

  /**
   * Append an event on behalf of another service
   */
  recordEvent(event: AuditEvent): AuditRecord {
    return this.auditLedger.record(event);
  }

  queryAudit(filters: AuditFilters = {}, pagination: AuditPagination = {}): AuditQueryResult {
    return {
      records: this.auditLedger.query(filters, pagination),
      total: this.auditLedger.count(filters),
    };
  }

  /**
   * Clean up resources
   */
  destroy(): void {
    for (const disposable of this.disposables) {
      disposable.destroy();
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /**
   * Run `operation` and append one record for its outcome
   *
   * The success record is appended outside the try block so that a ledger
   * refusal is not recorded a second time as a failure.
   */
  private async audited<T>(
    event: PendingEvent,
    operation: () => Promise<T>,
    onSuccess?: (result: T) => { actor?: string | null; detail?: Record<string, unknown> }
  ): Promise<T> {
    let result: T;
    try {
      result = await operation();
    } catch (error) {
      this.auditLedger.record({
        ...event,
        actor: event.actor ?? actorFromError(error),
        outcome: 'failure',
        severity: 'warning',
        detail: {
          ...event.detail,
          error: isSecurityError(error) ? error.code : 'unknown',
        },
      });
      throw error;
    }

    const extra = onSuccess?.(result) ?? {};
    this.auditLedger.record({
      ...event,
      actor: extra.actor ?? event.actor ?? null,
      outcome: 'success',
      detail: { ...event.detail, ...extra.detail },
    });
    return result;
  }
}

/**
 * A disabled account is known even though the login failed
 */
function actorFromError(error: unknown): string | null {
  if (isSecurityError(error, 'USER_DISABLED')) {
    const userId = error.details?.userId;
    return typeof userId === 'string' ? userId : null;
  }
  return null;
}
