/**
 * Permission Resolver - Role to Permission Mapping and Authorization
 *
 * The role → permission map is validated once, at construction.
 * A map that misses a role, names an unknown role, grants an empty set or
 * contains a malformed permission is rejected before the process serves a
 * single request.
 *
 * Authorization is deny-by-default: anything not explicitly granted is
 * refused, and unknown roles resolve to the empty set.
 */

import {
  AUDIT_ACTIONS,
  PERMISSION_WILDCARD,
  ROLES,
  isRole,
  type Role,
  type RoleBearer,
  type RequestContext,
} from './types.js';
import type { AuditLedger } from './audit-ledger.js';
import { SecurityErrors } from '../utils/errors.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Role → permission list, as written in configuration
 */
export type RolePermissionMap = Record<string, readonly string[]>;

const PERMISSION_PATTERN = /^[a-z_]+:[a-z_]+$/;

/**
 * Platform defaults. Admin holds the wildcard.
 */
export const DEFAULT_ROLE_PERMISSIONS: Readonly<Record<Role, readonly string[]>> = {
  admin: [PERMISSION_WILDCARD],
  instructor: [
    'read:students',
    'write:students',
    'read:curriculum',
    'write:curriculum',
    'read:grades',
  ],
  student: ['read:profile', 'write:profile', 'read:grades', 'read:curriculum'],
  staff: ['read:all', 'write:finance', 'write:staff'],
};

export interface PermissionResolverOptions {
  /** Ledger for denial records (enforce only) */
  auditLedger?: AuditLedger;

  /** Also record successful enforce() calls (default: false) */
  logAuthorizationSuccess?: boolean;
}

// ============================================================================
// Permission Resolver Class
// ============================================================================

/**
 * Permission Resolver
 *
 * Two kinds of check, mirroring how callers use them:
 * - authorize(): soft check, returns boolean, never records
 * - enforce(): hard check, throws FORBIDDEN and records the denial
 *
 * Usage:
 * ```typescript
 * const resolver = new PermissionResolver(DEFAULT_ROLE_PERMISSIONS, { auditLedger });
 *
 * if (resolver.authorize(claims, 'read:grades')) {
 *   // ...
 * }
 *
 * resolver.enforce(claims, 'write:users', { actor: claims.subject });
 * ```
 */
export class PermissionResolver {
  private readonly permissions: ReadonlyMap<Role, ReadonlySet<string>>;
  private readonly auditLedger?: AuditLedger;
  private readonly logAuthorizationSuccess: boolean;

  constructor(
    map: RolePermissionMap = DEFAULT_ROLE_PERMISSIONS,
    options: PermissionResolverOptions = {}
  ) {
    this.permissions = PermissionResolver.buildPermissionMap(map);
    this.auditLedger = options.auditLedger;
    this.logAuthorizationSuccess = options.logAuthorizationSuccess ?? false;
  }

  /**
   * Validate a raw map and build the per-role sets
   *
   * @throws SecurityError CONFIGURATION_ERROR on any defect
   */
  static buildPermissionMap(map: RolePermissionMap): ReadonlyMap<Role, ReadonlySet<string>> {
    const unknownRoles = Object.keys(map).filter((key) => !isRole(key));
    if (unknownRoles.length > 0) {
      throw SecurityErrors.CONFIGURATION_ERROR(
        `unknown role(s) in permission map: ${unknownRoles.join(', ')}`
      );
    }

    const built = new Map<Role, ReadonlySet<string>>();
    for (const role of ROLES) {
      const granted = map[role];
      if (!granted || granted.length === 0) {
        throw SecurityErrors.CONFIGURATION_ERROR(`role "${role}" has no permissions`);
      }

      const malformed = granted.filter(
        (permission) => permission !== PERMISSION_WILDCARD && !PERMISSION_PATTERN.test(permission)
      );
      if (malformed.length > 0) {
        throw SecurityErrors.CONFIGURATION_ERROR(
          `malformed permission(s) for role "${role}": ${malformed.join(', ')}`
        );
      }

      built.set(role, new Set(granted));
    }
    return built;
  }

  /**
   * Permissions granted to `role`; unknown roles get the empty set
   */
  permissionsFor(role: string): ReadonlySet<string> {
    if (!isRole(role)) {
      return EMPTY;
    }
    return this.permissions.get(role) ?? EMPTY;
  }

  /**
   * Soft check: does `subject` hold `requiredPermission`?
   */
  authorize(subject: RoleBearer, requiredPermission: string): boolean {
    const granted = this.permissionsFor(subject.role);
    return granted.has(PERMISSION_WILDCARD) || granted.has(requiredPermission);
  }

  /**
   * Hard check: throw FORBIDDEN when `subject` lacks `requiredPermission`
   *
   * The denial is recorded before the error is thrown.
   */
  enforce(
    subject: RoleBearer,
    requiredPermission: string,
    context: RequestContext & { resource?: string } = {}
  ): void {
    const allowed = this.authorize(subject, requiredPermission);

    if (this.auditLedger && (!allowed || this.logAuthorizationSuccess)) {
      this.auditLedger.record({
        actor: context.actor ?? null,
        action: allowed ? AUDIT_ACTIONS.ACCESS_GRANTED : AUDIT_ACTIONS.ACCESS_DENIED,
        resource: context.resource ?? 'permission',
        outcome: allowed ? 'success' : 'failure',
        severity: allowed ? 'info' : 'warning',
        detail: { role: subject.role, permission: requiredPermission },
        ipAddress: context.ipAddress,
      });
    }

    if (!allowed) {
      throw SecurityErrors.FORBIDDEN(requiredPermission);
    }
  }

  /**
   * Every role with its granted permissions, sorted, for introspection
   */
  describe(): Array<{ role: Role; permissions: string[] }> {
    return ROLES.map((role) => ({ role, permissions: [...this.permissionsFor(role)].sort() }));
  }
}

const EMPTY: ReadonlySet<string> = new Set<string>();
