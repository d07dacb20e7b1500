/**
 * PermissionResolver Tests
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_ROLE_PERMISSIONS,
  PermissionResolver,
} from '../../../src/core/permission-resolver.js';
import { AuditLedger } from '../../../src/core/audit-ledger.js';
import { isSecurityError } from '../../../src/utils/errors.js';

function captureError(fn: () => void): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('PermissionResolver', () => {
  describe('configuration', () => {
    it('should accept the default map', () => {
      expect(() => new PermissionResolver()).not.toThrow();
    });

    it('should reject a map missing a role', () => {
      const { staff: _staff, ...withoutStaff } = DEFAULT_ROLE_PERMISSIONS;

      expect(() => new PermissionResolver(withoutStaff)).toThrow(
        'Configuration error: role "staff" has no permissions'
      );
    });

    it('should reject a role with an empty permission list', () => {
      expect(() => new PermissionResolver({ ...DEFAULT_ROLE_PERMISSIONS, student: [] })).toThrow(
        'Configuration error: role "student" has no permissions'
      );
    });

    it('should reject unknown roles', () => {
      const error = captureError(
        () => new PermissionResolver({ ...DEFAULT_ROLE_PERMISSIONS, janitor: ['read:rooms'] })
      );

      expect(isSecurityError(error, 'CONFIGURATION_ERROR')).toBe(true);
      expect(error).toHaveProperty(
        'message',
        'Configuration error: unknown role(s) in permission map: janitor'
      );
    });

    it('should reject malformed permissions', () => {
      expect(
        () => new PermissionResolver({ ...DEFAULT_ROLE_PERMISSIONS, staff: ['read:all', 'Write-Finance'] })
      ).toThrow('Configuration error: malformed permission(s) for role "staff": Write-Finance');
    });
  });

  describe('permissionsFor', () => {
    it('should return the configured set', () => {
      const resolver = new PermissionResolver();

      expect([...resolver.permissionsFor('student')].sort()).toEqual([
        'read:curriculum',
        'read:grades',
        'read:profile',
        'write:profile',
      ]);
    });

    it('should return the empty set for unknown roles', () => {
      const resolver = new PermissionResolver();

      expect(resolver.permissionsFor('superuser').size).toBe(0);
    });
  });

  describe('authorize', () => {
    const resolver = new PermissionResolver();

    it('should grant everything to the wildcard role', () => {
      expect(resolver.authorize({ role: 'admin' }, 'write:users')).toBe(true);
      expect(resolver.authorize({ role: 'admin' }, 'read:audit_logs')).toBe(true);
    });

    it('should grant exact matches only', () => {
      expect(resolver.authorize({ role: 'instructor' }, 'write:curriculum')).toBe(true);
      expect(resolver.authorize({ role: 'instructor' }, 'write:finance')).toBe(false);
      expect(resolver.authorize({ role: 'staff' }, 'read:students')).toBe(false);
    });

    it('should deny unknown roles', () => {
      expect(resolver.authorize({ role: 'ghost' }, 'read:profile')).toBe(false);
    });
  });

  describe('enforce', () => {
    it('should record the denial before throwing FORBIDDEN', () => {
      const auditLedger = new AuditLedger();
      const resolver = new PermissionResolver(DEFAULT_ROLE_PERMISSIONS, { auditLedger });

      const error = captureError(() =>
        resolver.enforce({ role: 'student' }, 'write:users', {
          actor: 'user-1',
          ipAddress: '10.0.0.1',
          resource: '/users',
        })
      );

      expect(isSecurityError(error, 'FORBIDDEN')).toBe(true);
      const [record] = auditLedger.query();
      expect(record).toMatchObject({
        actor: 'user-1',
        action: 'access_denied',
        resource: '/users',
        outcome: 'failure',
        severity: 'warning',
        detail: { role: 'student', permission: 'write:users' },
        ipAddress: '10.0.0.1',
      });
    });

    it('should not record successes by default', () => {
      const auditLedger = new AuditLedger();
      const resolver = new PermissionResolver(DEFAULT_ROLE_PERMISSIONS, { auditLedger });

      resolver.enforce({ role: 'student' }, 'read:grades');

      expect(auditLedger.size()).toBe(0);
    });

    it('should record successes when enabled', () => {
      const auditLedger = new AuditLedger();
      const resolver = new PermissionResolver(DEFAULT_ROLE_PERMISSIONS, {
        auditLedger,
        logAuthorizationSuccess: true,
      });

      resolver.enforce({ role: 'student' }, 'read:grades', { actor: 'user-1' });

      expect(auditLedger.query()[0]).toMatchObject({
        actor: 'user-1',
        action: 'access_granted',
        resource: 'permission',
        outcome: 'success',
        severity: 'info',
      });
    });
  });

  describe('describe', () => {
    it('should list every role with sorted permissions', () => {
      const resolver = new PermissionResolver();

      expect(resolver.describe()).toEqual([
        { role: 'admin', permissions: ['*'] },
        {
          role: 'instructor',
          permissions: [
            'read:curriculum',
            'read:grades',
            'read:students',
            'write:curriculum',
            'write:students',
          ],
        },
        {
          role: 'student',
          permissions: ['read:curriculum', 'read:grades', 'read:profile', 'write:profile'],
        },
        { role: 'staff', permissions: ['read:all', 'write:finance', 'write:staff'] },
      ]);
    });
  });
});
