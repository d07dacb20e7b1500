/**
 * CredentialStore Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { InMemoryCredentialStore, normalizeEmail } from '../../../src/core/credential-store.js';
import { isSecurityError } from '../../../src/utils/errors.js';
import { createManualClock, T0 } from '../../support/manual-clock.js';

const PASSWORD = 'passw0rd-1';

describe('InMemoryCredentialStore', () => {
  let store: InMemoryCredentialStore;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    store = new InMemoryCredentialStore({ bcryptRounds: 4, clock: createManualClock().clock });
  });

  describe('register', () => {
    it('should create an active user with the default role', async () => {
      const user = await store.register({ email: 'Alice@Example.edu ', password: PASSWORD });

      expect(user).toMatchObject({
        email: 'alice@example.edu',
        fullName: 'alice@example.edu',
        role: 'student',
        status: 'active',
      });
      expect(user.createdAt.getTime()).toBe(T0);
      expect(user).not.toHaveProperty('passwordHash');
    });

    it('should keep the requested role and name', async () => {
      const user = await store.register({
        email: 'prof@example.edu',
        password: PASSWORD,
        fullName: ' Ada Lovelace ',
        role: 'instructor',
      });

      expect(user.role).toBe('instructor');
      expect(user.fullName).toBe('Ada Lovelace');
    });

    it('should reject a duplicate email regardless of case', async () => {
      await store.register({ email: 'alice@example.edu', password: PASSWORD });

      await expect(
        store.register({ email: 'ALICE@example.edu', password: PASSWORD })
      ).rejects.toMatchObject({ code: 'DUPLICATE_USER', statusCode: 409 });
    });

    it('should let only one of two concurrent registrations win', async () => {
      const results = await Promise.allSettled([
        store.register({ email: 'alice@example.edu', password: PASSWORD }),
        store.register({ email: 'alice@example.edu', password: PASSWORD }),
      ]);

      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
      const rejected = results.find((r) => r.status === 'rejected');
      expect(rejected?.status === 'rejected' && isSecurityError(rejected.reason, 'DUPLICATE_USER')).toBe(true);
      expect(await store.list()).toHaveLength(1);
    });

    it('should reject short passwords', async () => {
      await expect(
        store.register({ email: 'alice@example.edu', password: 'ab1' })
      ).rejects.toThrow('Password rejected: must be at least 8 characters');
    });

    it('should reject passwords without digits', async () => {
      await expect(
        store.register({ email: 'alice@example.edu', password: 'onlyletters' })
      ).rejects.toThrow('Password rejected: must contain letters and digits');
    });
  });

  describe('verify', () => {
    beforeEach(async () => {
      await store.register({ email: 'alice@example.edu', password: PASSWORD });
    });

    it('should return the user for the right password', async () => {
      const user = await store.verify(' ALICE@example.edu', PASSWORD);

      expect(user.email).toBe('alice@example.edu');
    });

    it('should reject a wrong password', async () => {
      await expect(store.verify('alice@example.edu', 'wrong-pass1')).rejects.toMatchObject({
        code: 'INVALID_CREDENTIALS',
        statusCode: 401,
      });
    });

    it('should reject an unknown email with the same error', async () => {
      await expect(store.verify('nobody@example.edu', PASSWORD)).rejects.toMatchObject({
        code: 'INVALID_CREDENTIALS',
        message: 'Invalid credentials',
      });
    });

    it('should reject a disabled user with the right password', async () => {
      const user = await store.findByEmail('alice@example.edu');
      await store.setStatus(user?.id ?? '', 'disabled');

      await expect(store.verify('alice@example.edu', PASSWORD)).rejects.toMatchObject({
        code: 'USER_DISABLED',
        statusCode: 403,
      });
    });

    it('should not reveal a disabled user to a wrong password', async () => {
      const user = await store.findByEmail('alice@example.edu');
      await store.setStatus(user?.id ?? '', 'disabled');

      await expect(store.verify('alice@example.edu', 'wrong-pass1')).rejects.toMatchObject({
        code: 'INVALID_CREDENTIALS',
      });
    });
  });

  describe('updates', () => {
    it('should change profile fields and bump updatedAt', async () => {
      const time = createManualClock();
      store = new InMemoryCredentialStore({ bcryptRounds: 4, clock: time.clock });
      const user = await store.register({ email: 'alice@example.edu', password: PASSWORD });

      time.advance(5000);
      const updated = await store.updateProfile(user.id, {
        email: 'Alice.New@example.edu',
        fullName: 'Alice New',
      });

      expect(updated.email).toBe('alice.new@example.edu');
      expect(updated.fullName).toBe('Alice New');
      expect(updated.updatedAt.getTime()).toBe(T0 + 5000);
      expect(await store.findByEmail('alice@example.edu')).toBeUndefined();
      expect((await store.findByEmail('alice.new@example.edu'))?.id).toBe(user.id);
    });

    it('should refuse an email owned by another user', async () => {
      const alice = await store.register({ email: 'alice@example.edu', password: PASSWORD });
      await store.register({ email: 'bob@example.edu', password: PASSWORD });

      await expect(
        store.updateProfile(alice.id, { email: 'bob@example.edu' })
      ).rejects.toMatchObject({ code: 'DUPLICATE_USER' });
    });

    it('should change the role', async () => {
      const user = await store.register({ email: 'alice@example.edu', password: PASSWORD });

      const updated = await store.setRole(user.id, 'staff');

      expect(updated.role).toBe('staff');
      expect((await store.findById(user.id))?.role).toBe('staff');
    });

    it('should fail for unknown ids', async () => {
      await expect(store.setRole('missing', 'admin')).rejects.toMatchObject({
        code: 'USER_NOT_FOUND',
        statusCode: 404,
      });
    });
  });

  describe('normalizeEmail', () => {
    it('should trim and lower-case', () => {
      expect(normalizeEmail('  Bob@Example.EDU ')).toBe('bob@example.edu');
    });
  });
});
