/**
 * Credential Store - User Identity and Password Verification
 *
 * Owns user records. Passwords are stored only as bcrypt hashes (the salt is
 * embedded in the hash string). Users are never deleted; they are disabled.
 *
 * The store records nothing in the audit ledger: a verify() call is one step
 * of a larger login, and the caller records the outcome of the whole.
 */

import { randomUUID } from 'node:crypto';
import bcrypt from 'bcryptjs';
import {
  ROLE_STUDENT,
  type ProfileUpdate,
  type RegisterInput,
  type Role,
  type User,
  type UserStatus,
} from './types.js';
import { SecurityErrors } from '../utils/errors.js';
import { KeyedLock } from '../utils/keyed-lock.js';
import { systemClock, type Clock } from '../utils/expiring-map.js';

// ============================================================================
// Interfaces
// ============================================================================

export interface CredentialStore {
  /**
   * Create a user
   *
   * @throws SecurityError DUPLICATE_USER, WEAK_PASSWORD
   */
  register(input: RegisterInput): Promise<User>;

  /**
   * Check an email/password pair
   *
   * @throws SecurityError INVALID_CREDENTIALS (unknown email or wrong password), USER_DISABLED
   */
  verify(email: string, password: string): Promise<User>;

  findById(id: string): Promise<User | undefined>;

  findByEmail(email: string): Promise<User | undefined>;

  list(): Promise<User[]>;

  updateProfile(id: string, update: ProfileUpdate): Promise<User>;

  setRole(id: string, role: Role): Promise<User>;

  setStatus(id: string, status: UserStatus): Promise<User>;

  /**
   * Run `task` with the current record of a user while holding the lock that
   * setRole and setStatus take
   *
   * @throws SecurityError USER_NOT_FOUND
   */
  withUser<T>(id: string, task: (user: User) => Promise<T>): Promise<T>;
}

export interface CredentialStoreConfig {
  /** bcrypt cost factor (default: 12) */
  bcryptRounds?: number;

  /** Minimum password length (default: 8) */
  minPasswordLength?: number;

  /** Role given to users registered without one (default: student) */
  defaultRole?: Role;

  clock?: Clock;
}

interface StoredUser extends User {
  passwordHash: string;
}

/**
 * Lower-case and trim so that lookups ignore case and surrounding whitespace
 */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

// ============================================================================
// In-Memory Implementation
// ============================================================================

export class InMemoryCredentialStore implements CredentialStore {
  private users = new Map<string, StoredUser>();
  private idsByEmail = new Map<string, string>();
  private locks = new KeyedLock();
  private dummyHash?: Promise<string>;

  private readonly bcryptRounds: number;
  private readonly minPasswordLength: number;
  private readonly defaultRole: Role;
  private readonly clock: Clock;

  constructor(config: CredentialStoreConfig = {}) {
    this.bcryptRounds = config.bcryptRounds ?? 12;
    this.minPasswordLength = config.minPasswordLength ?? 8;
    this.defaultRole = config.defaultRole ?? ROLE_STUDENT;
    this.clock = config.clock ?? systemClock;
  }

  async register(input: RegisterInput): Promise<User> {
    const email = normalizeEmail(input.email);

    return this.locks.run(`email:${email}`, async () => {
      if (this.idsByEmail.has(email)) {
        throw SecurityErrors.DUPLICATE_USER(email);
      }
      this.checkPasswordPolicy(input.password);

      const passwordHash = await bcrypt.hash(input.password, this.bcryptRounds);
      // A profile update may have claimed the address while hashing
      if (this.idsByEmail.has(email)) {
        throw SecurityErrors.DUPLICATE_USER(email);
      }
      const now = new Date(this.clock());
      const user: StoredUser = {
        id: randomUUID(),
        email,
        fullName: input.fullName?.trim() || email,
        role: input.role ?? this.defaultRole,
        status: 'active',
        createdAt: now,
        updatedAt: now,
        passwordHash,
      };

      this.users.set(user.id, user);
      this.idsByEmail.set(email, user.id);

      console.log('[CredentialStore] User registered:', { userId: user.id, role: user.role });
      return toPublic(user);
    });
  }

  async verify(email: string, password: string): Promise<User> {
    const id = this.idsByEmail.get(normalizeEmail(email));
    const user = id ? this.users.get(id) : undefined;

    if (!user) {
      // Spend the same bcrypt work as for a known account
      await bcrypt.compare(password, await this.getDummyHash());
      throw SecurityErrors.INVALID_CREDENTIALS();
    }

    const matches = await bcrypt.compare(password, user.passwordHash);
    if (!matches) {
      throw SecurityErrors.INVALID_CREDENTIALS();
    }

    if (user.status === 'disabled') {
      throw SecurityErrors.USER_DISABLED(user.id);
    }

    return toPublic(user);
  }

  async findById(id: string): Promise<User | undefined> {
    const user = this.users.get(id);
    return user ? toPublic(user) : undefined;
  }

  async findByEmail(email: string): Promise<User | undefined> {
    const id = this.idsByEmail.get(normalizeEmail(email));
    return id ? this.findById(id) : undefined;
  }

  async list(): Promise<User[]> {
    return [...this.users.values()].map(toPublic);
  }

  async updateProfile(id: string, update: ProfileUpdate): Promise<User> {
    return this.mutate(id, (user) => {
      if (update.email !== undefined) {
        const email = normalizeEmail(update.email);
        const owner = this.idsByEmail.get(email);
        if (owner !== undefined && owner !== user.id) {
          throw SecurityErrors.DUPLICATE_USER(email);
        }
        this.idsByEmail.delete(user.email);
        this.idsByEmail.set(email, user.id);
        user.email = email;
      }
      if (update.fullName !== undefined) {
        user.fullName = update.fullName.trim();
      }
    });
  }

  async setRole(id: string, role: Role): Promise<User> {
    return this.mutate(id, (user) => {
      user.role = role;
    });
  }

  async setStatus(id: string, status: UserStatus): Promise<User> {
    return this.mutate(id, (user) => {
      user.status = status;
    });
  }

  async withUser<T>(id: string, task: (user: User) => Promise<T>): Promise<T> {
    return this.locks.run(`user:${id}`, async () => {
      const user = this.users.get(id);
      if (!user) {
        throw SecurityErrors.USER_NOT_FOUND(id);
      }
      return task(toPublic(user));
    });
  }

  /**
   * Apply `change` to a user under that user's lock
   */
  private async mutate(id: string, change: (user: StoredUser) => void): Promise<User> {
    return this.locks.run(`user:${id}`, async () => {
      const user = this.users.get(id);
      if (!user) {
        throw SecurityErrors.USER_NOT_FOUND(id);
      }
      change(user);
      user.updatedAt = new Date(this.clock());
      return toPublic(user);
    });
  }

  private checkPasswordPolicy(password: string): void {
    if (password.length < this.minPasswordLength) {
      throw SecurityErrors.WEAK_PASSWORD(
        `must be at least ${this.minPasswordLength} characters`
      );
    }
    if (!/[A-Za-z]/.test(password) || !/\d/.test(password)) {
      throw SecurityErrors.WEAK_PASSWORD('must contain letters and digits');
    }
  }

  private getDummyHash(): Promise<string> {
    this.dummyHash ??= bcrypt.hash(randomUUID(), this.bcryptRounds);
    return this.dummyHash;
  }
}

function toPublic(user: StoredUser): User {
  return {
    id: user.id,
    email: user.email,
    fullName: user.fullName,
    role: user.role,
    status: user.status,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt,
  };
}
