/**
 * Token Family Store
 *
 * Remembers which token ids belong to which family, and which families
 * belong to which subject, so that a family (or every session of a user) can
 * be revoked jti by jti. Members are forgotten once they expire: lazily when
 * a family is read, and by `sweep()` for families nobody reads again.
 */

import { startSweeper, systemClock, type Clock } from '../utils/expiring-map.js';
import type { RegistryOptions } from './revocation-registry.js';
import type { TokenType } from './types.js';

export interface FamilyMember {
  jti: string;
  type: TokenType;
  /** NumericDate seconds */
  expiresAt: number;
}

export interface TokenFamilyStore {
  track(subject: string, familyId: string, member: FamilyMember): Promise<void>;

  /** Live members of a family */
  members(familyId: string): Promise<FamilyMember[]>;

  /** Families with at least one live member */
  familiesOf(subject: string): Promise<string[]>;

  /** Forget a family entirely */
  forget(familyId: string): Promise<void>;
}

interface FamilyRecord {
  subject: string;
  members: Map<string, FamilyMember>;
}

export class InMemoryTokenFamilyStore implements TokenFamilyStore {
  private families = new Map<string, FamilyRecord>();
  private bySubject = new Map<string, Set<string>>();
  private readonly clock: Clock;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: RegistryOptions = {}) {
    this.clock = options.clock ?? systemClock;

    const interval = options.sweepIntervalMs ?? 60000;
    if (interval > 0) {
      this.sweepTimer = startSweeper(this, interval);
    }
  }

  async track(subject: string, familyId: string, member: FamilyMember): Promise<void> {
    let family = this.families.get(familyId);
    if (!family) {
      family = { subject, members: new Map() };
      this.families.set(familyId, family);

      const owned = this.bySubject.get(subject) ?? new Set<string>();
      owned.add(familyId);
      this.bySubject.set(subject, owned);
    }
    family.members.set(member.jti, member);
  }

  async members(familyId: string): Promise<FamilyMember[]> {
    const family = this.families.get(familyId);
    if (!family) {
      return [];
    }
    this.prune(familyId, family);
    return [...family.members.values()];
  }

  async familiesOf(subject: string): Promise<string[]> {
    const owned = this.bySubject.get(subject);
    if (!owned) {
      return [];
    }
    for (const familyId of [...owned]) {
      const family = this.families.get(familyId);
      if (family) {
        this.prune(familyId, family);
      }
    }
    return [...(this.bySubject.get(subject) ?? [])];
  }

  async forget(familyId: string): Promise<void> {
    const family = this.families.get(familyId);
    if (!family) {
      return;
    }
    this.families.delete(familyId);
    this.detach(family.subject, familyId);
  }

  /**
   * Prune every family now
   *
   * @returns number of families removed
   */
  sweep(): number {
    let removed = 0;
    for (const [familyId, family] of [...this.families]) {
      this.prune(familyId, family);
      if (!this.families.has(familyId)) {
        removed++;
      }
    }
    return removed;
  }

  /** Tracked families, including ones whose members have all expired */
  size(): number {
    return this.families.size;
  }

  /**
   * Stop the background sweep and forget every family
   */
  destroy(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    this.families.clear();
    this.bySubject.clear();
  }

  /**
   * Drop expired members, and the family itself once empty
   */
  private prune(familyId: string, family: FamilyRecord): void {
    const nowSeconds = Math.floor(this.clock() / 1000);
    for (const [jti, member] of family.members) {
      if (member.expiresAt <= nowSeconds) {
        family.members.delete(jti);
      }
    }
    if (family.members.size === 0) {
      this.families.delete(familyId);
      this.detach(family.subject, familyId);
    }
  }

  private detach(subject: string, familyId: string): void {
    const owned = this.bySubject.get(subject);
    if (!owned) {
      return;
    }
    owned.delete(familyId);
    if (owned.size === 0) {
      this.bySubject.delete(subject);
    }
  }
}
