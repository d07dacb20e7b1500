/**
 * Revocation and Consumption Registries
 *
 * Both track token identifiers that must no longer be honoured, and both let
 * entries lapse at the token's natural expiry: once a token has expired it
 * fails validation on its own, so keeping the entry any longer only grows
 * memory.
 *
 * - RevocationRegistry: jti (or family key) → reason. Consulted by validate().
 * - ConsumptionRegistry: single-use flag for refresh tokens. Consulted by refresh().
 *
 * The interfaces are async so a shared external store can stand in for the
 * in-memory implementations when the core runs on several replicas.
 */

import { ExpiringMap, startSweeper, systemClock, type Clock } from '../utils/expiring-map.js';

// ============================================================================
// Interfaces
// ============================================================================

export interface RevocationEntry {
  jti: string;
  reason: string;
  /** Epoch milliseconds after which the entry may be dropped */
  expiresAt: number;
}

export interface RevocationRegistry {
  /** Record `jti` as revoked for `ttlSeconds` */
  add(jti: string, reason: string, ttlSeconds: number): Promise<void>;

  contains(jti: string): Promise<boolean>;

  get(jti: string): Promise<RevocationEntry | undefined>;
}

export interface ConsumptionRegistry {
  /**
   * Atomically mark `jti` consumed.
   *
   * @param expiresAt - token expiry, NumericDate seconds
   * @returns true for the first caller only
   */
  consume(jti: string, expiresAt: number): Promise<boolean>;

  isConsumed(jti: string): Promise<boolean>;
}

export interface RegistryOptions {
  /** Background sweep interval in ms; 0 disables the sweep (default: 60000) */
  sweepIntervalMs?: number;

  clock?: Clock;
}

// ============================================================================
// In-Memory Implementations
// ============================================================================

/**
 * Shared sweep lifecycle for the in-memory registries
 */
abstract class SweptRegistry<V> {
  protected readonly entries: ExpiringMap<V>;
  protected readonly clock: Clock;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: RegistryOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.entries = new ExpiringMap<V>(this.clock);

    const interval = options.sweepIntervalMs ?? 60000;
    if (interval > 0) {
      this.sweepTimer = startSweeper(this.entries, interval);
    }
  }

  /**
   * Drop expired entries now
   *
   * @returns number of entries removed
   */
  sweep(): number {
    return this.entries.sweep();
  }

  size(): number {
    return this.entries.size;
  }

  /**
   * Stop the background sweep and forget every entry
   */
  destroy(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    this.entries.clear();
  }
}

export class InMemoryRevocationRegistry
  extends SweptRegistry<RevocationEntry>
  implements RevocationRegistry
{
  async add(jti: string, reason: string, ttlSeconds: number): Promise<void> {
    const expiresAt = this.clock() + Math.max(0, ttlSeconds) * 1000;
    this.entries.set(jti, { jti, reason, expiresAt }, expiresAt);
  }

  async contains(jti: string): Promise<boolean> {
    return this.entries.has(jti);
  }

  async get(jti: string): Promise<RevocationEntry | undefined> {
    return this.entries.get(jti);
  }
}

export class InMemoryConsumptionRegistry
  extends SweptRegistry<number>
  implements ConsumptionRegistry
{
  async consume(jti: string, expiresAt: number): Promise<boolean> {
    // No await between check and set
    return this.entries.setIfAbsent(jti, this.clock(), expiresAt * 1000);
  }

  async isConsumed(jti: string): Promise<boolean> {
    return this.entries.has(jti);
  }
}
