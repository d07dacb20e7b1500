/**
 * Audit Ledger - Append-Only Accounting Record
 *
 * Every security-relevant outcome of the core lands here: registrations,
 * login attempts, refreshes, reuse detections, revocations, authorization
 * denials and administrative changes.
 *
 * Guarantees:
 * - Ids are assigned synchronously at append time, strictly increasing, gap-free
 * - Records are frozen on append; there is no update or delete operation
 * - Capacity is bounded; what happens at capacity is an explicit retention policy
 */

import type {
  AuditEvent,
  AuditFilters,
  AuditPagination,
  AuditRecord,
} from './types.js';
import { SecurityErrors } from '../utils/errors.js';
import { systemClock, type Clock } from '../utils/expiring-map.js';

// ============================================================================
// Interfaces
// ============================================================================

/**
 * What the ledger does once `maxRecords` is reached
 *
 * - rotate: evict the oldest records to the `onRotate` sink, then append
 * - reject: refuse the append with AUDIT_CAPACITY_EXCEEDED
 */
export type AuditRetentionPolicy = 'rotate' | 'reject';

export const DEFAULT_MAX_RECORDS = 10000;
export const DEFAULT_QUERY_LIMIT = 100;
export const MAX_QUERY_LIMIT = 1000;

/**
 * Configuration for the Audit Ledger
 */
export interface AuditLedgerConfig {
  /** Maximum records held by the storage (default: 10000) */
  maxRecords?: number;

  /** Behaviour at capacity (default: 'rotate') */
  retentionPolicy?: AuditRetentionPolicy;

  /** Custom storage implementation (default: InMemoryAuditStorage) */
  storage?: AuditStorage;

  /** Receives records evicted by rotation, oldest first */
  onRotate?: (records: AuditRecord[]) => void;

  clock?: Clock;
}

/**
 * Storage behind the ledger
 *
 * Appends are synchronous so that id assignment and ordering cannot
 * interleave between concurrent callers.
 */
export interface AuditStorage {
  append(record: AuditRecord): void;

  /** Remove and return the `count` oldest records */
  evictOldest(count: number): AuditRecord[];

  size(): number;

  /** Records in ascending id order */
  scan(): Iterable<AuditRecord>;
}

// ============================================================================
// In-Memory Storage Implementation
// ============================================================================

/**
 * Default in-memory audit storage
 */
class InMemoryAuditStorage implements AuditStorage {
  private records: AuditRecord[] = [];

  append(record: AuditRecord): void {
    this.records.push(record);
  }

  evictOldest(count: number): AuditRecord[] {
    return this.records.splice(0, count);
  }

  size(): number {
    return this.records.length;
  }

  scan(): Iterable<AuditRecord> {
    return this.records;
  }
}

// ============================================================================
// Audit Ledger
// ============================================================================

/**
 * Centralized append-only audit ledger
 *
 * Usage:
 * ```typescript
 * const ledger = new AuditLedger({
 *   maxRecords: 50000,
 *   onRotate: (records) => archive.write(records),
 * });
 *
 * ledger.record({ actor: user.id, action: 'login', resource: 'user', outcome: 'success' });
 * const failures = ledger.query({ outcome: 'failure' }, { limit: 50 });
 * ```
 */
export class AuditLedger {
  private readonly storage: AuditStorage;
  private readonly maxRecords: number;
  private readonly retentionPolicy: AuditRetentionPolicy;
  private readonly onRotate?: (records: AuditRecord[]) => void;
  private readonly clock: Clock;
  private nextId = 1;

  constructor(config: AuditLedgerConfig = {}) {
    this.storage = config.storage ?? new InMemoryAuditStorage();
    this.maxRecords = config.maxRecords ?? DEFAULT_MAX_RECORDS;
    this.retentionPolicy = config.retentionPolicy ?? 'rotate';
    this.onRotate = config.onRotate;
    this.clock = config.clock ?? systemClock;

    if (!Number.isInteger(this.maxRecords) || this.maxRecords < 1) {
      throw SecurityErrors.CONFIGURATION_ERROR('audit maxRecords must be a positive integer');
    }
  }

  /**
   * Append an event and return the stored record
   *
   * @throws SecurityError AUDIT_CAPACITY_EXCEEDED under the 'reject' policy
   */
  record(event: AuditEvent): AuditRecord {
    this.makeRoom();

    const record: AuditRecord = Object.freeze({
      id: this.nextId,
      timestamp: new Date(this.clock()),
      actor: event.actor,
      action: event.action,
      resource: event.resource,
      outcome: event.outcome,
      severity: event.severity ?? 'info',
      detail: Object.freeze({ ...(event.detail ?? {}) }),
      ...(event.ipAddress !== undefined && { ipAddress: event.ipAddress }),
    });

    this.storage.append(record);
    // Only a successful append consumes an id
    this.nextId++;

    if (record.severity === 'critical') {
      console.warn('[AuditLedger] CRITICAL:', {
        id: record.id,
        action: record.action,
        actor: record.actor,
        detail: record.detail,
      });
    }

    return record;
  }

  /**
   * Read records matching `filters`, ascending by id
   */
  query(filters: AuditFilters = {}, pagination: AuditPagination = {}): AuditRecord[] {
    const skip = Math.max(0, pagination.skip ?? 0);
    const limit = Math.min(Math.max(0, pagination.limit ?? DEFAULT_QUERY_LIMIT), MAX_QUERY_LIMIT);

    const page: AuditRecord[] = [];
    let matched = 0;
    for (const record of this.storage.scan()) {
      if (!matches(record, filters)) {
        continue;
      }
      if (matched++ < skip) {
        continue;
      }
      if (page.length >= limit) {
        break;
      }
      page.push(record);
    }
    return page;
  }

  /**
   * Count records matching `filters`
   */
  count(filters: AuditFilters = {}): number {
    let total = 0;
    for (const record of this.storage.scan()) {
      if (matches(record, filters)) {
        total++;
      }
    }
    return total;
  }

  /** Id of the most recent record, 0 when empty */
  lastId(): number {
    return this.nextId - 1;
  }

  size(): number {
    return this.storage.size();
  }

  getRetentionPolicy(): AuditRetentionPolicy {
    return this.retentionPolicy;
  }

  private makeRoom(): void {
    const overflow = this.storage.size() + 1 - this.maxRecords;
    if (overflow <= 0) {
      return;
    }

    if (this.retentionPolicy === 'reject') {
      console.error('[AuditLedger] Capacity reached, refusing append', {
        maxRecords: this.maxRecords,
      });
      throw SecurityErrors.AUDIT_CAPACITY_EXCEEDED(this.maxRecords);
    }

    const evicted = this.storage.evictOldest(overflow);
    if (this.onRotate && evicted.length > 0) {
      this.onRotate(evicted);
    }
  }
}

function matches(record: AuditRecord, filters: AuditFilters): boolean {
  if (filters.actor !== undefined && record.actor !== filters.actor) {
    return false;
  }
  if (filters.action !== undefined && record.action !== filters.action) {
    return false;
  }
  if (filters.outcome !== undefined && record.outcome !== filters.outcome) {
    return false;
  }
  if (filters.severity !== undefined && record.severity !== filters.severity) {
    return false;
  }
  if (filters.resource !== undefined && record.resource !== filters.resource) {
    return false;
  }
  const time = record.timestamp.getTime();
  if (filters.from !== undefined && time < filters.from.getTime()) {
    return false;
  }
  if (filters.to !== undefined && time > filters.to.getTime()) {
    return false;
  }
  return true;
}

// ============================================================================
// Exports
// ============================================================================

export { InMemoryAuditStorage };
