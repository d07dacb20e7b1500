/**
 * AuditLedger Tests
 *
 * Append-only semantics, id assignment, retention policies and queries.
 */

import { describe, it, expect, vi } from 'vitest';
import { AuditLedger, InMemoryAuditStorage } from '../../../src/core/audit-ledger.js';
import type { AuditEvent, AuditRecord } from '../../../src/core/types.js';
import { isSecurityError } from '../../../src/utils/errors.js';
import { createManualClock, T0 } from '../../support/manual-clock.js';

function event(overrides: Partial<AuditEvent> = {}): AuditEvent {
  return {
    actor: 'user-1',
    action: 'login',
    resource: 'session',
    outcome: 'success',
    ...overrides,
  };
}

describe('AuditLedger', () => {
  describe('record', () => {
    it('should assign increasing ids starting at 1', () => {
      const ledger = new AuditLedger();

      const first = ledger.record(event());
      const second = ledger.record(event());

      expect(first.id).toBe(1);
      expect(second.id).toBe(2);
      expect(ledger.lastId()).toBe(2);
    });

    it('should stamp records with the injected clock', () => {
      const time = createManualClock();
      const ledger = new AuditLedger({ clock: time.clock });

      const record = ledger.record(event());

      expect(record.timestamp.getTime()).toBe(T0);
    });

    it('should default severity to info and detail to empty', () => {
      const ledger = new AuditLedger();

      const record = ledger.record(event());

      expect(record.severity).toBe('info');
      expect(record.detail).toEqual({});
      expect(record).not.toHaveProperty('ipAddress');
    });

    it('should freeze records and their detail', () => {
      const ledger = new AuditLedger();

      const record = ledger.record(event({ detail: { familyId: 'f1' } }));

      expect(Object.isFrozen(record)).toBe(true);
      expect(Object.isFrozen(record.detail)).toBe(true);
    });

    it('should copy detail so later mutation of the event has no effect', () => {
      const ledger = new AuditLedger();
      const detail: Record<string, unknown> = { attempt: 1 };

      const record = ledger.record(event({ detail }));
      detail.attempt = 2;

      expect(record.detail).toEqual({ attempt: 1 });
    });

    it('should log critical records to the console', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const ledger = new AuditLedger();

      ledger.record(event({ action: 'token_reuse_detected', severity: 'critical' }));

      expect(warn).toHaveBeenCalledWith(
        '[AuditLedger] CRITICAL:',
        expect.objectContaining({ id: 1, action: 'token_reuse_detected' })
      );
      warn.mockRestore();
    });
  });

  describe('retention', () => {
    it('should evict the oldest records to onRotate when full', () => {
      const rotated: AuditRecord[][] = [];
      const ledger = new AuditLedger({
        maxRecords: 3,
        onRotate: (records) => rotated.push(records),
      });

      for (let i = 0; i < 5; i++) {
        ledger.record(event({ detail: { i } }));
      }

      expect(ledger.size()).toBe(3);
      expect(rotated.map((batch) => batch.map((r) => r.id))).toEqual([[1], [2]]);
      expect(ledger.query().map((r) => r.id)).toEqual([3, 4, 5]);
    });

    it('should refuse appends at capacity under the reject policy', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const ledger = new AuditLedger({ maxRecords: 2, retentionPolicy: 'reject' });
      ledger.record(event());
      ledger.record(event());

      let thrown: unknown;
      try {
        ledger.record(event());
      } catch (e) {
        thrown = e;
      }

      expect(isSecurityError(thrown, 'AUDIT_CAPACITY_EXCEEDED')).toBe(true);
      expect(ledger.size()).toBe(2);
      expect(ledger.lastId()).toBe(2);
      error.mockRestore();
    });

    it('should reject a non-positive capacity', () => {
      expect(() => new AuditLedger({ maxRecords: 0 })).toThrow(
        'Configuration error: audit maxRecords must be a positive integer'
      );
    });

    it('should use a custom storage', () => {
      const storage = new InMemoryAuditStorage();
      const ledger = new AuditLedger({ storage });

      ledger.record(event());

      expect(storage.size()).toBe(1);
    });
  });

  describe('query', () => {
    function seeded(): { ledger: AuditLedger; advance: (ms: number) => void } {
      const time = createManualClock();
      const ledger = new AuditLedger({ clock: time.clock });

      ledger.record(event({ actor: 'alice', action: 'login' }));
      time.advance(1000);
      ledger.record(event({ actor: 'bob', action: 'login', outcome: 'failure', severity: 'warning' }));
      time.advance(1000);
      ledger.record(event({ actor: 'alice', action: 'token_refresh', resource: 'token' }));
      time.advance(1000);
      ledger.record(event({ actor: null, action: 'login', outcome: 'failure', severity: 'warning' }));

      return { ledger, advance: time.advance };
    }

    it('should return all records in ascending id order', () => {
      const { ledger } = seeded();

      expect(ledger.query().map((r) => r.id)).toEqual([1, 2, 3, 4]);
    });

    it('should filter by actor, action and outcome', () => {
      const { ledger } = seeded();

      expect(ledger.query({ actor: 'alice' }).map((r) => r.id)).toEqual([1, 3]);
      expect(ledger.query({ action: 'login', outcome: 'failure' }).map((r) => r.id)).toEqual([2, 4]);
    });

    it('should filter by severity and resource', () => {
      const { ledger } = seeded();

      expect(ledger.query({ severity: 'warning' }).map((r) => r.id)).toEqual([2, 4]);
      expect(ledger.query({ resource: 'token' }).map((r) => r.id)).toEqual([3]);
    });

    it('should treat time bounds as inclusive', () => {
      const { ledger } = seeded();

      const records = ledger.query({ from: new Date(T0 + 1000), to: new Date(T0 + 2000) });

      expect(records.map((r) => r.id)).toEqual([2, 3]);
    });

    it('should paginate after filtering', () => {
      const { ledger } = seeded();

      expect(ledger.query({}, { skip: 1, limit: 2 }).map((r) => r.id)).toEqual([2, 3]);
      expect(ledger.query({ action: 'login' }, { skip: 1 }).map((r) => r.id)).toEqual([2, 4]);
    });

    it('should clamp the limit to 1000', () => {
      const ledger = new AuditLedger({ maxRecords: 2000 });
      for (let i = 0; i < 1200; i++) {
        ledger.record(event());
      }

      expect(ledger.query({}, { limit: 5000 })).toHaveLength(1000);
    });

    it('should count matching records regardless of pagination', () => {
      const { ledger } = seeded();

      expect(ledger.count({ action: 'login' })).toBe(3);
      expect(ledger.count()).toBe(4);
    });
  });
});
