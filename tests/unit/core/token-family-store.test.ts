/**
 * TokenFamilyStore Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { InMemoryTokenFamilyStore } from '../../../src/core/token-family-store.js';
import { createManualClock, T0 } from '../../support/manual-clock.js';

const NOW = T0 / 1000;

describe('InMemoryTokenFamilyStore', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should list members of a family', async () => {
    const store = new InMemoryTokenFamilyStore({ clock: createManualClock().clock, sweepIntervalMs: 0 });

    await store.track('alice', 'f1', { jti: 'a1', type: 'access', expiresAt: NOW + 900 });
    await store.track('alice', 'f1', { jti: 'r1', type: 'refresh', expiresAt: NOW + 3600 });

    expect((await store.members('f1')).map((m) => m.jti)).toEqual(['a1', 'r1']);
  });

  it('should list families per subject', async () => {
    const store = new InMemoryTokenFamilyStore({ clock: createManualClock().clock, sweepIntervalMs: 0 });

    await store.track('alice', 'f1', { jti: 'a1', type: 'access', expiresAt: NOW + 900 });
    await store.track('alice', 'f2', { jti: 'a2', type: 'access', expiresAt: NOW + 900 });
    await store.track('bob', 'f3', { jti: 'b1', type: 'access', expiresAt: NOW + 900 });

    expect(await store.familiesOf('alice')).toEqual(['f1', 'f2']);
    expect(await store.familiesOf('carol')).toEqual([]);
  });

  it('should prune expired members and empty families', async () => {
    const time = createManualClock();
    const store = new InMemoryTokenFamilyStore({ clock: time.clock, sweepIntervalMs: 0 });
    await store.track('alice', 'f1', { jti: 'a1', type: 'access', expiresAt: NOW + 900 });
    await store.track('alice', 'f1', { jti: 'r1', type: 'refresh', expiresAt: NOW + 3600 });
    await store.track('alice', 'f2', { jti: 'a2', type: 'access', expiresAt: NOW + 900 });

    time.advance(900_000);

    expect((await store.members('f1')).map((m) => m.jti)).toEqual(['r1']);
    expect(await store.familiesOf('alice')).toEqual(['f1']);
  });

  it('should forget a family', async () => {
    const store = new InMemoryTokenFamilyStore({ clock: createManualClock().clock, sweepIntervalMs: 0 });
    await store.track('alice', 'f1', { jti: 'a1', type: 'access', expiresAt: NOW + 900 });

    await store.forget('f1');

    expect(await store.members('f1')).toEqual([]);
    expect(await store.familiesOf('alice')).toEqual([]);
  });

  it('should sweep families that are never read again', async () => {
    const time = createManualClock();
    const store = new InMemoryTokenFamilyStore({ clock: time.clock, sweepIntervalMs: 0 });
    await store.track('alice', 'f1', { jti: 'a1', type: 'access', expiresAt: NOW + 900 });
    await store.track('alice', 'f1', { jti: 'r1', type: 'refresh', expiresAt: NOW + 3600 });
    await store.track('bob', 'f2', { jti: 'b1', type: 'access', expiresAt: NOW + 900 });
    await store.track('carol', 'f3', { jti: 'c1', type: 'refresh', expiresAt: NOW + 7200 });

    time.advance(3_600_000);

    expect(store.size()).toBe(3);
    expect(store.sweep()).toBe(2);
    expect(store.size()).toBe(1);
    expect(await store.familiesOf('alice')).toEqual([]);
    expect(await store.familiesOf('carol')).toEqual(['f3']);
  });

  it('should sweep in the background until destroyed', async () => {
    vi.useFakeTimers();
    const time = createManualClock();
    const store = new InMemoryTokenFamilyStore({ clock: time.clock, sweepIntervalMs: 1000 });
    await store.track('alice', 'f1', { jti: 'a1', type: 'access', expiresAt: NOW + 1 });

    time.advance(5000);
    expect(store.size()).toBe(1);
    vi.advanceTimersByTime(1000);
    expect(store.size()).toBe(0);

    store.destroy();
    expect(vi.getTimerCount()).toBe(0);
  });
});
