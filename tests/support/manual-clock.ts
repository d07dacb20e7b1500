import type { Clock } from '../../src/utils/expiring-map.js';

/** 2024-01-15T09:00:00.000Z */
export const T0 = Date.UTC(2024, 0, 15, 9, 0, 0);

export interface ManualClock {
  clock: Clock;
  advance(ms: number): void;
  now(): number;
}

export function createManualClock(start: number = T0): ManualClock {
  let now = start;
  return {
    clock: () => now,
    advance: (ms) => {
      now += ms;
    },
    now: () => now,
  };
}

export const TEST_SECRET = 'test-secret-test-secret-test-secret';
