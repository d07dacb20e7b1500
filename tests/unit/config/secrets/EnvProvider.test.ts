/**
 * Unit Tests for EnvProvider
 */

import { describe, it, expect } from 'vitest';
import { EnvProvider } from '../../../../src/config/secrets/providers/EnvProvider.js';

describe('EnvProvider', () => {
  it('should resolve a set variable', async () => {
    const provider = new EnvProvider({ AAA_SIGNING_SECRET: 'test-secret' });

    await expect(provider.resolve('AAA_SIGNING_SECRET')).resolves.toBe('test-secret');
  });

  it('should trim surrounding whitespace', async () => {
    const provider = new EnvProvider({ AAA_SIGNING_SECRET: '  test-secret \n' });

    await expect(provider.resolve('AAA_SIGNING_SECRET')).resolves.toBe('test-secret');
  });

  it('should return undefined for unset and empty variables', async () => {
    const provider = new EnvProvider({ EMPTY: '' });

    await expect(provider.resolve('EMPTY')).resolves.toBeUndefined();
    await expect(provider.resolve('UNSET')).resolves.toBeUndefined();
  });
});
