/**
 * Unit Tests for FileSecretProvider
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FileSecretProvider } from '../../../../src/config/secrets/providers/FileSecretProvider.js';
import { promises as fs } from 'fs';
import * as path from 'path';
import * as os from 'os';

describe('FileSecretProvider', () => {
  let tempDir: string;
  let provider: FileSecretProvider;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'aaa-secrets-test-'));
    provider = new FileSecretProvider(tempDir);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('constructor', () => {
    it('should use default secrets directory if not provided', () => {
      expect(new FileSecretProvider().getSecretDir()).toBe('/run/secrets');
    });
  });

  describe('resolve', () => {
    it('should resolve secret from file, trimmed', async () => {
      await fs.writeFile(path.join(tempDir, 'AAA_SIGNING_SECRET'), 'test-secret\n\n');

      await expect(provider.resolve('AAA_SIGNING_SECRET')).resolves.toBe('test-secret');
    });

    it('should return undefined for non-existent file', async () => {
      await expect(provider.resolve('NONEXISTENT_SECRET')).resolves.toBeUndefined();
    });

    it('should return undefined for a directory', async () => {
      await fs.mkdir(path.join(tempDir, 'NESTED'));

      await expect(provider.resolve('NESTED')).resolves.toBeUndefined();
    });

    it.each(['../etc/passwd', '/etc/passwd', 'a/../../outside'])(
      'should refuse path traversal: %s',
      async (name) => {
        await expect(provider.resolve(name)).resolves.toBeUndefined();
      }
    );
  });
});
