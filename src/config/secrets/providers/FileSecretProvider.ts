/**
 * File-Based Secret Provider
 *
 * Resolves secrets from files on the filesystem. This is the RECOMMENDED provider for production
 * environments (Kubernetes secret mounts, Docker secrets).
 *
 * Usage:
 * ```typescript
 * const provider = new FileSecretProvider('/run/secrets');
 * const secret = await provider.resolve('AAA_SIGNING_SECRET');
 * // Reads from /run/secrets/AAA_SIGNING_SECRET
 * ```
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { ISecretProvider } from '../ISecretProvider.js';

export class FileSecretProvider implements ISecretProvider {
  private readonly secretDir: string;

  /**
   * @param secretDir - Directory holding one file per secret (default: "/run/secrets")
   */
  constructor(secretDir: string = '/run/secrets') {
    this.secretDir = secretDir;
  }

  /**
   * Reads `{secretDir}/{logicalName}`, trimmed
   *
   * Names that would resolve outside secretDir are refused.
   */
  public async resolve(logicalName: string): Promise<string | undefined> {
    // Security: Prevent path traversal attacks
    if (logicalName.includes('..') || logicalName.startsWith('/')) {
      return undefined;
    }

    const filePath = path.join(this.secretDir, logicalName);

    const normalizedSecretDir = path.resolve(this.secretDir);
    const normalizedFilePath = path.resolve(filePath);
    if (!normalizedFilePath.startsWith(normalizedSecretDir + path.sep)) {
      return undefined;
    }

    try {
      const secretValue = await fs.readFile(filePath, 'utf-8');

      // Files often have trailing newlines from echo/heredoc
      return secretValue.trim();
    } catch (error) {
      const code = errorCode(error);
      if (code === 'ENOENT' || code === 'EACCES' || code === 'EISDIR') {
        // Try next provider
        return undefined;
      }

      console.warn(
        `[FileSecretProvider] Unexpected error reading ${filePath}: ${error instanceof Error ? error.message : String(error)}`
      );
      return undefined;
    }
  }

  public getSecretDir(): string {
    return this.secretDir;
  }
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
