/**
 * Environment Variable Secret Provider
 *
 * Resolves secrets from environment variables. Use as the FALLBACK after
 * FileSecretProvider: environment variables are visible to child processes
 * and end up in crash dumps.
 */

import type { ISecretProvider } from '../ISecretProvider.js';

export class EnvProvider implements ISecretProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * Reads env[logicalName], trimmed. Unset and empty variables resolve to undefined.
   */
  public async resolve(logicalName: string): Promise<string | undefined> {
    const value = this.env[logicalName];

    if (value === undefined || value === '') {
      return undefined;
    }

    return value.trim();
  }
}
