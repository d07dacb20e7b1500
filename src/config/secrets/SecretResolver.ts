/**
 * Secret Resolver
 *
 * Orchestrates the loading and resolution of configuration secrets via a provider chain.
 *
 * Features:
 * - Provider chain with priority ordering
 * - Recursive config walking to find {"$secret": "NAME"} descriptors
 * - Fail-fast behavior (startup aborts if a secret cannot be resolved)
 * - Every resolution attempt becomes a secret_resolve audit event
 *
 * Usage:
 * ```typescript
 * const resolver = new SecretResolver();
 * resolver.addProvider(new FileSecretProvider('/run/secrets'));
 * resolver.addProvider(new EnvProvider());
 *
 * const config = JSON.parse(await fs.readFile('config.json', 'utf-8'));
 * await resolver.resolveSecrets(config);
 * // Config now has secrets resolved in-place
 * ```
 */

import { type ISecretProvider, isSecretProvider } from './ISecretProvider.js';
import type { AuditLedger } from '../../core/audit-ledger.js';
import { AUDIT_ACTIONS, type AuditEvent } from '../../core/types.js';
import { SecurityErrors } from '../../utils/errors.js';

export interface SecretResolverConfig {
  /**
   * Ledger for resolution events. Configuration is usually loaded before the
   * ledger exists; without one, events are kept until drainEvents().
   */
  auditLedger?: AuditLedger;

  /** Whether to fail fast if secrets cannot be resolved (default: true) */
  failFast?: boolean;
}

interface SecretDescriptor {
  $secret: string;
}

export class SecretResolver {
  private providers: ISecretProvider[] = [];
  private auditLedger?: AuditLedger;
  private failFast: boolean;
  private pendingEvents: AuditEvent[] = [];

  constructor(config?: SecretResolverConfig) {
    this.auditLedger = config?.auditLedger;
    this.failFast = config?.failFast ?? true;
  }

  /**
   * Providers are tried in the order they are added. The first provider that
   * returns a value wins.
   *
   * @throws Error if provider doesn't implement ISecretProvider
   */
  public addProvider(provider: ISecretProvider): void {
    if (!isSecretProvider(provider)) {
      throw new Error('Provider must implement ISecretProvider interface');
    }
    this.providers.push(provider);
  }

  /**
   * Attach the ledger and flush any events recorded before it existed
   */
  public attachAuditLedger(auditLedger: AuditLedger): void {
    this.auditLedger = auditLedger;
    for (const event of this.drainEvents()) {
      auditLedger.record(event);
    }
  }

  /**
   * Events held back because no ledger was attached
   */
  public drainEvents(): AuditEvent[] {
    const events = this.pendingEvents;
    this.pendingEvents = [];
    return events;
  }

  /**
   * Replace every {"$secret": "NAME"} descriptor in `config`, in place
   *
   * @throws SecurityError CONFIGURATION_ERROR if failFast is set and a secret cannot be resolved
   */
  public async resolveSecrets(config: unknown): Promise<void> {
    await this.resolveNode(config, 'config');
  }

  private async resolveNode(node: unknown, path: string): Promise<void> {
    if (Array.isArray(node)) {
      for (let i = 0; i < node.length; i++) {
        const replaced = await this.resolveChild(node[i], `${path}[${i}]`);
        if (replaced !== undefined) {
          node[i] = replaced;
        }
      }
      return;
    }

    if (!isRecord(node)) {
      return;
    }

    for (const key of Object.keys(node)) {
      const replaced = await this.resolveChild(node[key], `${path}.${key}`);
      if (replaced !== undefined) {
        node[key] = replaced;
      }
    }
  }

  /**
   * @returns the replacement value for a descriptor, undefined otherwise
   */
  private async resolveChild(child: unknown, childPath: string): Promise<string | undefined> {
    if (!isSecretDescriptor(child)) {
      await this.resolveNode(child, childPath);
      return undefined;
    }

    const logicalName = child.$secret;
    const resolvedValue = await this.resolveSecret(logicalName, childPath);

    if (resolvedValue === undefined) {
      const errorMessage = `Secret "${logicalName}" at path "${childPath}" could not be resolved by any provider`;
      if (this.failFast) {
        throw SecurityErrors.CONFIGURATION_ERROR(errorMessage);
      }
      console.warn(`[SecretResolver] ${errorMessage}`);
    }
    return resolvedValue;
  }

  private async resolveSecret(logicalName: string, path: string): Promise<string | undefined> {
    for (const provider of this.providers) {
      try {
        const value = await provider.resolve(logicalName);

        if (value !== undefined) {
          this.emit({
            actor: null,
            action: AUDIT_ACTIONS.SECRET_RESOLVE,
            resource: `secret:${logicalName}`,
            outcome: 'success',
            detail: { provider: provider.constructor.name, configPath: path },
          });
          return value;
        }
      } catch (error) {
        console.warn(
          `[SecretResolver] Provider ${provider.constructor.name} failed to resolve "${logicalName}": ${error instanceof Error ? error.message : 'Unknown error'}`
        );
      }
    }

    this.emit({
      actor: null,
      action: AUDIT_ACTIONS.SECRET_RESOLVE,
      resource: `secret:${logicalName}`,
      outcome: 'failure',
      severity: 'warning',
      detail: { provider: 'none', configPath: path },
    });
    return undefined;
  }

  private emit(event: AuditEvent): void {
    if (this.auditLedger) {
      this.auditLedger.record(event);
    } else {
      this.pendingEvents.push(event);
    }
  }

  public getProviders(): ISecretProvider[] {
    return [...this.providers];
  }

  /**
   * Clear all registered providers (useful for testing)
   */
  public clearProviders(): void {
    this.providers = [];
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * A secret descriptor is an object with a single string "$secret" property
 */
function isSecretDescriptor(value: unknown): value is SecretDescriptor {
  return (
    isRecord(value) &&
    Object.keys(value).length === 1 &&
    typeof value.$secret === 'string' &&
    value.$secret.length > 0
  );
}
