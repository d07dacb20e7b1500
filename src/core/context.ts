/**
 * Core Context - Wires the AAA Components Together
 *
 * Builds every component in dependency order (leaves first) and returns them
 * as one CoreContext. The HTTP layer and embedding services receive the
 * context; nothing in the core reaches for globals.
 *
 * Architectural Rule: this file takes a plain CoreConfig, not the zod-parsed
 * file config, so the core never imports from src/config/.
 */

import { AuditLedger, type AuditLedgerConfig } from './audit-ledger.js';
import { AuthenticationService } from './authentication-service.js';
import { InMemoryCredentialStore, type CredentialStore, type CredentialStoreConfig } from './credential-store.js';
import { PermissionResolver, type RolePermissionMap } from './permission-resolver.js';
import {
  InMemoryConsumptionRegistry,
  InMemoryRevocationRegistry,
} from './revocation-registry.js';
import { InMemoryTokenFamilyStore } from './token-family-store.js';
import { TokenService, type TokenServiceConfig } from './token-service.js';
import type { AuditRecord } from './types.js';
import { systemClock, type Clock } from '../utils/expiring-map.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface CoreConfig {
  tokens: TokenServiceConfig;
  credentials?: Omit<CredentialStoreConfig, 'clock'>;
  permissions?: RolePermissionMap;
  revocation?: {
    sweepIntervalMs?: number;
  };
  audit?: Pick<AuditLedgerConfig, 'maxRecords' | 'retentionPolicy'> & {
    logAuthorizationSuccess?: boolean;
  };
}

export interface CoreContextOptions {
  /** Millisecond clock shared by every component (default: Date.now) */
  clock?: Clock;

  /** Receives records evicted by audit rotation */
  onAuditRotate?: (records: AuditRecord[]) => void;

  /** Replace the in-memory credential store */
  credentialStore?: CredentialStore;
}

/**
 * Every component, plus the facade that composes them
 */
export interface CoreContext {
  auth: AuthenticationService;
  credentials: CredentialStore;
  tokens: TokenService;
  permissions: PermissionResolver;
  auditLedger: AuditLedger;
  revocations: InMemoryRevocationRegistry;
  consumptions: InMemoryConsumptionRegistry;
  families: InMemoryTokenFamilyStore;
  clock: Clock;
}

// ============================================================================
// Factory
// ============================================================================

/**
 * @throws SecurityError CONFIGURATION_ERROR for an invalid permission map,
 *   a short signing secret or an invalid audit capacity
 */
export function createCoreContext(config: CoreConfig, options: CoreContextOptions = {}): CoreContext {
  const clock = options.clock ?? systemClock;

  const auditLedger = new AuditLedger({
    maxRecords: config.audit?.maxRecords,
    retentionPolicy: config.audit?.retentionPolicy,
    onRotate: options.onAuditRotate,
    clock,
  });

  const permissions = new PermissionResolver(config.permissions, {
    auditLedger,
    logAuthorizationSuccess: config.audit?.logAuthorizationSuccess,
  });

  const credentials =
    options.credentialStore ?? new InMemoryCredentialStore({ ...config.credentials, clock });

  const registryOptions = { sweepIntervalMs: config.revocation?.sweepIntervalMs, clock };
  const revocations = new InMemoryRevocationRegistry(registryOptions);
  const consumptions = new InMemoryConsumptionRegistry(registryOptions);
  const families = new InMemoryTokenFamilyStore(registryOptions);

  const tokens = new TokenService(config.tokens, {
    auditLedger,
    revocations,
    consumptions,
    families,
    clock,
  });

  const auth = new AuthenticationService({
    credentials,
    tokens,
    permissions,
    auditLedger,
    disposables: [revocations, consumptions, families],
  });

  console.log('[CoreContext] AAA core initialized:', {
    retentionPolicy: auditLedger.getRetentionPolicy(),
    ...tokens.getLifetimes(),
  });

  return {
    auth,
    credentials,
    tokens,
    permissions,
    auditLedger,
    revocations,
    consumptions,
    families,
    clock,
  } satisfies CoreContext;
}
