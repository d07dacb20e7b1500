/**
 * Token Service - Issue, Validate, Rotate and Revoke Token Pairs
 *
 * Tokens are HMAC-signed JWTs (jose). Integrity comes from the signature;
 * liveness comes from the registries:
 * - RevocationRegistry: revoked jtis and revoked families
 * - ConsumptionRegistry: refresh tokens already exchanged
 * - TokenFamilyStore: which jtis belong to which login
 *
 * Token lifecycle: Issued → Active → {Expired | Revoked | Consumed}
 * Consumed refresh tokens no longer validate; presenting one to refresh()
 * is reuse.
 *
 * Refresh rotation:
 * 1. Validate the presented refresh token
 * 2. Mint the successor pair under the same family
 * 3. Atomically consume the presented jti
 * 4. Second consumer → reuse detected → whole family revoked
 */

import { randomUUID } from 'node:crypto';
import { SignJWT, jwtVerify, errors as joseErrors, type JWTPayload } from 'jose';
import { z } from 'zod';
import {
  AUDIT_ACTIONS,
  ROLES,
  type RequestContext,
  type RevocationScope,
  type Role,
  type TokenClaims,
  type TokenPair,
  type TokenType,
  type User,
} from './types.js';
import type { AuditLedger } from './audit-ledger.js';
import {
  InMemoryConsumptionRegistry,
  InMemoryRevocationRegistry,
  type ConsumptionRegistry,
  type RevocationRegistry,
} from './revocation-registry.js';
import { InMemoryTokenFamilyStore, type TokenFamilyStore } from './token-family-store.js';
import { SecurityErrors, isSecurityError } from '../utils/errors.js';
import { systemClock, type Clock } from '../utils/expiring-map.js';

// ============================================================================
// Configuration Types
// ============================================================================

export type SigningAlgorithm = 'HS256' | 'HS384' | 'HS512';

export const MIN_SECRET_LENGTH = 32;

export interface TokenServiceConfig {
  issuer: string;
  audience: string;

  /** HMAC secret, at least 32 characters */
  signingSecret: string;

  /** Default: HS256 */
  algorithm?: SigningAlgorithm;

  /** Default: 900 (15 minutes) */
  accessTtlSeconds?: number;

  /** Default: 604800 (7 days) */
  refreshTtlSeconds?: number;

  /** Default: 0 */
  clockToleranceSeconds?: number;
}

export interface TokenServiceDependencies {
  auditLedger: AuditLedger;
  revocations?: RevocationRegistry;
  consumptions?: ConsumptionRegistry;
  families?: TokenFamilyStore;
  clock?: Clock;
}

export interface RevokeOptions extends RequestContext {
  /** Default: 'token' */
  scope?: RevocationScope;
  reason?: string;
}

/**
 * JWT claims as signed. Custom claims: role, fid (family), token_use.
 */
const SignedClaimsSchema = z.object({
  sub: z.string().min(1),
  jti: z.string().min(1),
  fid: z.string().min(1),
  role: z.enum(ROLES),
  token_use: z.enum(['access', 'refresh']),
  iat: z.number().int(),
  exp: z.number().int(),
});

const FAMILY_KEY_PREFIX = 'family:';

function familyKey(familyId: string): string {
  return `${FAMILY_KEY_PREFIX}${familyId}`;
}

// ============================================================================
// Token Service Class
// ============================================================================

/**
 * Usage:
 * ```typescript
 * const tokens = new TokenService(
 *   { issuer: 'edu-aaa', audience: 'edu-platform', signingSecret },
 *   { auditLedger }
 * );
 *
 * const pair = await tokens.issue(user);
 * const claims = await tokens.validate(pair.accessToken, 'access');
 * const rotated = await tokens.refresh(pair.refreshToken);
 * ```
 */
export class TokenService {
  private readonly key: Uint8Array;
  private readonly issuer: string;
  private readonly audience: string;
  private readonly algorithm: SigningAlgorithm;
  private readonly accessTtlSeconds: number;
  private readonly refreshTtlSeconds: number;
  private readonly clockToleranceSeconds: number;

  private readonly auditLedger: AuditLedger;
  private readonly revocations: RevocationRegistry;
  private readonly consumptions: ConsumptionRegistry;
  private readonly families: TokenFamilyStore;
  private readonly clock: Clock;

  constructor(config: TokenServiceConfig, deps: TokenServiceDependencies) {
    if (config.signingSecret.length < MIN_SECRET_LENGTH) {
      throw SecurityErrors.CONFIGURATION_ERROR(
        `signing secret must be at least ${MIN_SECRET_LENGTH} characters`
      );
    }

    this.key = new TextEncoder().encode(config.signingSecret);
    this.issuer = config.issuer;
    this.audience = config.audience;
    this.algorithm = config.algorithm ?? 'HS256';
    this.accessTtlSeconds = config.accessTtlSeconds ?? 900;
    this.refreshTtlSeconds = config.refreshTtlSeconds ?? 604800;
    this.clockToleranceSeconds = config.clockToleranceSeconds ?? 0;

    if (this.accessTtlSeconds <= 0 || this.refreshTtlSeconds < this.accessTtlSeconds) {
      throw SecurityErrors.CONFIGURATION_ERROR(
        'token TTLs must be positive and refresh TTL must not be shorter than access TTL'
      );
    }

    this.clock = deps.clock ?? systemClock;
    this.auditLedger = deps.auditLedger;
    this.revocations =
      deps.revocations ?? new InMemoryRevocationRegistry({ clock: this.clock, sweepIntervalMs: 0 });
    this.consumptions =
      deps.consumptions ?? new InMemoryConsumptionRegistry({ clock: this.clock, sweepIntervalMs: 0 });
    this.families = deps.families ?? new InMemoryTokenFamilyStore({ clock: this.clock, sweepIntervalMs: 0 });
  }

  // ==========================================================================
  // Issue
  // ==========================================================================

  /**
   * Issue a fresh access/refresh pair under a new family
   */
  async issue(user: Pick<User, 'id' | 'role'>): Promise<TokenPair> {
    const familyId = randomUUID();
    const { pair, access, refresh } = await this.mintPair(user.id, user.role, familyId);

    await this.families.track(user.id, familyId, access);
    await this.families.track(user.id, familyId, refresh);

    console.log('[TokenService] Token pair issued:', { subject: user.id, familyId });
    return pair;
  }

  // ==========================================================================
  // Validate
  // ==========================================================================

  /**
   * Validate a token and return its claims
   *
   * Read-only: consults the revocation and consumption registries, writes
   * nothing. An exchanged refresh token is rejected as revoked.
   *
   * @param expectedType - reject tokens of the other type as malformed
   * @throws SecurityError TOKEN_MALFORMED, TOKEN_EXPIRED, TOKEN_REVOKED
   */
  async validate(token: unknown, expectedType?: TokenType): Promise<TokenClaims> {
    const claims = await this.verifyLive(token, expectedType);

    if (claims.type === 'refresh' && (await this.consumptions.isConsumed(claims.jti))) {
      throw SecurityErrors.TOKEN_REVOKED(claims.jti);
    }

    return claims;
  }

  // ==========================================================================
  // Refresh
  // ==========================================================================

  /**
   * Exchange a refresh token for a new pair in the same family
   *
   * Exactly one audit record per call: token_refresh (success or failure) or
   * token_reuse_detected (critical).
   *
   * @throws SecurityError TOKEN_REUSE_DETECTED when the token was already exchanged
   */
  async refresh(refreshToken: unknown, context: RequestContext = {}): Promise<TokenPair> {
    let claims: TokenClaims;
    try {
      // Consumed tokens pass here: the consume below detects reuse
      claims = await this.verifyLive(refreshToken, 'refresh');
    } catch (error) {
      this.recordRefreshFailure(null, error, context);
      throw error;
    }

    const { pair, access, refresh } = await this.mintPair(
      claims.subject,
      claims.role,
      claims.familyId
    );

    // Revoked while we were minting
    if (await this.revocations.contains(familyKey(claims.familyId))) {
      const error = SecurityErrors.TOKEN_REVOKED(claims.jti);
      this.recordRefreshFailure(claims, error, context);
      throw error;
    }

    const first = await this.consumptions.consume(claims.jti, claims.expiresAt);

    if (!first) {
      this.auditLedger.record({
        actor: claims.subject,
        action: AUDIT_ACTIONS.TOKEN_REUSE_DETECTED,
        resource: 'token_family',
        outcome: 'failure',
        severity: 'critical',
        detail: { familyId: claims.familyId, jti: claims.jti },
        ipAddress: context.ipAddress,
      });
      const revoked = await this.revokeFamilyEntries(claims.familyId, 'refresh_token_reuse');
      console.warn('[TokenService] Refresh token reuse detected, family revoked:', {
        subject: claims.subject,
        familyId: claims.familyId,
        revoked,
      });
      throw SecurityErrors.TOKEN_REUSE_DETECTED(claims.familyId);
    }

    // Same continuation as the winning consume: precedes any reuse record
    this.auditLedger.record({
      actor: claims.subject,
      action: AUDIT_ACTIONS.TOKEN_REFRESH,
      resource: 'token',
      outcome: 'success',
      detail: { familyId: claims.familyId, consumedJti: claims.jti },
      ipAddress: context.ipAddress,
    });

    await this.families.track(claims.subject, claims.familyId, access);
    await this.families.track(claims.subject, claims.familyId, refresh);

    return pair;
  }

  // ==========================================================================
  // Revoke
  // ==========================================================================

  /**
   * Revoke a single token, or the whole family it belongs to
   *
   * An expired token is already dead: the call is recorded and succeeds.
   *
   * @returns number of registry entries written
   */
  async revoke(token: unknown, options: RevokeOptions = {}): Promise<number> {
    const scope = options.scope ?? 'token';
    const reason = options.reason ?? 'revoked';

    let claims: TokenClaims;
    try {
      claims = await this.inspect(token);
    } catch (error) {
      if (isSecurityError(error, 'TOKEN_EXPIRED')) {
        this.recordRevocation(options, 'token', 'success', { scope, reason, note: 'already_expired' });
        return 0;
      }
      this.recordRevocation(options, 'token', 'failure', {
        scope,
        reason,
        error: isSecurityError(error) ? error.code : 'unknown',
      });
      throw error;
    }

    let written: number;
    if (scope === 'family') {
      written = await this.revokeFamilyEntries(claims.familyId, reason);
    } else {
      await this.revocations.add(claims.jti, reason, this.remainingSeconds(claims.expiresAt));
      written = 1;
    }

    this.recordRevocation(options, scope === 'family' ? 'token_family' : 'token', 'success', {
      scope,
      reason,
      subject: claims.subject,
      familyId: claims.familyId,
      jti: claims.jti,
      written,
    });
    return written;
  }

  /**
   * Revoke every token of a family by id
   */
  async revokeFamily(familyId: string, reason: string, context: RequestContext = {}): Promise<number> {
    const written = await this.revokeFamilyEntries(familyId, reason);
    this.recordRevocation(context, 'token_family', 'success', {
      scope: 'family',
      reason,
      familyId,
      written,
    });
    return written;
  }

  /**
   * Revoke every live family of a subject (logout everywhere, role change, disable)
   */
  async revokeSubject(subject: string, reason: string, context: RequestContext = {}): Promise<number> {
    const familyIds = await this.families.familiesOf(subject);
    let written = 0;
    for (const familyId of familyIds) {
      written += await this.revokeFamilyEntries(familyId, reason);
    }
    this.recordRevocation(context, 'user_tokens', 'success', {
      scope: 'subject',
      reason,
      subject,
      families: familyIds.length,
      written,
    });
    return written;
  }

  /**
   * Lifetimes in seconds, as configured
   */
  getLifetimes(): { accessTtlSeconds: number; refreshTtlSeconds: number } {
    return {
      accessTtlSeconds: this.accessTtlSeconds,
      refreshTtlSeconds: this.refreshTtlSeconds,
    };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /**
   * Verify signature, issuer, audience and expiry, and parse claims,
   * without consulting the registries
   *
   * @throws SecurityError TOKEN_MALFORMED, TOKEN_EXPIRED
   */
  async inspect(token: unknown): Promise<TokenClaims> {
    if (typeof token !== 'string' || token.length === 0) {
      throw SecurityErrors.TOKEN_MALFORMED('token must be a non-empty string');
    }

    let payload: JWTPayload;
    try {
      const verified = await jwtVerify(token, this.key, {
        issuer: this.issuer,
        audience: this.audience,
        algorithms: [this.algorithm],
        clockTolerance: this.clockToleranceSeconds,
        currentDate: new Date(this.clock()),
      });
      payload = verified.payload;
    } catch (error) {
      // JWTExpired is a JWTClaimValidationFailed: test it first
      if (error instanceof joseErrors.JWTExpired) {
        throw SecurityErrors.TOKEN_EXPIRED({ originalError: error.message });
      }
      if (error instanceof joseErrors.JOSEError) {
        throw SecurityErrors.TOKEN_MALFORMED(error.code);
      }
      throw SecurityErrors.TOKEN_MALFORMED('unverifiable token');
    }

    const parsed = SignedClaimsSchema.safeParse(payload);
    if (!parsed.success) {
      throw SecurityErrors.TOKEN_MALFORMED('claims failed schema validation');
    }

    return {
      subject: parsed.data.sub,
      role: parsed.data.role,
      jti: parsed.data.jti,
      familyId: parsed.data.fid,
      type: parsed.data.token_use,
      issuedAt: parsed.data.iat,
      expiresAt: parsed.data.exp,
    };
  }

  /**
   * inspect() plus the type check and the revocation registry
   */
  private async verifyLive(token: unknown, expectedType?: TokenType): Promise<TokenClaims> {
    const claims = await this.inspect(token);

    if (expectedType !== undefined && claims.type !== expectedType) {
      throw SecurityErrors.TOKEN_MALFORMED(`expected ${expectedType} token, got ${claims.type}`);
    }

    if (
      (await this.revocations.contains(claims.jti)) ||
      (await this.revocations.contains(familyKey(claims.familyId)))
    ) {
      throw SecurityErrors.TOKEN_REVOKED(claims.jti);
    }

    return claims;
  }

  private async mintPair(subject: string, role: Role, familyId: string) {
    const issuedAt = this.nowSeconds();
    const access = await this.mint(subject, role, familyId, 'access', issuedAt);
    const refresh = await this.mint(subject, role, familyId, 'refresh', issuedAt);

    const pair: TokenPair = {
      accessToken: access.token,
      refreshToken: refresh.token,
      tokenType: 'bearer',
      familyId,
      expiresIn: this.accessTtlSeconds,
      accessExpiresAt: access.member.expiresAt,
      refreshExpiresAt: refresh.member.expiresAt,
    };
    return { pair, access: access.member, refresh: refresh.member };
  }

  private async mint(
    subject: string,
    role: Role,
    familyId: string,
    type: TokenType,
    issuedAt: number
  ) {
    const jti = randomUUID();
    const expiresAt =
      issuedAt + (type === 'access' ? this.accessTtlSeconds : this.refreshTtlSeconds);

    const token = await new SignJWT({ role, fid: familyId, token_use: type })
      .setProtectedHeader({ alg: this.algorithm, typ: 'JWT' })
      .setSubject(subject)
      .setJti(jti)
      .setIssuer(this.issuer)
      .setAudience(this.audience)
      .setIssuedAt(issuedAt)
      .setExpirationTime(expiresAt)
      .sign(this.key);

    return { token, member: { jti, type, expiresAt } };
  }

  /**
   * Write the family key and every tracked member into the revocation registry
   *
   * The family key outlives any member: members were minted no later than
   * now and live at most refreshTtlSeconds.
   */
  private async revokeFamilyEntries(familyId: string, reason: string): Promise<number> {
    await this.revocations.add(familyKey(familyId), reason, this.refreshTtlSeconds);

    const members = await this.families.members(familyId);
    for (const member of members) {
      await this.revocations.add(member.jti, reason, this.remainingSeconds(member.expiresAt));
    }
    await this.families.forget(familyId);

    return members.length + 1;
  }

  private recordRefreshFailure(
    claims: TokenClaims | null,
    error: unknown,
    context: RequestContext
  ): void {
    this.auditLedger.record({
      actor: claims?.subject ?? null,
      action: AUDIT_ACTIONS.TOKEN_REFRESH,
      resource: 'token',
      outcome: 'failure',
      severity: 'warning',
      detail: {
        error: isSecurityError(error) ? error.code : 'unknown',
        ...(claims && { familyId: claims.familyId }),
      },
      ipAddress: context.ipAddress,
    });
  }

  private recordRevocation(
    context: RequestContext,
    resource: string,
    outcome: 'success' | 'failure',
    detail: Record<string, unknown>
  ): void {
    this.auditLedger.record({
      actor: context.actor ?? null,
      action: AUDIT_ACTIONS.TOKEN_REVOKE,
      resource,
      outcome,
      severity: outcome === 'success' ? 'info' : 'warning',
      detail,
      ipAddress: context.ipAddress,
    });
  }

  private remainingSeconds(expiresAt: number): number {
    return Math.max(1, expiresAt - this.nowSeconds());
  }

  private nowSeconds(): number {
    return Math.floor(this.clock() / 1000);
  }
}
