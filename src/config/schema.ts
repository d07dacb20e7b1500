import { z } from 'zod';
import { ROLES } from '../core/types.js';
import { DEFAULT_ROLE_PERMISSIONS, PermissionResolver } from '../core/permission-resolver.js';
import { MIN_SECRET_LENGTH } from '../core/token-service.js';
import { isSecurityError } from '../utils/errors.js';

// Zod schemas for configuration validation

export const TokensConfigSchema = z
  .object({
    issuer: z.string().min(1).default('edu-aaa'),
    audience: z.string().min(1).default('edu-platform'),
    signingSecret: z
      .string()
      .min(MIN_SECRET_LENGTH, `signingSecret must be at least ${MIN_SECRET_LENGTH} characters`),
    algorithm: z.enum(['HS256', 'HS384', 'HS512']).default('HS256'),
    accessTtlSeconds: z.number().int().positive().default(900),
    refreshTtlSeconds: z.number().int().positive().default(604800),
    clockToleranceSeconds: z.number().int().min(0).max(300).default(0), // Max 5 minutes tolerance
  })
  .refine((tokens) => tokens.refreshTtlSeconds >= tokens.accessTtlSeconds, {
    message: 'refreshTtlSeconds must not be shorter than accessTtlSeconds',
    path: ['refreshTtlSeconds'],
  });

export const CredentialsConfigSchema = z
  .object({
    bcryptRounds: z.number().int().min(4).max(15).default(12),
    minPasswordLength: z.number().int().min(6).max(128).default(8),
    defaultRole: z.enum(ROLES).default('student'),
  })
  .default({});

export const PermissionsConfigSchema = z
  .record(z.string(), z.array(z.string()))
  .default(() =>
    Object.fromEntries(
      Object.entries(DEFAULT_ROLE_PERMISSIONS).map(([role, granted]) => [role, [...granted]])
    )
  )
  .superRefine((map, ctx) => {
    try {
      PermissionResolver.buildPermissionMap(map);
    } catch (error) {
      if (!isSecurityError(error, 'CONFIGURATION_ERROR')) {
        throw error;
      }
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.message });
    }
  });

export const RevocationConfigSchema = z
  .object({
    sweepIntervalMs: z.number().int().min(0).default(60000), // 0 disables the sweep
  })
  .default({});

export const AuditConfigSchema = z
  .object({
    maxRecords: z.number().int().positive().default(10000),
    retentionPolicy: z.enum(['rotate', 'reject']).default('rotate'),
    logAuthorizationSuccess: z.boolean().default(false),
  })
  .default({});

export const ServerConfigSchema = z
  .object({
    port: z.number().int().min(1).max(65535).default(8001),
    host: z.string().min(1).default('0.0.0.0'),
    corsOrigin: z.string().min(1).default('*'),
  })
  .default({});

export const AAAConfigSchema = z.object({
  tokens: TokensConfigSchema,
  credentials: CredentialsConfigSchema,
  permissions: PermissionsConfigSchema,
  revocation: RevocationConfigSchema,
  audit: AuditConfigSchema,
  server: ServerConfigSchema,
});

// Environment variables read at startup
export const EnvironmentSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  CONFIG_PATH: z.string().optional(),
  SECRETS_DIR: z.string().default('/run/secrets'),
});

export type TokensConfig = z.infer<typeof TokensConfigSchema>;
export type CredentialsConfig = z.infer<typeof CredentialsConfigSchema>;
export type RevocationConfig = z.infer<typeof RevocationConfigSchema>;
export type AuditConfig = z.infer<typeof AuditConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type AAAConfig = z.infer<typeof AAAConfigSchema>;
export type Environment = z.infer<typeof EnvironmentSchema>;
