/**
 * Request body schemas for the /api/auth routes
 */

import { z } from 'zod';
import { ROLES } from '../core/types.js';

export const RegisterBodySchema = z.object({
  email: z.string().email(),
  password: z.string().min(1),
  fullName: z.string().min(1).max(200).optional(),
  role: z.enum(ROLES).optional(),
});

export const LoginBodySchema = z.object({
  email: z.string().min(1),
  password: z.string().min(1),
});

export const RefreshBodySchema = z.object({
  refreshToken: z.string().min(1),
});

export const RevokeBodySchema = z.object({
  token: z.string().min(1),
  scope: z.enum(['token', 'family']).default('token'),
  reason: z.string().min(1).max(200).optional(),
});

export const LogoutBodySchema = z
  .object({
    all: z.boolean().default(false),
  })
  .default({});

export const ValidateBodySchema = z.object({
  token: z.string().min(1),
});

export const AuthorizeBodySchema = z.object({
  token: z.string().min(1),
  permission: z.string().min(1),
});

export const UpdateUserBodySchema = z
  .object({
    email: z.string().email().optional(),
    fullName: z.string().min(1).max(200).optional(),
  })
  .refine((body) => body.email !== undefined || body.fullName !== undefined, {
    message: 'nothing to update',
  });

export const ChangeRoleBodySchema = z.object({
  role: z.enum(ROLES),
});

const isoDate = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

export const AuditQuerySchema = z.object({
  actor: z.string().min(1).optional(),
  action: z.string().min(1).optional(),
  outcome: z.enum(['success', 'failure']).optional(),
  severity: z.enum(['info', 'warning', 'critical']).optional(),
  resource: z.string().min(1).optional(),
  from: isoDate.optional(),
  to: isoDate.optional(),
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export const AuditEventBodySchema = z.object({
  action: z.string().min(1).max(100),
  resource: z.string().min(1).max(200),
  outcome: z.enum(['success', 'failure']),
  severity: z.enum(['info', 'warning', 'critical']).optional(),
  detail: z.record(z.string(), z.unknown()).optional(),
});
