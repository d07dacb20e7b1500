/**
 * HTTP Server for the AAA Core
 *
 * Express application exposing the core under /api/auth:
 * - credential flows (register, login, refresh, logout, revoke)
 * - introspection for other services (validate, authorize)
 * - user administration and audit log access, guarded by permissions
 * - GET /health
 */

import express, { type Request, type Response } from 'express';
import { createServer, type Server } from 'http';
import type { CoreContext } from '../core/context.js';
import { ROLE_STUDENT, type AuditFilters, type Role } from '../core/types.js';
import {
  asyncHandler,
  authenticate,
  errorHandler,
  parseBody,
  requestContext,
  requireClaims,
  requirePermission,
} from './middleware.js';
import {
  AuditEventBodySchema,
  AuditQuerySchema,
  AuthorizeBodySchema,
  ChangeRoleBodySchema,
  LoginBodySchema,
  LogoutBodySchema,
  RefreshBodySchema,
  RegisterBodySchema,
  RevokeBodySchema,
  UpdateUserBodySchema,
  ValidateBodySchema,
} from './schemas.js';

export const API_BASE_PATH = '/api/auth';

export interface AuthServerOptions {
  /** Access-Control-Allow-Origin (default: '*') */
  corsOrigin?: string;

  /** Role that self-registration may request without write:users (default: student) */
  defaultRole?: Role;
}

/**
 * Create the Express application
 *
 * @param context - Core context from createCoreContext()
 */
export function createAuthServer(
  context: CoreContext,
  options: AuthServerOptions = {}
): express.Application {
  const { auth } = context;
  const defaultRole = options.defaultRole ?? ROLE_STUDENT;
  const corsOrigin = options.corsOrigin ?? '*';

  const app = express();
  app.use(express.json({ limit: '100kb' }));

  // CORS headers
  app.use((req, res, next) => {
    res.header('Access-Control-Allow-Origin', corsOrigin);
    res.header('Access-Control-Allow-Methods', 'GET, POST, PUT, DELETE, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    res.header('Access-Control-Expose-Headers', 'WWW-Authenticate');

    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }
    next();
  });

  const health = (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: 'edu-aaa',
      timestamp: new Date(context.clock()).toISOString(),
    });
  };
  app.get('/health', health);

  const router = express.Router();
  router.get('/health', health);

  // ==========================================================================
  // Credential flows
  // ==========================================================================

  router.post(
    '/register',
    authenticate(auth, { optional: true }),
    asyncHandler(async (req, res) => {
      const body = parseBody(RegisterBodySchema, req.body);
      if (body.role !== undefined && body.role !== defaultRole) {
        auth.enforce(requireClaims(res), 'write:users', {
          ...requestContext(req, res),
          resource: 'user',
        });
      }
      const user = await auth.register(body, requestContext(req, res));
      res.status(201).json(user);
    })
  );

  router.post(
    '/login',
    asyncHandler(async (req, res) => {
      const body = parseBody(LoginBodySchema, req.body);
      const result = await auth.login(body.email, body.password, requestContext(req, res));
      res.json(result);
    })
  );

  router.post(
    '/refresh',
    asyncHandler(async (req, res) => {
      const body = parseBody(RefreshBodySchema, req.body);
      res.json(await auth.refresh(body.refreshToken, requestContext(req, res)));
    })
  );

  router.post(
    '/logout',
    authenticate(auth),
    asyncHandler(async (req, res) => {
      const body = parseBody(LogoutBodySchema, req.body);
      const claims = requireClaims(res);
      if (body.all) {
        await auth.logoutAll(claims, requestContext(req, res));
      } else {
        await auth.logout(claims, requestContext(req, res));
      }
      res.sendStatus(204);
    })
  );

  router.post(
    '/revoke',
    authenticate(auth),
    asyncHandler(async (req, res) => {
      const body = parseBody(RevokeBodySchema, req.body);
      await auth.revoke(
        body.token,
        { scope: body.scope, reason: body.reason, ...requestContext(req, res) },
        requireClaims(res)
      );
      res.sendStatus(204);
    })
  );

  // ==========================================================================
  // Introspection
  // ==========================================================================

  router.post(
    '/validate',
    asyncHandler(async (req, res) => {
      const body = parseBody(ValidateBodySchema, req.body);
      const claims = await auth.validate(body.token);
      res.json({ claims, permissions: [...auth.permissionsFor(claims.role)].sort() });
    })
  );

  router.post(
    '/authorize',
    asyncHandler(async (req, res) => {
      const body = parseBody(AuthorizeBodySchema, req.body);
      const claims = await auth.validate(body.token);
      res.json({ allowed: auth.authorize(claims, body.permission) });
    })
  );

  router.get(
    '/me',
    authenticate(auth),
    asyncHandler(async (req, res) => {
      res.json(await auth.getUserWithPermissions(requireClaims(res).subject));
    })
  );

  // ==========================================================================
  // User administration
  // ==========================================================================

  router.get(
    '/users',
    authenticate(auth),
    requirePermission(auth, 'read:users'),
    asyncHandler(async (req, res) => {
      res.json(await auth.listUsers());
    })
  );

  router.get(
    '/users/:id',
    authenticate(auth),
    asyncHandler(async (req, res) => {
      const claims = requireClaims(res);
      if (claims.subject !== req.params.id) {
        auth.enforce(claims, 'read:users', { ...requestContext(req, res), resource: 'user' });
      }
      res.json(await auth.getUserWithPermissions(req.params.id));
    })
  );

  router.put(
    '/users/:id',
    authenticate(auth),
    asyncHandler(async (req, res) => {
      const claims = requireClaims(res);
      const permission = claims.subject === req.params.id ? 'write:profile' : 'write:users';
      auth.enforce(claims, permission, { ...requestContext(req, res), resource: 'user' });

      const body = parseBody(UpdateUserBodySchema, req.body);
      res.json(await auth.updateUser(req.params.id, body, requestContext(req, res)));
    })
  );

  router.delete(
    '/users/:id',
    authenticate(auth),
    requirePermission(auth, 'delete:users'),
    asyncHandler(async (req, res) => {
      await auth.disableUser(req.params.id, requestContext(req, res));
      res.sendStatus(204);
    })
  );

  router.post(
    '/users/:id/role',
    authenticate(auth),
    requirePermission(auth, 'write:users'),
    asyncHandler(async (req, res) => {
      const body = parseBody(ChangeRoleBodySchema, req.body);
      res.json(await auth.changeRole(req.params.id, body.role, requestContext(req, res)));
    })
  );

  router.post(
    '/users/:id/enable',
    authenticate(auth),
    requirePermission(auth, 'write:users'),
    asyncHandler(async (req, res) => {
      res.json(await auth.enableUser(req.params.id, requestContext(req, res)));
    })
  );

  // ==========================================================================
  // Audit logs
  // ==========================================================================

  // The :actor path segment wins over ?actor=
  const queryAudit = (req: Request, res: Response, actor?: string) => {
    const { skip, limit, ...rest } = parseBody(AuditQuerySchema, req.query);
    const filters: AuditFilters = { ...rest, ...(actor !== undefined && { actor }) };
    const { records, total } = auth.queryAudit(filters, { skip, limit });
    res.json({ records, total, skip, limit });
  };

  router.get(
    '/audit-logs',
    authenticate(auth),
    requirePermission(auth, 'read:audit_logs'),
    (req, res) => queryAudit(req, res)
  );

  router.get(
    '/audit-logs/:actor',
    authenticate(auth),
    requirePermission(auth, 'read:audit_logs'),
    (req, res) => queryAudit(req, res, req.params.actor)
  );

  router.post(
    '/audit-logs',
    authenticate(auth),
    requirePermission(auth, 'write:audit_logs'),
    (req, res) => {
      const body = parseBody(AuditEventBodySchema, req.body);
      const { actor, ipAddress } = requestContext(req, res);
      const record = auth.recordEvent({ ...body, actor: actor ?? null, ipAddress });
      res.status(201).json(record);
    }
  );

  app.use(API_BASE_PATH, router);

  app.use((req, res) => {
    res.status(404).json({ error: { code: 'NOT_FOUND', message: 'Route not found' } });
  });

  app.use(errorHandler);

  return app;
}

/**
 * Start HTTP server
 *
 * @returns the listening server
 */
export function startHTTPServer(
  app: express.Application,
  port: number,
  host: string = '0.0.0.0'
): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = createServer(app);

    server.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        reject(new Error(`Port ${port} is already in use`));
      } else {
        reject(err);
      }
    });

    server.listen(port, host, () => {
      console.log(`[HTTP Server] Listening on ${host}:${port}`);
      console.log(`[HTTP Server] API: http://localhost:${port}${API_BASE_PATH}`);
      resolve(server);
    });
  });
}
