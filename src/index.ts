// Main export file - re-exports all public APIs

// Core layer exports
export * from './core/index.js';

// HTTP layer exports
export { createAuthServer, startHTTPServer, API_BASE_PATH, type AuthServerOptions } from './http/server.js';
export {
  authenticate,
  requirePermission,
  errorHandler,
  extractBearerToken,
} from './http/middleware.js';

// Configuration exports
export * from './config/index.js';

// Utility exports
export * from './utils/errors.js';
export { KeyedLock } from './utils/keyed-lock.js';
export { ExpiringMap, systemClock, type Clock } from './utils/expiring-map.js';
