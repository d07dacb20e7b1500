#!/usr/bin/env node
import type { Server } from 'http';
import { ConfigManager } from './config/manager.js';
import { createCoreContext } from './core/context.js';
import { createAuthServer, startHTTPServer } from './http/server.js';
import { sanitizeError } from './utils/errors.js';

/**
 * Start the AAA HTTP server
 *
 * Configuration: CONFIG_PATH (default ./config/aaa.json), secrets from
 * SECRETS_DIR files or environment variables.
 */
async function main(): Promise<void> {
  const configManager = new ConfigManager();
  const config = await configManager.loadConfig();

  const context = createCoreContext(configManager.getCoreConfig());

  // Secrets were resolved before the ledger existed
  configManager.getSecretResolver().attachAuditLedger(context.auditLedger);

  const app = createAuthServer(context, {
    corsOrigin: config.server.corsOrigin,
    defaultRole: config.credentials.defaultRole,
  });

  console.log('Starting AAA server...');
  console.log(`Config: ${configManager.getEnvironment().CONFIG_PATH ?? 'default'}`);

  const server = await startHTTPServer(app, config.server.port, config.server.host);

  const shutdown = (signal: string) => {
    console.log(`\n\nShutting down server (${signal})...`);
    context.auth.destroy();
    closeServer(server)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('Failed to close server:', sanitizeError(error));
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

main().catch((error: unknown) => {
  console.error('Failed to start server:', sanitizeError(error));
  process.exit(1);
});
