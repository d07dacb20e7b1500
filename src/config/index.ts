/**
 * Configuration Module - Public API
 */

export { ConfigManager, DEFAULT_CONFIG_PATH, type ConfigManagerOptions } from './manager.js';

export {
  AAAConfigSchema,
  TokensConfigSchema,
  CredentialsConfigSchema,
  PermissionsConfigSchema,
  RevocationConfigSchema,
  AuditConfigSchema,
  ServerConfigSchema,
  EnvironmentSchema,
  type AAAConfig,
  type TokensConfig,
  type CredentialsConfig,
  type RevocationConfig,
  type AuditConfig,
  type ServerConfig,
  type Environment,
} from './schema.js';

export {
  SecretResolver,
  FileSecretProvider,
  EnvProvider,
  isSecretProvider,
  type ISecretProvider,
  type SecretResolverConfig,
} from './secrets/index.js';
