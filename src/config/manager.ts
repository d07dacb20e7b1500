import { readFile } from 'fs/promises';
import { ZodError } from 'zod';
import { AAAConfigSchema, EnvironmentSchema, type AAAConfig, type Environment } from './schema.js';
import { SecretResolver, FileSecretProvider, EnvProvider } from './secrets/index.js';
import type { CoreConfig } from '../core/context.js';
import { SecurityErrors } from '../utils/errors.js';

export const DEFAULT_CONFIG_PATH = './config/aaa.json';

export interface ConfigManagerOptions {
  /** Directory for file-based secrets (default: SECRETS_DIR or '/run/secrets') */
  secretsDir?: string;

  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private config: AAAConfig | null = null;
  private environment: Environment;
  private secretResolver: SecretResolver;

  constructor(options: ConfigManagerOptions = {}) {
    const env = options.env ?? process.env;
    this.environment = EnvironmentSchema.parse({
      NODE_ENV: env.NODE_ENV,
      CONFIG_PATH: env.CONFIG_PATH,
      SECRETS_DIR: env.SECRETS_DIR,
    });

    this.secretResolver = new SecretResolver({ failFast: true });

    // Add providers in priority order
    // 1. FileSecretProvider (highest priority - production)
    this.secretResolver.addProvider(
      new FileSecretProvider(options.secretsDir ?? this.environment.SECRETS_DIR)
    );

    // 2. EnvProvider (fallback - development/test)
    this.secretResolver.addProvider(new EnvProvider(env));
  }

  /**
   * Read, resolve secrets in, and validate the JSON configuration file
   *
   * @throws SecurityError CONFIGURATION_ERROR
   */
  async loadConfig(configPath?: string): Promise<AAAConfig> {
    if (this.config) {
      return this.config;
    }

    const path = configPath ?? this.environment.CONFIG_PATH ?? DEFAULT_CONFIG_PATH;

    let rawConfig: unknown;
    try {
      rawConfig = JSON.parse(await readFile(path, 'utf-8'));
    } catch (error) {
      throw SecurityErrors.CONFIGURATION_ERROR(
        `cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    return this.loadFromObject(rawConfig);
  }

  /**
   * Same as loadConfig for an already parsed object (modified in place)
   */
  async loadFromObject(rawConfig: unknown): Promise<AAAConfig> {
    // STEP 1: Resolve secrets BEFORE validation
    console.log('[ConfigManager] Resolving secrets...');
    await this.secretResolver.resolveSecrets(rawConfig);

    // STEP 2: Validate
    try {
      this.config = AAAConfigSchema.parse(rawConfig);
    } catch (error) {
      if (error instanceof ZodError) {
        throw SecurityErrors.CONFIGURATION_ERROR(formatIssues(error));
      }
      throw error;
    }

    this.warnOnWeakSettings(this.config);

    console.log('[ConfigManager] Configuration loaded and validated successfully');
    return this.config;
  }

  getConfig(): AAAConfig {
    if (!this.config) {
      throw SecurityErrors.CONFIGURATION_ERROR('configuration not loaded, call loadConfig() first');
    }
    return this.config;
  }

  /**
   * The subset handed to createCoreContext()
   */
  getCoreConfig(): CoreConfig {
    const { tokens, credentials, permissions, revocation, audit } = this.getConfig();
    return { tokens, credentials, permissions, revocation, audit };
  }

  getEnvironment(): Environment {
    return this.environment;
  }

  isSecureEnvironment(): boolean {
    return this.environment.NODE_ENV === 'production';
  }

  // Hot reload configuration (for development)
  async reloadConfig(configPath?: string): Promise<AAAConfig> {
    this.config = null;
    console.log('[ConfigManager] Reloading configuration...');
    return this.loadConfig(configPath);
  }

  getSecretResolver(): SecretResolver {
    return this.secretResolver;
  }

  private warnOnWeakSettings(config: AAAConfig): void {
    if (!this.isSecureEnvironment()) {
      return;
    }
    if (config.credentials.bcryptRounds < 10) {
      console.warn('[ConfigManager] bcryptRounds below 10 in production');
    }
    if (config.tokens.accessTtlSeconds > 3600) {
      console.warn('[ConfigManager] access tokens live longer than 1 hour');
    }
  }
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'config'}: ${issue.message}`)
    .join('; ');
}
