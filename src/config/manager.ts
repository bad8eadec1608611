import { readFile } from 'fs/promises';
import { ZodError } from 'zod';
import { AppConfigSchema, type AppConfig, type KeyConfig } from './schema.js';
import { EnvProvider, FileSecretProvider, SecretResolver } from './secrets.js';
import { loadSigningKeys, readKeyFile, type SigningKeys } from '../core/signing-keys.js';
import { ConfigurationError } from '../utils/errors.js';

export const DEFAULT_CONFIG_PATH = './config/credential-lifecycle.json';

export interface ConfigManagerOptions {
  /** Directory for file-based secrets (default: '/run/secrets') */
  secretsDir?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private config: AppConfig | null = null;
  private readonly env: NodeJS.ProcessEnv;
  private readonly secretResolver: SecretResolver;

  constructor(options: ConfigManagerOptions = {}) {
    this.env = options.env ?? process.env;

    // Files take priority over environment variables
    this.secretResolver = new SecretResolver()
      .addProvider(new FileSecretProvider(options.secretsDir ?? '/run/secrets'))
      .addProvider(new EnvProvider(this.env));
  }

  /**
   * Load, resolve and validate the configuration file.
   *
   * Path precedence: argument, then CONFIG_PATH, then {@link DEFAULT_CONFIG_PATH}.
   *
   * @throws {ConfigurationError} On unreadable JSON, unresolved secrets or schema violations
   */
  async loadConfig(configPath?: string): Promise<AppConfig> {
    if (this.config) {
      return this.config;
    }

    const path = configPath ?? this.env.CONFIG_PATH ?? DEFAULT_CONFIG_PATH;

    let rawConfig: unknown;
    try {
      rawConfig = JSON.parse(await readFile(path, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`Cannot read ${path}`, {
        originalError: error instanceof Error ? error.message : String(error),
      });
    }

    await this.secretResolver.resolveSecrets(rawConfig);

    let config: AppConfig;
    try {
      config = AppConfigSchema.parse(rawConfig);
    } catch (error) {
      if (error instanceof ZodError) {
        throw new ConfigurationError(
          error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
        );
      }
      throw error;
    }

    this.validateSecurityRequirements(config);
    this.config = config;

    console.log(`[ConfigManager] Configuration loaded from ${path}`);
    return config;
  }

  getConfig(): AppConfig {
    if (!this.config) {
      throw new ConfigurationError('Configuration not loaded. Call loadConfig() first.');
    }
    return this.config;
  }

  isSecureEnvironment(): boolean {
    return this.env.NODE_ENV === 'production';
  }

  private validateSecurityRequirements(config: AppConfig): void {
    const { accessTtlSeconds, refreshTtlSeconds } = config.credentials;
    if (refreshTtlSeconds <= accessTtlSeconds) {
      throw new ConfigurationError('refreshTtlSeconds must be longer than accessTtlSeconds');
    }

    if (this.isSecureEnvironment() && !config.server.secureCookies) {
      console.warn('[ConfigManager] secureCookies is disabled in production');
    }

    if (this.isSecureEnvironment() && !config.database) {
      console.warn('[ConfigManager] No database configured: accounts will not survive a restart');
    }
  }
}

/**
 * Load the signing key pair the configuration names, inline or from files.
 *
 * @throws {KeyLoadError} Fatal: the process must not start without keys
 */
export async function loadConfiguredSigningKeys(keys: KeyConfig): Promise<SigningKeys> {
  const [privateKeyPem, publicKeyPem] = await Promise.all([
    keys.privateKeyPem ?? readKeyFile(requirePath(keys.privateKeyPath)),
    keys.publicKeyPem ?? readKeyFile(requirePath(keys.publicKeyPath)),
  ]);
  return loadSigningKeys({ privateKeyPem, publicKeyPem, algorithm: keys.algorithm });
}

function requirePath(path: string | undefined): string {
  if (path === undefined) {
    throw new ConfigurationError('Key material must be given inline or by path');
  }
  return path;
}
