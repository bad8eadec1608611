export { ConfigManager, loadConfiguredSigningKeys, DEFAULT_CONFIG_PATH } from './manager.js';
export type { ConfigManagerOptions } from './manager.js';
export { AppConfigSchema } from './schema.js';
export type {
  AppConfig,
  ServerConfig,
  KeyConfig,
  CredentialsConfig,
  AccountsConfig,
  DatabaseConfig,
  NotifierConfig,
  AuditConfig,
} from './schema.js';
export { SecretResolver, FileSecretProvider, EnvProvider } from './secrets.js';
export type { SecretProvider } from './secrets.js';
