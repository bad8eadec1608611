#!/usr/bin/env node
import { ConfigManager, loadConfiguredSigningKeys } from './config/manager.js';
import { createApplication } from './application.js';
import { startHTTPServer } from './http/server.js';
import { sanitizeError } from './utils/errors.js';

async function main(): Promise<void> {
  const configManager = new ConfigManager({ secretsDir: process.env.SECRETS_DIR });
  const config = await configManager.loadConfig();

  // Fatal on failure: never serve without a usable key pair
  const keys = await loadConfiguredSigningKeys(config.credentials.keys);

  const application = createApplication(config, keys);
  const server = await startHTTPServer(application.app, config.server.port);

  const shutdown = (signal: string) => {
    console.log(`\n[Server] ${signal} received, shutting down...`);
    server.close(() => {
      application.close().then(
        () => process.exit(0),
        (error: unknown) => {
          console.error('[Server] Failed to close resources:', sanitizeError(error));
          process.exit(1);
        }
      );
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error('Fatal error:', sanitizeError(error));
  process.exit(1);
});
