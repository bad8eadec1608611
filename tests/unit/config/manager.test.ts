/**
 * Unit Tests for Configuration Manager
 *
 * Loading, secret resolution, schema defaults and security checks, using
 * config files written to a temporary directory.
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { ConfigManager, loadConfiguredSigningKeys } from '../../../src/config/manager.js';
import { generateTestKeyMaterial, type TestKeyMaterial } from '../../../src/testing/index.js';
import { ConfigurationError, KeyLoadError } from '../../../src/utils/errors.js';

describe('ConfigManager', () => {
  let material: TestKeyMaterial;
  let dir: string;
  let secretsDir: string;

  beforeAll(async () => {
    material = await generateTestKeyMaterial();
  });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'config-test-'));
    secretsDir = join(dir, 'secrets');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  async function writeConfig(config: unknown, name = 'config.json'): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, JSON.stringify(config));
    return path;
  }

  function minimalConfig(overrides: Record<string, unknown> = {}) {
    return {
      credentials: {
        keys: {
          privateKeyPem: material.privateKeyPem,
          publicKeyPem: material.publicKeyPem,
        },
      },
      ...overrides,
    };
  }

  describe('loadConfig()', () => {
    it('should apply defaults to a minimal file', async () => {
      const manager = new ConfigManager({ secretsDir, env: {} });

      const config = await manager.loadConfig(await writeConfig(minimalConfig()));

      expect(config.server).toEqual({ port: 3000, secureCookies: true });
      expect(config.credentials).toMatchObject({
        issuer: 'credential-lifecycle',
        accessTtlSeconds: 1800,
        refreshTtlSeconds: 259200,
      });
      expect(config.credentials.keys.algorithm).toBe('RS256');
      expect(config.accounts).toEqual({ activationWindowSeconds: 1800 });
      expect(config.notifier).toEqual({ type: 'console' });
      expect(config.audit).toEqual({ enabled: false });
      expect(config.database).toBeUndefined();
    });

    it('should fall back to CONFIG_PATH', async () => {
      const path = await writeConfig(minimalConfig({ server: { port: 8080 } }));
      const manager = new ConfigManager({ secretsDir, env: { CONFIG_PATH: path } });

      const config = await manager.loadConfig();

      expect(config.server.port).toBe(8080);
    });

    it('should cache the loaded configuration', async () => {
      const manager = new ConfigManager({ secretsDir, env: {} });
      const first = await manager.loadConfig(await writeConfig(minimalConfig()));

      const second = await manager.loadConfig(join(dir, 'does-not-exist.json'));

      expect(second).toBe(first);
      expect(manager.getConfig()).toBe(first);
    });

    it('should resolve secrets from the environment', async () => {
      const manager = new ConfigManager({
        secretsDir,
        env: { DB_PASSWORD: 'test-secret' },
      });
      const path = await writeConfig(
        minimalConfig({
          database: {
            host: 'localhost',
            database: 'accounts',
            user: 'app',
            password: { $secret: 'DB_PASSWORD' },
          },
        })
      );

      const config = await manager.loadConfig(path);

      expect(config.database?.password).toBe('test-secret');
    });

    it('should prefer secret files over the environment', async () => {
      await mkdir(secretsDir);
      await writeFile(join(secretsDir, 'RELAY_KEY'), 'from-file\n');
      const manager = new ConfigManager({ secretsDir, env: { RELAY_KEY: 'from-env' } });
      const path = await writeConfig(
        minimalConfig({
          notifier: {
            type: 'http',
            relayUrl: 'http://relay.test/send',
            apiKey: { $secret: 'RELAY_KEY' },
          },
        })
      );

      const config = await manager.loadConfig(path);

      expect(config.notifier).toEqual({
        type: 'http',
        relayUrl: 'http://relay.test/send',
        apiKey: 'from-file',
      });
    });

    it('should fail on an unresolved secret', async () => {
      const manager = new ConfigManager({ secretsDir, env: {} });
      const path = await writeConfig({
        credentials: {
          keys: { privateKeyPem: { $secret: 'SIGNING_KEY' }, publicKeyPem: 'x' },
        },
      });

      await expect(manager.loadConfig(path)).rejects.toThrow(
        'Secret "SIGNING_KEY" at "config.credentials.keys.privateKeyPem" could not be resolved by any provider'
      );
    });

    it('should fail on a missing file', async () => {
      const manager = new ConfigManager({ secretsDir, env: {} });
      const path = join(dir, 'missing.json');

      const result = manager.loadConfig(path);

      await expect(result).rejects.toBeInstanceOf(ConfigurationError);
      await expect(result).rejects.toThrow(`Configuration error: Cannot read ${path}`);
    });

    it('should fail on invalid JSON', async () => {
      const manager = new ConfigManager({ secretsDir, env: {} });
      const path = join(dir, 'broken.json');
      await writeFile(path, '{ not json');

      await expect(manager.loadConfig(path)).rejects.toThrow(`Cannot read ${path}`);
    });

    it('should list schema violations by path', async () => {
      const manager = new ConfigManager({ secretsDir, env: {} });
      const path = await writeConfig({
        credentials: { keys: { privateKeyPem: 'a', privateKeyPath: '/b', publicKeyPath: '/c' } },
      });

      await expect(manager.loadConfig(path)).rejects.toThrow(
        'Configuration error: credentials.keys.privateKeyPem: Exactly one of privateKeyPem or privateKeyPath is required'
      );
    });

    it('should reject a refresh TTL that does not outlive the access TTL', async () => {
      const manager = new ConfigManager({ secretsDir, env: {} });
      const path = await writeConfig(
        minimalConfig({
          credentials: {
            accessTtlSeconds: 600,
            refreshTtlSeconds: 600,
            keys: { privateKeyPem: 'a', publicKeyPem: 'b' },
          },
        })
      );

      await expect(manager.loadConfig(path)).rejects.toThrow(
        'refreshTtlSeconds must be longer than accessTtlSeconds'
      );
    });

    it('should warn about insecure cookies and a missing database in production', async () => {
      const manager = new ConfigManager({ secretsDir, env: { NODE_ENV: 'production' } });
      const path = await writeConfig(minimalConfig({ server: { secureCookies: false } }));

      await manager.loadConfig(path);

      expect(manager.isSecureEnvironment()).toBe(true);
      expect(console.warn).toHaveBeenCalledWith(
        '[ConfigManager] secureCookies is disabled in production'
      );
      expect(console.warn).toHaveBeenCalledWith(
        '[ConfigManager] No database configured: accounts will not survive a restart'
      );
    });
  });

  describe('example configuration', () => {
    it('should validate once its secrets are supplied', async () => {
      const examplePath = fileURLToPath(
        new URL('../../../config/credential-lifecycle.example.json', import.meta.url)
      );
      const manager = new ConfigManager({
        secretsDir,
        env: {
          SIGNING_PRIVATE_KEY: material.privateKeyPem,
          DB_PASSWORD: 'test-secret',
          MAIL_RELAY_API_KEY: 'test-secret',
        },
      });

      const config = await manager.loadConfig(examplePath);

      expect(config.database?.password).toBe('test-secret');
      expect(config.notifier.type).toBe('http');
      expect(config.credentials.keys.publicKeyPath).toBe('./keys/public.pem');
    });
  });

  describe('getConfig()', () => {
    it('should throw before loadConfig()', () => {
      const manager = new ConfigManager({ secretsDir, env: {} });

      expect(() => manager.getConfig()).toThrow(
        'Configuration error: Configuration not loaded. Call loadConfig() first.'
      );
    });
  });

  describe('loadConfiguredSigningKeys()', () => {
    it('should load inline PEM blocks', async () => {
      const keys = await loadConfiguredSigningKeys({
        algorithm: 'RS256',
        privateKeyPem: material.privateKeyPem,
        publicKeyPem: material.publicKeyPem,
      });

      expect(keys.algorithm).toBe('RS256');
    });

    it('should load key files', async () => {
      const privateKeyPath = join(dir, 'private.pem');
      const publicKeyPath = join(dir, 'public.pem');
      await writeFile(privateKeyPath, material.privateKeyPem);
      await writeFile(publicKeyPath, material.publicKeyPem);

      const keys = await loadConfiguredSigningKeys({
        algorithm: 'RS256',
        privateKeyPath,
        publicKeyPath,
      });

      expect(keys.algorithm).toBe('RS256');
    });

    it('should fail with KeyLoadError on a missing key file', async () => {
      const result = loadConfiguredSigningKeys({
        algorithm: 'RS256',
        privateKeyPath: join(dir, 'missing.pem'),
        publicKeyPem: material.publicKeyPem,
      });

      await expect(result).rejects.toBeInstanceOf(KeyLoadError);
    });

    it('should fail when neither PEM nor path is given', async () => {
      await expect(
        loadConfiguredSigningKeys({ algorithm: 'RS256', publicKeyPem: material.publicKeyPem })
      ).rejects.toThrow('Configuration error: Key material must be given inline or by path');
    });
  });
});
