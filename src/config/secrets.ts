/**
 * Secret resolution for configuration files
 *
 * A config value written as {"$secret": "NAME"} is replaced, before schema
 * validation, by the first value a provider in the chain returns:
 *
 *   1. FileSecretProvider - `{secretsDir}/NAME` (Docker/Kubernetes mounts)
 *   2. EnvProvider        - `process.env.NAME`
 *
 * Unresolved secrets are fatal.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { ConfigurationError } from '../utils/errors.js';

/**
 * A source of secret values. Resolves to undefined when it does not hold the
 * name, so the next provider can be tried; rejects only on real failures.
 */
export interface SecretProvider {
  resolve(logicalName: string): Promise<string | undefined>;
}

export class FileSecretProvider implements SecretProvider {
  constructor(private readonly secretDir: string = '/run/secrets') {}

  async resolve(logicalName: string): Promise<string | undefined> {
    const root = path.resolve(this.secretDir);
    const filePath = path.resolve(root, logicalName);

    // Names must stay inside the secrets directory
    if (!filePath.startsWith(root + path.sep)) {
      return undefined;
    }

    try {
      const contents = await fs.readFile(filePath, 'utf-8');
      return contents.trim();
    } catch (error) {
      if (isNodeError(error) && (error.code === 'ENOENT' || error.code === 'EISDIR')) {
        return undefined;
      }
      throw error;
    }
  }
}

export class EnvProvider implements SecretProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async resolve(logicalName: string): Promise<string | undefined> {
    const value = this.env[logicalName];
    return value === undefined || value === '' ? undefined : value.trim();
  }
}

export class SecretResolver {
  private readonly providers: SecretProvider[] = [];

  addProvider(provider: SecretProvider): this {
    this.providers.push(provider);
    return this;
  }

  /**
   * Replace every secret descriptor in `config`, in place.
   *
   * @throws {ConfigurationError} If a descriptor cannot be resolved
   */
  async resolveSecrets(config: unknown): Promise<void> {
    await this.resolveNode(config, 'config');
  }

  private async resolveNode(node: unknown, nodePath: string): Promise<void> {
    if (Array.isArray(node)) {
      for (let i = 0; i < node.length; i++) {
        const child: unknown = node[i];
        if (isSecretDescriptor(child)) {
          node[i] = await this.require(child.$secret, `${nodePath}[${i}]`);
        } else {
          await this.resolveNode(child, `${nodePath}[${i}]`);
        }
      }
      return;
    }

    if (!isRecord(node)) {
      return;
    }

    for (const [key, child] of Object.entries(node)) {
      if (isSecretDescriptor(child)) {
        node[key] = await this.require(child.$secret, `${nodePath}.${key}`);
      } else {
        await this.resolveNode(child, `${nodePath}.${key}`);
      }
    }
  }

  private async require(logicalName: string, nodePath: string): Promise<string> {
    for (const provider of this.providers) {
      try {
        const value = await provider.resolve(logicalName);
        if (value !== undefined) {
          return value;
        }
      } catch (error) {
        console.warn(
          `[SecretResolver] ${provider.constructor.name} failed to resolve "${logicalName}": ${
            error instanceof Error ? error.message : 'Unknown error'
          }`
        );
      }
    }

    throw new ConfigurationError(
      `Secret "${logicalName}" at "${nodePath}" could not be resolved by any provider`
    );
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSecretDescriptor(value: unknown): value is { $secret: string } {
  return (
    isRecord(value) && typeof value.$secret === 'string' && Object.keys(value).length === 1
  );
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
