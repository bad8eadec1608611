/**
 * Configuration Schema
 *
 * Validated after secret descriptors have been resolved, so every string
 * here is the final value.
 */

import { z } from 'zod';
import { SIGNING_ALGORITHMS } from '../core/signing-keys.js';
import {
  DEFAULT_ACCESS_TTL_SECONDS,
  DEFAULT_ISSUER,
  DEFAULT_REFRESH_TTL_SECONDS,
} from '../core/credential-engine.js';
import { DEFAULT_ACTIVATION_WINDOW_SECONDS } from '../core/account-state-machine.js';

// ============================================================================
// Sections
// ============================================================================

export const ServerConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).default(3000).describe('HTTP listen port'),
  secureCookies: z
    .boolean()
    .default(true)
    .describe('Mark the refresh-token cookie Secure (HTTPS only)'),
  allowedOrigin: z
    .string()
    .url()
    .optional()
    .describe('Browser origin allowed to call the API with credentials (CORS)'),
});

/**
 * Key pair for signing credentials. Each half is given either inline
 * (PEM text, usually a {"$secret": ...}) or as a file path, never both.
 */
export const KeyConfigSchema = z
  .object({
    algorithm: z.enum(SIGNING_ALGORITHMS).default('RS256'),
    privateKeyPem: z.string().min(1).optional(),
    privateKeyPath: z.string().min(1).optional(),
    publicKeyPem: z.string().min(1).optional(),
    publicKeyPath: z.string().min(1).optional(),
  })
  .refine((keys) => (keys.privateKeyPem === undefined) !== (keys.privateKeyPath === undefined), {
    message: 'Exactly one of privateKeyPem or privateKeyPath is required',
    path: ['privateKeyPem'],
  })
  .refine((keys) => (keys.publicKeyPem === undefined) !== (keys.publicKeyPath === undefined), {
    message: 'Exactly one of publicKeyPem or publicKeyPath is required',
    path: ['publicKeyPem'],
  });

export const CredentialsConfigSchema = z.object({
  issuer: z.string().min(1).default(DEFAULT_ISSUER),
  accessTtlSeconds: z.number().int().positive().default(DEFAULT_ACCESS_TTL_SECONDS),
  refreshTtlSeconds: z.number().int().positive().default(DEFAULT_REFRESH_TTL_SECONDS),
  keys: KeyConfigSchema,
});

export const AccountsConfigSchema = z.object({
  activationWindowSeconds: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_ACTIVATION_WINDOW_SECONDS),
});

export const DatabaseConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535).optional(),
  database: z.string().min(1),
  user: z.string().min(1),
  password: z.string(),
  ssl: z.boolean().optional(),
  pool: z
    .object({
      max: z.number().int().positive().optional(),
      idleTimeoutMillis: z.number().int().nonnegative().optional(),
      connectionTimeoutMillis: z.number().int().nonnegative().optional(),
    })
    .optional(),
});

export const NotifierConfigSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('console') }),
  z.object({
    type: z.literal('http'),
    relayUrl: z.string().url(),
    apiKey: z.string().min(1).optional(),
    subject: z.string().min(1).optional(),
    timeoutMs: z.number().int().positive().optional(),
  }),
]);

export const AuditConfigSchema = z.object({
  enabled: z.boolean().default(false),
  maxEntries: z.number().int().positive().optional(),
});

// ============================================================================
// Application Configuration
// ============================================================================

export const AppConfigSchema = z.object({
  server: ServerConfigSchema.default({}),
  credentials: CredentialsConfigSchema,
  accounts: AccountsConfigSchema.default({}),
  /** In-memory store when absent */
  database: DatabaseConfigSchema.optional(),
  notifier: NotifierConfigSchema.default({ type: 'console' }),
  audit: AuditConfigSchema.default({}),
});

// ============================================================================
// TypeScript Types
// ============================================================================

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type KeyConfig = z.infer<typeof KeyConfigSchema>;
export type CredentialsConfig = z.infer<typeof CredentialsConfigSchema>;
export type AccountsConfig = z.infer<typeof AccountsConfigSchema>;
export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;
export type NotifierConfig = z.infer<typeof NotifierConfigSchema>;
export type AuditConfig = z.infer<typeof AuditConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
