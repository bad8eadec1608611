/**
 * Composition root: builds every service from a validated configuration.
 *
 * Collaborators can be overridden (tests, embedding); otherwise the store is
 * PostgreSQL when `database` is configured and in-memory when it is not.
 */

import type express from 'express';
import type { AppConfig } from './config/schema.js';
import type { SigningKeys } from './core/signing-keys.js';
import type { AccountStore, Clock, Notifier } from './core/types.js';
import { systemClock } from './core/types.js';
import { CredentialEngine } from './core/credential-engine.js';
import { AccountStateMachine } from './core/account-state-machine.js';
import { SessionOrchestrator } from './core/session-orchestrator.js';
import { AuditService, type AuditStorage } from './core/audit-service.js';
import { InMemoryAccountStore } from './store/memory-account-store.js';
import { createPostgresPool, PostgresAccountStore } from './store/postgres-account-store.js';
import { ConsoleNotifier } from './notify/console-notifier.js';
import { HttpRelayNotifier } from './notify/http-relay-notifier.js';
import { createAuthServer } from './http/server.js';

export interface ApplicationOverrides {
  store?: AccountStore;
  notifier?: Notifier;
  clock?: Clock;
  auditStorage?: AuditStorage;
}

export interface Application {
  app: express.Application;
  orchestrator: SessionOrchestrator;
  credentials: CredentialEngine;
  auditService: AuditService;
  /** Release pooled connections */
  close(): Promise<void>;
}

function createNotifier(config: AppConfig['notifier']): Notifier {
  switch (config.type) {
    case 'http':
      return new HttpRelayNotifier({
        relayUrl: config.relayUrl,
        apiKey: config.apiKey,
        subject: config.subject,
        timeoutMs: config.timeoutMs,
      });
    case 'console':
      return new ConsoleNotifier();
  }
}

export function createApplication(
  config: AppConfig,
  keys: SigningKeys,
  overrides: ApplicationOverrides = {}
): Application {
  const clock = overrides.clock ?? systemClock;

  let store: AccountStore;
  let close = async (): Promise<void> => {};
  if (overrides.store) {
    store = overrides.store;
  } else if (config.database) {
    const pgStore = new PostgresAccountStore(createPostgresPool(config.database));
    store = pgStore;
    close = () => pgStore.close();
  } else {
    console.warn('[Application] No database configured, using in-memory account store');
    store = new InMemoryAccountStore();
  }

  const credentials = new CredentialEngine(keys, {
    issuer: config.credentials.issuer,
    accessTtlSeconds: config.credentials.accessTtlSeconds,
    refreshTtlSeconds: config.credentials.refreshTtlSeconds,
    clock,
  });

  const stateMachine = new AccountStateMachine(store, {
    activationWindowSeconds: config.accounts.activationWindowSeconds,
    clock,
  });

  const auditService = new AuditService({
    enabled: config.audit.enabled,
    maxEntries: config.audit.maxEntries,
    storage: overrides.auditStorage,
  });

  const orchestrator = new SessionOrchestrator({
    store,
    notifier: overrides.notifier ?? createNotifier(config.notifier),
    stateMachine,
    credentials,
    auditService,
  });

  const app = createAuthServer(orchestrator, {
    refreshTtlSeconds: config.credentials.refreshTtlSeconds,
    secureCookies: config.server.secureCookies,
    allowedOrigin: config.server.allowedOrigin,
  });

  return { app, orchestrator, credentials, auditService, close };
}
