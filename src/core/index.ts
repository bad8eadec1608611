/**
 * Core Module Public API
 *
 * One-way dependency: core → store / notify → http
 */

// ============================================================================
// Services
// ============================================================================

export {
  CredentialEngine,
  CREDENTIAL_SUBJECTS,
  DEFAULT_ISSUER,
  DEFAULT_ACCESS_TTL_SECONDS,
  DEFAULT_REFRESH_TTL_SECONDS,
} from './credential-engine.js';
export type {
  CredentialIssuer,
  CredentialVerifier,
  CredentialEngineOptions,
} from './credential-engine.js';

export { loadSigningKeys, readKeyFile, SIGNING_ALGORITHMS } from './signing-keys.js';
export type { SigningKeys, SigningKeyMaterial, SigningAlgorithm } from './signing-keys.js';

export {
  AccountStateMachine,
  SALT_LENGTH,
  ACTIVATION_SECRET_LENGTH,
  DEFAULT_ACTIVATION_WINDOW_SECONDS,
} from './account-state-machine.js';
export type { AccountStateMachineOptions } from './account-state-machine.js';

export { SessionOrchestrator } from './session-orchestrator.js';
export type {
  SessionOrchestratorDeps,
  LoginResult,
  RefreshResult,
} from './session-orchestrator.js';

export { AuditService, InMemoryAuditStorage } from './audit-service.js';
export type { AuditServiceConfig, AuditStorage } from './audit-service.js';

export { hashPassword, verifyPassword, randomAlphanumeric } from './password.js';

// ============================================================================
// Types
// ============================================================================

export { AccountState, isActive, systemClock } from './types.js';
export type {
  Account,
  AccountId,
  AccountStore,
  NewAccount,
  Notifier,
  Clock,
  CredentialClass,
  CredentialClaims,
  AuditEntry,
} from './types.js';
