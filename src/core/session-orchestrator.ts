/**
 * Session Orchestrator - the four user-facing operations
 *
 * Coordinates:
 * - Account lookups (AccountStore)
 * - Lifecycle rules (AccountStateMachine)
 * - Credential minting and verification (CredentialIssuer / CredentialVerifier)
 * - Activation secret delivery (Notifier)
 * - Audit logging (AuditService)
 *
 * Errors reach the caller untranslated. Audit failures are logged and never
 * replace an operation's own outcome. Nothing here retries; there is no
 * compensation either, so a failed delivery leaves the Pending row in place
 * until the next pre-registration replaces it.
 */

import type { Account, AccountId, AccountStore, Notifier } from './types.js';
import { isActive } from './types.js';
import type { AccountStateMachine } from './account-state-machine.js';
import type { CredentialIssuer, CredentialVerifier } from './credential-engine.js';
import { AuditService } from './audit-service.js';
import {
  CredentialLifecycleError,
  InactiveAccountError,
  NotFoundError,
  sanitizeError,
} from '../utils/errors.js';

export interface SessionOrchestratorDeps {
  store: AccountStore;
  notifier: Notifier;
  stateMachine: AccountStateMachine;
  credentials: CredentialIssuer & CredentialVerifier;
  auditService?: AuditService;
}

export interface LoginResult {
  accountId: AccountId;

  /** Returned to the caller directly */
  accessToken: string;

  /** Opaque renewal handle; the client replays it verbatim to refresh */
  refreshToken: string;
}

export interface RefreshResult {
  accountId: AccountId;
  accessToken: string;
}

export class SessionOrchestrator {
  private readonly store: AccountStore;
  private readonly notifier: Notifier;
  private readonly stateMachine: AccountStateMachine;
  private readonly credentials: CredentialIssuer & CredentialVerifier;
  private readonly auditService: AuditService;

  constructor(deps: SessionOrchestratorDeps) {
    this.store = deps.store;
    this.notifier = deps.notifier;
    this.stateMachine = deps.stateMachine;
    this.credentials = deps.credentials;
    this.auditService = deps.auditService ?? new AuditService(); // Null Object Pattern
  }

  /**
   * Create (or recreate) a Pending account and send its activation secret.
   *
   * @throws {AlreadyActiveError} If an Active account holds this email
   * @throws {DeliveryError} If the notifier fails; the Pending row remains
   */
  async preRegister(email: string, password: string): Promise<Account> {
    try {
      const account = await this.stateMachine.beginRegistration(email, password);
      await this.notifier.sendActivationSecret(email, account.activationSecret);

      console.log(`[SessionOrchestrator] Pending account ${account.id} registered`);
      await this.audit('preRegister', true, { accountId: account.id, email });
      return account;
    } catch (error) {
      await this.audit('preRegister', false, { email, error });
      throw error;
    }
  }

  /**
   * @throws {NotFoundError} If no account holds this email
   * @throws {AlreadyActiveError | InvalidTokenError | ExpiredTokenError} From the state machine
   */
  async activate(email: string, secret: string): Promise<Account> {
    try {
      const account = await this.requireByEmail(email);
      const activated = await this.stateMachine.activate(account, secret);

      console.log(`[SessionOrchestrator] Account ${activated.id} activated`);
      await this.audit('activate', true, { accountId: activated.id, email });
      return activated;
    } catch (error) {
      await this.audit('activate', false, { email, error });
      throw error;
    }
  }

  /**
   * Authenticate by password and issue one access and one refresh credential.
   *
   * @throws {NotFoundError | InactiveAccountError | AuthenticationError}
   * @throws {SigningError} If a credential cannot be signed
   */
  async login(email: string, password: string): Promise<LoginResult> {
    try {
      const account = await this.store.findByEmail(email);
      if (!account) {
        await this.stateMachine.rejectWithoutAccount(password);
        throw new NotFoundError();
      }
      await this.stateMachine.authenticate(account, password);

      const [accessToken, refreshToken] = await Promise.all([
        this.credentials.issue(account.id, 'access'),
        this.credentials.issue(account.id, 'refresh'),
      ]);

      await this.audit('login', true, { accountId: account.id, email });
      return { accountId: account.id, accessToken, refreshToken };
    } catch (error) {
      await this.audit('login', false, { email, error });
      throw error;
    }
  }

  /**
   * Exchange a refresh credential for a new access credential.
   *
   * The bound account must still exist and be Active: a valid signature
   * alone is not enough.
   *
   * @throws {InvalidTokenError | ExpiredTokenError | MalformedClaimError} From verification
   * @throws {NotFoundError} If the account no longer exists
   * @throws {InactiveAccountError} If the account is not Active
   */
  async refresh(refreshToken: string): Promise<RefreshResult> {
    let accountId: AccountId | undefined;
    try {
      accountId = await this.credentials.verify(refreshToken, 'refresh');

      const account = await this.getAccount(accountId);
      if (!isActive(account)) {
        throw new InactiveAccountError();
      }

      const accessToken = await this.credentials.issue(account.id, 'access');
      await this.audit('refresh', true, { accountId });
      return { accountId, accessToken };
    } catch (error) {
      await this.audit('refresh', false, { accountId, error });
      throw error;
    }
  }

  /**
   * Verify an access credential presented on a protected call.
   */
  async authenticateAccessToken(accessToken: string): Promise<AccountId> {
    return this.credentials.verify(accessToken, 'access');
  }

  async getAccount(accountId: AccountId): Promise<Account> {
    const account = await this.store.findById(accountId);
    if (!account) {
      throw new NotFoundError(`Account ${accountId} not found`);
    }
    return account;
  }

  private async requireByEmail(email: string): Promise<Account> {
    const account = await this.store.findByEmail(email);
    if (!account) {
      throw new NotFoundError();
    }
    return account;
  }

  private async audit(
    action: string,
    success: boolean,
    context: { accountId?: AccountId; email?: string; error?: unknown }
  ): Promise<void> {
    const { error } = context;
    try {
      await this.auditService.log({
        timestamp: new Date(),
        source: `session:${action}`,
        accountId: context.accountId,
        email: context.email,
        action,
        success,
        ...(error !== undefined && {
          error: error instanceof CredentialLifecycleError ? error.code : 'INTERNAL_ERROR',
          reason: error instanceof Error ? error.message : undefined,
        }),
      });
    } catch (auditError) {
      console.error(
        `[SessionOrchestrator] Failed to write audit entry for ${action}:`,
        sanitizeError(auditError)
      );
    }
  }
}
