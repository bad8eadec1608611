/**
 * Core Types
 *
 * Architectural Rule: files in src/core/ MUST NOT import from src/store/,
 * src/notify/ or src/http/. Collaborators are described here as interfaces
 * and injected.
 */

// ============================================================================
// Accounts
// ============================================================================

/** Positive integer identity assigned by the store at creation */
export type AccountId = number;

export enum AccountState {
  Pending = 'pending',
  Active = 'active',
}

export interface Account {
  id: AccountId;

  /** Unique, compared exactly as stored */
  email: string;

  /** scrypt(password, salt) */
  passwordHash: Buffer;
  salt: string;

  /** Meaningless once the account is Active */
  activationSecret: string;

  state: AccountState;
  createdAt: Date;

  /** Refreshed on every state-affecting write; start of the activation window */
  updatedAt: Date;
}

/** An account before the store has assigned its id */
export type NewAccount = Omit<Account, 'id'>;

export function isActive(account: Account): boolean {
  return account.state === AccountState.Active;
}

// ============================================================================
// Collaborators
// ============================================================================

/**
 * Persistence for account rows.
 *
 * Lookups resolve to `null` when no row matches; every other failure rejects.
 */
export interface AccountStore {
  findByEmail(email: string): Promise<Account | null>;
  findById(id: AccountId): Promise<Account | null>;
  /** Rejects with AlreadyActiveError when the email is already taken */
  insertPending(account: NewAccount): Promise<Account>;
  delete(id: AccountId): Promise<void>;

  /**
   * @throws {NotFoundError} If no row has this id
   */
  markActive(id: AccountId, at: Date): Promise<void>;
}

export interface Notifier {
  sendActivationSecret(email: string, secret: string): Promise<void>;
}

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

// ============================================================================
// Credentials
// ============================================================================

export type CredentialClass = 'access' | 'refresh';

/** Claim set carried by every access and refresh credential */
export interface CredentialClaims {
  iss: string;
  sub: string;
  iat: number;
  exp: number;
  user_id: AccountId;
}

// ============================================================================
// Audit Types
// ============================================================================

/**
 * AuditEntry represents a single audit log entry.
 *
 * All entries MUST include a source field naming their origin
 * (e.g. 'session:login').
 */
export interface AuditEntry {
  /** Timestamp when the event occurred */
  timestamp: Date;

  /** Origin of the entry */
  source: string;

  /** Account the event concerns, when known */
  accountId?: AccountId;

  /** Email the event concerns, when known */
  email?: string;

  action: string;
  success: boolean;
  reason?: string;

  /** Error code if the action failed */
  error?: string;

  metadata?: Record<string, unknown>;
}
