/**
 * PostgreSQL Account Store
 *
 * Rows live in the `users` table (see db/schema.sql). Parameterized queries
 * only.
 */

import pg from 'pg';
const { Pool } = pg;
import type { Account, AccountId, AccountStore, NewAccount } from '../core/types.js';
import { AccountState } from '../core/types.js';
import { AlreadyActiveError, CredentialLifecycleError, NotFoundError } from '../utils/errors.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface PostgreSQLConfig {
  host: string;
  /** Default: 5432 */
  port?: number;
  database: string;
  user: string;
  password: string;
  ssl?: boolean;
  pool?: {
    max?: number;
    idleTimeoutMillis?: number;
    connectionTimeoutMillis?: number;
  };
}

interface UserRow {
  id: number;
  email: string;
  password_hash: Buffer;
  salt: string;
  activation_secret: string;
  state: string;
  created_at: Date;
  updated_at: Date;
}

/** SQLSTATE unique_violation */
const UNIQUE_VIOLATION = '23505';

const COLUMNS =
  'id, email, password_hash, salt, activation_secret, state, created_at, updated_at';

export function createPostgresPool(config: PostgreSQLConfig): pg.Pool {
  return new Pool({
    host: config.host,
    port: config.port ?? 5432,
    database: config.database,
    user: config.user,
    password: config.password,
    ssl: config.ssl ?? false,
    max: config.pool?.max ?? 10,
    idleTimeoutMillis: config.pool?.idleTimeoutMillis ?? 30000,
    connectionTimeoutMillis: config.pool?.connectionTimeoutMillis ?? 5000,
  });
}

function toAccountState(value: string): AccountState {
  switch (value) {
    case AccountState.Pending:
      return AccountState.Pending;
    case AccountState.Active:
      return AccountState.Active;
    default:
      throw new CredentialLifecycleError(
        'CORRUPT_ROW',
        `Unknown account state in storage: ${value}`,
        500
      );
  }
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === UNIQUE_VIOLATION;
}

function toAccount(row: UserRow): Account {
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.password_hash,
    salt: row.salt,
    activationSecret: row.activation_secret,
    state: toAccountState(row.state),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class PostgresAccountStore implements AccountStore {
  constructor(private readonly pool: pg.Pool) {}

  async findByEmail(email: string): Promise<Account | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${COLUMNS} FROM users WHERE email = $1`,
      [email]
    );
    return result.rows.length > 0 ? toAccount(result.rows[0]) : null;
  }

  async findById(id: AccountId): Promise<Account | null> {
    const result = await this.pool.query<UserRow>(`SELECT ${COLUMNS} FROM users WHERE id = $1`, [
      id,
    ]);
    return result.rows.length > 0 ? toAccount(result.rows[0]) : null;
  }

  /**
   * @throws {AlreadyActiveError} If the email is taken, e.g. by a concurrent registration
   */
  async insertPending(account: NewAccount): Promise<Account> {
    try {
      const result = await this.pool.query<UserRow>(
        `INSERT INTO users (email, password_hash, salt, activation_secret, state, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         RETURNING ${COLUMNS}`,
        [
          account.email,
          account.passwordHash,
          account.salt,
          account.activationSecret,
          AccountState.Pending,
          account.createdAt,
          account.updatedAt,
        ]
      );
      return toAccount(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new AlreadyActiveError('An account with this email already exists');
      }
      throw error;
    }
  }

  async delete(id: AccountId): Promise<void> {
    await this.pool.query('DELETE FROM users WHERE id = $1', [id]);
  }

  async markActive(id: AccountId, at: Date): Promise<void> {
    const result = await this.pool.query('UPDATE users SET state = $2, updated_at = $3 WHERE id = $1', [
      id,
      AccountState.Active,
      at,
    ]);
    if (result.rowCount === 0) {
      throw new NotFoundError(`Account ${id} not found`);
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
