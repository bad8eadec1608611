/**
 * Account State Machine - Pending → Active lifecycle
 *
 *   Pending --activate--> Active (terminal)
 *   Pending --new pre-registration, same email--> deleted, replaced by a new Pending row
 *
 * Decides when an account may receive credentials. Touches the store and
 * the clock, never key material.
 */

import type { Account, AccountStore, Clock } from './types.js';
import { AccountState, isActive, systemClock } from './types.js';
import { hashesEqual, hashPassword, randomAlphanumeric, safeEqual } from './password.js';
import {
  AlreadyActiveError,
  AuthenticationError,
  ExpiredTokenError,
  InactiveAccountError,
  InvalidTokenError,
} from '../utils/errors.js';

export const SALT_LENGTH = 30;
export const ACTIVATION_SECRET_LENGTH = 8;

/** 30 minutes */
export const DEFAULT_ACTIVATION_WINDOW_SECONDS = 30 * 60;

// Hashed against on logins that fail before a real salt is available
const DECOY_SALT = randomAlphanumeric(SALT_LENGTH);

export interface AccountStateMachineOptions {
  activationWindowSeconds?: number;
  clock?: Clock;
}

export class AccountStateMachine {
  private readonly store: AccountStore;
  private readonly clock: Clock;
  private readonly activationWindowMs: number;

  constructor(store: AccountStore, options: AccountStateMachineOptions = {}) {
    this.store = store;
    this.clock = options.clock ?? systemClock;
    this.activationWindowMs =
      (options.activationWindowSeconds ?? DEFAULT_ACTIVATION_WINDOW_SECONDS) * 1000;
  }

  /**
   * Create a fresh Pending account.
   *
   * A Pending account already holding this email is deleted first, so its
   * salt and activation secret are discarded rather than merged.
   *
   * @throws {AlreadyActiveError} If an Active account holds this email
   */
  async beginRegistration(email: string, password: string): Promise<Account> {
    const existing = await this.store.findByEmail(email);
    if (existing) {
      if (isActive(existing)) {
        throw new AlreadyActiveError('An active account already exists for this email');
      }
      await this.store.delete(existing.id);
    }

    const salt = randomAlphanumeric(SALT_LENGTH);
    const activationSecret = randomAlphanumeric(ACTIVATION_SECRET_LENGTH);
    const passwordHash = await hashPassword(password, salt);
    const now = this.clock.now();

    return this.store.insertPending({
      email,
      passwordHash,
      salt,
      activationSecret,
      state: AccountState.Pending,
      createdAt: now,
      updatedAt: now,
    });
  }

  /**
   * Move a Pending account to Active.
   *
   * Checks run in order: state, secret, window. The window is measured from
   * `updatedAt`, the moment the secret was generated.
   */
  async activate(account: Account, presentedSecret: string): Promise<Account> {
    if (isActive(account)) {
      throw new AlreadyActiveError();
    }

    if (!safeEqual(presentedSecret, account.activationSecret)) {
      throw new InvalidTokenError('Activation secret does not match');
    }

    const now = this.clock.now();
    const deadline = account.updatedAt.getTime() + this.activationWindowMs;
    if (now.getTime() > deadline) {
      throw new ExpiredTokenError('Activation secret has expired', {
        expiredAt: new Date(deadline).toISOString(),
      });
    }

    await this.store.markActive(account.id, now);
    return { ...account, state: AccountState.Active, updatedAt: now };
  }

  /**
   * Check a password against an Active account.
   *
   * State is checked before the password, so a Pending account fails with
   * InactiveAccountError whether or not the password is right. Every path
   * computes exactly one password hash.
   */
  async authenticate(account: Account, password: string): Promise<void> {
    if (!isActive(account)) {
      await this.rejectWithoutAccount(password);
      throw new InactiveAccountError();
    }

    const actual = await hashPassword(password, account.salt);
    if (!hashesEqual(actual, account.passwordHash)) {
      throw new AuthenticationError();
    }
  }

  /**
   * Spend one password hash on a login that has no usable account, so its
   * latency matches a wrong password.
   */
  async rejectWithoutAccount(password: string): Promise<void> {
    await hashPassword(password, DECOY_SALT);
  }
}
