import type { Account, AccountId, AccountStore, NewAccount } from '../core/types.js';
import { AccountState } from '../core/types.js';
import { AlreadyActiveError, NotFoundError } from '../utils/errors.js';

/**
 * Map-backed AccountStore for development and tests.
 *
 * Ids are assigned from 1 upwards and never reused; email uniqueness is
 * enforced the way the `users` table's unique index would.
 */
export class InMemoryAccountStore implements AccountStore {
  private readonly accounts = new Map<AccountId, Account>();
  private nextId = 1;

  async findByEmail(email: string): Promise<Account | null> {
    for (const account of this.accounts.values()) {
      if (account.email === email) {
        return { ...account };
      }
    }
    return null;
  }

  async findById(id: AccountId): Promise<Account | null> {
    const account = this.accounts.get(id);
    return account ? { ...account } : null;
  }

  async insertPending(account: NewAccount): Promise<Account> {
    if (await this.findByEmail(account.email)) {
      throw new AlreadyActiveError('An account with this email already exists');
    }

    const stored: Account = { ...account, id: this.nextId++, state: AccountState.Pending };
    this.accounts.set(stored.id, stored);
    return { ...stored };
  }

  async delete(id: AccountId): Promise<void> {
    this.accounts.delete(id);
  }

  async markActive(id: AccountId, at: Date): Promise<void> {
    const account = this.accounts.get(id);
    if (!account) {
      throw new NotFoundError(`Account ${id} not found`);
    }
    this.accounts.set(id, { ...account, state: AccountState.Active, updatedAt: at });
  }

  size(): number {
    return this.accounts.size;
  }
}
