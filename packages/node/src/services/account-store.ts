/**
 * In-memory account store for the example service.
 *
 * Failures are thrown as ApiError values, so route handlers never build
 * error responses themselves. In-memory only — survives as long as the process.
 */

import { ApiError } from "../errors.js";
import type { CreateAccountDto } from "../types/dto.js";

// =============================================================================
// Types
// =============================================================================

export interface Account {
  readonly id: string;
  readonly owner: string;
  readonly balance: number;
  readonly createdAt: string;
}

// =============================================================================
// AccountStore
// =============================================================================

export class AccountStore {
  private readonly _accounts = new Map<string, Account>();

  /**
   * All accounts, in creation order.
   */
  list(): readonly Account[] {
    return [...this._accounts.values()];
  }

  /**
   * @throws ApiError AccountNotFound
   */
  get(id: string): Account {
    const account = this._accounts.get(id);
    if (account === undefined) {
      throw ApiError.create({ variant: "AccountNotFound", payload: id });
    }
    return account;
  }

  /**
   * @throws ApiError AccountExists
   */
  create(dto: CreateAccountDto): Account {
    if (this._accounts.has(dto.id)) {
      throw ApiError.create({ variant: "AccountExists", payload: dto.id });
    }
    const account: Account = {
      id: dto.id,
      owner: dto.owner,
      balance: dto.balance,
      createdAt: new Date().toISOString(),
    };
    this._accounts.set(account.id, account);
    return account;
  }

  /**
   * @throws ApiError BalanceLimitExceeded if the balance would pass
   *   Number.MAX_SAFE_INTEGER
   */
  deposit(id: string, amount: number): Account {
    const account = this.get(id);
    const balance = account.balance + amount;
    if (!Number.isSafeInteger(balance)) {
      throw ApiError.create({ variant: "BalanceLimitExceeded", payload: id });
    }
    return this.replace({ ...account, balance });
  }

  /**
   * @throws ApiError InsufficientFunds if the balance would go negative
   */
  withdraw(id: string, amount: number): Account {
    const account = this.get(id);
    if (account.balance < amount) {
      throw ApiError.create({ variant: "InsufficientFunds", payload: id });
    }
    return this.replace({ ...account, balance: account.balance - amount });
  }

  /**
   * @throws ApiError AccountNotFound
   */
  delete(id: string): void {
    if (!this._accounts.delete(id)) {
      throw ApiError.create({ variant: "AccountNotFound", payload: id });
    }
  }

  get size(): number {
    return this._accounts.size;
  }

  private replace(account: Account): Account {
    this._accounts.set(account.id, account);
    return account;
  }
}
