/**
 * UserDirectory — Maps external identities to accounts.
 *
 * Accounts are created on first contact and never deleted.
 */

import type { Account, Currency } from "@coinpurse/types";
import type { FinanceStore } from "@coinpurse/store";
import { normalizeCurrency } from "@coinpurse/fx";
import { requireAccount } from "@coinpurse/ledger";
import type { CategoryStore } from "./category-store.js";

export interface UserDirectoryOptions {
  readonly store: FinanceStore;
  readonly categories: CategoryStore;
  /** Default and report currency of new accounts */
  readonly defaultCurrency: Currency;
  readonly now?: (() => Date) | undefined;
  /** Called once for every account created */
  readonly onAccountCreated?: ((account: Account) => void) | undefined;
}

export class UserDirectory {
  private readonly _store: FinanceStore;
  private readonly _categories: CategoryStore;
  private readonly _defaultCurrency: Currency;
  private readonly _now: () => Date;
  private readonly _onAccountCreated: ((account: Account) => void) | undefined;

  constructor(options: UserDirectoryOptions) {
    this._store = options.store;
    this._categories = options.categories;
    this._defaultCurrency = normalizeCurrency(options.defaultCurrency);
    this._now = options.now ?? (() => new Date());
    this._onAccountCreated = options.onAccountCreated;
  }

  /**
   * Get or create the account of an external id.
   *
   * An existing account takes over a changed display name; passing
   * undefined leaves the stored name alone. A new account gets the
   * default categories in the same unit of work.
   */
  resolve(externalId: string, displayName?: string | null): Account {
    const name = displayName === undefined ? undefined : normalizeDisplayName(displayName);

    const { account, created } = this._store.transaction((unit) => {
      const existing = unit.findAccountByExternalId(externalId);
      if (existing !== undefined) {
        if (name !== undefined && name !== existing.displayName) {
          return { account: unit.updateAccount(existing.id, { displayName: name }), created: false };
        }
        return { account: existing, created: false };
      }

      const fresh = unit.insertAccount({
        externalId,
        displayName: name ?? null,
        defaultCurrency: this._defaultCurrency,
        preferredReportCurrency: this._defaultCurrency,
        createdAt: this._now().toISOString(),
      });
      this._categories.seedDefaults(unit, fresh.id);
      return { account: fresh, created: true };
    });

    if (created) {
      this._onAccountCreated?.(account);
    }
    return account;
  }

  findByExternalId(externalId: string): Account | undefined {
    return this._store.findAccountByExternalId(externalId);
  }

  updateDefaultCurrency(accountId: number, currency: Currency): Account {
    const code = normalizeCurrency(currency);
    return this._store.transaction((unit) => {
      requireAccount(unit, accountId);
      return unit.updateAccount(accountId, { defaultCurrency: code });
    });
  }

  updatePreferredReportCurrency(accountId: number, currency: Currency): Account {
    const code = normalizeCurrency(currency);
    return this._store.transaction((unit) => {
      requireAccount(unit, accountId);
      return unit.updateAccount(accountId, { preferredReportCurrency: code });
    });
  }
}

function normalizeDisplayName(value: string | null): string | null {
  if (value === null) return null;
  const trimmed = value.trim();
  return trimmed === "" ? null : trimmed;
}
