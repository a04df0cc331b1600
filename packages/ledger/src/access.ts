/**
 * Lookup helpers that enforce existence and ownership.
 *
 * NOT_FOUND and ACCESS_DENIED are distinct here; the outer layer merges
 * them into one user message.
 */

import { FinanceError } from "@coinpurse/types";
import type { Account, Category, FlowKind, Transaction } from "@coinpurse/types";
import type { FinanceUnit } from "@coinpurse/store";

export function requireAccount(unit: FinanceUnit, accountId: number): Account {
  const account = unit.getAccount(accountId);
  if (account === undefined) {
    throw new FinanceError("NOT_FOUND", `Account ${accountId} not found`);
  }
  return account;
}

export function requireOwnedTransaction(
  unit: FinanceUnit,
  transactionId: string,
  accountId: number,
): Transaction {
  const transaction = unit.getTransaction(transactionId);
  if (transaction === undefined) {
    throw new FinanceError("NOT_FOUND", `Transaction ${transactionId} not found`);
  }
  if (transaction.accountId !== accountId) {
    throw new FinanceError(
      "ACCESS_DENIED",
      `Transaction ${transactionId} does not belong to account ${accountId}`,
    );
  }
  return transaction;
}

export function requireOwnedCategory(
  unit: FinanceUnit,
  categoryId: number,
  accountId: number,
): Category {
  const category = unit.getCategory(categoryId);
  if (category === undefined) {
    throw new FinanceError("NOT_FOUND", `Category ${categoryId} not found`);
  }
  if (category.accountId !== accountId) {
    throw new FinanceError(
      "ACCESS_DENIED",
      `Category ${categoryId} does not belong to account ${accountId}`,
    );
  }
  return category;
}

/**
 * Check that a category can take a new record: it exists, belongs to the
 * account, fits the kind and is not archived.
 */
export function requireCategory(
  unit: FinanceUnit,
  categoryId: number,
  accountId: number,
  kind: FlowKind,
): void {
  const category = unit.getCategory(categoryId);
  if (category === undefined || category.accountId !== accountId) {
    throw new FinanceError("NOT_FOUND", `Category ${categoryId} not found`);
  }
  if (category.flowKind !== kind) {
    throw new FinanceError(
      "VALIDATION_ERROR",
      `Category "${category.name}" is for ${category.flowKind.toLowerCase()}, not ${kind.toLowerCase()}`,
    );
  }
  if (category.isArchived) {
    throw new FinanceError("INVALID_OPERATION", `Category "${category.name}" is archived`);
  }
}

/**
 * Trim a free-text note; blank becomes null.
 */
export function normalizeNote(note: string | null | undefined): string | null {
  if (note === undefined || note === null) {
    return null;
  }
  const trimmed = note.trim();
  return trimmed === "" ? null : trimmed;
}

/**
 * Parse an ISO-8601 instant and return it in canonical UTC form.
 */
export function normalizeInstant(value: string): string {
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new FinanceError("VALIDATION_ERROR", `Invalid timestamp: "${value}"`);
  }
  return parsed.toISOString();
}
