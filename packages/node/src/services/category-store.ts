/**
 * CategoryStore — Per-account expense and income categories.
 *
 * Every new account receives a copy of the default categories from
 * data/default-categories.json.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { FinanceError } from "@coinpurse/types";
import type { Category, FlowKind } from "@coinpurse/types";
import type { FinanceStore, FinanceUnit } from "@coinpurse/store";
import { requireAccount, requireOwnedCategory } from "@coinpurse/ledger";

const MAX_NAME_LENGTH = 64;
const MAX_ICON_LENGTH = 16;

const DefaultCategorySchema = z.object({
  name: z.string().min(1).max(MAX_NAME_LENGTH),
  icon: z.string().min(1).max(MAX_ICON_LENGTH),
  flowKind: z.enum(["EXPENSE", "INCOME"]),
});

export type DefaultCategory = z.infer<typeof DefaultCategorySchema>;

const DEFAULTS_FILE = new URL("../../data/default-categories.json", import.meta.url);

/**
 * Read and validate the bundled default categories.
 */
export function loadDefaultCategories(path: URL | string = DEFAULTS_FILE): readonly DefaultCategory[] {
  const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
  return z.array(DefaultCategorySchema).parse(raw);
}

export interface NewCategoryInput {
  readonly name: string;
  readonly icon: string;
  readonly flowKind: FlowKind;
}

export interface CategoryChanges {
  readonly name?: string | undefined;
  readonly icon?: string | undefined;
}

function cleanName(name: string): string {
  const trimmed = name.trim();
  if (trimmed === "" || trimmed.length > MAX_NAME_LENGTH) {
    throw new FinanceError("VALIDATION_ERROR", `Category name must be 1-${MAX_NAME_LENGTH} characters`);
  }
  return trimmed;
}

function cleanIcon(icon: string): string {
  const trimmed = icon.trim();
  if (trimmed === "" || trimmed.length > MAX_ICON_LENGTH) {
    throw new FinanceError("VALIDATION_ERROR", `Category icon must be 1-${MAX_ICON_LENGTH} characters`);
  }
  return trimmed;
}

/**
 * Names are unique per account and kind, ignoring case.
 */
function requireFreeName(
  unit: FinanceUnit,
  accountId: number,
  flowKind: FlowKind,
  name: string,
  exceptId?: number,
): void {
  const taken = unit
    .listCategories(accountId, { flowKind, includeArchived: true })
    .some((c) => c.id !== exceptId && c.name.toLowerCase() === name.toLowerCase());
  if (taken) {
    throw new FinanceError("INVALID_OPERATION", `Category "${name}" already exists`);
  }
}

export class CategoryStore {
  private readonly _store: FinanceStore;
  private readonly _defaults: readonly DefaultCategory[];

  constructor(store: FinanceStore, defaults: readonly DefaultCategory[] = loadDefaultCategories()) {
    this._store = store;
    this._defaults = defaults;
  }

  /**
   * Categories of an account, defaults first, then by name.
   */
  list(accountId: number, flowKind?: FlowKind, includeArchived: boolean = false): readonly Category[] {
    return this._store.transaction((unit) => {
      requireAccount(unit, accountId);
      return unit.listCategories(accountId, { flowKind, includeArchived });
    });
  }

  /**
   * Add a custom category.
   */
  create(accountId: number, input: NewCategoryInput): Category {
    const name = cleanName(input.name);
    const icon = cleanIcon(input.icon);

    return this._store.transaction((unit) => {
      requireAccount(unit, accountId);
      requireFreeName(unit, accountId, input.flowKind, name);
      return unit.insertCategory({ accountId, name, icon, flowKind: input.flowKind, isDefault: false });
    });
  }

  /**
   * Rename a category or change its icon. Default categories can be
   * edited too; the copy belongs to the account.
   */
  update(accountId: number, categoryId: number, changes: CategoryChanges): Category {
    const name = changes.name === undefined ? undefined : cleanName(changes.name);
    const icon = changes.icon === undefined ? undefined : cleanIcon(changes.icon);
    if (name === undefined && icon === undefined) {
      throw new FinanceError("VALIDATION_ERROR", "Nothing to update");
    }

    return this._store.transaction((unit) => {
      const category = requireOwnedCategory(unit, categoryId, accountId);
      if (name !== undefined) {
        requireFreeName(unit, accountId, category.flowKind, name, category.id);
      }
      return unit.updateCategory(category.id, { name, icon });
    });
  }

  /**
   * Hide a category from lists and flows. Records already filed under it
   * keep it.
   */
  archive(accountId: number, categoryId: number): Category {
    return this.setArchived(accountId, categoryId, true);
  }

  unarchive(accountId: number, categoryId: number): Category {
    return this.setArchived(accountId, categoryId, false);
  }

  private setArchived(accountId: number, categoryId: number, isArchived: boolean): Category {
    return this._store.transaction((unit) => {
      const category = requireOwnedCategory(unit, categoryId, accountId);
      return unit.updateCategory(category.id, { isArchived });
    });
  }

  /**
   * Copy the default categories to an account. Runs inside the caller's
   * unit of work.
   */
  seedDefaults(unit: FinanceUnit, accountId: number): readonly Category[] {
    return this._defaults.map((category) =>
      unit.insertCategory({ accountId, ...category, isDefault: true }),
    );
  }
}
