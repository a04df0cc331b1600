/**
 * SQLite schema for the durable store.
 *
 * Applied idempotently on open. Decimal columns are TEXT so rates and
 * reference amounts round-trip without floating-point drift.
 */

export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS accounts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    external_id TEXT NOT NULL UNIQUE,
    display_name TEXT,
    default_currency TEXT NOT NULL,
    preferred_report_currency TEXT NOT NULL,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS categories (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    account_id INTEGER NOT NULL REFERENCES accounts(id) ON DELETE CASCADE,
    name TEXT NOT NULL,
    icon TEXT NOT NULL,
    flow_kind TEXT NOT NULL CHECK (flow_kind IN ('EXPENSE', 'INCOME')),
    is_default INTEGER NOT NULL DEFAULT 0,
    is_archived INTEGER NOT NULL DEFAULT 0
  );

  CREATE INDEX IF NOT EXISTS idx_categories_account_kind
    ON categories(account_id, flow_kind, is_archived);

  CREATE TABLE IF NOT EXISTS transactions (
    id TEXT PRIMARY KEY,
    account_id INTEGER NOT NULL REFERENCES accounts(id) ON DELETE CASCADE,
    kind TEXT NOT NULL CHECK (kind IN ('EXPENSE', 'INCOME', 'REVERSAL', 'SETTLEMENT')),
    amount_minor INTEGER NOT NULL CHECK (amount_minor > 0),
    currency TEXT NOT NULL,
    amount_eur TEXT NOT NULL,
    amount_usd TEXT NOT NULL,
    fx_rate_to_eur TEXT NOT NULL,
    fx_rate_to_usd TEXT NOT NULL,
    category_id INTEGER,
    note TEXT,
    at_time TEXT NOT NULL,
    created_at TEXT NOT NULL,
    related_debt_id TEXT,
    reverses_transaction_id TEXT UNIQUE REFERENCES transactions(id)
  );

  CREATE INDEX IF NOT EXISTS idx_transactions_account_time
    ON transactions(account_id, at_time);

  CREATE TABLE IF NOT EXISTS debts (
    id TEXT PRIMARY KEY,
    creditor_id INTEGER NOT NULL REFERENCES accounts(id) ON DELETE CASCADE,
    debtor_id INTEGER NOT NULL REFERENCES accounts(id) ON DELETE CASCADE,
    amount_minor INTEGER NOT NULL CHECK (amount_minor > 0),
    currency TEXT NOT NULL,
    amount_eur TEXT NOT NULL,
    amount_usd TEXT NOT NULL,
    fx_rate_to_eur TEXT NOT NULL,
    fx_rate_to_usd TEXT NOT NULL,
    category_id INTEGER,
    note TEXT,
    related_transaction_id TEXT,
    is_settled INTEGER NOT NULL DEFAULT 0,
    settled_at TEXT,
    created_at TEXT NOT NULL,
    CHECK (creditor_id <> debtor_id)
  );

  CREATE INDEX IF NOT EXISTS idx_debts_creditor ON debts(creditor_id, is_settled);
  CREATE INDEX IF NOT EXISTS idx_debts_debtor ON debts(debtor_id, is_settled);

  CREATE TABLE IF NOT EXISTS fx_rates (
    from_currency TEXT NOT NULL,
    to_currency TEXT NOT NULL,
    date TEXT NOT NULL,
    rate TEXT NOT NULL,
    fetched_at TEXT NOT NULL,
    PRIMARY KEY (from_currency, to_currency, date)
  );
`;
