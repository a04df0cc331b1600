/**
 * Parsers for single flow inputs. Each returns the parsed value or
 * throws FinanceError with a message the user can act on.
 */

import { FinanceError } from "@coinpurse/types";
import type { Currency } from "@coinpurse/types";
import { normalizeCurrency } from "@coinpurse/fx";
import { formatMinor, normalizeNote, toPositiveMinorUnits } from "@coinpurse/ledger";
import { SKIP_INPUTS } from "./types.js";

export function isSkip(input: string): boolean {
  return SKIP_INPUTS.has(input.trim().toLowerCase());
}

/** Positive amount; a decimal comma is accepted. Returns 2-digit major units. */
export function parseAmountInput(input: string): string {
  return formatMinor(toPositiveMinorUnits(input.trim().replace(",", ".")));
}

export function parseCurrencyInput(input: string): Currency {
  return normalizeCurrency(input);
}

/** A category id, or null when skipped. */
export function parseCategoryInput(input: string): number | null {
  if (isSkip(input)) return null;
  const text = input.trim();
  const id = /^\d+$/.test(text) ? Number(text) : NaN;
  if (!Number.isSafeInteger(id) || id < 1) {
    throw new FinanceError("VALIDATION_ERROR", `Invalid category: "${text}"`);
  }
  return id;
}

export function parseNoteInput(input: string): string | null {
  return isSkip(input) ? null : normalizeNote(input);
}

/** Run a parser, turning a FinanceError into its message. */
export function attempt<T>(parse: () => T): { ok: true; value: T } | { ok: false; message: string } {
  try {
    return { ok: true, value: parse() };
  } catch (err: unknown) {
    if (err instanceof FinanceError) {
      return { ok: false, message: err.message };
    }
    throw err;
  }
}
