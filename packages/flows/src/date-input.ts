/**
 * Date input parsing.
 *
 * Users type days as DD.MM (current UTC year) or DD.MM.YYYY, and ranges as
 * "DD.MM-DD.MM" or "DD.MM.YYYY - DD.MM.YYYY". Results are YYYY-MM-DD.
 */

import { FinanceError, isIsoDate } from "@coinpurse/types";
import type { DateRangePeriod } from "@coinpurse/types";

const DAY_PATTERN = /^(\d{1,2})\.(\d{1,2})(?:\.(\d{4}))?$/;

const SINGLE_DATE_HELP =
  "Invalid date format. Please use DD.MM.YYYY or DD.MM format (e.g., 15.03.2024 or 15.09).";

const RANGE_HELP =
  "Invalid date range format. Please use DD.MM-DD.MM or DD.MM.YYYY - DD.MM.YYYY format " +
  "(e.g., 01.03-15.03 or 01.03.2024 - 15.03.2024).";

interface ParsedDay {
  readonly date: string;
  readonly hasYear: boolean;
}

function parseDay(text: string, now: Date): ParsedDay | undefined {
  const match = DAY_PATTERN.exec(text.trim());
  if (match === null) return undefined;

  const [, day = "", month = "", year] = match;
  const hasYear = year !== undefined;
  const date = [
    hasYear ? year : String(now.getUTCFullYear()),
    month.padStart(2, "0"),
    day.padStart(2, "0"),
  ].join("-");
  return isIsoDate(date) ? { date, hasYear } : undefined;
}

/**
 * Parse "DD.MM" or "DD.MM.YYYY" into YYYY-MM-DD.
 */
export function parseSingleDate(text: string, now: Date = new Date()): string {
  const parsed = parseDay(text, now);
  if (parsed === undefined) {
    throw new FinanceError("VALIDATION_ERROR", SINGLE_DATE_HELP);
  }
  return parsed.date;
}

/**
 * Parse an inclusive date range. Both sides must use the same format and
 * the start may not come after the end.
 */
export function parseDateRange(text: string, now: Date = new Date()): DateRangePeriod {
  const dash = text.indexOf("-");
  if (dash === -1) {
    throw new FinanceError("VALIDATION_ERROR", RANGE_HELP);
  }

  const start = parseDay(text.slice(0, dash), now);
  const end = parseDay(text.slice(dash + 1), now);
  if (start === undefined || end === undefined) {
    throw new FinanceError("VALIDATION_ERROR", RANGE_HELP);
  }
  if (start.hasYear !== end.hasYear) {
    throw new FinanceError(
      "VALIDATION_ERROR",
      "Both dates in the range must have the same format. " +
        "Use either DD.MM-DD.MM or DD.MM.YYYY - DD.MM.YYYY.",
    );
  }
  if (start.date > end.date) {
    throw new FinanceError("VALIDATION_ERROR", "Start date must be before or equal to end date.");
  }

  return { kind: "range", start: start.date, end: end.date };
}
