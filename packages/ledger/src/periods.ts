/**
 * Report period construction and validation.
 *
 * Periods are calendar ranges in UTC. A monthly period spans the first
 * to the last day of the month; a range spans start 00:00:00.000 to
 * end 23:59:59.999.
 */

import { FinanceError, isIsoDate } from "@coinpurse/types";
import type { DateRangePeriod, MonthlyPeriod, ReportPeriod } from "@coinpurse/types";
import type { PeriodBounds } from "./types.js";

function pad2(n: number): string {
  return n.toString().padStart(2, "0");
}

/** Number of days in a month (1-12) of a year. */
export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function monthlyPeriod(year: number, month: number): MonthlyPeriod {
  if (!Number.isInteger(year) || year < 1970 || year > 9999) {
    throw new FinanceError("VALIDATION_ERROR", `Invalid report year: ${String(year)}`);
  }
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new FinanceError("VALIDATION_ERROR", `Invalid report month: ${String(month)}`);
  }
  return { kind: "monthly", year, month };
}

export function dateRangePeriod(start: string, end: string): DateRangePeriod {
  if (!isIsoDate(start) || !isIsoDate(end)) {
    throw new FinanceError("VALIDATION_ERROR", `Invalid date range: ${start} .. ${end}`);
  }
  if (start > end) {
    throw new FinanceError("VALIDATION_ERROR", "Start date must not be after end date");
  }
  return { kind: "range", start, end };
}

/**
 * The inclusive instants covered by a period. Validates the period.
 */
export function periodBounds(period: ReportPeriod): PeriodBounds {
  switch (period.kind) {
    case "monthly": {
      const { year, month } = monthlyPeriod(period.year, period.month);
      const prefix = `${String(year).padStart(4, "0")}-${pad2(month)}`;
      return {
        fromTime: `${prefix}-01T00:00:00.000Z`,
        toTime: `${prefix}-${pad2(daysInMonth(year, month))}T23:59:59.999Z`,
      };
    }
    case "range": {
      const { start, end } = dateRangePeriod(period.start, period.end);
      return {
        fromTime: `${start}T00:00:00.000Z`,
        toTime: `${end}T23:59:59.999Z`,
      };
    }
  }
}
