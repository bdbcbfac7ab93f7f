import { AppError } from "../infra/app-error.js";

const MONTH_PATTERN = /^(\d{4})-(0[1-9]|1[0-2])$/;
const MIN_REQUESTED_YEAR = 1970;

export function variation(current: number, previous: number): number {
  if (previous === 0) {
    return 0;
  }
  return ((current - previous) * 100) / previous;
}

function matchMonth(month: string): { year: number; monthIndex: number } | null {
  const match = MONTH_PATTERN.exec(month);
  return match ? { year: Number(match[1]), monthIndex: Number(match[2]) - 1 } : null;
}

/** Months a caller may ask for: well formed and not before 1970. */
export function isMonth(value: string): boolean {
  const parsed = matchMonth(value);
  return parsed !== null && parsed.year >= MIN_REQUESTED_YEAR;
}

function parseMonth(month: string): { year: number; monthIndex: number } {
  const parsed = matchMonth(month);
  if (!parsed) {
    throw new AppError(422, "invalid_month", "month must use the YYYY-MM format.");
  }
  return parsed;
}

// Date.UTC would read years 0-99 as 1900-1999.
function monthStart(year: number, monthIndex: number): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, 1);
  return date;
}

function formatMonth(date: Date): string {
  const year = String(date.getUTCFullYear()).padStart(4, "0");
  return `${year}-${String(date.getUTCMonth() + 1).padStart(2, "0")}`;
}

/** Half-open UTC range `[from, to)` covering the month. */
export function monthRange(month: string): { from: string; to: string } {
  const { year, monthIndex } = parseMonth(month);
  return {
    from: monthStart(year, monthIndex).toISOString(),
    to: monthStart(year, monthIndex + 1).toISOString(),
  };
}

export function previousMonth(month: string): string {
  const { year, monthIndex } = parseMonth(month);
  return formatMonth(monthStart(year, monthIndex - 1));
}

export function monthOf(iso: string): string {
  return formatMonth(new Date(iso));
}
