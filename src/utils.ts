import type { DailyObservation, MonthCursor, ObservationSet } from "./types.js";

export function stepBackward(cursor: MonthCursor): MonthCursor {
  if (cursor.month <= 1) {
    return { year: cursor.year - 1, month: 12 };
  }
  return { year: cursor.year, month: cursor.month - 1 };
}

export function compareMonths(a: MonthCursor, b: MonthCursor): number {
  return a.year !== b.year ? a.year - b.year : a.month - b.month;
}

export function isValidMonth(month: number): boolean {
  return Number.isInteger(month) && month >= 1 && month <= 12;
}

// Local calendar month: `new Date("2024-03-01")` is UTC midnight and lands in
// February west of Greenwich. Build start dates with `new Date(y, m - 1, d)`.
export function monthOf(date: Date): MonthCursor {
  return { year: date.getFullYear(), month: date.getMonth() + 1 };
}

export function formatMonth(cursor: MonthCursor): string {
  const yyyy = String(cursor.year).padStart(4, "0");
  const mm = String(cursor.month).padStart(2, "0");
  return `${yyyy}-${mm}`;
}

// Accepts "YYYY-MM" and "YYYY-M".
export function parseMonth(raw: string): MonthCursor | null {
  const match = /^(\d{4})-(\d{1,2})$/.exec(raw.trim());
  if (!match) {
    return null;
  }
  const year = Number.parseInt(match[1], 10);
  const month = Number.parseInt(match[2], 10);
  return isValidMonth(month) ? { year, month } : null;
}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function parseOptionalNumber(raw: string | undefined): number | null {
  if (raw === undefined) {
    return null;
  }
  const text = raw.trim();
  if (!DECIMAL.test(text)) {
    return null;
  }
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

export function mergeObservations(
  target: ObservationSet,
  source: ObservationSet
): ObservationSet {
  for (const [date, observation] of source) {
    target.set(date, observation);
  }
  return target;
}

export function observation(
  date: string,
  minTemp: number | null,
  maxTemp: number | null,
  meanTemp: number | null
): DailyObservation {
  return Object.freeze({ date, minTemp, maxTemp, meanTemp });
}

export function calculateNextDelay(intervalMinutes: number): number {
  const intervalMs = intervalMinutes * 60 * 1000;
  const now = Date.now();
  const next = Math.ceil(now / intervalMs) * intervalMs;
  return Math.max(next - now, 0);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
