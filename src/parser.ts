import { parse } from "csv-parse/sync";
import type { ObservationSet } from "./types.js";
import { type Logger, silentLogger } from "./logger.js";
import { formatMonth, observation, parseOptionalNumber } from "./utils.js";

type CsvRecord = Record<string, string | undefined>;

// Ordered by preference. The source has shipped the degree sign both as
// UTF-8 and as mis-decoded Latin-1.
export const HEADER_SYNONYMS = {
  date: ["Date/Time", "Date", "Local Date"],
  max: ["Max Temp (°C)", "Max Temp (Â°C)", "Max Temp (C)"],
  min: ["Min Temp (°C)", "Min Temp (Â°C)", "Min Temp (C)"],
  mean: ["Mean Temp (°C)", "Mean Temp (Â°C)", "Mean Temp (C)"],
} as const;

type LogicalField = keyof typeof HEADER_SYNONYMS;

export type ColumnMap = Record<LogicalField, string | null>;

export function resolveColumns(header: readonly string[]): ColumnMap {
  const byLowerName = new Map<string, string>();
  for (const name of header) {
    const key = name.trim().toLowerCase();
    if (!byLowerName.has(key)) {
      byLowerName.set(key, name);
    }
  }

  const pick = (candidates: readonly string[]): string | null => {
    for (const candidate of candidates) {
      const found = byLowerName.get(candidate.toLowerCase());
      if (found !== undefined) {
        return found;
      }
    }
    return null;
  };

  return {
    date: pick(HEADER_SYNONYMS.date),
    max: pick(HEADER_SYNONYMS.max),
    min: pick(HEADER_SYNONYMS.min),
    mean: pick(HEADER_SYNONYMS.mean),
  };
}

export function isDayInMonth(date: string, year: number, month: number): boolean {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(date);
  if (!match) {
    return false;
  }
  const y = Number(match[1]);
  const m = Number(match[2]);
  const d = Number(match[3]);
  if (y !== year || m !== month || d < 1) {
    return false;
  }
  const daysInMonth = new Date(Date.UTC(y, m, 0)).getUTCDate();
  return d <= daysInMonth;
}

function readRecords(rawText: string): { header: string[]; records: CsvRecord[] } {
  const records: unknown = parse(rawText, {
    columns: (header: string[]) => header.map((name) => name.trim()),
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
    relax_quotes: true,
  });
  if (!Array.isArray(records)) {
    return { header: [], records: [] };
  }

  const rows: CsvRecord[] = [];
  const header = new Set<string>();
  for (const record of records) {
    if (typeof record !== "object" || record === null) {
      continue;
    }
    const row: CsvRecord = {};
    for (const [key, value] of Object.entries(record)) {
      header.add(key);
      row[key] = typeof value === "string" ? value : undefined;
    }
    rows.push(row);
  }
  return { header: [...header], records: rows };
}

export function parseMonthCsv(
  rawText: string,
  year: number,
  month: number,
  logger: Logger = silentLogger
): ObservationSet {
  const results: ObservationSet = new Map();
  const period = formatMonth({ year, month });

  let parsed: { header: string[]; records: CsvRecord[] };
  try {
    parsed = readRecords(rawText);
  } catch (error) {
    logger.warn({ period, err: error }, "unreadable CSV page");
    return results;
  }

  const columns = resolveColumns(parsed.header);
  if (columns.date === null) {
    logger.warn({ period, header: parsed.header }, "no date column on page");
    return results;
  }

  const cell = (row: CsvRecord, column: string | null): number | null =>
    column === null ? null : parseOptionalNumber(row[column]);

  let dayRows = 0;
  let matched = 0;
  for (const row of parsed.records) {
    const date = (row[columns.date] ?? "").trim().slice(0, 10);
    if (!isDayInMonth(date, year, month)) {
      continue;
    }

    dayRows += 1;
    const day = observation(
      date,
      cell(row, columns.min),
      cell(row, columns.max),
      cell(row, columns.mean)
    );
    if (day.minTemp !== null || day.maxTemp !== null || day.meanTemp !== null) {
      matched += 1;
    }
    results.set(date, day);
  }

  logger.debug({ period, dayRows, matched }, "parsed month");
  return results;
}
