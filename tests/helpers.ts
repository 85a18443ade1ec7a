import type { FetchOutcome } from "../src/types.js";
import { formatMonth } from "../src/utils.js";

const HEADER = [
  "Longitude (x)",
  "Latitude (y)",
  "Station Name",
  "Climate ID",
  "Date/Time",
  "Year",
  "Month",
  "Day",
  "Data Quality",
  "Max Temp (°C)",
  "Max Temp Flag",
  "Min Temp (°C)",
  "Min Temp Flag",
  "Mean Temp (°C)",
  "Mean Temp Flag",
];

function quote(values: string[]): string {
  return values.map((value) => `"${value}"`).join(",");
}

/**
 * A month page shaped like the bulk endpoint's daily CSV. Day `d` reports
 * max `d + 0.5`, min `d - 10` and mean `d - 5`.
 */
export function monthCsv(year: number, month: number, days: number): string {
  const lines = [quote(HEADER)];
  for (let day = 1; day <= days; day += 1) {
    const dd = String(day).padStart(2, "0");
    const mm = String(month).padStart(2, "0");
    lines.push(
      quote([
        "-97.24",
        "49.92",
        "TEST STATION",
        "0000001",
        `${year}-${mm}-${dd}`,
        String(year),
        mm,
        dd,
        "",
        String(day + 0.5),
        "",
        String(day - 10),
        "",
        String(day - 5),
        "",
      ])
    );
  }
  return `${lines.join("\n")}\n`;
}

export function page(text: string): FetchOutcome {
  return { kind: "page", text, encoding: "utf-8" };
}

export interface FakeSource {
  calls: string[];
  fetchMonth: (stationId: number, year: number, month: number) => Promise<FetchOutcome>;
}

/**
 * Serves whatever `outcomes` holds for a "YYYY-MM" key. Functions are called
 * on every request so a test can vary the answer between attempts; unknown
 * months answer 404.
 */
export function fakeSource(
  outcomes: Record<string, FetchOutcome | (() => FetchOutcome)>
): FakeSource {
  const calls: string[] = [];
  return {
    calls,
    fetchMonth: async (_stationId, year, month) => {
      const key = formatMonth({ year, month });
      calls.push(key);
      const outcome = outcomes[key];
      if (outcome === undefined) {
        return { kind: "end-of-data", status: 404 };
      }
      return typeof outcome === "function" ? outcome() : outcome;
    },
  };
}

export async function noSleep(_ms: number): Promise<void> {}
