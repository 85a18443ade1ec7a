import type { FetchOutcome } from "./types.js";
import { DEFAULT_FETCH_TIMEOUT_MS, DEFAULT_USER_AGENT } from "./config.js";
import { type Logger, silentLogger } from "./logger.js";
import { formatMonth } from "./utils.js";

export const BULK_DATA_URL =
  "https://climate.weather.gc.ca/climate_data/bulk_data_e.html";

// timeframe=2 selects daily rows on the bulk endpoint
const DAILY_TIMEFRAME = "2";

export type FetchFn = typeof fetch;

export interface FetchMonthOptions {
  timeoutMs?: number;
  userAgent?: string;
  fetchFn?: FetchFn;
  logger?: Logger;
}

export function buildMonthUrl(stationId: number, year: number, month: number): string {
  const params = new URLSearchParams({
    format: "csv",
    stationID: String(stationId),
    Year: String(year),
    Month: String(month),
    Day: "1",
    timeframe: DAILY_TIMEFRAME,
    submit: " Download Data",
  });

  return `${BULK_DATA_URL}?${params.toString()}`;
}

function charsetOf(contentType: string | null): string {
  const match = contentType ? /charset=([^;]+)/i.exec(contentType) : null;
  return match ? match[1].trim().replace(/^"|"$/g, "").toLowerCase() : "utf-8";
}

export async function fetchMonth(
  stationId: number,
  year: number,
  month: number,
  options: FetchMonthOptions = {}
): Promise<FetchOutcome> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
  const fetchFn = options.fetchFn ?? fetch;
  const log = options.logger ?? silentLogger;
  const period = formatMonth({ year, month });
  const url = buildMonthUrl(stationId, year, month);

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetchFn(url, {
      signal: controller.signal,
      headers: { "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT },
    });

    if (response.status === 404) {
      log.info({ stationId, period, status: 404 }, "month not available");
      return { kind: "end-of-data", status: 404 };
    }
    if (!response.ok) {
      log.error({ stationId, period, status: response.status }, "unexpected response status");
      return {
        kind: "transient-failure",
        reason: `HTTP ${response.status}`,
        status: response.status,
      };
    }

    const bytes = new Uint8Array(await response.arrayBuffer());
    const text = new TextDecoder("utf-8", { fatal: false }).decode(bytes);
    return {
      kind: "page",
      text,
      encoding: charsetOf(response.headers.get("content-type")),
    };
  } catch (error) {
    const reason = controller.signal.aborted
      ? `timed out after ${timeoutMs}ms`
      : error instanceof Error
        ? error.message
        : String(error);
    log.error({ stationId, period, err: error }, `fetch failed: ${reason}`);
    return { kind: "transient-failure", reason };
  } finally {
    clearTimeout(timeoutId);
  }
}
