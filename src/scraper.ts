import type { FetchOutcome, MonthCursor, ObservationSet, ProgressObserver } from "./types.js";
import { DEFAULT_PAUSE_MS, DEFAULT_STATION_ID } from "./config.js";
import { fetchMonth, type FetchMonthOptions } from "./fetcher.js";
import { parseMonthCsv } from "./parser.js";
import { type Logger, silentLogger } from "./logger.js";
import {
  compareMonths,
  formatMonth,
  isValidMonth,
  mergeObservations,
  monthOf,
  sleep,
  stepBackward,
} from "./utils.js";

export type MonthFetcher = (
  stationId: number,
  year: number,
  month: number
) => Promise<FetchOutcome>;

export interface WeatherScraperOptions {
  stationId?: number;
  pauseMs?: number;
  /**
   * How many times a month that failed transiently is fetched again before
   * the walk gives up on it. 0 ends the walk on the first failure, exactly
   * like a missing month.
   */
  transientRetries?: number;
  progress?: ProgressObserver;
  signal?: AbortSignal;
  logger?: Logger;
  fetchMonth?: MonthFetcher;
  fetchOptions?: Omit<FetchMonthOptions, "logger">;
  sleep?: (ms: number) => Promise<void>;
}

type StopReason = "end-of-data" | "empty-page" | "transient-failure" | "limit" | "aborted";

export class WeatherScraper {
  readonly stationId: number;
  private readonly pauseMs: number;
  private readonly transientRetries: number;
  private readonly progress?: ProgressObserver;
  private readonly signal?: AbortSignal;
  private readonly log: Logger;
  private readonly fetcher: MonthFetcher;
  private readonly pause: (ms: number) => Promise<void>;

  constructor(options: WeatherScraperOptions = {}) {
    this.stationId = options.stationId ?? DEFAULT_STATION_ID;
    this.pauseMs = options.pauseMs ?? DEFAULT_PAUSE_MS;
    this.transientRetries = Math.max(0, options.transientRetries ?? 0);
    this.progress = options.progress;
    this.signal = options.signal;
    this.log = options.logger ?? silentLogger;
    this.pause = options.sleep ?? sleep;

    const log = this.log;
    const fetchOptions = options.fetchOptions ?? {};
    this.fetcher =
      options.fetchMonth ??
      ((stationId, year, month) =>
        fetchMonth(stationId, year, month, { ...fetchOptions, logger: log }));
  }

  /** `start` is read in local time; only its year and month matter. */
  async scrapeBackwards(start: Date = new Date()): Promise<ObservationSet> {
    return this.walk(monthOf(start), () => true);
  }

  async scrapeLastMonths(months: number, start: Date = new Date()): Promise<ObservationSet> {
    if (months <= 0) {
      return new Map();
    }
    return this.walk(monthOf(start), (_cursor, done) => done < months);
  }

  async scrapeRange(y1: number, m1: number, y2: number, m2: number): Promise<ObservationSet> {
    if (!isValidMonth(m1) || !isValidMonth(m2)) {
      throw new RangeError(`Months must be between 1 and 12 (got ${m1} and ${m2})`);
    }
    const a = { year: y1, month: m1 };
    const b = { year: y2, month: m2 };
    const [newer, older] = compareMonths(a, b) >= 0 ? [a, b] : [b, a];

    return this.walk(newer, (cursor) => compareMonths(cursor, older) >= 0);
  }

  scrapeMonth(year: number, month: number): Promise<ObservationSet> {
    return this.scrapeRange(year, month, year, month);
  }

  private async walk(
    start: MonthCursor,
    shouldFetch: (cursor: MonthCursor, monthsDone: number) => boolean
  ): Promise<ObservationSet> {
    const observations: ObservationSet = new Map();
    let cursor = start;
    let months = 0;
    let stoppedBy: StopReason = "limit";

    while (shouldFetch(cursor, months)) {
      if (this.signal?.aborted) {
        stoppedBy = "aborted";
        break;
      }
      if (months > 0) {
        await this.pause(this.pauseMs);
      }

      const outcome = await this.fetchWithRetries(cursor);
      if (outcome.kind !== "page") {
        stoppedBy = outcome.kind;
        break;
      }

      // A month with no day rows marks the start of the station's history.
      const parsed = parseMonthCsv(outcome.text, cursor.year, cursor.month, this.log);
      if (parsed.size === 0) {
        stoppedBy = "empty-page";
        break;
      }

      mergeObservations(observations, parsed);
      months += 1;
      cursor = stepBackward(cursor);
    }

    this.log.info(
      {
        stationId: this.stationId,
        from: formatMonth(start),
        last: formatMonth(cursor),
        months,
        days: observations.size,
        stoppedBy,
      },
      "walk finished"
    );
    return observations;
  }

  private async fetchWithRetries(cursor: MonthCursor): Promise<FetchOutcome> {
    let outcome = await this.fetchOnce(cursor);
    for (
      let attempt = 1;
      outcome.kind === "transient-failure" && attempt <= this.transientRetries;
      attempt += 1
    ) {
      if (this.signal?.aborted) {
        break;
      }
      this.log.warn(
        { period: formatMonth(cursor), attempt, reason: outcome.reason },
        "retrying month after transient failure"
      );
      await this.pause(this.pauseMs);
      outcome = await this.fetchOnce(cursor);
    }
    return outcome;
  }

  private fetchOnce(cursor: MonthCursor): Promise<FetchOutcome> {
    this.notify(`Fetching ${formatMonth(cursor)} …`);
    return this.fetcher(this.stationId, cursor.year, cursor.month);
  }

  private notify(message: string): void {
    if (!this.progress) {
      return;
    }
    try {
      this.progress(message);
    } catch (error) {
      this.log.warn({ err: error }, "progress observer failed");
    }
  }
}
