import type { IngestMode, IngestSettings, ObservationSet, StoredObservation } from "./types.js";
import type { WeatherScraper } from "./scraper.js";
import type { ObservationStore } from "./store.js";
import { type Logger, silentLogger } from "./logger.js";
import { formatMonth } from "./utils.js";

export interface IngestDeps {
  scraper: WeatherScraper;
  store: ObservationStore;
  logger?: Logger;
  now?: () => Date;
}

type ScrapeMode = Exclude<IngestMode, "latest" | "purge">;

export type IngestSummary =
  | { mode: ScrapeMode; fetched: number; inserted: number }
  | { mode: "latest"; rows: StoredObservation[] }
  | { mode: "purge"; deleted: number };

function collect(
  mode: ScrapeMode,
  settings: IngestSettings,
  scraper: WeatherScraper,
  today: Date
): Promise<ObservationSet> {
  switch (mode) {
    case "backwards":
      return scraper.scrapeBackwards(today);
    case "last":
      return scraper.scrapeLastMonths(settings.months, today);
    case "range":
    case "month": {
      const from = settings.from;
      if (!from) {
        throw new Error(`INGEST_FROM is required for ${mode} mode`);
      }
      if (mode === "month") {
        return scraper.scrapeMonth(from.year, from.month);
      }
      const to = settings.to ?? from;
      return scraper.scrapeRange(from.year, from.month, to.year, to.month);
    }
  }
}

export async function runIngestion(
  settings: IngestSettings,
  deps: IngestDeps
): Promise<IngestSummary> {
  const log = deps.logger ?? silentLogger;
  const mode = settings.mode;

  if (mode === "latest") {
    const rows = deps.store.latest(settings.latestRows);
    log.info({ location: settings.location, rows }, `Last ${rows.length} rows`);
    return { mode, rows };
  }
  if (mode === "purge") {
    const deleted = deps.store.purge();
    log.info({ location: settings.location, deleted }, `Deleted ${deleted} rows`);
    return { mode, deleted };
  }

  const today = deps.now ? deps.now() : new Date();
  log.info(
    {
      mode,
      stationId: deps.scraper.stationId,
      location: settings.location,
      from: settings.from ? formatMonth(settings.from) : undefined,
      to: settings.to ? formatMonth(settings.to) : undefined,
    },
    "starting ingestion"
  );

  const observations = await collect(mode, settings, deps.scraper, today);
  const inserted = deps.store.save(settings.location, observations);

  const summary = { mode, fetched: observations.size, inserted };
  log.info(summary, `Inserted ${inserted} rows`);
  return summary;
}

/**
 * Wraps a polling task so a tick that arrives while the previous run is still
 * going is skipped instead of starting a second run. Resolves `false` for a
 * skipped tick.
 */
export function skipWhileRunning(
  task: () => Promise<void>,
  log: Logger = silentLogger
): () => Promise<boolean> {
  let running = false;
  return async () => {
    if (running) {
      log.warn("Previous ingestion still running, skipping this tick");
      return false;
    }
    running = true;
    try {
      await task();
      return true;
    } finally {
      running = false;
    }
  };
}
