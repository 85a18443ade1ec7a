import "dotenv/config";
import { loadSettings } from "./config.js";
import { createLogger, type Logger } from "./logger.js";
import { WeatherScraper } from "./scraper.js";
import { ObservationStore } from "./store.js";
import { runIngestion, skipWhileRunning } from "./ingest.js";
import type { IngestSettings } from "./types.js";
import { calculateNextDelay, sleep } from "./utils.js";

function buildScraper(settings: IngestSettings, log: Logger): WeatherScraper {
  return new WeatherScraper({
    stationId: settings.stationId,
    pauseMs: settings.pauseMs,
    transientRetries: settings.transientRetries,
    logger: log,
    fetchOptions: {
      timeoutMs: settings.fetchTimeoutMs,
      userAgent: settings.userAgent,
    },
    progress: (message) => log.debug(message),
  });
}

async function ingestOnce(
  settings: IngestSettings,
  store: ObservationStore,
  log: Logger
): Promise<void> {
  try {
    await runIngestion(settings, { scraper: buildScraper(settings, log), store, logger: log });
  } catch (error) {
    log.error({ err: error }, "Ingestion failed");
  }
}

async function startIngestion(): Promise<void> {
  const settings = loadSettings();
  const log = createLogger(settings.logLevel);
  const store = new ObservationStore(settings.dbPath, settings.location, log);

  if (settings.refreshMinutes === null) {
    try {
      await runIngestion(settings, { scraper: buildScraper(settings, log), store, logger: log });
    } finally {
      store.close();
    }
    return;
  }

  const refreshMinutes = settings.refreshMinutes;
  const initialDelay = calculateNextDelay(refreshMinutes);
  if (initialDelay > 0) {
    log.info(`Aligning first run in ${Math.round(initialDelay / 1000)}s`);
    await sleep(initialDelay);
  }

  const tick = skipWhileRunning(() => ingestOnce(settings, store, log), log);
  await tick();

  setInterval(() => {
    void tick();
  }, refreshMinutes * 60 * 1000);
}

startIngestion().catch((error) => {
  createLogger().error({ err: error }, "Ingestion runner failed");
  process.exitCode = 1;
});
