import { describe, expect, it } from "vitest";
import { ConfigError, DEFAULT_USER_AGENT, loadSettings } from "../src/config.js";

describe("loadSettings", () => {
  it("falls back to defaults for unset and blank variables", () => {
    expect(loadSettings({ LOCATION: "   ", PAUSE_MS: "" })).toEqual({
      stationId: 27174,
      location: "Winnipeg",
      dbPath: "./data/weather.sqlite3",
      pauseMs: 400,
      fetchTimeoutMs: 25000,
      transientRetries: 0,
      userAgent: DEFAULT_USER_AGENT,
      mode: "last",
      months: 12,
      latestRows: 10,
      from: null,
      to: null,
      refreshMinutes: null,
      logLevel: "info",
    });
  });

  it("reads a range run", () => {
    const settings = loadSettings({
      STATION_ID: "51097",
      LOCATION: " Brandon ",
      INGEST_MODE: "range",
      INGEST_FROM: "2024-09",
      INGEST_TO: "2023-3",
      TRANSIENT_RETRIES: "2",
      REFRESH_MINUTES: "60",
    });

    expect(settings).toMatchObject({
      stationId: 51097,
      location: "Brandon",
      mode: "range",
      from: { year: 2024, month: 9 },
      to: { year: 2023, month: 3 },
      transientRetries: 2,
      refreshMinutes: 60,
    });
  });

  it("uses the start month as the end of a range when no end is given", () => {
    const settings = loadSettings({ INGEST_MODE: "month", INGEST_FROM: "2024-02" });

    expect(settings.from).toEqual({ year: 2024, month: 2 });
    expect(settings.to).toEqual({ year: 2024, month: 2 });
  });

  it("requires a start month for range and month runs", () => {
    let caught: unknown;
    try {
      loadSettings({ INGEST_MODE: "range" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError ? caught.issues : []).toEqual([
      "INGEST_FROM: required when INGEST_MODE is range",
    ]);
  });

  it("reports every invalid variable", () => {
    let caught: unknown;
    try {
      loadSettings({ STATION_ID: "abc", INGEST_FROM: "2024-13", INGEST_MODE: "weekly" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const fields = caught instanceof ConfigError ? caught.issues.map((issue) => issue.split(":")[0]) : [];
    expect(fields.sort()).toEqual(["INGEST_FROM", "INGEST_MODE", "STATION_ID"]);
  });
});
