import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type { DailyObservation, ObservationSet, StoredObservation } from "./types.js";
import { type Logger, silentLogger } from "./logger.js";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS weather(
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  sample_date TEXT NOT NULL,
  location    TEXT NOT NULL,
  min_temp REAL,
  max_temp REAL,
  avg_temp REAL,
  UNIQUE(sample_date, location)
);
`;

interface WeatherRow {
  sample_date: string;
  location: string;
  min_temp: number | null;
  max_temp: number | null;
  avg_temp: number | null;
}

type InsertParams = [string, string, number | null, number | null, number | null];

function toStored(row: WeatherRow): StoredObservation {
  return {
    date: row.sample_date,
    location: row.location,
    minTemp: row.min_temp,
    maxTemp: row.max_temp,
    meanTemp: row.avg_temp,
  };
}

function isMissingTable(error: unknown): boolean {
  return error instanceof Error && /no such table/i.test(error.message);
}

export class ObservationStore {
  private readonly db: Database.Database;
  private readonly log: Logger;

  constructor(
    dbPath: string,
    readonly location: string,
    logger: Logger = silentLogger
  ) {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.log = logger;
  }

  initialize(): void {
    this.db.exec(SCHEMA);
  }

  save(location: string, observations: ObservationSet): number {
    this.initialize();
    const insert = this.db.prepare<InsertParams>(
      `INSERT INTO weather(sample_date, location, min_temp, max_temp, avg_temp)
       VALUES(?, ?, ?, ?, ?)
       ON CONFLICT(sample_date, location) DO NOTHING`
    );

    const insertAll = this.db.transaction((days: DailyObservation[]) => {
      let inserted = 0;
      for (const day of days) {
        inserted += insert.run(day.date, location, day.minTemp, day.maxTemp, day.meanTemp)
          .changes;
      }
      return inserted;
    });

    const inserted = insertAll([...observations.values()]);
    this.log.info(
      { location, offered: observations.size, inserted },
      "saved observations"
    );
    return inserted;
  }

  fetchRange(yearLo: number, yearHi: number): StoredObservation[] {
    const [lo, hi] = yearLo <= yearHi ? [yearLo, yearHi] : [yearHi, yearLo];
    return this.readHealing(() =>
      this.db
        .prepare<[string, number, number], WeatherRow>(
          `SELECT sample_date, location, min_temp, max_temp, avg_temp
           FROM weather
           WHERE location = ? AND CAST(substr(sample_date, 1, 4) AS INTEGER) BETWEEN ? AND ?
           ORDER BY sample_date`
        )
        .all(this.location, lo, hi)
        .map(toStored)
    );
  }

  latest(limit: number): StoredObservation[] {
    if (limit <= 0) {
      return [];
    }
    return this.readHealing(() =>
      this.db
        .prepare<[string, number], WeatherRow>(
          `SELECT sample_date, location, min_temp, max_temp, avg_temp
           FROM weather
           WHERE location = ?
           ORDER BY sample_date DESC
           LIMIT ?`
        )
        .all(this.location, limit)
        .map(toStored)
        .reverse()
    );
  }

  purge(): number {
    this.initialize();
    const { changes } = this.db
      .prepare<[string]>("DELETE FROM weather WHERE location = ?")
      .run(this.location);
    this.log.info({ location: this.location, deleted: changes }, "purged observations");
    return changes;
  }

  close(): void {
    this.db.close();
  }

  private readHealing(read: () => StoredObservation[]): StoredObservation[] {
    try {
      return read();
    } catch (error) {
      if (!isMissingTable(error)) {
        throw error;
      }
      this.log.warn({ location: this.location }, "weather table missing, initializing");
      this.initialize();
      return read();
    }
  }
}
