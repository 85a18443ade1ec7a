export interface DailyObservation {
  readonly date: string;
  readonly minTemp: number | null;
  readonly maxTemp: number | null;
  readonly meanTemp: number | null;
}

export type ObservationSet = Map<string, DailyObservation>;

export interface MonthCursor {
  year: number;
  month: number;
}

export interface RawPage {
  kind: "page";
  text: string;
  encoding: string;
}

export interface EndOfData {
  kind: "end-of-data";
  status: number;
}

export interface TransientFailure {
  kind: "transient-failure";
  reason: string;
  status?: number;
}

export type FetchOutcome = RawPage | EndOfData | TransientFailure;

export interface StoredObservation {
  date: string;
  location: string;
  minTemp: number | null;
  maxTemp: number | null;
  meanTemp: number | null;
}

export type ProgressObserver = (message: string) => void;

export type IngestMode = "backwards" | "last" | "range" | "month" | "latest" | "purge";

export interface IngestSettings {
  stationId: number;
  location: string;
  dbPath: string;
  pauseMs: number;
  fetchTimeoutMs: number;
  transientRetries: number;
  userAgent: string;
  mode: IngestMode;
  months: number;
  latestRows: number;
  from: MonthCursor | null;
  to: MonthCursor | null;
  refreshMinutes: number | null;
  logLevel: string;
}
