export interface Coordinates {
  latitude: number;
  longitude: number;
}

export interface LocationRow {
  line: number;
  locationName: string;
  /** False when the row has no name and `locationName` is its id. */
  named: boolean;
  locationId: number | null;
  latitude: number | null;
  longitude: number | null;
}

export type CoordinateSource = "csv" | "table" | "geocoder";

export interface Resolution {
  coordinates: Coordinates;
  source: CoordinateSource;
}

export interface ImportSummary {
  total: number;
  updated: number;
  skipped: number;
  unmatched: number;
}

export type Logger = Pick<Console, "log" | "warn" | "error">;
