import { parse } from "csv-parse/sync";
import { readFileSync } from "fs";
import { FileError, FormatError, RowError, describeError } from "./errors.js";
import type { LocationRow } from "./types.js";

const COLUMN_ALIASES: Record<string, "name" | "id" | "latitude" | "longitude"> = {
  location: "name",
  location_name: "name",
  locationid: "id",
  location_id: "id",
  latitude: "latitude",
  lat: "latitude",
  longitude: "longitude",
  lon: "longitude",
  lng: "longitude",
};

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)$/;

type ColumnRole = (typeof COLUMN_ALIASES)[string];

export interface ParsedLocations {
  locations: LocationRow[];
  rejected: RowError[];
}

interface CsvRecord {
  record: Record<string, string>;
  info: { lines: number };
}

function isCsvRecord(value: unknown): value is CsvRecord {
  if (typeof value !== "object" || value === null) return false;
  if (!("record" in value) || !("info" in value)) return false;
  const { record, info } = value;
  return (
    typeof record === "object" &&
    record !== null &&
    typeof info === "object" &&
    info !== null &&
    "lines" in info &&
    typeof info.lines === "number"
  );
}

export function readLocationsCSV(filepath: string): ParsedLocations {
  let content: string;
  try {
    content = readFileSync(filepath, "utf-8");
  } catch (error) {
    throw new FileError(`Cannot read CSV file ${filepath}: ${describeError(error)}`, { cause: error });
  }
  return parseLocationsCSV(content);
}

export function parseLocationsCSV(content: string): ParsedLocations {
  const seen: { header: string[] | null } = { header: null };
  let output: unknown;
  try {
    output = parse(content, {
      bom: true,
      columns: (names: string[]) => {
        seen.header = names.map((name) => name.trim().toLowerCase());
        return seen.header;
      },
      info: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    throw new FormatError(`Malformed CSV: ${describeError(error)}`, { cause: error });
  }

  const { header } = seen;
  if (!header) {
    throw new FormatError("Malformed CSV: missing header line");
  }
  if (!Array.isArray(output) || !output.every(isCsvRecord)) {
    throw new FormatError("Malformed CSV: unexpected parser output");
  }
  const records: CsvRecord[] = output;

  const columns = new Map<ColumnRole, string>();
  for (const name of header) {
    const role = COLUMN_ALIASES[name];
    if (role && !columns.has(role)) columns.set(role, name);
  }
  if (!columns.has("name") && !columns.has("id")) {
    throw new FormatError(
      `Malformed CSV: header must contain a "location" or "locationid" column (found: ${header.join(", ")})`
    );
  }

  const locations: LocationRow[] = [];
  const rejected: RowError[] = [];
  for (const { record, info } of records) {
    const cell = (role: ColumnRole): string => {
      const column = columns.get(role);
      return column ? (record[column] ?? "").trim() : "";
    };
    try {
      locations.push(toLocationRow(info.lines, cell("name"), cell("id"), cell("latitude"), cell("longitude")));
    } catch (error) {
      if (!(error instanceof RowError)) throw error;
      rejected.push(error);
    }
  }

  return { locations, rejected };
}

function toLocationRow(
  line: number,
  name: string,
  idText: string,
  latitudeText: string,
  longitudeText: string
): LocationRow {
  const locationName = name || idText;
  if (!locationName) {
    throw new RowError(line, "", "empty location");
  }

  const named = name !== "";

  let locationId: number | null = null;
  if (idText) {
    const id = Number(idText);
    if (!/^\d+$/.test(idText) || id === 0 || !Number.isSafeInteger(id)) {
      throw new RowError(line, locationName, `invalid location id "${idText}"`);
    }
    locationId = id;
  }

  const latitude = parseCoordinate(line, locationName, "latitude", latitudeText, 90);
  const longitude = parseCoordinate(line, locationName, "longitude", longitudeText, 180);

  // Half-filled coordinates are resolved like empty ones
  if (latitude === null || longitude === null) {
    return { line, locationName, named, locationId, latitude: null, longitude: null };
  }
  return { line, locationName, named, locationId, latitude, longitude };
}

function parseCoordinate(
  line: number,
  location: string,
  field: "latitude" | "longitude",
  text: string,
  limit: number
): number | null {
  if (!text) return null;
  const value = DECIMAL.test(text) ? Number(text) : NaN;
  if (!Number.isFinite(value)) {
    throw new RowError(line, location, `${field} "${text}" is not a number`);
  }
  if (Math.abs(value) > limit) {
    throw new RowError(line, location, `${field} ${value} is out of range`);
  }
  return value;
}
