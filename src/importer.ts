import type { LocationStore } from "./db.js";
import { RowError, describeError } from "./errors.js";
import { readLocationsCSV } from "./locations-csv.js";
import type { Resolver } from "./resolver.js";
import type { ImportSummary, LocationRow, Logger, Resolution } from "./types.js";

export interface ImportOptions {
  resolver: Resolver;
  openStore: () => Promise<LocationStore>;
  log?: Logger;
}

const OK = "\x1b[32m✓\x1b[0m";
const MISS = "\x1b[33m○\x1b[0m";
const FAIL = "\x1b[31m✗\x1b[0m";

/**
 * Reads the CSV at `filepath` and writes coordinates for every row that can be
 * resolved. The file is parsed before the database is opened, so a bad file
 * never reaches the database. The store is closed on every exit path.
 */
export async function importLocations(
  filepath: string,
  { resolver, openStore, log = console }: ImportOptions
): Promise<ImportSummary> {
  log.log(`Reading locations from ${filepath}...`);
  const { locations, rejected } = readLocationsCSV(filepath);

  for (const error of rejected) {
    log.warn(`WARNING: skipping ${error.message}`);
  }

  if (locations.length === 0) {
    log.log("INFO: No locations found in CSV file.");
    return { total: rejected.length, updated: 0, skipped: rejected.length, unmatched: 0 };
  }

  const store = await openStore();
  let summary: ImportSummary;
  try {
    summary = await updateLocations(locations, resolver, store, log);
  } catch (error) {
    // Keep the error that stopped the run; a failing close is only reported
    await store.close().catch((closeError: unknown) => {
      log.error(`ERROR: ${describeError(closeError)}`);
    });
    throw error;
  }
  await store.close();
  return { ...summary, total: summary.total + rejected.length, skipped: summary.skipped + rejected.length };
}

export async function updateLocations(
  locations: LocationRow[],
  resolver: Resolver,
  store: LocationStore,
  log: Logger = console
): Promise<ImportSummary> {
  const summary: ImportSummary = { total: locations.length, updated: 0, skipped: 0, unmatched: 0 };

  for (let i = 0; i < locations.length; i++) {
    const row = locations[i];
    const prefix = `[${i + 1}/${locations.length}] ${row.locationName}`;

    let resolution: Resolution;
    try {
      resolution = await resolver(row);
    } catch (error) {
      if (!(error instanceof RowError)) throw error;
      log.warn(`${prefix} ${FAIL} skipped: ${error.message}`);
      summary.skipped++;
      continue;
    }

    const { latitude, longitude } = resolution.coordinates;
    const matched = await store.updateCoordinates(row, resolution.coordinates);
    if (matched === 0) {
      log.warn(`${prefix} ${MISS} no matching location record`);
      summary.unmatched++;
      continue;
    }

    log.log(`${prefix} ${OK} ${latitude}, ${longitude} (${resolution.source})`);
    summary.updated++;
  }

  return summary;
}
