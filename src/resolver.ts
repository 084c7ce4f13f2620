import { RowError, describeError } from "./errors.js";
import type { Geocoder } from "./geocoder.js";
import type { LookupTable } from "./lookup.js";
import type { LocationRow, Resolution } from "./types.js";

export type Resolver = (row: LocationRow) => Promise<Resolution>;

export interface ResolverSources {
  table?: LookupTable;
  geocoder?: Geocoder;
}

/**
 * Resolves a row to coordinates: the row's own columns first, then the
 * lookup table, then the geocoder. Throws RowError when nothing matches.
 */
export function createResolver({ table, geocoder }: ResolverSources = {}): Resolver {
  return async (row) => {
    if (row.latitude !== null && row.longitude !== null) {
      return { coordinates: { latitude: row.latitude, longitude: row.longitude }, source: "csv" };
    }

    // An id is not a place name; such rows need coordinates in the file
    if (!row.named) {
      throw new RowError(row.line, row.locationName, "no coordinates found");
    }

    const known = table?.find(row.locationName);
    if (known) {
      return { coordinates: known, source: "table" };
    }

    if (geocoder) {
      const found = await geocoder(row.locationName).catch((error: unknown) => {
        throw new RowError(row.line, row.locationName, `lookup failed: ${describeError(error)}`, { cause: error });
      });
      if (found) {
        return { coordinates: found, source: "geocoder" };
      }
    }

    throw new RowError(row.line, row.locationName, "no coordinates found");
  };
}
