import { existsSync, readFileSync } from "fs";
import { z } from "zod";
import { ConfigError, describeError } from "./errors.js";
import type { Coordinates } from "./types.js";

export const DEFAULT_LOOKUP_TABLE = "data/known-locations.json";

const knownLocationsSchema = z.array(
  z.object({
    name: z.string().trim().min(1),
    latitude: z.number().min(-90).max(90),
    longitude: z.number().min(-180).max(180),
  })
);

export type KnownLocation = z.infer<typeof knownLocationsSchema>[number];

export function normalizeLocationName(name: string): string {
  return name.trim().replace(/\s+/g, " ").toLowerCase();
}

export class LookupTable {
  private readonly entries = new Map<string, Coordinates>();

  constructor(locations: KnownLocation[] = []) {
    for (const { name, latitude, longitude } of locations) {
      this.entries.set(normalizeLocationName(name), { latitude, longitude });
    }
  }

  get size(): number {
    return this.entries.size;
  }

  find(name: string): Coordinates | null {
    return this.entries.get(normalizeLocationName(name)) ?? null;
  }
}

/**
 * Loads the known-locations table. A missing file is only an error when the
 * path was configured explicitly.
 */
export function loadLookupTable(filepath: string = DEFAULT_LOOKUP_TABLE, required = false): LookupTable {
  if (!existsSync(filepath)) {
    if (required) throw new ConfigError(`Lookup table not found: ${filepath}`);
    return new LookupTable();
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(filepath, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Cannot read lookup table ${filepath}: ${describeError(error)}`, { cause: error });
  }

  const parsed = knownLocationsSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid lookup table ${filepath}: ${issue.path.join(".")} ${issue.message}`);
  }
  return new LookupTable(parsed.data);
}
