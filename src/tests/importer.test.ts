import Database from "better-sqlite3";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SqliteLocationStore } from "../db.js";
import type { LocationStore } from "../db.js";
import { DatabaseError, FileError, FormatError } from "../errors.js";
import { importLocations, updateLocations } from "../importer.js";
import { LookupTable } from "../lookup.js";
import { createResolver } from "../resolver.js";
import type { Coordinates, LocationRow } from "../types.js";

const LOCATIONS_SCHEMA = readFileSync(new URL("./fixtures/locations.sql", import.meta.url), "utf-8");

class RecordingStore implements LocationStore {
  readonly updates: { row: LocationRow; coordinates: Coordinates }[] = [];
  closed = false;

  constructor(private readonly matched = 1) {}

  async updateCoordinates(row: LocationRow, coordinates: Coordinates): Promise<number> {
    this.updates.push({ row, coordinates });
    return this.matched;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

function quietLog() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const resolver = createResolver({
  table: new LookupTable([{ name: "Chicago, IL", latitude: 41.8781, longitude: -87.6298 }]),
});

describe("importLocations", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "latlong-import-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function csv(content: string): string {
    const file = join(dir, "locations.csv");
    writeFileSync(file, content);
    return file;
  }

  function database(): string {
    const filename = join(dir, "stats.db");
    const db = new Database(filename);
    db.exec(LOCATIONS_SCHEMA);
    db.close();
    return filename;
  }

  function coordinatesOf(filename: string, id: number) {
    const db = new Database(filename, { readonly: true });
    try {
      return db.prepare("SELECT latitude, longitude FROM ww_locations WHERE locationid = ?").get(id);
    } finally {
      db.close();
    }
  }

  it("writes resolved coordinates to the matching record", async () => {
    const filename = database();
    const file = csv('location\n"Chicago, IL"\n');

    const summary = await importLocations(file, {
      resolver,
      openStore: async () => SqliteLocationStore.open(filename),
      log: quietLog(),
    });

    expect(summary).toEqual({ total: 1, updated: 1, skipped: 0, unmatched: 0 });
    expect(coordinatesOf(filename, 1)).toEqual({ latitude: 41.8781, longitude: -87.6298 });
  });

  it("gives the same result when run twice", async () => {
    const filename = database();
    const file = csv('location,locationid,latitude,longitude\n"Chicago, IL",,,\n"Boston, MA",2,42.3601,-71.0589\n');
    const options = { resolver, openStore: async () => SqliteLocationStore.open(filename), log: quietLog() };

    const first = await importLocations(file, options);
    const afterFirst = [coordinatesOf(filename, 1), coordinatesOf(filename, 2)];
    const second = await importLocations(file, options);

    expect(second).toEqual(first);
    expect([coordinatesOf(filename, 1), coordinatesOf(filename, 2)]).toEqual(afterFirst);
    expect(afterFirst).toEqual([
      { latitude: 41.8781, longitude: -87.6298 },
      { latitude: 42.3601, longitude: -71.0589 },
    ]);
  });

  it("skips bad rows and issues at most one update per row", async () => {
    const store = new RecordingStore();
    const log = quietLog();
    const file = csv(
      'location,locationid,latitude,longitude\n"Chicago, IL",,,\n,,,\n"Nowhere, ZZ",,,\n"Boston, MA",7,42.36,-71.06\n'
    );

    const summary = await importLocations(file, { resolver, openStore: async () => store, log });

    expect(summary).toEqual({ total: 4, updated: 2, skipped: 2, unmatched: 0 });
    expect(store.updates).toEqual([
      {
        row: { line: 2, locationName: "Chicago, IL", named: true, locationId: null, latitude: null, longitude: null },
        coordinates: { latitude: 41.8781, longitude: -87.6298 },
      },
      {
        row: { line: 5, locationName: "Boston, MA", named: true, locationId: 7, latitude: 42.36, longitude: -71.06 },
        coordinates: { latitude: 42.36, longitude: -71.06 },
      },
    ]);
    expect(log.warn).toHaveBeenCalledTimes(2);
    expect(store.closed).toBe(true);
  });

  it("does not open the database for an unreadable file", async () => {
    const openStore = vi.fn(async () => new RecordingStore());

    await expect(importLocations(join(dir, "missing.csv"), { resolver, openStore, log: quietLog() })).rejects.toBeInstanceOf(
      FileError
    );
    expect(openStore).not.toHaveBeenCalled();
  });

  it("does not open the database for a malformed file", async () => {
    const openStore = vi.fn(async () => new RecordingStore());
    const file = csv("location,latitude\nChicago,1,2\n");

    await expect(importLocations(file, { resolver, openStore, log: quietLog() })).rejects.toBeInstanceOf(FormatError);
    expect(openStore).not.toHaveBeenCalled();
  });

  it("stops early when the file has no locations", async () => {
    const openStore = vi.fn(async () => new RecordingStore());
    const log = quietLog();

    const summary = await importLocations(csv("location\n"), { resolver, openStore, log });

    expect(summary).toEqual({ total: 0, updated: 0, skipped: 0, unmatched: 0 });
    expect(openStore).not.toHaveBeenCalled();
    expect(log.log).toHaveBeenCalledWith("INFO: No locations found in CSV file.");
  });

  it("closes the store when an update fails", async () => {
    const store = new RecordingStore();
    vi.spyOn(store, "updateCoordinates").mockRejectedValue(new DatabaseError("Update failed for Chicago, IL: gone away"));

    await expect(
      importLocations(csv('location\n"Chicago, IL"\n'), { resolver, openStore: async () => store, log: quietLog() })
    ).rejects.toThrow("gone away");
    expect(store.closed).toBe(true);
  });

  it("reports a failing close without hiding the update error", async () => {
    const store = new RecordingStore();
    const log = quietLog();
    vi.spyOn(store, "updateCoordinates").mockRejectedValue(new DatabaseError("Update failed for Chicago, IL: gone away"));
    vi.spyOn(store, "close").mockRejectedValue(new DatabaseError("connection already closed"));

    await expect(
      importLocations(csv('location\n"Chicago, IL"\n'), { resolver, openStore: async () => store, log })
    ).rejects.toThrow("Update failed for Chicago, IL: gone away");
    expect(log.error).toHaveBeenCalledWith("ERROR: connection already closed");
  });

  it("skips id-only rows without coordinates instead of looking up the id", async () => {
    const store = new RecordingStore();
    const geocoder = vi.fn(async (_name: string): Promise<Coordinates | null> => ({ latitude: 1, longitude: 1 }));
    const log = quietLog();

    const summary = await importLocations(csv("locationid,latitude,longitude\n13,,\n14,41.5,-87.25\n"), {
      resolver: createResolver({ geocoder }),
      openStore: async () => store,
      log,
    });

    expect(summary).toEqual({ total: 2, updated: 1, skipped: 1, unmatched: 0 });
    expect(geocoder).not.toHaveBeenCalled();
    expect(store.updates.map((update) => update.row.locationId)).toEqual([14]);
  });
});

describe("updateLocations", () => {
  it("counts rows without a matching record", async () => {
    const store = new RecordingStore(0);
    const log = quietLog();
    const rows: LocationRow[] = [{ line: 2, locationName: "Chicago, IL", named: true, locationId: null, latitude: null, longitude: null }];

    const summary = await updateLocations(rows, resolver, store, log);

    expect(summary).toEqual({ total: 1, updated: 0, skipped: 0, unmatched: 1 });
    expect(log.warn).toHaveBeenCalledWith("[1/1] Chicago, IL \x1b[33m○\x1b[0m no matching location record");
  });

  it("propagates errors that are not row errors", async () => {
    const failing = vi.fn(async () => {
      throw new Error("boom");
    });
    const rows: LocationRow[] = [{ line: 2, locationName: "Chicago, IL", named: true, locationId: null, latitude: null, longitude: null }];

    await expect(updateLocations(rows, failing, new RecordingStore(), quietLog())).rejects.toThrow("boom");
  });
});
