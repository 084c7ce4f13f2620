import "dotenv/config";
import { USAGE, UsageError, parseCommand } from "./command.js";
import { loadConfig } from "./config.js";
import { openLocationStore } from "./db.js";
import { ImportError } from "./errors.js";
import { createGeocoder } from "./geocoder.js";
import { importLocations } from "./importer.js";
import { DEFAULT_LOOKUP_TABLE, loadLookupTable } from "./lookup.js";
import { createResolver } from "./resolver.js";

async function main(): Promise<number> {
  const command = parseCommand(process.argv.slice(2));
  if (command.help) {
    console.log(USAGE);
    return 0;
  }

  const config = loadConfig();
  const table = loadLookupTable(config.lookupTable ?? DEFAULT_LOOKUP_TABLE, config.lookupTable !== undefined);
  const geocoder = config.geocoder ? createGeocoder(config.geocoder) : undefined;
  console.log(
    `Lookup table: ${table.size} known locations; geocoder: ${config.geocoder ? config.geocoder.url : "disabled"}`
  );

  const summary = await importLocations(command.file, {
    resolver: createResolver({ table, geocoder }),
    openStore: () => openLocationStore(config.database),
  });

  console.log("\n" + "=".repeat(60));
  console.log("SUMMARY");
  console.log("=".repeat(60));
  console.log(`Rows read: ${summary.total}`);
  console.log(`Updated: ${summary.updated}`);
  console.log(`Skipped: ${summary.skipped}`);
  console.log(`No matching record: ${summary.unmatched}`);
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof UsageError) {
      console.error(`ERROR: ${error.message}\n\n${USAGE}`);
      process.exitCode = 2;
    } else if (error instanceof ImportError) {
      console.error(`ERROR: ${error.message}`);
      process.exitCode = 1;
    } else {
      console.error("Import failed:", error);
      process.exitCode = 1;
    }
  });
