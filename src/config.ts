import { readFileSync } from "fs";
import { z } from "zod";
import { ConfigError, describeError } from "./errors.js";

const mysqlSchema = z.object({
  driver: z.literal("mysql"),
  host: z.string().min(1).default("localhost"),
  port: z.number().int().positive().default(3306),
  user: z.string().min(1),
  password: z.string().default(""),
  database: z.string().min(1),
});

const sqliteSchema = z.object({
  driver: z.literal("sqlite"),
  filename: z.string().min(1),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// "driver" may be left out of config.json, in which case MySQL is assumed
const databaseSchema = z.preprocess(
  (value) => (isRecord(value) && value.driver === undefined ? { ...value, driver: "mysql" } : value),
  z.discriminatedUnion("driver", [mysqlSchema, sqliteSchema])
);

const geocoderSchema = z.object({
  url: z.string().url(),
  userAgent: z.string().min(1).default("latlong-import/1.0"),
  delayMs: z.number().int().nonnegative().default(1000),
});

const configSchema = z.object({
  database: databaseSchema,
  lookupTable: z.string().min(1).optional(),
  geocoder: geocoderSchema.optional(),
});

export type ImportConfig = z.infer<typeof configSchema>;
export type DatabaseConfig = ImportConfig["database"];
export type MysqlConfig = z.infer<typeof mysqlSchema>;
export type SqliteConfig = z.infer<typeof sqliteSchema>;
export type GeocoderConfig = z.infer<typeof geocoderSchema>;

type Env = Record<string, string | undefined>;

export function parseConfig(raw: unknown, env: Env = {}): ImportConfig {
  if (!isRecord(raw) || !("database" in raw)) {
    throw new ConfigError("Database configuration file is not valid: missing \"database\" section");
  }

  const merged: Record<string, unknown> = { ...raw };
  if (env.GEOCODER_URL) {
    merged.geocoder = { ...(isRecord(raw.geocoder) ? raw.geocoder : {}), url: env.GEOCODER_URL };
  }
  if (env.GEOCODER_USER_AGENT && isRecord(merged.geocoder)) {
    merged.geocoder = { ...merged.geocoder, userAgent: env.GEOCODER_USER_AGENT };
  }

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigError(`Database configuration file is not valid: ${problems.join("; ")}`);
  }

  const config = parsed.data;
  if (config.database.driver === "mysql" && env.DATABASE_PASSWORD) {
    config.database = { ...config.database, password: env.DATABASE_PASSWORD };
  }
  return config;
}

export function loadConfig(configFile: string = process.env.CONFIG_FILE || "config.json", env: Env = process.env): ImportConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configFile, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Cannot read configuration file ${configFile}: ${describeError(error)}`, { cause: error });
  }
  return parseConfig(raw, env);
}
