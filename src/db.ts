import Database from "better-sqlite3";
import mysql from "mysql2/promise";
import type { Connection, ResultSetHeader } from "mysql2/promise";
import type { DatabaseConfig, MysqlConfig } from "./config.js";
import { DatabaseError, describeError } from "./errors.js";
import type { Coordinates, LocationRow } from "./types.js";

export const LOCATIONS_TABLE = "ww_locations";

/**
 * Write access to the locations table. Only latitude and longitude are ever
 * touched; records are never created or deleted here.
 */
export interface LocationStore {
  /** Returns the number of records the update matched. */
  updateCoordinates(row: LocationRow, coordinates: Coordinates): Promise<number>;
  close(): Promise<void>;
}

export class MysqlLocationStore implements LocationStore {
  constructor(private readonly connection: Connection) {}

  static async connect(config: MysqlConfig): Promise<MysqlLocationStore> {
    let connection: Connection;
    try {
      connection = await mysql.createConnection({
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password,
        database: config.database,
      });
    } catch (error) {
      throw new DatabaseError(
        `Cannot connect to MySQL at ${config.host}:${config.port}/${config.database}: ${describeError(error)}`,
        { cause: error }
      );
    }

    const store = new MysqlLocationStore(connection);
    try {
      await connection.query("SET autocommit = 1");
    } catch (error) {
      await store.close();
      throw new DatabaseError(`Cannot enable autocommit: ${describeError(error)}`, { cause: error });
    }
    return store;
  }

  async updateCoordinates(row: LocationRow, { latitude, longitude }: Coordinates): Promise<number> {
    const sql =
      row.locationId !== null
        ? `UPDATE ${LOCATIONS_TABLE} SET latitude = ?, longitude = ? WHERE locationid = ?`
        : `UPDATE ${LOCATIONS_TABLE} SET latitude = ?, longitude = ? WHERE CONCAT_WS(', ', city, state) = ?`;

    try {
      const [result] = await this.connection.execute<ResultSetHeader>(sql, [
        latitude,
        longitude,
        row.locationId ?? row.locationName,
      ]);
      return result.affectedRows;
    } catch (error) {
      throw new DatabaseError(`Update failed for ${row.locationName}: ${describeError(error)}`, { cause: error });
    }
  }

  async close(): Promise<void> {
    try {
      await this.connection.end();
    } catch (error) {
      throw new DatabaseError(`Cannot close MySQL connection: ${describeError(error)}`, { cause: error });
    }
  }
}

export class SqliteLocationStore implements LocationStore {
  private readonly byId: Database.Statement;
  private readonly byName: Database.Statement;

  constructor(private readonly db: Database.Database) {
    this.byId = db.prepare(`UPDATE ${LOCATIONS_TABLE} SET latitude = ?, longitude = ? WHERE locationid = ?`);
    this.byName = db.prepare(
      `UPDATE ${LOCATIONS_TABLE} SET latitude = ?, longitude = ? WHERE city || COALESCE(', ' || state, '') = ?`
    );
  }

  static open(filename: string): SqliteLocationStore {
    let db: Database.Database;
    try {
      db = new Database(filename, { fileMustExist: true });
    } catch (error) {
      throw new DatabaseError(`Cannot open SQLite database ${filename}: ${describeError(error)}`, { cause: error });
    }
    try {
      return new SqliteLocationStore(db);
    } catch (error) {
      db.close();
      throw new DatabaseError(`Cannot prepare updates on ${LOCATIONS_TABLE}: ${describeError(error)}`, { cause: error });
    }
  }

  async updateCoordinates(row: LocationRow, { latitude, longitude }: Coordinates): Promise<number> {
    try {
      const result =
        row.locationId !== null
          ? this.byId.run(latitude, longitude, row.locationId)
          : this.byName.run(latitude, longitude, row.locationName);
      return result.changes;
    } catch (error) {
      throw new DatabaseError(`Update failed for ${row.locationName}: ${describeError(error)}`, { cause: error });
    }
  }

  async close(): Promise<void> {
    this.db.close();
  }
}

export async function openLocationStore(config: DatabaseConfig): Promise<LocationStore> {
  if (config.driver === "sqlite") {
    return SqliteLocationStore.open(config.filename);
  }
  return MysqlLocationStore.connect(config);
}
