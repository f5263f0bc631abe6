import BetterSqlite3 from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { describeStorageError, StorageUnavailable } from "./errors";
import * as schema from "./schema";

export type Database = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: Database;
  /** Underlying driver connection, for pragmas and shutdown */
  client: BetterSqlite3.Database;
}

/**
 * Open (or create) the SQLite database and make sure the tables exist.
 * `:memory:` gives a private in-process database.
 */
export function createDb(filename = ":memory:"): DatabaseHandle {
  try {
    // writers wait up to 5s on the file lock
    const client = new BetterSqlite3(filename, { timeout: 5000 });
    if (filename !== ":memory:") {
      client.pragma("journal_mode = WAL");
    }
    client.pragma("foreign_keys = ON");
    client.exec(schema.SCHEMA_DDL);

    console.log(`database: Opened ${filename}`);
    return { db: drizzle(client, { schema }), client };
  } catch (error) {
    throw new StorageUnavailable(
      `Cannot open negotiation database at ${filename}: ${describeStorageError(error)}`,
      { cause: error },
    );
  }
}
