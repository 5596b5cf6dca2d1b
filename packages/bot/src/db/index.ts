import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import Database from "better-sqlite3";
import * as schema from "./schema";

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export type RawConnection = Database.Database;

export interface OpenConnectionOptions {
  /** How long a statement waits on a locked store before failing with SQLITE_BUSY. */
  busyTimeoutMs: number;
}

/**
 * Open one live connection to the store, configured the same way for the
 * migrator and for every pooled connection.
 */
export function openConnection(dbPath: string, options: OpenConnectionOptions): RawConnection {
  const sqlite = new Database(dbPath, { timeout: options.busyTimeoutMs });
  try {
    sqlite.pragma("journal_mode = WAL");
    sqlite.pragma("foreign_keys = ON");
  } catch (error) {
    sqlite.close();
    throw error;
  }
  return sqlite;
}

export function createDrizzle(sqlite: RawConnection): AppDatabase {
  return drizzle(sqlite, { schema });
}

export { schema };
