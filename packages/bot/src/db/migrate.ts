/**
 * Database Migration
 *
 * Brings the store to the latest revision of the schema history. Each
 * revision runs under the store's write lock together with its history row,
 * so a revision and the recorded version advance commit as one unit. This is
 * the only code allowed to change schema structure.
 */

import { createHash } from "crypto";
import { openConnection, type RawConnection } from "./index";
import { MIGRATIONS } from "./migrations";
import type { Migration, MigrationHistoryRow, MigrationStep } from "./migrations/types";
import { tableExists } from "./migrations/probes";
import {
  MigrationFatalError,
  TransactionConflictError,
  ConnectionLostError,
  classifyDatabaseError,
  err,
  errorMessage,
  ok,
  type MigrationFailureReason,
  type Result,
} from "../lib/errors";
import { silentLogger, type Logger } from "../lib/logger";

const HISTORY_TABLE = "schema_migrations";

export const DEFAULT_PENDING_STALE_MS = 10 * 60_000;

const HISTORY_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS "${HISTORY_TABLE}" (
    "version" INTEGER PRIMARY KEY NOT NULL,
    "name" TEXT NOT NULL,
    "checksum" TEXT NOT NULL,
    "status" TEXT NOT NULL CHECK ("status" IN ('pending', 'applied')),
    "started_at" INTEGER NOT NULL,
    "applied_at" INTEGER,
    "duration_ms" INTEGER
  );
`;

export interface MigrationReport {
  tool: "sqlite";
  fromVersion: number;
  toVersion: number;
  latestVersion: number;
  steps: MigrationStep[];
}

export interface SqliteMigratorOptions {
  dbPath: string;
  /** How long to wait for another instance holding the write lock. */
  lockTimeoutMs: number;
  /**
   * How long a `pending` row is presumed to belong to a live instance. Younger
   * rows fail with `in_progress`; older ones with `partial`.
   */
  staleAfterMs?: number;
  migrations?: readonly Migration[];
  logger?: Logger;
  now?: () => number;
}

// ============================================================================
// History helpers
// ============================================================================

export function checksumOf(migration: Migration): string {
  const source = typeof migration.up === "string" ? migration.up : migration.up.toString();
  return createHash("sha256").update(`${migration.version}:${migration.name}:${source}`).digest("hex");
}

/**
 * Reject histories the migrator cannot interpret before the store is touched.
 */
export function validateHistory(migrations: readonly Migration[]): Result<void, MigrationFatalError> {
  const names = new Set<string>();
  let previous = 0;

  for (const migration of migrations) {
    if (!Number.isInteger(migration.version) || migration.version <= 0) {
      return err(
        new MigrationFatalError(
          `Revision "${migration.name}" has invalid version ${migration.version}`,
          "invalid_history",
          migration.version
        )
      );
    }
    if (migration.version <= previous) {
      return err(
        new MigrationFatalError(
          `Revision ${migration.version} (${migration.name}) is out of order or duplicated`,
          "invalid_history",
          migration.version
        )
      );
    }
    if (migration.name.trim() === "" || names.has(migration.name)) {
      return err(
        new MigrationFatalError(
          `Revision ${migration.version} has an empty or duplicate name "${migration.name}"`,
          "invalid_history",
          migration.version
        )
      );
    }
    names.add(migration.name);
    previous = migration.version;
  }

  return ok(undefined);
}

export function readHistory(conn: RawConnection): MigrationHistoryRow[] {
  if (!tableExists(conn, HISTORY_TABLE)) return [];
  return conn
    .prepare<[], MigrationHistoryRow>(
      `SELECT version, name, checksum, status, started_at, applied_at, duration_ms
       FROM "${HISTORY_TABLE}" ORDER BY version`
    )
    .all();
}

/** The recorded SchemaVersion: the highest fully applied revision, 0 for a fresh store. */
export function readSchemaVersion(conn: RawConnection): number {
  if (!tableExists(conn, HISTORY_TABLE)) return 0;
  const row = conn
    .prepare<[], { version: number | null }>(
      `SELECT MAX(version) AS version FROM "${HISTORY_TABLE}" WHERE status = 'applied'`
    )
    .get();
  return row?.version ?? 0;
}

function toFatal(error: unknown, fallback: MigrationFailureReason, version?: number): MigrationFatalError {
  if (error instanceof MigrationFatalError) return error;

  const classified = classifyDatabaseError(error);
  if (classified instanceof TransactionConflictError) {
    return new MigrationFatalError(
      `Another instance holds the migration lock: ${classified.message}`,
      "in_progress",
      version,
      { cause: error }
    );
  }
  if (classified instanceof ConnectionLostError) {
    return new MigrationFatalError(`Lost the store during migration: ${classified.message}`, "connection", version, {
      cause: error,
    });
  }
  return new MigrationFatalError(errorMessage(error), fallback, version, { cause: error });
}

// ============================================================================
// Migrator
// ============================================================================

export class SqliteMigrator {
  private readonly migrations: readonly Migration[];
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly staleAfterMs: number;

  constructor(private readonly options: SqliteMigratorOptions) {
    this.migrations = options.migrations ?? MIGRATIONS;
    this.staleAfterMs = options.staleAfterMs ?? DEFAULT_PENDING_STALE_MS;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => Date.now());
  }

  get latestVersion(): number {
    return this.migrations.length > 0 ? this.migrations[this.migrations.length - 1].version : 0;
  }

  async run(): Promise<Result<MigrationReport, MigrationFatalError>> {
    return this.migrate();
  }

  migrate(): Result<MigrationReport, MigrationFatalError> {
    const valid = validateHistory(this.migrations);
    if (!valid.ok) return valid;

    let conn: RawConnection;
    try {
      conn = openConnection(this.options.dbPath, { busyTimeoutMs: this.options.lockTimeoutMs });
    } catch (error) {
      return err(toFatal(error, "connection"));
    }

    try {
      return ok(this.migrateOn(conn));
    } catch (error) {
      const fatal = toFatal(error, "failed");
      this.logger.error("Migration aborted", { reason: fatal.reason, version: fatal.version, error: fatal.message });
      return err(fatal);
    } finally {
      conn.close();
    }
  }

  private migrateOn(conn: RawConnection): MigrationReport {
    this.locked(conn, () => conn.exec(HISTORY_TABLE_SQL));

    const fromVersion = readSchemaVersion(conn);
    const history = readHistory(conn);
    this.verifyHistory(history);

    const steps: MigrationStep[] = [];
    for (const row of history.filter((r) => r.status === "pending")) {
      steps.push(this.recoverPending(conn, row));
    }

    const applied = new Set(history.filter((r) => r.status === "applied").map((r) => r.version));
    const pending = this.migrations.filter((m) => !applied.has(m.version) && !steps.some((s) => s.version === m.version));

    if (pending.length === 0) {
      this.logger.info("Schema is up to date", { version: fromVersion });
    } else {
      this.logger.info(`Applying ${pending.length} revision(s)`, { from: fromVersion, to: this.latestVersion });
    }

    for (const migration of pending) {
      steps.push(this.applyStep(conn, migration));
    }

    return {
      tool: "sqlite",
      fromVersion,
      toVersion: readSchemaVersion(conn),
      latestVersion: this.latestVersion,
      steps,
    };
  }

  /**
   * Refuse to touch a store whose recorded history this build cannot explain.
   */
  private verifyHistory(history: MigrationHistoryRow[]): void {
    const known = new Map(this.migrations.map((m) => [m.version, m]));

    for (const row of history) {
      const migration = known.get(row.version);
      if (!migration) {
        throw new MigrationFatalError(
          `Store records revision ${row.version} (${row.name}) which is not part of this build's history`,
          "unknown_revision",
          row.version
        );
      }
      if (row.checksum !== checksumOf(migration)) {
        throw new MigrationFatalError(
          `Revision ${row.version} (${row.name}) was recorded with different contents than this build's revision`,
          "diverged",
          row.version
        );
      }
    }

    const applied = history.filter((r) => r.status === "applied").map((r) => r.version);
    const expected = this.migrations.slice(0, applied.length).map((m) => m.version);
    const gapAt = applied.findIndex((version, i) => version !== expected[i]);
    if (gapAt !== -1) {
      throw new MigrationFatalError(
        `Recorded history has a gap: revision ${expected[gapAt]} is missing before ${applied[gapAt]}`,
        "diverged",
        expected[gapAt]
      );
    }
  }

  /**
   * A `pending` row means a non-transactional revision is running or was
   * interrupted. It is completed only when the revision's probe confirms its
   * effect is present; otherwise the row's age decides between another
   * instance still working on it and a revision that died halfway.
   */
  private recoverPending(conn: RawConnection, row: MigrationHistoryRow): MigrationStep {
    const migration = this.migrations.find((m) => m.version === row.version);
    const started = this.now();

    const status = this.locked(conn, (): MigrationStep["status"] => {
      const current = this.historyRow(conn, row.version);
      if (current?.status === "applied") return "skipped";

      if (migration?.isApplied?.(conn)) {
        this.markApplied(conn, migration, started);
        return "recovered";
      }

      const ageMs = started - (current?.started_at ?? row.started_at);
      if (current && ageMs < this.staleAfterMs) {
        throw new MigrationFatalError(
          `Revision ${row.version} (${row.name}) is being applied by another instance (started ${ageMs}ms ago)`,
          "in_progress",
          row.version
        );
      }
      throw new MigrationFatalError(
        `Revision ${row.version} (${row.name}) was interrupted before it finished and its effect cannot be confirmed; ` +
          "repair or restore the store before starting again",
        "partial",
        row.version
      );
    });

    if (status === "recovered") {
      this.logger.warn(`Completed interrupted revision ${row.version} (${row.name})`);
    } else {
      this.logger.info(`Revision ${row.version} (${row.name}) was finished by another instance`);
    }
    return { version: row.version, name: row.name, status, durationMs: this.now() - started };
  }

  private applyStep(conn: RawConnection, migration: Migration): MigrationStep {
    const started = this.now();
    const step = (status: MigrationStep["status"]): MigrationStep => ({
      version: migration.version,
      name: migration.name,
      status,
      durationMs: this.now() - started,
    });

    const outcome = this.locked(conn, (): MigrationStep["status"] | "run_outside" => {
      // Re-read under the write lock: a concurrent instance may have won the race
      const row = this.historyRow(conn, migration.version);
      if (row?.status === "applied") return "skipped";
      if (row?.status === "pending") {
        throw new MigrationFatalError(
          `Revision ${migration.version} (${migration.name}) is being applied by another instance`,
          "in_progress",
          migration.version
        );
      }

      if (migration.isApplied?.(conn)) {
        this.markApplied(conn, migration, started);
        return "recovered";
      }

      if (migration.transactional === false) {
        this.insertRow(conn, migration, "pending", started);
        return "run_outside";
      }

      this.runUp(conn, migration);
      this.markApplied(conn, migration, started);
      return "applied";
    });

    if (outcome === "run_outside") {
      this.runUp(conn, migration);
      this.locked(conn, () => this.markApplied(conn, migration, started));
      this.logger.info(`Applied revision ${migration.version} (${migration.name}) outside a transaction`);
      return step("applied");
    }

    if (outcome === "applied") {
      this.logger.info(`Applied revision ${migration.version} (${migration.name})`);
    } else if (outcome === "skipped") {
      this.logger.info(`Revision ${migration.version} (${migration.name}) was applied by another instance`);
    } else {
      this.logger.warn(`Revision ${migration.version} (${migration.name}) was already in effect; recorded it`);
    }
    return step(outcome);
  }

  private runUp(conn: RawConnection, migration: Migration): void {
    try {
      if (typeof migration.up === "string") {
        conn.exec(migration.up);
      } else {
        migration.up(conn);
      }
    } catch (error) {
      throw new MigrationFatalError(
        `Revision ${migration.version} (${migration.name}) failed: ${errorMessage(error)}`,
        "failed",
        migration.version,
        { cause: error }
      );
    }
  }

  private historyRow(conn: RawConnection, version: number): MigrationHistoryRow | undefined {
    return conn
      .prepare<[number], MigrationHistoryRow>(
        `SELECT version, name, checksum, status, started_at, applied_at, duration_ms
         FROM "${HISTORY_TABLE}" WHERE version = ?`
      )
      .get(version);
  }

  private insertRow(conn: RawConnection, migration: Migration, status: "pending", startedAt: number): void {
    conn
      .prepare(
        `INSERT INTO "${HISTORY_TABLE}" (version, name, checksum, status, started_at) VALUES (?, ?, ?, ?, ?)`
      )
      .run(migration.version, migration.name, checksumOf(migration), status, startedAt);
  }

  private markApplied(conn: RawConnection, migration: Migration, startedAt: number): void {
    const appliedAt = this.now();
    conn
      .prepare(
        `INSERT INTO "${HISTORY_TABLE}" (version, name, checksum, status, started_at, applied_at, duration_ms)
         VALUES (?, ?, ?, 'applied', ?, ?, ?)
         ON CONFLICT (version) DO UPDATE SET status = 'applied', applied_at = excluded.applied_at,
           duration_ms = excluded.duration_ms`
      )
      .run(migration.version, migration.name, checksumOf(migration), startedAt, appliedAt, appliedAt - startedAt);
    // Mirrored into the file header so external tools can read it cheaply
    conn.pragma(`user_version = ${readSchemaVersion(conn)}`);
  }

  /**
   * Run `fn` holding the store's write lock. Waiting longer than the lock
   * timeout surfaces as SQLITE_BUSY, which maps to "migration in progress".
   */
  private locked<T>(conn: RawConnection, fn: () => T): T {
    conn.exec("BEGIN IMMEDIATE");
    try {
      const result = fn();
      conn.exec("COMMIT");
      return result;
    } catch (error) {
      if (conn.inTransaction) {
        try {
          conn.exec("ROLLBACK");
        } catch (rollbackError) {
          this.logger.warn("Rollback after failed revision also failed", { error: errorMessage(rollbackError) });
        }
      }
      throw error;
    }
  }
}

/**
 * Migrate the store at `dbPath` to the latest revision.
 */
export function runMigrations(
  dbPath: string,
  options: Omit<SqliteMigratorOptions, "dbPath"> = { lockTimeoutMs: 30_000 }
): Result<MigrationReport, MigrationFatalError> {
  return new SqliteMigrator({ ...options, dbPath }).migrate();
}
