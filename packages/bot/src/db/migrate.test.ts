import Database from "better-sqlite3";
import { existsSync } from "fs";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { silentLogger, type Logger } from "../lib/logger";
import { createTestStore, type TestStore } from "../test-utils";
import { checksumOf, readSchemaVersion, runMigrations, validateHistory, SqliteMigrator, type MigrationReport } from "./migrate";
import { MIGRATIONS, type Migration } from "./migrations";
import { tableExists } from "./migrations/probes";
import type { RawConnection } from "./index";
import type { MigrationFatalError, Result } from "../lib/errors";

const first: Migration = {
  version: 1,
  name: "first",
  up: `CREATE TABLE "alpha" ("id" INTEGER PRIMARY KEY);`,
  isApplied: (conn) => tableExists(conn, "alpha"),
};

const second: Migration = {
  version: 2,
  name: "second",
  up: `CREATE TABLE "beta" ("id" INTEGER PRIMARY KEY);`,
  isApplied: (conn) => tableExists(conn, "beta"),
};

const third: Migration = {
  version: 3,
  name: "third",
  up: `CREATE TABLE "gamma" ("id" INTEGER PRIMARY KEY);`,
  isApplied: (conn) => tableExists(conn, "gamma"),
};

function migrate(dbPath: string, migrations: readonly Migration[], lockTimeoutMs = 1_000, logger: Logger = silentLogger) {
  return runMigrations(dbPath, { lockTimeoutMs, migrations, logger });
}

function expectOk(result: Result<MigrationReport, MigrationFatalError>): MigrationReport {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

function expectFatal(result: Result<MigrationReport, MigrationFatalError>): MigrationFatalError {
  if (result.ok) {
    throw new Error(`expected migration to fail, got ${JSON.stringify(result.value)}`);
  }
  return result.error;
}

function inspect<T>(dbPath: string, fn: (conn: RawConnection) => T): T {
  const conn = new Database(dbPath);
  try {
    return fn(conn);
  } finally {
    conn.close();
  }
}

describe("SqliteMigrator", () => {
  let store: TestStore;

  beforeEach(() => {
    store = createTestStore();
  });

  afterEach(() => {
    store.cleanup();
  });

  describe("fresh store", () => {
    it("should apply the whole schema history in order", () => {
      const report = expectOk(runMigrations(store.dbPath, { lockTimeoutMs: 1_000, logger: silentLogger }));

      expect(report.fromVersion).toBe(0);
      expect(report.toVersion).toBe(MIGRATIONS.length);
      expect(report.latestVersion).toBe(MIGRATIONS.length);
      expect(report.steps.map((s) => [s.version, s.status])).toEqual(MIGRATIONS.map((m) => [m.version, "applied"]));

      inspect(store.dbPath, (conn) => {
        for (const table of ["users", "species", "plants", "schedules", "action_logs", "schedule_subscriptions"]) {
          expect(tableExists(conn, table)).toBe(true);
        }
        expect(readSchemaVersion(conn)).toBe(MIGRATIONS.length);
        expect(conn.pragma("user_version", { simple: true })).toBe(MIGRATIONS.length);
      });
    });

    it("should do nothing on a second run", () => {
      expectOk(migrate(store.dbPath, MIGRATIONS));
      const report = expectOk(migrate(store.dbPath, MIGRATIONS));

      expect(report.steps).toEqual([]);
      expect(report.fromVersion).toBe(MIGRATIONS.length);
      expect(report.toVersion).toBe(MIGRATIONS.length);
    });

    it("should apply only the revisions a store is missing", () => {
      expectOk(migrate(store.dbPath, MIGRATIONS.slice(0, 3)));
      const report = expectOk(migrate(store.dbPath, MIGRATIONS));

      expect(report.fromVersion).toBe(3);
      expect(report.steps.map((s) => s.version)).toEqual([4, 5, 6]);
    });

    it("should record a checksum for every applied revision", () => {
      expectOk(migrate(store.dbPath, [first, second]));

      const rows = inspect(store.dbPath, (conn) =>
        conn.prepare<[], { version: number; checksum: string; status: string }>(
          "SELECT version, checksum, status FROM schema_migrations ORDER BY version"
        ).all()
      );
      expect(rows).toEqual([
        { version: 1, checksum: checksumOf(first), status: "applied" },
        { version: 2, checksum: checksumOf(second), status: "applied" },
      ]);
    });
  });

  describe("failures", () => {
    it("should roll back a failing revision completely", () => {
      const broken: Migration = {
        version: 2,
        name: "broken",
        up: `
          CREATE TABLE "half_done" ("id" INTEGER);
          INSERT INTO "missing_table" VALUES (1);
        `,
      };

      const error = expectFatal(migrate(store.dbPath, [first, broken]));

      expect(error.reason).toBe("failed");
      expect(error.version).toBe(2);
      expect(error.message).toMatch(/^Revision 2 \(broken\) failed: /);
      inspect(store.dbPath, (conn) => {
        expect(tableExists(conn, "half_done")).toBe(false);
        expect(readSchemaVersion(conn)).toBe(1);
      });
    });

    it("should refuse a store that records an unknown revision", () => {
      expectOk(migrate(store.dbPath, [first, second, third]));

      const error = expectFatal(migrate(store.dbPath, [first, second]));

      expect(error.reason).toBe("unknown_revision");
      expect(error.version).toBe(3);
    });

    it("should refuse a store whose revision contents diverged", () => {
      expectOk(migrate(store.dbPath, [first]));
      const edited: Migration = { ...first, up: `CREATE TABLE "alpha" ("id" INTEGER PRIMARY KEY, "extra" TEXT);` };

      const error = expectFatal(migrate(store.dbPath, [edited, second]));

      expect(error.reason).toBe("diverged");
      expect(error.version).toBe(1);
    });

    it("should refuse a recorded history with a gap", () => {
      expectOk(migrate(store.dbPath, [first, second]));
      inspect(store.dbPath, (conn) => conn.prepare("DELETE FROM schema_migrations WHERE version = 1").run());

      const error = expectFatal(migrate(store.dbPath, [first, second, third]));

      expect(error.reason).toBe("diverged");
      expect(error.version).toBe(1);
      expect(error.message).toBe("Recorded history has a gap: revision 1 is missing before 2");
    });

    it("should reject an invalid history before touching the store", () => {
      const error = expectFatal(migrate(store.dbPath, [second, first]));

      expect(error.reason).toBe("invalid_history");
      expect(existsSync(store.dbPath)).toBe(false);
    });

    it("should report an unreachable store as a connection failure", () => {
      const error = expectFatal(migrate("/nonexistent-sprout-dir/nested/bot.db", [first]));

      expect(error.reason).toBe("connection");
    });

    it("should fail with in_progress while another instance holds the lock", () => {
      expectOk(migrate(store.dbPath, [first]));
      const holder = new Database(store.dbPath);
      holder.exec("BEGIN IMMEDIATE");

      try {
        const error = expectFatal(migrate(store.dbPath, [first, second], 50));
        expect(error.reason).toBe("in_progress");
      } finally {
        holder.exec("ROLLBACK");
        holder.close();
      }

      inspect(store.dbPath, (conn) => expect(readSchemaVersion(conn)).toBe(1));
    });
  });

  describe("recovery", () => {
    it("should run non-transactional revisions through a pending journal row", () => {
      const outside: Migration = {
        version: 2,
        name: "outside",
        transactional: false,
        up: (conn) => conn.exec(`CREATE TABLE "beta" ("id" INTEGER PRIMARY KEY);`),
      };

      const report = expectOk(migrate(store.dbPath, [first, outside]));

      expect(report.steps.map((s) => s.status)).toEqual(["applied", "applied"]);
      inspect(store.dbPath, (conn) => {
        const row = conn.prepare<[], { status: string }>("SELECT status FROM schema_migrations WHERE version = 2").get();
        expect(row).toEqual({ status: "applied" });
      });
    });

    it("should complete an interrupted revision whose effect is present", () => {
      expectOk(migrate(store.dbPath, [first]));
      inspect(store.dbPath, (conn) => {
        conn.exec(`CREATE TABLE "beta" ("id" INTEGER PRIMARY KEY);`);
        conn
          .prepare("INSERT INTO schema_migrations (version, name, checksum, status, started_at) VALUES (?, ?, ?, 'pending', ?)")
          .run(2, second.name, checksumOf(second), 1_700_000_000_000);
      });

      const report = expectOk(migrate(store.dbPath, [first, second]));

      expect(report.steps.map((s) => [s.version, s.status])).toEqual([[2, "recovered"]]);
      expect(report.toVersion).toBe(2);
    });

    it("should fail with partial when a stale interrupted revision left no effect", () => {
      expectOk(migrate(store.dbPath, [first]));
      inspect(store.dbPath, (conn) =>
        conn
          .prepare("INSERT INTO schema_migrations (version, name, checksum, status, started_at) VALUES (?, ?, ?, 'pending', ?)")
          .run(2, second.name, checksumOf(second), 1_700_000_000_000)
      );

      const error = expectFatal(migrate(store.dbPath, [first, second]));

      expect(error.reason).toBe("partial");
      expect(error.version).toBe(2);
    });

    it("should fail with in_progress while a recent pending revision has no effect yet", () => {
      expectOk(migrate(store.dbPath, [first]));
      inspect(store.dbPath, (conn) =>
        conn
          .prepare("INSERT INTO schema_migrations (version, name, checksum, status, started_at) VALUES (?, ?, ?, 'pending', ?)")
          .run(2, second.name, checksumOf(second), 1_700_000_000_000)
      );

      const error = expectFatal(
        runMigrations(store.dbPath, {
          lockTimeoutMs: 1_000,
          staleAfterMs: 60_000,
          migrations: [first, second],
          logger: silentLogger,
          now: () => 1_700_000_030_000,
        })
      );

      expect(error.reason).toBe("in_progress");
      expect(error.version).toBe(2);
    });

    it("should report in_progress to an instance that starts during a non-transactional revision", () => {
      const competitors: Result<MigrationReport, MigrationFatalError>[] = [];
      const outside: Migration = {
        version: 2,
        name: "outside",
        transactional: false,
        up: (conn) => {
          competitors.push(migrate(store.dbPath, [first, outside]));
          conn.exec(`CREATE TABLE "beta" ("id" INTEGER PRIMARY KEY);`);
        },
        isApplied: (conn) => tableExists(conn, "beta"),
      };

      const report = expectOk(migrate(store.dbPath, [first, outside]));

      expect(report.steps.map((s) => [s.version, s.status])).toEqual([
        [1, "applied"],
        [2, "applied"],
      ]);
      expect(competitors).toHaveLength(1);
      const error = expectFatal(competitors[0]);
      expect(error.reason).toBe("in_progress");
      expect(error.version).toBe(2);
    });

    it("should record an unrecorded revision whose effect is present without re-running it", () => {
      expectOk(migrate(store.dbPath, [first]));
      inspect(store.dbPath, (conn) => conn.exec(`CREATE TABLE "beta" ("id" INTEGER PRIMARY KEY);`));
      const up = vi.fn((conn: RawConnection) => {
        conn.exec(`CREATE TABLE "beta" ("id" INTEGER PRIMARY KEY);`);
      });

      const report = expectOk(migrate(store.dbPath, [first, { ...second, up }]));

      expect(up).not.toHaveBeenCalled();
      expect(report.steps.map((s) => [s.version, s.status])).toEqual([[2, "recovered"]]);
    });
  });

  describe("concurrent instances", () => {
    it("should apply each revision exactly once when two instances race", () => {
      const migrations = [first, second, third];
      let competitor: MigrationReport | undefined;

      // The competitor runs to completion right after this instance commits revision 1
      const logger: Logger = {
        ...silentLogger,
        info: (message) => {
          if (message === "Applied revision 1 (first)") {
            competitor = expectOk(migrate(store.dbPath, migrations));
          }
        },
      };

      const report = expectOk(migrate(store.dbPath, migrations, 1_000, logger));

      expect(report.steps.map((s) => [s.version, s.status])).toEqual([
        [1, "applied"],
        [2, "skipped"],
        [3, "skipped"],
      ]);
      expect(competitor?.steps.map((s) => [s.version, s.status])).toEqual([
        [2, "applied"],
        [3, "applied"],
      ]);
      expect(report.toVersion).toBe(3);
    });

    it("should let the second of two sequential gates find nothing to do", async () => {
      const a = new SqliteMigrator({ dbPath: store.dbPath, lockTimeoutMs: 1_000, migrations: [first, second] });
      const b = new SqliteMigrator({ dbPath: store.dbPath, lockTimeoutMs: 1_000, migrations: [first, second] });

      const [ra, rb] = await Promise.all([a.run(), b.run()]);

      expect(expectOk(ra).steps).toHaveLength(2);
      expect(expectOk(rb).steps).toEqual([]);
    });
  });
});

describe("validateHistory", () => {
  it("should accept an ordered history", () => {
    expect(validateHistory(MIGRATIONS).ok).toBe(true);
    expect(validateHistory([]).ok).toBe(true);
  });

  it("should reject duplicate, unordered and non-positive versions", () => {
    expect(validateHistory([first, first]).ok).toBe(false);
    expect(validateHistory([second, first]).ok).toBe(false);
    expect(validateHistory([{ ...first, version: 0 }]).ok).toBe(false);
  });

  it("should reject duplicate names", () => {
    expect(validateHistory([first, { ...second, name: "first" }]).ok).toBe(false);
  });
});

describe("checksumOf", () => {
  it("should change when a revision's contents change", () => {
    expect(checksumOf(first)).toBe(checksumOf({ ...first }));
    expect(checksumOf(first)).not.toBe(checksumOf({ ...first, up: `CREATE TABLE "other" ("id" INTEGER);` }));
    expect(checksumOf(first)).not.toBe(checksumOf({ ...first, name: "renamed" }));
  });
});
