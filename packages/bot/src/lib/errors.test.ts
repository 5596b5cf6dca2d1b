import Database from "better-sqlite3";
import { describe, expect, it } from "vitest";
import {
  ConnectionLostError,
  MigrationFatalError,
  OperationCancelledError,
  PoolClosedError,
  PoolExhaustedError,
  TransactionConflictError,
  classifyDatabaseError,
  errorMessage,
  isRetriable,
} from "./errors";

describe("classifyDatabaseError", () => {
  it("should map lock errors to TransactionConflictError", () => {
    for (const code of ["SQLITE_BUSY", "SQLITE_BUSY_SNAPSHOT", "SQLITE_LOCKED", "SQLITE_LOCKED_SHAREDCACHE"]) {
      const classified = classifyDatabaseError(new Database.SqliteError("database is locked", code));
      expect(classified).toBeInstanceOf(TransactionConflictError);
    }
  });

  it("should map I/O and open failures to ConnectionLostError", () => {
    for (const code of ["SQLITE_IOERR", "SQLITE_IOERR_WRITE", "SQLITE_CANTOPEN", "SQLITE_NOTADB", "SQLITE_CORRUPT"]) {
      const classified = classifyDatabaseError(new Database.SqliteError("disk I/O error", code));
      expect(classified).toBeInstanceOf(ConnectionLostError);
    }
  });

  it("should keep the driver error as the cause", () => {
    const original = new Database.SqliteError("database is locked", "SQLITE_BUSY");
    const classified = classifyDatabaseError(original);

    expect(classified).toBeInstanceOf(TransactionConflictError);
    expect(classified instanceof Error ? classified.cause : undefined).toBe(original);
  });

  it("should treat a closed connection as lost", () => {
    const conn = new Database(":memory:");
    conn.close();

    let thrown: unknown;
    try {
      conn.prepare("SELECT 1");
    } catch (error) {
      thrown = error;
    }

    expect(classifyDatabaseError(thrown)).toBeInstanceOf(ConnectionLostError);
  });

  it("should pass other errors through untouched", () => {
    const constraint = new Database.SqliteError("UNIQUE constraint failed: users.tg_user_id", "SQLITE_CONSTRAINT_UNIQUE");
    const plain = new Error("boom");
    const conflict = new TransactionConflictError("already classified");

    expect(classifyDatabaseError(constraint)).toBe(constraint);
    expect(classifyDatabaseError(plain)).toBe(plain);
    expect(classifyDatabaseError(conflict)).toBe(conflict);
    expect(classifyDatabaseError("text")).toBe("text");
  });
});

describe("isRetriable", () => {
  it("should retry transient failures only", () => {
    expect(isRetriable(new TransactionConflictError("busy"))).toBe(true);
    expect(isRetriable(new ConnectionLostError("gone"))).toBe(true);
    expect(isRetriable(new PoolExhaustedError(5, 100))).toBe(true);

    expect(isRetriable(new PoolClosedError())).toBe(false);
    expect(isRetriable(new OperationCancelledError())).toBe(false);
    expect(isRetriable(new MigrationFatalError("bad", "diverged", 3))).toBe(false);
    expect(isRetriable(new Error("boom"))).toBe(false);
  });
});

describe("error types", () => {
  it("should describe pool exhaustion", () => {
    const error = new PoolExhaustedError(2, 50);

    expect(error.message).toBe("Connection pool exhausted: no connection became available within 50ms (max 2)");
    expect(error.code).toBe("POOL_EXHAUSTED");
    expect(error.name).toBe("PoolExhaustedError");
  });

  it("should carry the migration failure reason and version", () => {
    const error = new MigrationFatalError("Revision 4 failed", "failed", 4);

    expect(error.reason).toBe("failed");
    expect(error.version).toBe(4);
    expect(error.toJSON()).toEqual({
      name: "MigrationFatalError",
      code: "MIGRATION_FATAL",
      retriable: false,
      message: "Revision 4 failed",
    });
  });

  it("should default the cancellation message", () => {
    expect(new OperationCancelledError().message).toBe("Operation was cancelled");
  });
});

describe("errorMessage", () => {
  it("should read messages from errors and stringify anything else", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage(42)).toBe("42");
  });
});
