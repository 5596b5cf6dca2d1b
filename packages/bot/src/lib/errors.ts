/**
 * Error taxonomy for the storage layer
 *
 * Every failure the runtime core can surface maps onto one of these classes.
 * Callers decide retry policy from `retriable`; nothing here swallows errors.
 */

import Database from "better-sqlite3";

// ============================================================================
// Result
// ============================================================================

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// ============================================================================
// Exit codes
// ============================================================================

export const ExitCode = {
  Ok: 0,
  ApplicationFailure: 1,
  ConfigFailure: 2,
  MigrationFailure: 3,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

// ============================================================================
// Error Types
// ============================================================================

export type DatabaseErrorCode =
  | "MIGRATION_FATAL"
  | "POOL_EXHAUSTED"
  | "POOL_CLOSED"
  | "CONNECTION_LOST"
  | "TRANSACTION_CONFLICT"
  | "CANCELLED";

export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly code: DatabaseErrorCode,
    public readonly retriable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "DatabaseError";
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      retriable: this.retriable,
      message: this.message,
    };
  }
}

export type MigrationFailureReason =
  | "connection"
  | "in_progress"
  | "partial"
  | "diverged"
  | "unknown_revision"
  | "invalid_history"
  | "failed"
  | "tool_failed";

/**
 * The schema cannot be brought to a known revision. The process must not
 * start, and this is never retried inside the same process.
 */
export class MigrationFatalError extends DatabaseError {
  constructor(
    message: string,
    public readonly reason: MigrationFailureReason,
    public readonly version?: number,
    options?: { cause?: unknown }
  ) {
    super(message, "MIGRATION_FATAL", false, options);
    this.name = "MigrationFatalError";
  }
}

export class PoolExhaustedError extends DatabaseError {
  constructor(
    public readonly max: number,
    public readonly waitedMs: number
  ) {
    super(
      `Connection pool exhausted: no connection became available within ${waitedMs}ms (max ${max})`,
      "POOL_EXHAUSTED",
      true
    );
    this.name = "PoolExhaustedError";
  }
}

export class PoolClosedError extends DatabaseError {
  constructor() {
    super("Connection pool is closed", "POOL_CLOSED", false);
    this.name = "PoolClosedError";
  }
}

export class ConnectionLostError extends DatabaseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CONNECTION_LOST", true, options);
    this.name = "ConnectionLostError";
  }
}

export class TransactionConflictError extends DatabaseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "TRANSACTION_CONFLICT", true, options);
    this.name = "TransactionConflictError";
  }
}

export class OperationCancelledError extends DatabaseError {
  constructor(message = "Operation was cancelled", options?: { cause?: unknown }) {
    super(message, "CANCELLED", false, options);
    this.name = "OperationCancelledError";
  }
}

// ============================================================================
// Classification
// ============================================================================

const CONFLICT_CODES = ["SQLITE_BUSY", "SQLITE_LOCKED"];
const CONNECTION_CODES = ["SQLITE_IOERR", "SQLITE_CANTOPEN", "SQLITE_NOTADB", "SQLITE_CORRUPT"];

function hasCodePrefix(code: string, prefixes: string[]): boolean {
  return prefixes.some((prefix) => code === prefix || code.startsWith(`${prefix}_`));
}

/**
 * Map a driver error onto the taxonomy. Errors that are already classified,
 * or that say nothing about the store, are returned untouched.
 */
export function classifyDatabaseError(error: unknown): unknown {
  if (error instanceof DatabaseError) return error;

  if (error instanceof Database.SqliteError) {
    if (hasCodePrefix(error.code, CONFLICT_CODES)) {
      return new TransactionConflictError(`Transaction conflict (${error.code}): ${error.message}`, {
        cause: error,
      });
    }
    if (hasCodePrefix(error.code, CONNECTION_CODES)) {
      return new ConnectionLostError(`Connection lost (${error.code}): ${error.message}`, { cause: error });
    }
    return error;
  }

  // better-sqlite3 raises a TypeError once the handle has been closed
  if (error instanceof TypeError && error.message.includes("database connection is not open")) {
    return new ConnectionLostError("Connection lost: the database connection is not open", { cause: error });
  }

  return error;
}

export function isRetriable(error: unknown): boolean {
  return error instanceof DatabaseError && error.retriable;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
