/**
 * Persistent Session Manager
 *
 * Owns the connection pool for the lifetime of the process and hands out
 * scoped connections and transactions. Whatever happens inside a scope
 * (success, error, cancellation) the connection goes back to the pool, and a
 * transaction that did not commit is rolled back completely.
 */

import type { PoolConfig } from "../lib/config";
import { ConnectionLostError, OperationCancelledError, classifyDatabaseError, errorMessage } from "../lib/errors";
import { createLogger, type Logger } from "../lib/logger";
import type { GatePassed } from "./gate";
import type { AppDatabase, RawConnection } from "./index";
import { ConnectionPool, type ConnectionHandle, type ConnectionPoolOptions, type PoolStats } from "./pool";

export interface ScopeOptions {
  signal?: AbortSignal;
}

export type TransactionMode = "deferred" | "immediate";

export interface TransactionOptions extends ScopeOptions {
  /** `immediate` takes the write lock up front instead of on first write. */
  mode?: TransactionMode;
}

/**
 * One atomic unit of work. Owned by the operation that opened it and only
 * valid until that operation's callback settles.
 */
export interface TransactionScope {
  readonly handle: ConnectionHandle;
  readonly db: AppDatabase;
  readonly raw: RawConnection;
  readonly signal?: AbortSignal;
}

export interface SessionManagerOptions extends PoolConfig {
  dbPath: string;
  logger?: Logger;
  openConnection?: ConnectionPoolOptions["openConnection"];
}

export class SessionManager {
  private readonly pool: ConnectionPool;
  private readonly logger: Logger;

  /**
   * Requires the migration gate's token: the pool cannot exist before the
   * schema has been brought to a known revision.
   */
  constructor(
    readonly gate: GatePassed,
    options: SessionManagerOptions
  ) {
    this.logger = options.logger ?? createLogger("Sessions");
    this.pool = new ConnectionPool({
      dbPath: options.dbPath,
      max: options.max,
      acquireTimeoutMs: options.acquireTimeoutMs,
      busyTimeoutMs: options.busyTimeoutMs,
      logger: this.logger,
      openConnection: options.openConnection,
    });
  }

  /**
   * Run `fn` with an exclusively owned connection.
   * @throws PoolExhaustedError when no connection frees up in time
   */
  async withConnection<T>(fn: (handle: ConnectionHandle) => Promise<T> | T, options: ScopeOptions = {}): Promise<T> {
    const handle = await this.pool.acquire({ signal: options.signal });
    this.pool.markInUse(handle);

    let healthy = true;
    try {
      return await fn(handle);
    } catch (error) {
      const classified = classifyDatabaseError(error);
      if (classified instanceof ConnectionLostError) {
        healthy = false;
      }
      throw classified;
    } finally {
      this.pool.release(handle, { healthy });
    }
  }

  /**
   * Run `fn` inside a transaction that commits when it resolves and rolls
   * back when it throws or when `signal` aborts before the commit.
   */
  withTransaction<T>(fn: (tx: TransactionScope) => Promise<T> | T, options: TransactionOptions = {}): Promise<T> {
    const { signal } = options;

    return this.withConnection(async (handle) => {
      handle.raw.exec(options.mode === "immediate" ? "BEGIN IMMEDIATE" : "BEGIN DEFERRED");

      const scope: TransactionScope = {
        handle,
        signal,
        get db() {
          return handle.db;
        },
        get raw() {
          return handle.raw;
        },
      };

      try {
        const result = await fn(scope);
        if (signal?.aborted) {
          throw new OperationCancelledError("Transaction cancelled before commit", { cause: signal.reason });
        }
        handle.raw.exec("COMMIT");
        return result;
      } catch (error) {
        this.rollback(handle);
        throw error;
      }
    }, options);
  }

  stats(): PoolStats {
    return this.pool.stats();
  }

  get isClosed(): boolean {
    return this.pool.isClosed;
  }

  /** Waits for checked-out connections to come back, then closes everything. */
  async close(): Promise<void> {
    if (!this.pool.isClosed) {
      this.logger.info("Closing session manager", { ...this.pool.stats() });
    }
    await this.pool.close();
  }

  private rollback(handle: ConnectionHandle): void {
    const raw = handle.raw;
    if (!raw.open || !raw.inTransaction) return;
    try {
      raw.exec("ROLLBACK");
    } catch (error) {
      // The connection still reports an open transaction, so release discards it
      this.logger.warn(`Rollback failed on connection ${handle.id}`, { error: errorMessage(error) });
    }
  }
}

export function openSessionManager(gate: GatePassed, options: SessionManagerOptions): SessionManager {
  const sessions = new SessionManager(gate, options);
  const { report } = gate;
  (options.logger ?? createLogger("Sessions")).info("Session manager ready", {
    schemaVersion: report.tool === "sqlite" ? report.toVersion : "external",
    max: options.max,
  });
  return sessions;
}
