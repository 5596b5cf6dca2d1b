/**
 * Connection Pool
 *
 * Bounded pool of better-sqlite3 connections. Every checkout gets a fresh
 * lease; a handle is only usable while its lease is current, so a unit of
 * work that kept a reference after release cannot reach a connection that
 * now belongs to someone else.
 *
 * Handle lifecycle:
 *   idle -> checked_out -> in_use -> releasing -> idle | discarded
 */

import { openConnection, createDrizzle, type AppDatabase, type OpenConnectionOptions, type RawConnection } from "./index";
import {
  OperationCancelledError,
  PoolClosedError,
  PoolExhaustedError,
  classifyDatabaseError,
  errorMessage,
} from "../lib/errors";
import { silentLogger, type Logger } from "../lib/logger";

export type HandleState = "idle" | "checked_out" | "in_use" | "releasing" | "discarded";

const TRANSITIONS: Record<HandleState, readonly HandleState[]> = {
  idle: ["checked_out", "discarded"],
  checked_out: ["in_use", "releasing"],
  in_use: ["releasing"],
  releasing: ["idle", "discarded"],
  discarded: [],
};

export interface PooledConnection {
  id: number;
  raw: RawConnection;
  db: AppDatabase;
  state: HandleState;
  /** Lease of the current owner; 0 while nobody owns it. */
  lease: number;
}

export class ConnectionHandle {
  readonly #conn: PooledConnection;

  constructor(
    conn: PooledConnection,
    readonly lease: number
  ) {
    this.#conn = conn;
  }

  get id(): number {
    return this.#conn.id;
  }

  /** False once the handle has been released, even if the connection lives on. */
  get active(): boolean {
    return this.#conn.lease === this.lease;
  }

  get state(): HandleState | "released" {
    return this.active ? this.#conn.state : "released";
  }

  get raw(): RawConnection {
    this.assertActive();
    return this.#conn.raw;
  }

  get db(): AppDatabase {
    this.assertActive();
    return this.#conn.db;
  }

  private assertActive(): void {
    if (!this.active) {
      throw new Error(`Connection handle ${this.#conn.id} (lease ${this.lease}) is no longer checked out`);
    }
  }
}

export interface ConnectionPoolOptions {
  dbPath: string;
  max: number;
  acquireTimeoutMs: number;
  busyTimeoutMs: number;
  logger?: Logger;
  openConnection?: (dbPath: string, options: OpenConnectionOptions) => RawConnection;
}

export interface AcquireOptions {
  signal?: AbortSignal;
}

export interface PoolStats {
  size: number;
  idle: number;
  inUse: number;
  waiting: number;
  max: number;
}

interface Waiter {
  resolve: (handle: ConnectionHandle) => void;
  reject: (error: unknown) => void;
  timer: ReturnType<typeof setTimeout>;
  signal?: AbortSignal;
  onAbort?: () => void;
}

export class ConnectionPool {
  private readonly logger: Logger;
  private readonly open: (dbPath: string, options: OpenConnectionOptions) => RawConnection;
  private readonly connections = new Map<number, PooledConnection>();
  private idle: PooledConnection[] = [];
  private waiters: Waiter[] = [];
  private nextId = 1;
  private nextLease = 1;
  private closed = false;
  private closing: Promise<void> | null = null;
  private onDrained: (() => void) | null = null;

  constructor(private readonly options: ConnectionPoolOptions) {
    if (!Number.isInteger(options.max) || options.max < 1) {
      throw new RangeError(`Pool max must be a positive integer, got ${options.max}`);
    }
    this.logger = options.logger ?? silentLogger;
    this.open = options.openConnection ?? openConnection;
  }

  /**
   * Check out a connection. Waits at most `acquireTimeoutMs` when the pool is
   * at capacity, then fails with `PoolExhaustedError`.
   */
  acquire(options: AcquireOptions = {}): Promise<ConnectionHandle> {
    if (this.closed) return Promise.reject(new PoolClosedError());
    if (options.signal?.aborted) {
      return Promise.reject(new OperationCancelledError("Connection acquisition cancelled", { cause: options.signal.reason }));
    }

    const idle = this.idle.pop();
    if (idle) return Promise.resolve(this.checkout(idle));

    if (this.connections.size < this.options.max) {
      try {
        return Promise.resolve(this.checkout(this.openPooled()));
      } catch (error) {
        return Promise.reject(classifyDatabaseError(error));
      }
    }

    return this.enqueue(options.signal);
  }

  /** checked_out -> in_use, once the owning unit of work starts using it. */
  markInUse(handle: ConnectionHandle): void {
    this.transition(this.owned(handle), "in_use");
  }

  /**
   * Return a handle. Unhealthy connections are closed instead of pooled, and
   * the freed slot is refilled for the next waiter.
   */
  release(handle: ConnectionHandle, options: { healthy?: boolean } = {}): void {
    const conn = this.owned(handle);
    this.transition(conn, "releasing");
    conn.lease = 0;

    const reusable = (options.healthy ?? true) && !this.closed && this.isHealthy(conn);
    if (!reusable) {
      this.discard(conn);
      this.refill();
    } else {
      this.transition(conn, "idle");
      const waiter = this.waiters.shift();
      if (waiter) {
        this.settle(waiter);
        waiter.resolve(this.checkout(conn));
      } else {
        this.idle.push(conn);
      }
    }

    this.checkDrained();
  }

  stats(): PoolStats {
    return {
      size: this.connections.size,
      idle: this.idle.length,
      inUse: this.connections.size - this.idle.length,
      waiting: this.waiters.length,
      max: this.options.max,
    };
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Reject waiters, close idle connections, and resolve once every
   * checked-out connection has come back and been closed.
   */
  close(): Promise<void> {
    if (this.closing) return this.closing;
    this.closed = true;

    for (const waiter of this.waiters) {
      this.settle(waiter);
      waiter.reject(new PoolClosedError());
    }
    this.waiters = [];

    for (const conn of this.idle) {
      this.discard(conn);
    }
    this.idle = [];

    this.closing = new Promise<void>((resolve) => {
      this.onDrained = resolve;
      this.checkDrained();
    });
    return this.closing;
  }

  private openPooled(): PooledConnection {
    const raw = this.open(this.options.dbPath, { busyTimeoutMs: this.options.busyTimeoutMs });
    const conn: PooledConnection = {
      id: this.nextId++,
      raw,
      db: createDrizzle(raw),
      state: "idle",
      lease: 0,
    };
    this.connections.set(conn.id, conn);
    this.logger.debug(`Opened connection ${conn.id}`, { size: this.connections.size });
    return conn;
  }

  private checkout(conn: PooledConnection): ConnectionHandle {
    this.transition(conn, "checked_out");
    conn.lease = this.nextLease++;
    return new ConnectionHandle(conn, conn.lease);
  }

  private enqueue(signal?: AbortSignal): Promise<ConnectionHandle> {
    return new Promise<ConnectionHandle>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        signal,
        timer: setTimeout(() => {
          this.removeWaiter(waiter);
          reject(new PoolExhaustedError(this.options.max, this.options.acquireTimeoutMs));
        }, this.options.acquireTimeoutMs),
      };

      if (signal) {
        waiter.onAbort = () => {
          this.removeWaiter(waiter);
          reject(new OperationCancelledError("Connection acquisition cancelled", { cause: signal.reason }));
        };
        signal.addEventListener("abort", waiter.onAbort, { once: true });
      }

      this.waiters.push(waiter);
    });
  }

  private removeWaiter(waiter: Waiter): void {
    this.settle(waiter);
    this.waiters = this.waiters.filter((w) => w !== waiter);
  }

  private settle(waiter: Waiter): void {
    clearTimeout(waiter.timer);
    if (waiter.signal && waiter.onAbort) {
      waiter.signal.removeEventListener("abort", waiter.onAbort);
    }
  }

  /** Replace discarded connections for queued waiters, up to `max`. */
  private refill(): void {
    while (!this.closed && this.waiters.length > 0 && this.connections.size < this.options.max) {
      const waiter = this.waiters.shift();
      if (!waiter) break;
      this.settle(waiter);
      try {
        waiter.resolve(this.checkout(this.openPooled()));
      } catch (error) {
        waiter.reject(classifyDatabaseError(error));
      }
    }
  }

  private isHealthy(conn: PooledConnection): boolean {
    if (!conn.raw.open || conn.raw.inTransaction) return false;
    try {
      conn.raw.prepare("SELECT 1").get();
      return true;
    } catch (error) {
      this.logger.warn(`Connection ${conn.id} failed its health check`, { error: errorMessage(error) });
      return false;
    }
  }

  private discard(conn: PooledConnection): void {
    this.transition(conn, "discarded");
    this.connections.delete(conn.id);
    if (conn.raw.open) {
      try {
        conn.raw.close();
      } catch (error) {
        this.logger.warn(`Closing connection ${conn.id} failed`, { error: errorMessage(error) });
      }
    }
    this.logger.debug(`Discarded connection ${conn.id}`, { size: this.connections.size });
  }

  private owned(handle: ConnectionHandle): PooledConnection {
    const conn = this.connections.get(handle.id);
    if (!conn || conn.lease !== handle.lease) {
      throw new Error(`Connection handle ${handle.id} (lease ${handle.lease}) is not checked out from this pool`);
    }
    return conn;
  }

  private transition(conn: PooledConnection, next: HandleState): void {
    if (!TRANSITIONS[conn.state].includes(next)) {
      throw new Error(`Connection ${conn.id} cannot move from ${conn.state} to ${next}`);
    }
    conn.state = next;
  }

  private checkDrained(): void {
    if (this.closed && this.connections.size === 0 && this.onDrained) {
      const resolve = this.onDrained;
      this.onDrained = null;
      resolve();
    }
  }
}
