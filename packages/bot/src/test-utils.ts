/**
 * Test Utilities
 *
 * Temporary SQLite stores, a migrated session manager, and an in-process
 * transport that records what the bot would have sent.
 */

import { randomUUID } from "crypto";
import { rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import type { BotEvent, BotEventListener, BotTransport } from "./bot/transport";
import { runMigrationGate, type GatePassed } from "./db/gate";
import { SqliteMigrator } from "./db/migrate";
import { openSessionManager, type SessionManager, type SessionManagerOptions } from "./db/session";
import { silentLogger } from "./lib/logger";

export interface TestStore {
  dbPath: string;
  /** Removes the store together with its WAL and shared-memory files. */
  cleanup: () => void;
}

export function createTestStore(): TestStore {
  const dbPath = join(tmpdir(), `sprout-test-${randomUUID()}.db`);
  return {
    dbPath,
    cleanup: () => {
      for (const suffix of ["", "-wal", "-shm", "-journal"]) {
        rmSync(`${dbPath}${suffix}`, { force: true });
      }
    },
  };
}

export async function passGate(dbPath: string): Promise<GatePassed> {
  const gate = await runMigrationGate(new SqliteMigrator({ dbPath, lockTimeoutMs: 1_000 }), silentLogger);
  if (!gate.ok) {
    throw gate.error;
  }
  return gate.value;
}

export interface TestSessions {
  dbPath: string;
  gate: GatePassed;
  sessions: SessionManager;
  cleanup: () => Promise<void>;
}

/**
 * A migrated store with a session manager over it. Lock waits are disabled
 * so conflicts surface immediately.
 */
export async function createTestSessions(
  options: Partial<Omit<SessionManagerOptions, "dbPath">> = {}
): Promise<TestSessions> {
  const store = createTestStore();
  const gate = await passGate(store.dbPath);
  const sessions = openSessionManager(gate, {
    dbPath: store.dbPath,
    max: 3,
    acquireTimeoutMs: 1_000,
    busyTimeoutMs: 0,
    logger: silentLogger,
    ...options,
  });

  return {
    dbPath: store.dbPath,
    gate,
    sessions,
    cleanup: async () => {
      await sessions.close();
      store.cleanup();
    },
  };
}

export interface SentMessage {
  chatId: number;
  text: string;
}

export class FakeTransport implements BotTransport {
  readonly sent: SentMessage[] = [];
  started = false;
  stopped = false;
  failSends = false;
  private listener: BotEventListener | null = null;

  async start(onEvent: BotEventListener): Promise<void> {
    this.listener = onEvent;
    this.started = true;
  }

  async stop(): Promise<void> {
    this.stopped = true;
    this.listener = null;
  }

  async send(chatId: number, text: string): Promise<void> {
    if (this.failSends) {
      throw new Error("send failed");
    }
    this.sent.push({ chatId, text });
  }

  /** Deliver an event the way the real transport would. */
  async emit(event: BotEvent): Promise<void> {
    if (!this.listener) {
      throw new Error("Transport is not started");
    }
    await this.listener(event);
  }
}

/** A promise plus the function that resolves it. */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
