/**
 * Application startup
 *
 * Two-phase barrier: the migration gate runs to completion first, and only a
 * passed gate can open the session manager. The transport (and with it the
 * dispatch loop) starts last.
 */

import { Dispatcher, type EventHandler } from "./bot/dispatcher";
import { TelegramTransport } from "./bot/telegram";
import type { BotTransport } from "./bot/transport";
import { createMigrationTool, runMigrationGate, type GatePassed, type MigrationTool } from "./db/gate";
import { openSessionManager, type SessionManager } from "./db/session";
import { ConfigError, loadConfig, type AppConfig } from "./lib/config";
import { ExitCode, MigrationFatalError, err, errorMessage, ok, type Result } from "./lib/errors";
import { createLogger, type Logger } from "./lib/logger";

export type StartupError =
  | { phase: "config"; error: ConfigError }
  | { phase: "migration"; error: MigrationFatalError }
  | { phase: "application"; error: unknown };

export interface ApplicationDeps {
  env?: Record<string, string | undefined>;
  /** Defaults to the Telegram transport, which needs `BOT_TOKEN`. */
  createTransport?: (config: AppConfig) => BotTransport;
  createMigrationTool?: (config: AppConfig, logger: Logger) => MigrationTool;
  handlers?: EventHandler[];
  logger?: Logger;
}

export interface RunningApp {
  readonly config: AppConfig;
  readonly gate: GatePassed;
  readonly sessions: SessionManager;
  readonly dispatcher: Dispatcher;
  readonly transport: BotTransport;
  /** Stop receiving, let in-flight events finish, then close the pool. */
  stop(): Promise<void>;
}

export function exitCodeFor(error: StartupError): ExitCode {
  switch (error.phase) {
    case "config":
      return ExitCode.ConfigFailure;
    case "migration":
      return ExitCode.MigrationFailure;
    case "application":
      return ExitCode.ApplicationFailure;
  }
}

function defaultTransport(config: AppConfig): BotTransport {
  if (!config.botToken) {
    throw new ConfigError(["BOT_TOKEN: required to connect to Telegram"]);
  }
  return new TelegramTransport({ token: config.botToken, logger: createLogger("Telegram", config.logLevel) });
}

export async function startApplication(deps: ApplicationDeps = {}): Promise<Result<RunningApp, StartupError>> {
  let logger = deps.logger ?? createLogger("App");

  // Phase 0: configuration
  let config: AppConfig;
  try {
    config = loadConfig(deps.env ?? process.env);
    if (!deps.createTransport && !config.botToken) {
      throw new ConfigError(["BOT_TOKEN: required to connect to Telegram"]);
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      return err({ phase: "config", error });
    }
    throw error;
  }
  const { logLevel } = config;
  const log = (component: string): Logger => createLogger(component, logLevel);
  logger = deps.logger ?? log("App");

  // Phase 1: migration gate
  const toolFactory = deps.createMigrationTool ?? createMigrationTool;
  const gate = await runMigrationGate(toolFactory(config, log("Migrator")), log("MigrationGate"));
  if (!gate.ok) {
    return err({ phase: "migration", error: gate.error });
  }

  // Phase 2: sessions and dispatch
  const sessions = openSessionManager(gate.value, {
    dbPath: config.databasePath,
    ...config.pool,
    logger: log("Sessions"),
  });

  let transport: BotTransport;
  let dispatcher: Dispatcher;
  try {
    transport = (deps.createTransport ?? defaultTransport)(config);
    dispatcher = new Dispatcher({
      sessions,
      transport,
      handlers: deps.handlers,
      defaultTimezone: config.defaultTimezone,
      logger: log("Dispatcher"),
    });
    await transport.start((event) => dispatcher.dispatch(event));
  } catch (error) {
    logger.error("Failed to start the bot", { error: errorMessage(error) });
    await sessions.close();
    return err({ phase: "application", error });
  }

  let stopping: Promise<void> | null = null;
  const stop = (): Promise<void> => {
    stopping ??= (async () => {
      logger.info("Stopping");
      try {
        await transport.stop();
      } finally {
        await dispatcher.drain();
        await sessions.close();
      }
      logger.info("Stopped");
    })();
    return stopping;
  };

  logger.info("Bot is running", { environment: config.environment });
  return ok({ config, gate: gate.value, sessions, dispatcher, transport, stop });
}
