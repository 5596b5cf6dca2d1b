/**
 * Schema Migrator Gate
 *
 * First phase of startup. The gate runs a migration tool to completion and
 * either issues a `GatePassed` token or a fatal error. The session manager can
 * only be opened with the token, so no unit of work reaches the store before
 * the schema is at a known revision.
 */

import { spawn } from "child_process";
import type { AppConfig } from "../lib/config";
import { MigrationFatalError, err, errorMessage, ok, type Result } from "../lib/errors";
import { createLogger, type Logger } from "../lib/logger";
import { SqliteMigrator, type MigrationReport } from "./migrate";

export interface CommandMigrationReport {
  tool: "command";
  command: string;
  durationMs: number;
}

export type GateReport = MigrationReport | CommandMigrationReport;

/**
 * A migration tool is a single blocking call: it resolves once the store is
 * at the latest revision, or with the reason it is not.
 */
export interface MigrationTool {
  run(): Promise<Result<GateReport, MigrationFatalError>>;
}

class GatePassed {
  // Private field makes the type nominal; only this module can issue one.
  readonly #issued = true;

  constructor(
    readonly report: GateReport,
    readonly passedAt: Date
  ) {}
}

export type { GatePassed };

// ============================================================================
// External command tool
// ============================================================================

export interface CommandMigrationToolOptions {
  command: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  logger?: Logger;
}

/**
 * Runs an external migration command through the shell and treats any
 * nonzero exit as fatal. Output is passed through to this process.
 */
export class CommandMigrationTool implements MigrationTool {
  private readonly logger: Logger;

  constructor(private readonly options: CommandMigrationToolOptions) {
    this.logger = options.logger ?? createLogger("MigrationCommand");
  }

  run(): Promise<Result<GateReport, MigrationFatalError>> {
    const { command } = this.options;
    const started = Date.now();
    this.logger.info(`Running ${command}`);

    return new Promise((resolve) => {
      const child = spawn(command, {
        shell: true,
        stdio: "inherit",
        env: this.options.env ?? process.env,
        cwd: this.options.cwd,
      });

      child.on("error", (error) => {
        resolve(
          err(
            new MigrationFatalError(`Migration command could not start: ${errorMessage(error)}`, "tool_failed", undefined, {
              cause: error,
            })
          )
        );
      });

      child.on("exit", (code, signal) => {
        if (code === 0) {
          resolve(ok({ tool: "command", command, durationMs: Date.now() - started }));
          return;
        }
        const how = signal ? `was killed by ${signal}` : `exited with code ${code}`;
        resolve(err(new MigrationFatalError(`Migration command ${how}`, "tool_failed")));
      });
    });
  }
}

// ============================================================================
// Gate
// ============================================================================

export function createMigrationTool(config: AppConfig, logger: Logger = createLogger("Migrator")): MigrationTool {
  if (config.migration.command) {
    return new CommandMigrationTool({ command: config.migration.command, logger });
  }
  return new SqliteMigrator({
    dbPath: config.databasePath,
    lockTimeoutMs: config.migration.lockTimeoutMs,
    staleAfterMs: config.migration.staleAfterMs,
    logger,
  });
}

/**
 * Run the tool once. A failure is final for this process: the caller must
 * exit and leave the retry to an operator or orchestrator.
 */
export async function runMigrationGate(
  tool: MigrationTool,
  logger: Logger = createLogger("MigrationGate")
): Promise<Result<GatePassed, MigrationFatalError>> {
  let result: Result<GateReport, MigrationFatalError>;
  try {
    result = await tool.run();
  } catch (error) {
    result = err(
      error instanceof MigrationFatalError
        ? error
        : new MigrationFatalError(`Migration tool crashed: ${errorMessage(error)}`, "failed", undefined, { cause: error })
    );
  }

  if (!result.ok) {
    logger.error("Schema migration failed; refusing to start", {
      reason: result.error.reason,
      version: result.error.version,
      error: result.error.message,
    });
    return result;
  }

  const report = result.value;
  if (report.tool === "sqlite") {
    logger.info("Schema migration complete", {
      from: report.fromVersion,
      to: report.toVersion,
      steps: report.steps.length,
    });
  } else {
    logger.info("Schema migration complete", { command: report.command, durationMs: report.durationMs });
  }

  return ok(new GatePassed(report, new Date()));
}
