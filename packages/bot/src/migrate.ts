/**
 * Standalone migration entrypoint.
 *
 * Runs only the migration gate, for operators who want to migrate ahead of a
 * deploy. Exits 0 when the store is at the latest revision, 2 on bad configuration
 * and 3 when the migration fails.
 */

import { createMigrationTool, runMigrationGate } from "./db/gate";
import { ConfigError, loadConfig, type AppConfig } from "./lib/config";
import { ExitCode } from "./lib/errors";
import { createLogger } from "./lib/logger";

async function main(): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`❌ ${error.message}`);
      return ExitCode.ConfigFailure;
    }
    throw error;
  }
  const gate = await runMigrationGate(
    createMigrationTool(config, createLogger("Migrator", config.logLevel)),
    createLogger("MigrationGate", config.logLevel)
  );
  if (!gate.ok) {
    console.error(`❌ Migration failed (${gate.error.reason}): ${gate.error.message}`);
    return ExitCode.MigrationFailure;
  }

  console.log("✅ Database is up to date");
  return ExitCode.Ok;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("❌ Unexpected failure:", error);
    process.exitCode = ExitCode.MigrationFailure;
  }
);
