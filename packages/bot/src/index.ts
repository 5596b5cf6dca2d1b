/**
 * Bot entrypoint.
 *
 * The container runs this file and nothing else: the migration gate executes
 * in-process before anything touches the store, and the exit code tells the
 * orchestrator which phase failed.
 */

import { exitCodeFor, startApplication } from "./app";
import { ExitCode, errorMessage } from "./lib/errors";

async function main(): Promise<number> {
  console.log("🌱 Sprout bot starting...");

  const started = await startApplication();
  if (!started.ok) {
    const { phase, error } = started.error;
    console.error(`❌ Startup failed during ${phase}: ${errorMessage(error)}`);
    return exitCodeFor(started.error);
  }

  const app = started.value;
  console.log("✅ Sprout bot is running");

  await new Promise<void>((resolve) => {
    const shutdown = (signal: NodeJS.Signals) => {
      console.log(`\n🛑 Received ${signal}, shutting down...`);
      resolve();
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  });

  await app.stop();
  console.log("👋 Stopped cleanly");
  return ExitCode.Ok;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("❌ Unexpected failure:", error);
    process.exitCode = ExitCode.ApplicationFailure;
  }
);
