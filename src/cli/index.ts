#!/usr/bin/env node
import { loadEnv } from "../config/env";
import { createLogger } from "../config/logger";
import { runEvaluateCli } from "./evaluate.cli";

async function run(): Promise<void> {
  const env = loadEnv();
  const logger = createLogger({ minLevel: env.logLevel, stream: "stderr" });
  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("cli.interrupted");
    controller.abort();
  });

  process.exitCode = await runEvaluateCli(process.argv.slice(2), {
    env,
    logger,
    signal: controller.signal,
  });
}

run().catch((error: unknown) => {
  process.stderr.write(`evaluate failed: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
