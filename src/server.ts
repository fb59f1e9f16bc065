import { createApp } from "./app";
import { EVALUATOR_SYSTEM_PROMPT } from "./ai/system/evaluator.system";
import { loadEnv } from "./config/env";

async function bootstrap(): Promise<void> {
  const env = loadEnv();
  const { app, logger } = createApp(env);

  app.listen(env.port, () => {
    logger.info("Server started", { port: env.port, nodeEnv: env.nodeEnv });
    logger.info("Generator configured", {
      model_name: env.generatorModel,
      apiUrl: env.generatorApiUrl,
      enabled: Boolean(env.generatorApiKey),
      timeoutMs: env.generatorTimeoutMs,
      maxAttempts: env.generatorMaxAttempts,
    });
    logger.info("Evaluator system prompt loaded", { length: EVALUATOR_SYSTEM_PROMPT.length });
    logger.info("Match weights", { ...env.matchWeights });
  });
}

bootstrap().catch((error: unknown) => {
  process.stderr.write(`Failed to start: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
