import express, { Express, Request, Response } from "express";
import { EnvConfig } from "./config/env";
import { createLogger, Logger } from "./config/logger";
import { buildEvaluationController } from "./http/evaluation.controller";
import { PipelineOverrides, createEvaluationPipeline } from "./pipeline/pipeline.factory";

export interface AppContext {
  app: Express;
  logger: Logger;
}

interface CreateAppOptions {
  logger?: Logger;
  overrides?: PipelineOverrides;
}

export function createApp(env: EnvConfig, options: CreateAppOptions = {}): AppContext {
  const logger = options.logger ?? createLogger({ minLevel: env.logLevel });
  const pipeline = createEvaluationPipeline(env, logger, options.overrides);

  const app = express();
  app.use(express.json({ limit: "2mb" }));

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({ ok: true });
  });

  app.use(
    "/evaluations",
    buildEvaluationController({
      pipeline,
      logger,
    }),
  );

  return { app, logger };
}
