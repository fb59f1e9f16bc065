import { randomUUID } from "node:crypto";
import { Request, Response, Router } from "express";
import { Logger } from "../config/logger";
import { EvaluationPipeline } from "../pipeline/evaluation.pipeline";
import { isRecord } from "../profiles/profile.schemas";
import { CandidateInput } from "../shared/types/pipeline.types";
import { toRunRecord } from "../storage/artifact-storage.service";

interface EvaluationControllerDeps {
  pipeline: EvaluationPipeline;
  logger: Logger;
}

interface EvaluationRequest {
  input: CandidateInput;
  /** Only requests that name their candidate share cached stages. */
  useCache: boolean;
}

function toEvaluationRequest(body: unknown): EvaluationRequest | null {
  if (!isRecord(body) || body.profile === undefined || body.requirement === undefined) {
    return null;
  }
  const candidateId = typeof body.candidate_id === "string" ? body.candidate_id.trim() : "";
  return {
    input: {
      candidate_id: candidateId || randomUUID(),
      profile: body.profile,
      requirement: body.requirement,
      match: body.match ?? undefined,
      assessment: body.assessment ?? undefined,
    },
    useCache: candidateId.length > 0,
  };
}

export function buildEvaluationController(deps: EvaluationControllerDeps): Router {
  const router = Router();

  router.post("/", async (request: Request, response: Response) => {
    const evaluation = toEvaluationRequest(request.body);
    if (!evaluation) {
      response.status(400).json({ ok: false, error: "Body must be an object with profile and requirement" });
      return;
    }

    const { input, useCache } = evaluation;
    const controller = new AbortController();
    response.on("close", () => {
      if (!response.writableEnded) {
        controller.abort();
      }
    });

    try {
      const run = await deps.pipeline.evaluate(input, { signal: controller.signal, useCache });
      if (run.failure?.error_code === "parse_error") {
        response.status(422).json({ ok: false, error: run.failure.message, run: toRunRecord(run) });
        return;
      }
      response.status(200).json({ ok: true, run: toRunRecord(run) });
    } catch (error) {
      deps.logger.error("Failed to evaluate candidate", {
        candidate_id: input.candidate_id,
        error: error instanceof Error ? error.message : "Unknown error",
      });
      response.status(500).json({ ok: false, error: "Internal error" });
    }
  });

  return router;
}
