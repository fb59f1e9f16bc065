import { readFile } from "node:fs/promises";
import { parseArgs } from "node:util";
import { EnvConfig } from "../config/env";
import { Logger } from "../config/logger";
import { PipelineOverrides, createEvaluationPipeline } from "../pipeline/pipeline.factory";
import { ArtifactStorageService } from "../storage/artifact-storage.service";
import { parseWeightsOverride } from "../matching/weights";
import { EvaluationError, ParseError } from "../shared/errors";
import { CandidateInput, RunStatus } from "../shared/types/pipeline.types";

export const EXIT_OK = 0;
export const EXIT_INPUT_ERROR = 1;
export const EXIT_DEGRADED = 2;
export const EXIT_CANCELLED = 130;

export const USAGE = [
  "Usage: evaluate <profile.json> <requirement.json> --output <prefix>",
  "  [--weights skills=0.4,experience=0.3,education=0.2,additional=0.1]",
  "  [--assessment assessment.json] [--match match.json] [--candidate-id id]",
].join("\n");

export interface EvaluateCliDeps extends Pick<PipelineOverrides, "categoryScorer" | "answerScorer"> {
  env: EnvConfig;
  logger: Logger;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
  now?: () => Date;
  signal?: AbortSignal;
}

interface EvaluateCommand {
  profilePath: string;
  requirementPath: string;
  outputPrefix: string;
  weights?: string;
  assessmentPath?: string;
  matchPath?: string;
  candidateId?: string;
}

class UsageError extends Error {}

type JsonReadResult = { value: unknown; error?: undefined } | { value?: undefined; error: string };

const EXIT_BY_STATUS: Record<RunStatus, number> = {
  completed: EXIT_OK,
  failed: EXIT_INPUT_ERROR,
  degraded: EXIT_DEGRADED,
  cancelled: EXIT_CANCELLED,
};

export async function runEvaluateCli(argv: ReadonlyArray<string>, deps: EvaluateCliDeps): Promise<number> {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;

  let command: EvaluateCommand;
  let input: CandidateInput;
  let overrides: PipelineOverrides;
  try {
    command = parseCommand(argv);
    if (!command.matchPath && !deps.categoryScorer && !deps.env.generatorApiKey) {
      throw new UsageError("Without --match the generator scores categories; set GENERATOR_API_KEY");
    }
    overrides = {
      categoryScorer: deps.categoryScorer,
      answerScorer: deps.answerScorer,
      weights: command.weights ? parseWeightsOverride(command.weights) : undefined,
    };
    const match = command.matchPath ? await readStageJsonFile(command.matchPath) : undefined;
    const assessment = command.assessmentPath ? await readStageJsonFile(command.assessmentPath) : undefined;
    input = {
      candidate_id: command.candidateId ?? deriveCandidateId(command.profilePath),
      profile: await readJsonFile(command.profilePath),
      requirement: await readJsonFile(command.requirementPath),
      match: match?.value,
      assessment: assessment?.value,
      input_errors: {
        match: match?.error,
        assessment: assessment?.error,
      },
    };
  } catch (error) {
    if (error instanceof UsageError || error instanceof EvaluationError) {
      stderr.write(`${error.message}\n`);
      if (error instanceof UsageError) {
        stderr.write(`${USAGE}\n`);
      }
      return EXIT_INPUT_ERROR;
    }
    throw error;
  }

  const pipeline = createEvaluationPipeline(deps.env, deps.logger, overrides);
  const run = await pipeline.evaluate(input, { signal: deps.signal });
  const storage = new ArtifactStorageService(deps.logger);
  const written = await storage.writeRunArtifacts(command.outputPrefix, run, {
    generatedAt: (deps.now ?? (() => new Date()))(),
  });

  stdout.write(`Run ${run.run_id}: ${run.status}\n`);
  if (run.decision) {
    const { status, confidence_score: confidence, interview_stage: stage } = run.decision.decision;
    stdout.write(`Decision: ${status} (confidence ${confidence}, stage ${stage})\n`);
  }
  if (run.failure) {
    stdout.write(`Failure at ${run.failure.stage}: ${run.failure.message}\n`);
  }
  for (const filePath of Object.values(written)) {
    if (filePath) {
      stdout.write(`Wrote ${filePath}\n`);
    }
  }

  return EXIT_BY_STATUS[run.status];
}

function parseCommand(argv: ReadonlyArray<string>): EvaluateCommand {
  let parsed: ReturnType<typeof parseEvaluateArgs>;
  try {
    parsed = parseEvaluateArgs(argv);
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : "Invalid arguments");
  }

  const [name, profilePath, requirementPath, ...rest] = parsed.positionals;
  if (name !== "evaluate") {
    throw new UsageError(name ? `Unknown command: ${name}` : "Missing command");
  }
  if (!profilePath || !requirementPath || rest.length > 0) {
    throw new UsageError("Expected exactly two paths: <profile.json> <requirement.json>");
  }
  const outputPrefix = parsed.values.output;
  if (!outputPrefix) {
    throw new UsageError("--output <prefix> is required");
  }

  return {
    profilePath,
    requirementPath,
    outputPrefix,
    weights: parsed.values.weights,
    assessmentPath: parsed.values.assessment,
    matchPath: parsed.values.match,
    candidateId: parsed.values["candidate-id"],
  };
}

function parseEvaluateArgs(argv: ReadonlyArray<string>) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      output: { type: "string", short: "o" },
      weights: { type: "string" },
      assessment: { type: "string" },
      match: { type: "string" },
      "candidate-id": { type: "string" },
    },
  });
}

async function readJsonFile(filePath: string): Promise<unknown> {
  const result = parseJsonText(filePath, await readText(filePath));
  if (result.error !== undefined) {
    throw new ParseError(result.error);
  }
  return result.value;
}

/** Match and assessment files feed one stage each; bad JSON fails that stage, not the run. */
async function readStageJsonFile(filePath: string): Promise<JsonReadResult> {
  return parseJsonText(filePath, await readText(filePath));
}

async function readText(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, "utf-8");
  } catch (error) {
    throw new UsageError(`Cannot read ${filePath}: ${error instanceof Error ? error.message : "unknown error"}`);
  }
}

function parseJsonText(filePath: string, text: string): JsonReadResult {
  try {
    const parsed: unknown = JSON.parse(text);
    return { value: parsed };
  } catch (error) {
    return { error: `${filePath} is not valid JSON: ${error instanceof Error ? error.message : "parse failed"}` };
  }
}

function deriveCandidateId(profilePath: string): string {
  const base = profilePath.split(/[\\/]/).pop() ?? profilePath;
  return base.replace(/\.json$/i, "") || "candidate";
}
