import { randomUUID } from "node:crypto";
import { AnswerScoreProvider } from "../assessment/answer-scoring.service";
import { parseAssessmentSubmission } from "../assessment/assessment.parser";
import { DEFAULT_PASS_THRESHOLD, scoreAssessment } from "../assessment/assessment-scorer";
import { Logger, LoggerContext, logContext } from "../config/logger";
import { classifyDecision } from "../decisions/decision-classifier";
import { CategoryScoreProvider } from "../matching/category-scoring.service";
import { parseUpstreamMatchAnalysis } from "../matching/match-analysis.parser";
import { computeMatch } from "../matching/scoring/category-match";
import { DEFAULT_MATCH_WEIGHTS } from "../matching/weights";
import { normalizeCandidateProfile, normalizeJobRequirement } from "../profiles/profile.schemas";
import { ConfigurationError, ValidationError, describeError } from "../shared/errors";
import { AssessmentQuestion, AssessmentReport, SubmittedQuestion } from "../shared/types/assessment.types";
import { Decision } from "../shared/types/decision.types";
import { MatchAnalysis, MatchWeights, UpstreamMatchAnalysis } from "../shared/types/match.types";
import {
  CandidateInput,
  PipelineRunResult,
  PipelineStage,
  RunStatus,
  StageOutcome,
} from "../shared/types/pipeline.types";
import { CandidateResultCache, IngestedCandidate, fingerprintOf } from "./result-cache";

export interface EvaluationPipelineDeps {
  logger: Logger;
  /** Asked for category scores when a candidate arrives without a match analysis. */
  categoryScorer?: CategoryScoreProvider;
  /** Scores submitted answers that carry no score. */
  answerScorer?: AnswerScoreProvider;
  cache?: CandidateResultCache;
  weights?: MatchWeights;
  passThreshold?: number;
  concurrency?: number;
  createRunId?: () => string;
}

export interface EvaluateOptions {
  signal?: AbortSignal;
  /** `false` keeps this run out of the shared cache, for inputs with no stable candidate id. */
  useCache?: boolean;
}

type StageRun<T> =
  | { status: "ok"; value: T; fromCache: boolean }
  | { status: "skipped"; reason: string }
  | { status: "failed"; error_code: string; reason: string }
  | { status: "cancelled" };

const NOT_REACHED: StageOutcome = { status: "skipped", reason: "not reached" };
const CANCELLED: StageRun<never> = { status: "cancelled" };

export class EvaluationPipeline {
  private readonly logger: Logger;
  private readonly weights: MatchWeights;
  private readonly passThreshold: number;
  private readonly concurrency: number;
  private readonly createRunId: () => string;

  constructor(private readonly deps: EvaluationPipelineDeps) {
    this.logger = deps.logger;
    this.weights = deps.weights ?? DEFAULT_MATCH_WEIGHTS;
    this.passThreshold = deps.passThreshold ?? DEFAULT_PASS_THRESHOLD;
    this.concurrency = Math.max(1, Math.floor(deps.concurrency ?? 1));
    this.createRunId = deps.createRunId ?? randomUUID;
  }

  async evaluate(input: CandidateInput, options: EvaluateOptions = {}): Promise<PipelineRunResult> {
    const { signal } = options;
    const cache = options.useCache === false ? undefined : this.deps.cache;
    const startedAt = Date.now();
    const runId = this.createRunId();
    const context: LoggerContext = {
      run_id: runId,
      candidate_id: input.candidate_id,
    };
    const run: PipelineRunResult = {
      run_id: runId,
      candidate_id: input.candidate_id,
      status: "failed",
      failure: null,
      stages: {
        ingestion: NOT_REACHED,
        matching: NOT_REACHED,
        assessment: NOT_REACHED,
        decision: NOT_REACHED,
      },
      profile: null,
      requirement: null,
      match_analysis: null,
      assessment_report: null,
      decision: null,
      candidate_name: null,
      data_quality_notes: [],
    };
    logContext(this.logger, "info", "pipeline.run.started", context);

    const ingestion = signal?.aborted ? CANCELLED : this.runIngestion(input, cache, context);
    run.stages.ingestion = toOutcome(ingestion);
    if (ingestion.status !== "ok") {
      const status: RunStatus = ingestion.status === "cancelled" ? "cancelled" : "failed";
      return this.finish(run, status, "ingestion", ingestion, startedAt);
    }

    const ingested = ingestion.value;
    run.profile = ingested.profile;
    run.requirement = ingested.requirement;
    run.candidate_name = ingested.profile.personal_info.name;
    run.data_quality_notes.push(...ingested.notes);

    const [matching, assessment] = await Promise.all([
      this.runMatching(input, ingested, cache, context, signal),
      this.runAssessment(input, cache, context, signal),
    ]);
    run.stages.matching = toOutcome(matching);
    run.stages.assessment = toOutcome(assessment);
    if (matching.status === "ok") {
      run.match_analysis = matching.value;
    } else if (matching.status === "failed") {
      run.data_quality_notes.push(
        `Matching failed (${matching.error_code}): ${matching.reason}. The decision uses an all-not-assessed stand-in.`,
      );
    }
    if (assessment.status === "ok") {
      run.assessment_report = assessment.value;
    } else if (assessment.status === "failed") {
      run.data_quality_notes.push(`Assessment failed (${assessment.error_code}): ${assessment.reason}.`);
    }

    if (signal?.aborted || matching.status === "cancelled" || assessment.status === "cancelled") {
      run.stages.decision = { status: "cancelled" };
      const stage: PipelineStage = matching.status === "ok" ? "assessment" : "matching";
      return this.finish(run, "cancelled", stage, CANCELLED, startedAt);
    }

    const decision = this.runDecision(input, ingested, matching, assessment, run.data_quality_notes, cache, context);
    run.stages.decision = toOutcome(decision);
    if (decision.status === "ok") {
      run.decision = decision.value;
    } else if (decision.status === "failed") {
      run.data_quality_notes.push(`Decision failed (${decision.error_code}): ${decision.reason}.`);
    }

    const completed = matching.status === "ok" && assessment.status !== "failed" && decision.status === "ok";
    return this.finish(run, completed ? "completed" : "degraded", "decision", decision, startedAt);
  }

  /** Evaluates independent candidates with at most `concurrency` runs in flight; results keep input order. */
  async evaluateMany(
    inputs: ReadonlyArray<CandidateInput>,
    options: EvaluateOptions = {},
  ): Promise<PipelineRunResult[]> {
    const results = new Array<PipelineRunResult>(inputs.length);
    let next = 0;
    const worker = async (): Promise<void> => {
      while (next < inputs.length) {
        const index = next;
        next += 1;
        results[index] = await this.evaluate(inputs[index], options);
      }
    };
    const workers = Array.from({ length: Math.min(this.concurrency, inputs.length) }, () => worker());
    await Promise.all(workers);
    return results;
  }

  private runIngestion(
    input: CandidateInput,
    cache: CandidateResultCache | undefined,
    context: LoggerContext,
  ): StageRun<IngestedCandidate> {
    const fingerprint = fingerprintOf({ profile: input.profile, requirement: input.requirement });
    const cached = cache?.get(input.candidate_id, "ingestion", fingerprint);
    if (cached) {
      return { status: "ok", value: cached, fromCache: true };
    }
    const startedAt = Date.now();
    try {
      const profile = normalizeCandidateProfile(input.profile);
      const requirement = normalizeJobRequirement(input.requirement);
      const ingested: IngestedCandidate = {
        profile: profile.value,
        requirement: requirement.value,
        notes: [...profile.notes, ...requirement.notes],
      };
      cache?.set(input.candidate_id, "ingestion", fingerprint, ingested);
      return this.logStage(context, "ingestion", startedAt, { status: "ok", value: ingested, fromCache: false });
    } catch (error) {
      return this.logStage(context, "ingestion", startedAt, toFailure(error));
    }
  }

  private async runMatching(
    input: CandidateInput,
    ingested: IngestedCandidate,
    cache: CandidateResultCache | undefined,
    context: LoggerContext,
    signal: AbortSignal | undefined,
  ): Promise<StageRun<MatchAnalysis>> {
    const unreadable = input.input_errors?.match;
    const fingerprint = fingerprintOf({
      match: input.match ?? null,
      profile: ingested.profile,
      requirement: ingested.requirement,
      weights: this.weights,
    });
    const cached = unreadable ? undefined : cache?.get(input.candidate_id, "matching", fingerprint);
    if (cached) {
      return { status: "ok", value: cached, fromCache: true };
    }
    const stageContext: LoggerContext = { ...context, stage: "matching" };
    const startedAt = Date.now();
    try {
      if (unreadable) {
        throw new ValidationError(unreadable);
      }
      const upstream =
        input.match !== undefined
          ? parseUpstreamMatchAnalysis(input.match)
          : await this.requestCategoryScores(ingested, stageContext, signal);
      if (signal?.aborted) {
        return CANCELLED;
      }
      const computed = computeMatch(ingested.requirement, upstream.categories, this.weights);
      const analysis: MatchAnalysis = {
        ...computed,
        data_quality_notes: unique([...upstream.notes, ...computed.data_quality_notes]),
      };
      cache?.set(input.candidate_id, "matching", fingerprint, analysis);
      return this.logStage(context, "matching", startedAt, { status: "ok", value: analysis, fromCache: false });
    } catch (error) {
      if (signal?.aborted) {
        return CANCELLED;
      }
      return this.logStage(context, "matching", startedAt, toFailure(error));
    }
  }

  private async requestCategoryScores(
    ingested: IngestedCandidate,
    context: LoggerContext,
    signal: AbortSignal | undefined,
  ): Promise<UpstreamMatchAnalysis> {
    if (!this.deps.categoryScorer) {
      throw new ConfigurationError("No match analysis supplied and no category scorer configured");
    }
    return this.deps.categoryScorer.scoreCategories(ingested.profile, ingested.requirement, { signal, context });
  }

  private async runAssessment(
    input: CandidateInput,
    cache: CandidateResultCache | undefined,
    context: LoggerContext,
    signal: AbortSignal | undefined,
  ): Promise<StageRun<AssessmentReport>> {
    const unreadable = input.input_errors?.assessment;
    if (!unreadable && (input.assessment === undefined || input.assessment === null)) {
      return { status: "skipped", reason: "no assessment submitted" };
    }
    const fingerprint = fingerprintOf({ assessment: input.assessment, passThreshold: this.passThreshold });
    const cached = unreadable ? undefined : cache?.get(input.candidate_id, "assessment", fingerprint);
    if (cached) {
      return { status: "ok", value: cached, fromCache: true };
    }
    const stageContext: LoggerContext = { ...context, stage: "assessment" };
    const startedAt = Date.now();
    try {
      if (unreadable) {
        throw new ValidationError(unreadable);
      }
      const submission = parseAssessmentSubmission(input.assessment);
      const questions = await Promise.all(
        submission.questions.map((question) => this.scoreQuestion(question, stageContext, signal)),
      );
      if (signal?.aborted) {
        return CANCELLED;
      }
      const scored = scoreAssessment(questions, { passThreshold: this.passThreshold });
      const report: AssessmentReport = {
        ...scored,
        data_quality_notes: unique([...submission.notes, ...scored.data_quality_notes]),
      };
      cache?.set(input.candidate_id, "assessment", fingerprint, report);
      return this.logStage(context, "assessment", startedAt, { status: "ok", value: report, fromCache: false });
    } catch (error) {
      if (signal?.aborted) {
        return CANCELLED;
      }
      return this.logStage(context, "assessment", startedAt, toFailure(error));
    }
  }

  private async scoreQuestion(
    question: SubmittedQuestion,
    context: LoggerContext,
    signal: AbortSignal | undefined,
  ): Promise<AssessmentQuestion> {
    const answer = question.answer?.trim() ?? "";
    if (question.score !== null || !answer) {
      return question;
    }
    if (!this.deps.answerScorer) {
      throw new ConfigurationError(`Question ${question.id} has an unscored answer and no answer scorer is configured`);
    }
    const scored = await this.deps.answerScorer.scoreAnswer(question, answer, { signal, context });
    return {
      ...question,
      score: scored.score,
      feedback: question.feedback || scored.feedback,
      passion_score: question.passion_score ?? scored.passion_score,
    };
  }

  private runDecision(
    input: CandidateInput,
    ingested: IngestedCandidate,
    matching: StageRun<MatchAnalysis>,
    assessment: StageRun<AssessmentReport>,
    runNotes: string[],
    cache: CandidateResultCache | undefined,
    context: LoggerContext,
  ): StageRun<Decision> {
    const reusable = matching.status === "ok" && assessment.status !== "failed";
    const fingerprint = fingerprintOf({
      analysis: matching.status === "ok" ? matching.value : null,
      assessment: assessment.status === "ok" ? assessment.value : null,
      notes: runNotes,
    });
    const cached = reusable ? cache?.get(input.candidate_id, "decision", fingerprint) : undefined;
    if (cached) {
      return { status: "ok", value: cached, fromCache: true };
    }
    const startedAt = Date.now();
    try {
      const errorSignal = matching.status !== "ok";
      const analysis =
        matching.status === "ok" ? matching.value : computeMatch(ingested.requirement, {}, this.weights);
      const decision = classifyDecision({
        analysis,
        assessment: assessment.status === "ok" ? assessment.value : null,
        errorSignal,
        upstreamNotes: runNotes,
      });
      if (reusable) {
        cache?.set(input.candidate_id, "decision", fingerprint, decision);
      }
      return this.logStage(context, "decision", startedAt, { status: "ok", value: decision, fromCache: false });
    } catch (error) {
      return this.logStage(context, "decision", startedAt, toFailure(error));
    }
  }

  private logStage<T>(
    context: LoggerContext,
    stage: PipelineStage,
    startedAt: number,
    result: StageRun<T>,
  ): StageRun<T> {
    const stageContext: LoggerContext = {
      ...context,
      stage,
      latency_ms: Date.now() - startedAt,
      ok: result.status === "ok",
    };
    if (result.status === "failed") {
      logContext(
        this.logger,
        "warn",
        "pipeline.stage.failed",
        { ...stageContext, error_code: result.error_code },
        { reason: result.reason },
      );
    } else {
      logContext(this.logger, "info", "pipeline.stage.completed", stageContext);
    }
    return result;
  }

  private finish<T>(
    run: PipelineRunResult,
    status: RunStatus,
    stage: PipelineStage,
    result: StageRun<T>,
    startedAt: number,
  ): PipelineRunResult {
    run.status = status;
    if (status === "failed" && result.status === "failed") {
      run.failure = { stage, error_code: result.error_code, message: result.reason };
    } else if (status === "cancelled") {
      run.failure = { stage, error_code: "cancelled", message: `Run cancelled during ${stage}` };
    }
    logContext(
      this.logger,
      status === "completed" ? "info" : "warn",
      "pipeline.run.finished",
      {
        run_id: run.run_id,
        candidate_id: run.candidate_id,
        latency_ms: Date.now() - startedAt,
        ok: status === "completed",
        error_code: run.failure?.error_code,
      },
      { status, cached_candidates: this.deps.cache?.size },
    );
    return run;
  }
}

function toOutcome<T>(run: StageRun<T>): StageOutcome {
  if (run.status === "ok") {
    return { status: "ok" };
  }
  return run;
}

function toFailure(error: unknown): StageRun<never> {
  const described = describeError(error);
  return { status: "failed", error_code: described.code, reason: described.message };
}

function unique(values: string[]): string[] {
  return Array.from(new Set(values));
}
