import { AssessmentReport } from "./assessment.types";
import { Decision } from "./decision.types";
import { MatchAnalysis } from "./match.types";
import { CandidateProfile, JobRequirement } from "./profile.types";

export type PipelineStage = "ingestion" | "matching" | "assessment" | "decision";

export type StageOutcome =
  | { status: "ok" }
  | { status: "skipped"; reason: string }
  | { status: "failed"; error_code: string; reason: string }
  | { status: "cancelled" };

export type RunStatus = "completed" | "degraded" | "failed" | "cancelled";

export interface CandidateInput {
  candidate_id: string;
  profile: unknown;
  requirement: unknown;
  /** Precomputed generator match analysis; asked from the generator when absent. */
  match?: unknown;
  assessment?: unknown;
  /** Optional inputs that could not be read; the matching or assessment stage fails with the message. */
  input_errors?: { match?: string; assessment?: string };
}

export interface RunFailure {
  stage: PipelineStage;
  error_code: string;
  message: string;
}

export interface PipelineRunResult {
  run_id: string;
  candidate_id: string;
  status: RunStatus;
  failure: RunFailure | null;
  stages: Record<PipelineStage, StageOutcome>;
  profile: CandidateProfile | null;
  requirement: JobRequirement | null;
  match_analysis: MatchAnalysis | null;
  assessment_report: AssessmentReport | null;
  decision: Decision | null;
  candidate_name: string | null;
  data_quality_notes: string[];
}
