import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { formatAssessmentReport } from "../assessment/assessment-report.formatter";
import { Logger } from "../config/logger";
import { MatchAnalysis } from "../shared/types/match.types";
import { PipelineRunResult } from "../shared/types/pipeline.types";

export interface MatchAnalysisRecord extends MatchAnalysis {
  /** 0-100 integer; canonical. */
  match_score: number;
  /** 0-1 float kept for readers of the older convention. */
  overall_match_score: number;
}

export interface WrittenArtifacts {
  parsedResume: string | null;
  matchAnalysis: string | null;
  decision: string | null;
  assessmentReport: string | null;
  runRecord: string | null;
}

export function toMatchAnalysisRecord(analysis: MatchAnalysis): MatchAnalysisRecord {
  return {
    match_score: analysis.overall_score,
    overall_match_score: analysis.overall_score / 100,
    ...analysis,
  };
}

export type RunRecord = Omit<PipelineRunResult, "match_analysis"> & {
  match_analysis: MatchAnalysisRecord | null;
};

export function toRunRecord(run: PipelineRunResult): RunRecord {
  return {
    ...run,
    match_analysis: run.match_analysis ? toMatchAnalysisRecord(run.match_analysis) : null,
  };
}

/**
 * Writes one run's artifacts next to a caller-chosen prefix. Artifacts of
 * stages that produced nothing are not written; a failed or cancelled run
 * additionally leaves `<prefix>_run.json` with the failure record.
 */
export class ArtifactStorageService {
  constructor(private readonly logger: Logger) {}

  async writeRunArtifacts(
    prefix: string,
    run: PipelineRunResult,
    options: { generatedAt: Date },
  ): Promise<WrittenArtifacts> {
    await mkdir(path.dirname(path.resolve(prefix)), { recursive: true });

    const written: WrittenArtifacts = {
      parsedResume: null,
      matchAnalysis: null,
      decision: null,
      assessmentReport: null,
      runRecord: null,
    };

    if (run.profile) {
      written.parsedResume = await this.writeJson(`${prefix}_parsed_resume.json`, run.profile);
    }
    if (run.match_analysis) {
      written.matchAnalysis = await this.writeJson(
        `${prefix}_match_analysis.json`,
        toMatchAnalysisRecord(run.match_analysis),
      );
    }
    if (run.decision) {
      written.decision = await this.writeJson(`${prefix}_decision.json`, run.decision);
    }
    if (run.assessment_report) {
      const text = formatAssessmentReport(run.assessment_report, {
        candidateName: run.candidate_name ?? run.candidate_id,
        runId: run.run_id,
        generatedAt: options.generatedAt,
      });
      written.assessmentReport = await this.writeText(`${prefix}_assessment_report.txt`, text);
    }
    if (run.status === "failed" || run.status === "cancelled") {
      written.runRecord = await this.writeJson(`${prefix}_run.json`, {
        run_id: run.run_id,
        candidate_id: run.candidate_id,
        status: run.status,
        failure: run.failure,
        stages: run.stages,
        data_quality_notes: run.data_quality_notes,
      });
    }

    return written;
  }

  private async writeJson(filePath: string, payload: unknown): Promise<string> {
    return this.writeText(filePath, `${JSON.stringify(payload, null, 2)}\n`);
  }

  private async writeText(filePath: string, content: string): Promise<string> {
    await writeFile(filePath, content, "utf-8");
    this.logger.debug("artifact.written", { filePath, bytes: Buffer.byteLength(content, "utf-8") });
    return filePath;
  }
}
