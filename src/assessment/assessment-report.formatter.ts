import {
  AssessmentCategory,
  AssessmentQuestion,
  AssessmentReport,
} from "../shared/types/assessment.types";

export interface ReportMeta {
  candidateName: string;
  runId: string;
  generatedAt: Date;
}

const CATEGORY_LABELS: Record<AssessmentCategory, string> = {
  coding: "Coding",
  system_design: "System Design",
  behavioral: "Behavioral",
};

const STRONG_QUESTION_SCORE = 80;
const WEAK_QUESTION_SCORE = 60;
const SOLID_AREA_SCORE = 70;
const RULE = "=".repeat(50);

/**
 * Renders the persisted assessment report. Section titles and their order are
 * read back by downstream scrapers, so both are fixed.
 */
export function formatAssessmentReport(report: AssessmentReport, meta: ReportMeta): string {
  const lines: string[] = [];

  const title = `Assessment Summary for ${meta.candidateName}`;
  lines.push(title, "=".repeat(title.length));
  lines.push(`Generated on: ${formatTimestamp(meta.generatedAt)}`);
  lines.push(`Run ID: ${meta.runId}`);

  section(lines, "OVERALL RESULTS");
  lines.push(`Total Score: ${report.overall_score.toFixed(2)}/100`);
  lines.push(`Status: ${report.status === "PASS" ? "PASSED" : "FAILED"}`);
  lines.push(`Pass Threshold: ${report.pass_threshold}/100`);
  lines.push(`Technical Rating: ${report.technical_rating.toFixed(2)}/1.0`);
  lines.push(`Passion Rating: ${report.passion_rating.toFixed(2)}/1.0`);

  section(lines, "PERFORMANCE BY CATEGORY");
  lines.push(`${"Category".padEnd(16)}${"Questions".padStart(10)}${"Unanswered".padStart(12)}${"Average".padStart(12)}`);
  for (const item of report.categories) {
    lines.push(
      `${CATEGORY_LABELS[item.category].padEnd(16)}${String(item.question_count).padStart(10)}${String(
        item.unanswered_count,
      ).padStart(12)}${`${item.average.toFixed(1)}/100`.padStart(12)}`,
    );
  }
  lines.push("");
  lines.push(`Strongest Area: ${labelOf(report.strongest_category)}`);
  lines.push(`Weakest Area: ${labelOf(report.weakest_category)}`);

  section(lines, "DETAILED FEEDBACK BY CATEGORY");
  for (const item of report.categories) {
    const heading = `${CATEGORY_LABELS[item.category].toUpperCase()} QUESTIONS`;
    lines.push("", heading, "-".repeat(heading.length));
    for (const question of questionsOf(report, item.category)) {
      lines.push(`Question ID: ${question.id}`);
      lines.push(`Score: ${question.score === null ? "No answer" : `${question.score}/100`}`);
      lines.push(`Feedback: ${question.feedback || (question.score === null ? "No answer provided." : "No feedback provided.")}`);
      lines.push("");
    }
  }

  section(lines, "STRENGTHS & AREAS FOR IMPROVEMENT");
  for (const item of report.categories) {
    const label = CATEGORY_LABELS[item.category];
    const { strengths, improvements } = collectCategoryFeedback(report, item.category);
    lines.push("", `${label} Strengths:`, ...bullets(strengths));
    lines.push("", `${label} Areas for Improvement:`, ...bullets(improvements));
  }

  section(lines, "SUMMARY & RECOMMENDATIONS");
  const strongest = report.categories.find((item) => item.category === report.strongest_category);
  const weakest = report.categories.find((item) => item.category === report.weakest_category);
  lines.push("Key Strengths:");
  lines.push(
    `- ${strongest && strongest.average >= SOLID_AREA_SCORE ? CATEGORY_LABELS[strongest.category] : "No outstanding strengths identified"}`,
  );
  lines.push(`- ${report.technical_rating >= 0.7 ? "Technical knowledge is solid" : "Basic technical understanding demonstrated"}`);
  lines.push("", "Areas for Improvement:");
  lines.push(
    `- ${weakest && weakest.average < SOLID_AREA_SCORE ? CATEGORY_LABELS[weakest.category] : "No critical weaknesses identified"}`,
  );
  lines.push(`- ${report.passion_rating < 0.7 ? "Could show more enthusiasm" : "Maintain positive attitude"}`);
  lines.push("", "Recommendations:");
  lines.push(
    `- ${report.status === "PASS" ? "Proceed with next interview stage" : "Consider additional preparation before proceeding"}`,
  );
  if (weakest) {
    lines.push(`- Focus on strengthening skills in ${CATEGORY_LABELS[weakest.category].toLowerCase()} questions`);
  }
  if (report.data_quality_notes.length > 0) {
    lines.push("", "Data Quality Notes:", ...bullets(report.data_quality_notes));
  }

  lines.push(
    "",
    RULE,
    "This report was automatically generated based on the assessment responses.",
    "Results should be considered alongside other evaluation methods.",
    RULE,
  );
  return `${lines.join("\n")}\n`;
}

function collectCategoryFeedback(
  report: AssessmentReport,
  category: AssessmentCategory,
): { strengths: string[]; improvements: string[] } {
  const strengths: string[] = [];
  const improvements: string[] = [];
  for (const question of questionsOf(report, category)) {
    if (question.score === null) {
      improvements.push(`No answer provided for ${question.id}`);
    } else if (question.score >= STRONG_QUESTION_SCORE) {
      strengths.push(`Strong performance in ${question.id}`);
    } else if (question.score <= WEAK_QUESTION_SCORE) {
      improvements.push(`Needs improvement in ${question.id}`);
    }
  }

  if (category === "behavioral") {
    if (report.passion_rating >= 0.8) {
      strengths.push("Shows strong enthusiasm and genuine interest in the role");
    } else if (report.passion_rating <= 0.5) {
      improvements.push("Could demonstrate more passion for the role");
    }
  } else if (report.technical_rating >= 0.8) {
    strengths.push("Strong technical capabilities demonstrated");
  } else if (report.technical_rating <= 0.5) {
    improvements.push("Technical skills need significant improvement");
  }

  return { strengths, improvements };
}

function questionsOf(report: AssessmentReport, category: AssessmentCategory): AssessmentQuestion[] {
  return report.questions.filter((question) => question.category === category);
}

function section(lines: string[], title: string): void {
  lines.push("", title, "=".repeat(title.length));
}

function bullets(items: string[]): string[] {
  return items.length > 0 ? items.map((item) => `- ${item}`) : ["- None identified"];
}

function labelOf(category: AssessmentCategory | null): string {
  return category ? CATEGORY_LABELS[category] : "None";
}

function formatTimestamp(date: Date): string {
  return `${date.toISOString().replace("T", " ").slice(0, 19)} UTC`;
}
