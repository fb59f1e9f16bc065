export const ASSESSMENT_CATEGORIES = ["coding", "system_design", "behavioral"] as const;

export type AssessmentCategory = (typeof ASSESSMENT_CATEGORIES)[number];

export type AssessmentStatus = "PASS" | "FAIL";

export interface AssessmentQuestion {
  id: string;
  category: AssessmentCategory;
  /** null means the candidate gave no answer. */
  score: number | null;
  feedback: string;
  passion_score?: number | null;
}

/** Question as submitted; unscored answers are sent to the generator. */
export interface SubmittedQuestion extends AssessmentQuestion {
  text: string;
  answer: string | null;
  difficulty: string;
}

export interface AssessmentSubmission {
  candidate_name: string | null;
  assessment_id: string | null;
  questions: SubmittedQuestion[];
  notes: string[];
}

export interface CategoryBreakdown {
  category: AssessmentCategory;
  average: number;
  question_count: number;
  unanswered_count: number;
}

export interface AssessmentReport {
  category_averages: Partial<Record<AssessmentCategory, number>>;
  categories: CategoryBreakdown[];
  overall_score: number;
  status: AssessmentStatus;
  pass_threshold: number;
  technical_rating: number;
  passion_rating: number;
  strongest_category: AssessmentCategory | null;
  weakest_category: AssessmentCategory | null;
  unanswered_count: number;
  questions: AssessmentQuestion[];
  data_quality_notes: string[];
}
