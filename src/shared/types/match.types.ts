export const MATCH_CATEGORIES = ["skills", "experience", "education", "additional"] as const;

export type MatchCategory = (typeof MATCH_CATEGORIES)[number];

export type MatchWeights = Record<MatchCategory, number>;

export interface CategoryScore {
  category: MatchCategory;
  score: number;
  matches: string[];
  gaps: string[];
  assessed: boolean;
}

/** Category evidence as supplied by the generator, before clamping. */
export interface CategoryScoreInput {
  score: number;
  matches?: string[];
  gaps?: string[];
}

export type CategoryScoreInputs = Partial<Record<MatchCategory, CategoryScoreInput>>;

export interface MatchAnalysis {
  overall_score: number;
  categories: Record<MatchCategory, CategoryScore>;
  recommendation: string;
  key_strengths: string[];
  areas_for_consideration: string[];
  data_quality_notes: string[];
  weights: MatchWeights;
}

export interface UpstreamMatchAnalysis {
  categories: CategoryScoreInputs;
  reportedOverallScore: number | null;
  scale: "unit" | "percent";
  notes: string[];
}
