export type DecisionStatus = "PROCEED" | "HOLD" | "REJECT";

export type InterviewStage = "SKIP" | "SCREENING" | "TECHNICAL" | "FULL_LOOP";

export interface DecisionDetails {
  status: DecisionStatus;
  confidence_score: number;
  interview_stage: InterviewStage;
}

export interface DecisionRationale {
  key_strengths: string[];
  concerns: string[];
  risk_factors: string[];
}

export interface DecisionRecommendations {
  interview_focus: string[];
  skill_verification: string[];
  discussion_points: string[];
}

export interface HiringManagerNotes {
  salary_band_fit: string;
  growth_trajectory: string;
  team_fit_considerations: string;
  onboarding_requirements: string[];
}

export interface NextSteps {
  immediate_actions: string[];
  required_approvals: string[];
  timeline_recommendation: string;
}

export interface Decision {
  decision: DecisionDetails;
  rationale: DecisionRationale;
  recommendations: DecisionRecommendations;
  hiring_manager_notes: HiringManagerNotes;
  next_steps: NextSteps;
  data_quality_notes: string[];
}
