import { InterviewStage, NextSteps } from "../shared/types/decision.types";

const NEXT_STEPS_BY_STAGE: Record<InterviewStage, NextSteps> = {
  FULL_LOOP: {
    immediate_actions: ["Schedule full interview loop", "Share interview focus areas with the panel"],
    required_approvals: ["Hiring manager approval"],
    timeline_recommendation: "Schedule within 1 week",
  },
  TECHNICAL: {
    immediate_actions: ["Schedule technical interview", "Verify listed skills in the technical round"],
    required_approvals: ["Hiring manager approval"],
    timeline_recommendation: "Schedule within 2 weeks",
  },
  SCREENING: {
    immediate_actions: ["Schedule recruiter screening call", "Clarify open gaps before a technical round"],
    required_approvals: ["Recruiter review"],
    timeline_recommendation: "Screen within 2 weeks",
  },
  SKIP: {
    immediate_actions: ["Send decline notice", "Keep profile for future openings"],
    required_approvals: ["Recruiter sign-off"],
    timeline_recommendation: "Close within 1 week",
  },
};

export function buildNextSteps(stage: InterviewStage, suspectedFault: boolean): NextSteps {
  const template = NEXT_STEPS_BY_STAGE[stage];
  if (!suspectedFault) {
    return {
      immediate_actions: [...template.immediate_actions],
      required_approvals: [...template.required_approvals],
      timeline_recommendation: template.timeline_recommendation,
    };
  }
  return {
    immediate_actions: ["Re-run analysis or manually review", ...template.immediate_actions],
    required_approvals: [...template.required_approvals],
    timeline_recommendation: "Proceed with caution due to data processing issues",
  };
}
