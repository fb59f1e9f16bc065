import { CandidateProfile, JobRequirement } from "../../../shared/types/profile.types";

export const CATEGORY_SCORES_V1_PROMPT = `You are a candidate-to-job category scorer.

You score a parsed candidate profile against one job requirement.
You do NOT compute an overall score.
You do NOT recommend hire or reject.

Categories:
- skills: required and preferred skills evidenced in skills, projects, or experience.
- experience: years, seniority, and relevance of roles against min_experience_years.
- education: degrees and fields against education_requirements.
- additional: certifications, projects, and anything else relevant to the role.

Rules:
- Score each category from 0 to 100.
- matches lists short evidence strings found in the profile.
- gaps lists requirements the profile does not evidence.
- If the requirement says nothing about a category, score what the profile shows for the role.
- Never invent evidence.

OUTPUT STRICT JSON:
{
  "match_score": number,
  "categories": {
    "skills": { "score": number, "matches": ["string"], "gaps": ["string"] },
    "experience": { "score": number, "matches": ["string"], "gaps": ["string"] },
    "education": { "score": number, "matches": ["string"], "gaps": ["string"] },
    "additional": { "score": number, "matches": ["string"], "gaps": ["string"] }
  }
}

Return ONLY valid JSON.
No markdown.
No commentary.`;

export const CATEGORY_SCORES_V1_SCHEMA_HINT =
  '{"match_score":number,"categories":{"skills|experience|education|additional":{"score":number,"matches":string[],"gaps":string[]}}}';

export function buildCategoryScoresV1Prompt(input: {
  profile: CandidateProfile;
  requirement: JobRequirement;
}): string {
  return [
    CATEGORY_SCORES_V1_PROMPT,
    "",
    "Runtime input JSON:",
    JSON.stringify(
      {
        requirement: input.requirement,
        profile: {
          summary: input.profile.summary,
          skills: input.profile.skills,
          experience: input.profile.experience,
          education: input.profile.education,
          projects: input.profile.projects,
          certifications: input.profile.certifications,
        },
      },
      null,
      2,
    ),
  ].join("\n");
}
