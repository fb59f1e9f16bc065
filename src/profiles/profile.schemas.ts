import { ParseError } from "../shared/errors";
import {
  CandidateProfile,
  CertificationEntry,
  EducationEntry,
  ExperienceEntry,
  IngestionResult,
  JobRequirement,
  PersonalInfo,
  ProjectEntry,
} from "../shared/types/profile.types";
import { monthsBetween, normalizeDate, parseDuration } from "./parsers/date.parser";

const MAX_LIST_ITEMS = 30;
const MAX_SKILLS = 60;
const MAX_TEXT = 800;
const MAX_SUMMARY = 2000;

const PLACEHOLDER_PATTERN = /^(n\/a|na|none|null|unknown|-+)$|\b(not provided|not specified|not available|pending)$/i;
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export function normalizeCandidateProfile(raw: unknown): IngestionResult<CandidateProfile> {
  if (!isRecord(raw)) {
    throw new ParseError("Candidate profile must be a JSON object");
  }
  const notes: string[] = [];
  const personalInfo = toPersonalInfo(raw.personal_info, notes);

  const profile: CandidateProfile = {
    personal_info: personalInfo,
    summary: toMeaningfulText(raw.summary, MAX_SUMMARY),
    education: toList(raw.education, (item, index) => toEducation(item, index, notes)),
    experience: toList(raw.experience, (item, index) => toExperience(item, index, notes)),
    skills: toSkillList(raw.skills, MAX_SKILLS),
    projects: toList(raw.projects, toProject),
    certifications: toList(raw.certifications, toCertification),
  };

  return { value: profile, notes };
}

export function normalizeJobRequirement(raw: unknown): IngestionResult<JobRequirement> {
  if (!isRecord(raw)) {
    throw new ParseError("Job requirement must be a JSON object");
  }
  const title = toText(raw.title) || toText(raw.job_title);
  if (!title) {
    throw new ParseError("Job requirement has no title", "title");
  }

  const notes: string[] = [];
  const requiredSkills = toSkillList(raw.required_skills ?? raw.must_have_skills, MAX_SKILLS);
  if (requiredSkills.length === 0) {
    notes.push("Job requirement lists no required skills.");
  }

  const minYearsRaw = raw.min_experience_years;
  const minExperienceYears = toYears(minYearsRaw);
  if (minExperienceYears === null && minYearsRaw !== undefined && minYearsRaw !== null) {
    notes.push(`min_experience_years "${String(minYearsRaw)}" could not be read as a number.`);
  }

  return {
    value: {
      title,
      required_skills: requiredSkills,
      preferred_skills: toSkillList(raw.preferred_skills ?? raw.nice_to_have_skills, MAX_SKILLS),
      min_experience_years: minExperienceYears,
      education_requirements: toTextList(raw.education_requirements),
    },
    notes,
  };
}

function toPersonalInfo(value: unknown, notes: string[]): PersonalInfo {
  const source = isRecord(value) ? value : {};
  const name = toMeaningfulText(source.name);
  if (!name) {
    throw new ParseError("Candidate profile has no name", "personal_info.name");
  }

  const rawEmail = toMeaningfulText(source.email);
  const email = EMAIL_PATTERN.test(rawEmail) ? rawEmail.toLowerCase() : null;
  if (rawEmail && !email) {
    notes.push(`personal_info.email "${rawEmail}" is not a valid address and was dropped.`);
  }

  const rawPhone = toMeaningfulText(source.phone);
  const phone = rawPhone.replace(/\D/g, "").length >= 7 ? rawPhone : null;
  if (rawPhone && !phone) {
    notes.push(`personal_info.phone "${rawPhone}" is not a usable number and was dropped.`);
  }

  if (!email && !phone) {
    throw new ParseError("Candidate profile has no email or phone", "personal_info");
  }

  return {
    name,
    email,
    phone,
    location: toMeaningfulText(source.location) || null,
  };
}

function toEducation(item: unknown, index: number, notes: string[]): EducationEntry | null {
  if (!isRecord(item)) {
    return null;
  }
  const degree = toMeaningfulText(item.degree);
  const institution = toMeaningfulText(item.institution);
  if (!degree && !institution) {
    return null;
  }

  const rawDate = toMeaningfulText(item.graduation_date) || toMeaningfulText(item.graduation_year);
  const graduationDate = rawDate ? normalizeDate(rawDate).value : null;
  if (rawDate && !graduationDate) {
    notes.push(`education[${index}].graduation_date "${rawDate}" could not be normalised.`);
  }

  return {
    degree,
    institution,
    field: toMeaningfulText(item.field) || null,
    graduation_date: graduationDate,
    gpa: toNonNegativeNumber(item.gpa),
  };
}

function toExperience(item: unknown, index: number, notes: string[]): ExperienceEntry | null {
  if (!isRecord(item)) {
    return null;
  }
  const title = toMeaningfulText(item.title);
  const company = toMeaningfulText(item.company);
  if (!title && !company) {
    return null;
  }

  const rawStart = toMeaningfulText(item.start_date);
  const rawEnd = toMeaningfulText(item.end_date);
  const start = rawStart ? normalizeDate(rawStart) : null;
  const end = rawEnd ? normalizeDate(rawEnd) : null;
  if (start && !start.recognized) {
    notes.push(`experience[${index}].start_date "${rawStart}" could not be normalised.`);
  }
  if (end && !end.recognized) {
    notes.push(`experience[${index}].end_date "${rawEnd}" could not be normalised.`);
  }

  let startDate = start?.value ?? null;
  let endDate = end?.value ?? null;
  let isCurrent = item.is_current === true || Boolean(end?.isOpenEnd);
  let durationMonths: number | null = null;
  let unparsedDuration: string | null = null;

  const rawDuration = toMeaningfulText(item.duration);
  if (rawDuration) {
    const duration = parseDuration(rawDuration);
    if (duration.parsed) {
      startDate = startDate ?? duration.start?.value ?? null;
      endDate = endDate ?? duration.end?.value ?? null;
      isCurrent = isCurrent || Boolean(duration.end?.isOpenEnd);
      durationMonths = duration.months;
    } else {
      unparsedDuration = rawDuration;
      notes.push(`experience[${index}].duration "${rawDuration}" kept verbatim; it could not be parsed.`);
    }
  }
  if (durationMonths === null && !isCurrent) {
    const derived = monthsBetween(startDate, endDate);
    durationMonths = derived !== null && derived >= 0 ? derived : null;
  }

  return {
    title,
    company,
    location: toMeaningfulText(item.location) || null,
    start_date: startDate,
    end_date: isCurrent ? null : endDate,
    is_current: isCurrent,
    duration_months: durationMonths,
    unparsed_duration: unparsedDuration,
    description: toTextList(item.description),
    responsibilities: toTextList(item.responsibilities),
    achievements: toTextList(item.achievements),
  };
}

function toProject(item: unknown): ProjectEntry | null {
  if (!isRecord(item)) {
    return null;
  }
  const name = toMeaningfulText(item.name);
  if (!name) {
    return null;
  }
  return {
    name,
    description: toMeaningfulText(item.description) || null,
    technologies: toSkillList(item.technologies, MAX_LIST_ITEMS),
    url: toMeaningfulText(item.url) || null,
  };
}

function toCertification(item: unknown): CertificationEntry | null {
  if (typeof item === "string") {
    const name = toMeaningfulText(item);
    return name ? { name, issuer: null, date: null } : null;
  }
  if (!isRecord(item)) {
    return null;
  }
  const name = toMeaningfulText(item.name);
  if (!name) {
    return null;
  }
  const rawDate = toMeaningfulText(item.date);
  return {
    name,
    issuer: toMeaningfulText(item.issuer) || null,
    date: rawDate ? normalizeDate(rawDate).value : null,
  };
}

function toList<T>(value: unknown, mapItem: (item: unknown, index: number) => T | null): T[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const items: T[] = [];
  value.forEach((item, index) => {
    const mapped = mapItem(item, index);
    if (mapped !== null && items.length < MAX_LIST_ITEMS) {
      items.push(mapped);
    }
  });
  return items;
}

function toSkillList(value: unknown, limit: number): string[] {
  const source = typeof value === "string" ? value.split(/[,;\n]/) : value;
  if (!Array.isArray(source)) {
    return [];
  }
  const seen = new Set<string>();
  const skills: string[] = [];
  for (const item of source) {
    const skill = toMeaningfulText(item);
    const key = skill.toLowerCase();
    if (!skill || seen.has(key)) {
      continue;
    }
    seen.add(key);
    skills.push(skill);
    if (skills.length >= limit) {
      break;
    }
  }
  return skills;
}

function toTextList(value: unknown): string[] {
  const source = typeof value === "string" ? value.split(/\n+/) : value;
  if (!Array.isArray(source)) {
    return [];
  }
  return source
    .map((item) => toMeaningfulText(item))
    .filter((item) => Boolean(item))
    .slice(0, MAX_LIST_ITEMS);
}

function toYears(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) && value >= 0 ? value : null;
  }
  if (typeof value !== "string") {
    return null;
  }
  const match = value.match(/\d+(?:\.\d+)?/);
  return match ? Number(match[0]) : null;
}

function toNonNegativeNumber(value: unknown): number | null {
  const numeric = typeof value === "number" ? value : typeof value === "string" ? Number(value) : Number.NaN;
  return Number.isFinite(numeric) && numeric >= 0 ? numeric : null;
}

function toMeaningfulText(value: unknown, max = MAX_TEXT): string {
  const text = typeof value === "number" && Number.isFinite(value) ? String(value) : toText(value, max);
  return PLACEHOLDER_PATTERN.test(text) ? "" : text;
}

function toText(value: unknown, max = MAX_TEXT): string {
  if (typeof value !== "string") {
    return "";
  }
  return value.replace(/\s+/g, " ").trim().slice(0, max);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
