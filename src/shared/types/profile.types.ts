export interface PersonalInfo {
  name: string;
  email: string | null;
  phone: string | null;
  location: string | null;
}

export interface EducationEntry {
  degree: string;
  institution: string;
  field: string | null;
  graduation_date: string | null;
  gpa: number | null;
}

export interface ExperienceEntry {
  title: string;
  company: string;
  location: string | null;
  start_date: string | null;
  end_date: string | null;
  is_current: boolean;
  duration_months: number | null;
  unparsed_duration: string | null;
  description: string[];
  responsibilities: string[];
  achievements: string[];
}

export interface ProjectEntry {
  name: string;
  description: string | null;
  technologies: string[];
  url: string | null;
}

export interface CertificationEntry {
  name: string;
  issuer: string | null;
  date: string | null;
}

export interface CandidateProfile {
  personal_info: PersonalInfo;
  summary: string;
  education: EducationEntry[];
  experience: ExperienceEntry[];
  skills: string[];
  projects: ProjectEntry[];
  certifications: CertificationEntry[];
}

export interface JobRequirement {
  title: string;
  required_skills: string[];
  preferred_skills: string[];
  min_experience_years: number | null;
  education_requirements: string[];
}

export interface IngestionResult<T> {
  value: T;
  notes: string[];
}
