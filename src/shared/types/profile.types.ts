import { ExperienceLevel, IndustryCategory, Skill } from "./skill.types";

export interface JobRequirementProfile {
  readonly job_title: string | null;
  readonly company: string | null;
  readonly required_skills: ReadonlyArray<Skill>;
  readonly preferred_skills: ReadonlyArray<Skill>;
  readonly experience_level: ExperienceLevel;
  readonly responsibilities: ReadonlyArray<string>;
  readonly industry_keywords: ReadonlyArray<string>;
  readonly culture_signals: ReadonlyArray<string>;
  readonly industry: IndustryCategory;
  readonly inference_degraded: boolean;
}

export interface CandidateProfile {
  readonly skills: ReadonlyArray<Skill>;
  readonly experience_level: ExperienceLevel;
  readonly years_of_experience: number | null;
  readonly experience_bullets: ReadonlyArray<string>;
  readonly keyword_terms: ReadonlyArray<string>;
  readonly inference_degraded: boolean;
}

export interface JobPostingInput {
  text: string;
  job_title?: string | null;
  company?: string | null;
}

export interface CandidateDocumentInput {
  text: string;
  skills?: ReadonlyArray<string>;
}

/**
 * Terms proposed by the inference collaborator. Job terms are split by the
 * part of the posting they were proposed for.
 */
export interface InferredJobTerms {
  required: ReadonlyArray<string>;
  preferred: ReadonlyArray<string>;
}
