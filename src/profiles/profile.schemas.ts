import { ScoringError } from "../shared/errors";
import { CandidateProfile, JobRequirementProfile } from "../shared/types/profile.types";
import {
  EXPERIENCE_LEVELS,
  ExperienceLevel,
  INDUSTRY_CATEGORIES,
  IndustryCategory,
  Skill,
  SkillCategory,
  SKILL_CATEGORIES,
} from "../shared/types/skill.types";
import { deepFreeze } from "../shared/utils/freeze.util";
import { normalizeTerm } from "../shared/utils/text.util";
import { SkillDictionary } from "../skills/skill-dictionary";
import { SkillSet } from "../skills/skill-set";

/**
 * Validates a job profile received over the wire (for example a stored
 * profile posted back for re-scoring). Skills are resolved through the
 * dictionary so synonyms collapse to one id. Throws ScoringError listing
 * every problem found.
 */
export function parseJobRequirementProfile(raw: unknown, dictionary: SkillDictionary): JobRequirementProfile {
  if (raw === null || raw === undefined) {
    throw new ScoringError("missing_profile", "Job requirement profile is missing", { input: "job_profile" });
  }
  const issues: string[] = [];
  const source = isRecord(raw) ? raw : {};
  if (!isRecord(raw)) {
    issues.push("profile must be an object");
  }

  const profile: JobRequirementProfile = {
    job_title: toNullableText(source.job_title, "job_title", issues),
    company: toNullableText(source.company, "company", issues),
    required_skills: toSkills(source.required_skills, "required_skills", issues, dictionary),
    preferred_skills: toSkills(source.preferred_skills, "preferred_skills", issues, dictionary),
    experience_level: toExperienceLevel(source.experience_level, issues),
    responsibilities: toStringList(source.responsibilities, "responsibilities", issues),
    industry_keywords: toStringList(source.industry_keywords, "industry_keywords", issues),
    culture_signals: toStringList(source.culture_signals, "culture_signals", issues, true),
    industry: toIndustry(source.industry, issues),
    inference_degraded: source.inference_degraded === true,
  };
  issues.push(...jobProfileIssues(profile));
  throwOnIssues(issues, "job_profile");
  return deepFreeze(profile);
}

export function parseCandidateProfile(raw: unknown, dictionary: SkillDictionary): CandidateProfile {
  if (raw === null || raw === undefined) {
    throw new ScoringError("missing_profile", "Candidate profile is missing", { input: "candidate_profile" });
  }
  const issues: string[] = [];
  const source = isRecord(raw) ? raw : {};
  if (!isRecord(raw)) {
    issues.push("profile must be an object");
  }

  const years = source.years_of_experience;
  if (years !== undefined && years !== null && (typeof years !== "number" || !Number.isFinite(years) || years < 0)) {
    issues.push("years_of_experience must be a non-negative number or null");
  }

  const profile: CandidateProfile = {
    skills: toSkills(source.skills, "skills", issues, dictionary),
    experience_level: toExperienceLevel(source.experience_level, issues),
    years_of_experience: typeof years === "number" && Number.isFinite(years) ? years : null,
    experience_bullets: toStringList(source.experience_bullets, "experience_bullets", issues),
    keyword_terms: toStringList(source.keyword_terms, "keyword_terms", issues, true),
    inference_degraded: source.inference_degraded === true,
  };
  throwOnIssues(issues, "candidate_profile");
  return deepFreeze(profile);
}

/** Structural invariants of an already-typed job profile. */
export function jobProfileIssues(profile: JobRequirementProfile): string[] {
  const issues: string[] = [];
  const required = new Set(profile.required_skills.map((skill) => skill.id));
  const overlap = profile.preferred_skills.filter((skill) => required.has(skill.id)).map((skill) => skill.id);
  if (overlap.length > 0) {
    issues.push(`required_skills and preferred_skills overlap: ${overlap.join(", ")}`);
  }
  for (const [field, skills] of [
    ["required_skills", profile.required_skills],
    ["preferred_skills", profile.preferred_skills],
  ] as const) {
    const ids = skills.map((skill) => skill.id);
    if (new Set(ids).size !== ids.length) {
      issues.push(`${field} contains duplicate skills`);
    }
  }
  return issues;
}

function throwOnIssues(issues: ReadonlyArray<string>, input: string): void {
  if (issues.length > 0) {
    throw new ScoringError("malformed_profile", `Malformed ${input}: ${issues.join("; ")}`, { input });
  }
}

function toSkills(value: unknown, field: string, issues: string[], dictionary: SkillDictionary): Skill[] {
  if (!Array.isArray(value)) {
    issues.push(`${field} must be an array`);
    return [];
  }
  const skills = new SkillSet();
  value.forEach((item, index) => {
    const skill = toSkill(item, dictionary);
    if (!skill) {
      issues.push(`${field}[${index}] is not a valid skill`);
      return;
    }
    skills.add(skill);
  });
  return skills.toArray();
}

/**
 * Accepts a full skill record or a bare name. Known names and ids map to the
 * dictionary skill; anything else keeps a normalized id.
 */
function toSkill(value: unknown, dictionary: SkillDictionary): Skill | null {
  if (typeof value === "string") {
    return dictionary.toSkill(value);
  }
  if (!isRecord(value)) {
    return null;
  }
  const rawId = value.id;
  const id = typeof rawId === "string" ? rawId.trim() : "";
  if (!id) {
    return null;
  }
  const rawName = value.name;
  const name = typeof rawName === "string" && rawName.trim() ? rawName.trim() : id;
  const rawSurfaces = value.surface_forms;
  const surfaceForms = Array.isArray(rawSurfaces)
    ? rawSurfaces.filter((item): item is string => typeof item === "string")
    : [];

  const known = dictionary.resolve(name) ?? dictionary.resolve(id);
  if (known) {
    return { ...known, surface_forms: surfaceForms.length > 0 ? surfaceForms : [name] };
  }
  const normalizedId = normalizeTerm(id);
  if (!normalizedId) {
    return null;
  }
  return {
    id: normalizedId,
    name,
    category: toSkillCategory(value.category),
    surface_forms: surfaceForms.length > 0 ? surfaceForms : [name],
  };
}

function toSkillCategory(value: unknown): SkillCategory {
  const known = SKILL_CATEGORIES.find((category) => category === value);
  return known ?? "unknown";
}

function toExperienceLevel(value: unknown, issues: string[]): ExperienceLevel {
  const level = EXPERIENCE_LEVELS.find((item) => item === value);
  if (!level) {
    issues.push(`experience_level must be one of ${EXPERIENCE_LEVELS.join(", ")}`);
    return "unspecified";
  }
  return level;
}

function toIndustry(value: unknown, issues: string[]): IndustryCategory {
  if (value === undefined) {
    return "general";
  }
  const industry = INDUSTRY_CATEGORIES.find((item) => item === value);
  if (!industry) {
    issues.push(`industry must be one of ${INDUSTRY_CATEGORIES.join(", ")}`);
    return "general";
  }
  return industry;
}

function toStringList(value: unknown, field: string, issues: string[], optional = false): string[] {
  if (value === undefined && optional) {
    return [];
  }
  if (!Array.isArray(value) || value.some((item) => typeof item !== "string")) {
    issues.push(`${field} must be an array of strings`);
    return [];
  }
  return value.filter((item): item is string => typeof item === "string");
}

function toNullableText(value: unknown, field: string, issues: string[]): string | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== "string") {
    issues.push(`${field} must be a string or null`);
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
