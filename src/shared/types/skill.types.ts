export const SKILL_CATEGORIES = ["language", "tool", "certification", "soft_skill"] as const;

export type KnownSkillCategory = (typeof SKILL_CATEGORIES)[number];
export type SkillCategory = KnownSkillCategory | "unknown";

export interface Skill {
  readonly id: string;
  readonly name: string;
  readonly category: SkillCategory;
  readonly surface_forms: ReadonlyArray<string>;
}

export const EXPERIENCE_LEVELS = ["entry", "mid", "senior", "unspecified"] as const;

export type ExperienceLevel = (typeof EXPERIENCE_LEVELS)[number];

export const INDUSTRY_CATEGORIES = [
  "technology",
  "finance",
  "healthcare",
  "education",
  "marketing",
  "general",
] as const;

/** Closed set of industries used to phrase advice. "general" is the fallback. */
export type IndustryCategory = (typeof INDUSTRY_CATEGORIES)[number];
