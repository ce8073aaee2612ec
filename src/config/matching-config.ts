import { readFile } from "node:fs/promises";
import path from "node:path";
import { deepFreeze } from "../shared/utils/freeze.util";
import { FactorName, FactorWeights } from "../shared/types/report.types";
import { SECTION_KINDS, SectionKind } from "../shared/types/section.types";
import {
  INDUSTRY_CATEGORIES,
  IndustryCategory,
  KnownSkillCategory,
  SKILL_CATEGORIES,
} from "../shared/types/skill.types";

export type SeniorityBand = "entry" | "mid" | "senior";
export type SignalIndustry = Exclude<IndustryCategory, "general">;

export interface SkillEntry {
  readonly name: string;
  readonly category: KnownSkillCategory;
  readonly aliases: ReadonlyArray<string>;
}

export interface SkillDictionaryData {
  readonly version: string;
  readonly skills: ReadonlyArray<SkillEntry>;
  readonly stopwords: ReadonlyArray<string>;
  readonly actionVerbs: ReadonlyArray<ReadonlyArray<string>>;
  readonly seniorityWords: Readonly<Record<SeniorityBand, ReadonlyArray<string>>>;
  readonly cultureSignals: ReadonlyArray<string>;
  readonly industries: Readonly<Record<SignalIndustry, ReadonlyArray<string>>>;
}

export interface MatchingSettings {
  readonly version: string;
  readonly weights: FactorWeights;
  readonly minTokens: number;
  readonly industryKeywordLimit: number;
  readonly experienceBands: {
    readonly midFromYears: number;
    readonly seniorFromYears: number;
  };
  readonly sectionHeaders: Readonly<Record<SectionKind, ReadonlyArray<string>>>;
}

export interface MatchingConfig {
  readonly settings: MatchingSettings;
  readonly dictionary: SkillDictionaryData;
}

export interface MatchingConfigPaths {
  settingsPath: string;
  dictionaryPath: string;
}

const FACTOR_NAMES: ReadonlyArray<FactorName> = [
  "skill_match",
  "experience_alignment",
  "keyword_coverage",
  "responsibility_alignment",
];
const WEIGHT_SUM_TOLERANCE = 1e-6;

export async function loadMatchingConfig(paths: MatchingConfigPaths): Promise<MatchingConfig> {
  const [settingsRaw, dictionaryRaw] = await Promise.all([
    readJsonFile(paths.settingsPath),
    readJsonFile(paths.dictionaryPath),
  ]);
  return createMatchingConfig(settingsRaw, dictionaryRaw);
}

/** Validates raw JSON and returns a frozen configuration. */
export function createMatchingConfig(settingsRaw: unknown, dictionaryRaw: unknown): MatchingConfig {
  return deepFreeze({
    settings: parseMatchingSettings(settingsRaw),
    dictionary: parseSkillDictionary(dictionaryRaw),
  });
}

export function parseMatchingSettings(raw: unknown): MatchingSettings {
  const source = requireRecord(raw, "matching config");
  const weightsSource = requireRecord(source.weights, "weights");
  const weights = {
    skill_match: requireNumber(weightsSource.skill_match, "weights.skill_match", 0, 1),
    experience_alignment: requireNumber(weightsSource.experience_alignment, "weights.experience_alignment", 0, 1),
    keyword_coverage: requireNumber(weightsSource.keyword_coverage, "weights.keyword_coverage", 0, 1),
    responsibility_alignment: requireNumber(
      weightsSource.responsibility_alignment,
      "weights.responsibility_alignment",
      0,
      1,
    ),
  };
  const weightSum = FACTOR_NAMES.reduce((sum, name) => sum + weights[name], 0);
  if (Math.abs(weightSum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new Error(`Invalid matching config: weights must sum to 1, got ${weightSum}`);
  }

  const bandsSource = requireRecord(source.experience_bands, "experience_bands");
  const midFromYears = requireNumber(bandsSource.mid_from_years, "experience_bands.mid_from_years", 0, 60);
  const seniorFromYears = requireNumber(bandsSource.senior_from_years, "experience_bands.senior_from_years", 0, 60);
  if (seniorFromYears <= midFromYears) {
    throw new Error("Invalid matching config: experience_bands.senior_from_years must exceed mid_from_years");
  }

  const headersSource = requireRecord(source.section_headers, "section_headers");
  const headers = (kind: SectionKind): string[] =>
    requireStringArray(headersSource[kind] ?? [], `section_headers.${kind}`).map((item) => item.toLowerCase());
  for (const key of Object.keys(headersSource)) {
    if (!SECTION_KINDS.some((kind) => kind === key)) {
      throw new Error(`Invalid matching config: unknown section kind "${key}"`);
    }
  }

  return {
    version: requireString(source.version, "version"),
    weights,
    minTokens: requireInteger(source.min_tokens, "min_tokens", 1),
    industryKeywordLimit: requireInteger(source.industry_keyword_limit, "industry_keyword_limit", 0),
    experienceBands: { midFromYears, seniorFromYears },
    sectionHeaders: {
      requirements: headers("requirements"),
      preferred: headers("preferred"),
      responsibilities: headers("responsibilities"),
      experience: headers("experience"),
      skills: headers("skills"),
      education: headers("education"),
      summary: headers("summary"),
      about: headers("about"),
      benefits: headers("benefits"),
    },
  };
}

export function parseSkillDictionary(raw: unknown): SkillDictionaryData {
  const source = requireRecord(raw, "skill dictionary");
  const skills = requireArray(source.skills, "skills").map((item, index) => parseSkillEntry(item, index));

  const actionVerbs = requireArray(source.action_verbs ?? [], "action_verbs").map((group, index) => {
    const verbs = requireStringArray(group, `action_verbs[${index}]`);
    if (verbs.length === 0) {
      throw new Error(`Invalid skill dictionary: action_verbs[${index}] is empty`);
    }
    return verbs.map((verb) => verb.toLowerCase());
  });

  const seniorityRaw = requireRecord(source.seniority_words, "seniority_words");
  const seniority = (band: SeniorityBand): string[] =>
    requireStringArray(seniorityRaw[band] ?? [], `seniority_words.${band}`).map((word) => word.toLowerCase());

  const industriesRaw = requireRecord(source.industries ?? {}, "industries");
  const signals = (industry: SignalIndustry): string[] =>
    requireStringArray(industriesRaw[industry] ?? [], `industries.${industry}`).map((word) => word.toLowerCase());
  for (const key of Object.keys(industriesRaw)) {
    if (!isSignalIndustry(key)) {
      throw new Error(`Invalid skill dictionary: unknown industry "${key}"`);
    }
  }

  return {
    version: requireString(source.version, "version"),
    skills,
    stopwords: requireStringArray(source.stopwords ?? [], "stopwords").map((word) => word.toLowerCase()),
    actionVerbs,
    seniorityWords: {
      entry: seniority("entry"),
      mid: seniority("mid"),
      senior: seniority("senior"),
    },
    cultureSignals: requireStringArray(source.culture_signals ?? [], "culture_signals").map((item) =>
      item.toLowerCase(),
    ),
    industries: {
      technology: signals("technology"),
      finance: signals("finance"),
      healthcare: signals("healthcare"),
      education: signals("education"),
      marketing: signals("marketing"),
    },
  };
}

function parseSkillEntry(raw: unknown, index: number): SkillEntry {
  const source = requireRecord(raw, `skills[${index}]`);
  const category = source.category;
  if (!isKnownSkillCategory(category)) {
    throw new Error(`Invalid skill dictionary: skills[${index}].category must be one of ${SKILL_CATEGORIES.join(", ")}`);
  }
  return {
    name: requireString(source.name, `skills[${index}].name`),
    category,
    aliases: requireStringArray(source.aliases ?? [], `skills[${index}].aliases`),
  };
}

function isKnownSkillCategory(value: unknown): value is KnownSkillCategory {
  return SKILL_CATEGORIES.some((category) => category === value);
}

function isSignalIndustry(value: string): value is SignalIndustry {
  return value !== "general" && INDUSTRY_CATEGORIES.some((industry) => industry === value);
}

async function readJsonFile(filePath: string): Promise<unknown> {
  const resolved = path.resolve(filePath);
  const content = await readFile(resolved, "utf8");
  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (error) {
    throw new Error(`Invalid JSON in ${resolved}: ${error instanceof Error ? error.message : "Unknown error"}`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireRecord(value: unknown, field: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new Error(`Invalid matching config: ${field} must be an object`);
  }
  return value;
}

function requireArray(value: unknown, field: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new Error(`Invalid matching config: ${field} must be an array`);
  }
  return value;
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== "string" || !value.trim()) {
    throw new Error(`Invalid matching config: ${field} must be a non-empty string`);
  }
  return value.trim();
}

function requireStringArray(value: unknown, field: string): string[] {
  return requireArray(value, field).map((item, index) => requireString(item, `${field}[${index}]`));
}

function requireNumber(value: unknown, field: string, min: number, max: number): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value < min || value > max) {
    throw new Error(`Invalid matching config: ${field} must be a number between ${min} and ${max}`);
  }
  return value;
}

function requireInteger(value: unknown, field: string, min: number): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
    throw new Error(`Invalid matching config: ${field} must be an integer >= ${min}`);
  }
  return value;
}
