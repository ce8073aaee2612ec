import { jobProfileIssues } from "../../profiles/profile.schemas";
import { levelRank } from "../../profiles/parsers/experience-level.parser";
import { ScoringError } from "../../shared/errors";
import { CandidateProfile, JobRequirementProfile } from "../../shared/types/profile.types";
import {
  CompatibilityReport,
  FactorName,
  FactorScores,
  FactorWeights,
  ResponsibilityMatch,
} from "../../shared/types/report.types";
import { ExperienceLevel, Skill } from "../../shared/types/skill.types";
import { deepFreeze } from "../../shared/utils/freeze.util";
import { jaccard, wordTokens } from "../../shared/utils/text.util";

const PREFERRED_BONUS_MAX = 10;
const FACTOR_NAMES: ReadonlyArray<FactorName> = [
  "skill_match",
  "experience_alignment",
  "keyword_coverage",
  "responsibility_alignment",
];

export interface ScoringContext {
  weights: FactorWeights;
  /** Collapses action-verb synonyms ("led", "managed") before overlap is measured. */
  canonicalVerb: (token: string) => string;
}

/**
 * Pure: the same pair of profiles always yields the same report. Throws
 * ScoringError only when a profile is missing or malformed.
 */
export function calculateCompatibility(
  job: JobRequirementProfile | null | undefined,
  candidate: CandidateProfile | null | undefined,
  context: ScoringContext,
): CompatibilityReport {
  if (!job) {
    throw new ScoringError("missing_profile", "Job requirement profile is missing", { input: "job_profile" });
  }
  if (!candidate) {
    throw new ScoringError("missing_profile", "Candidate profile is missing", { input: "candidate_profile" });
  }
  const issues = jobProfileIssues(job);
  if (issues.length > 0) {
    throw new ScoringError("malformed_profile", `Malformed job_profile: ${issues.join("; ")}`, {
      input: "job_profile",
    });
  }

  const candidateIds = new Set(candidate.skills.map((skill) => skill.id));
  const responsibilityMatches = matchResponsibilities(job.responsibilities, candidate.experience_bullets, context);

  const factorScores: FactorScores = {
    skill_match: scoreSkillMatch(job, candidateIds),
    experience_alignment: scoreExperienceAlignment(job.experience_level, candidate.experience_level),
    keyword_coverage: scoreKeywordCoverage(job.industry_keywords, candidate.keyword_terms),
    responsibility_alignment: scoreResponsibilityAlignment(responsibilityMatches),
  };

  const weighted = FACTOR_NAMES.reduce((sum, name) => sum + context.weights[name] * factorScores[name], 0);
  const jobIds = new Set([...job.required_skills, ...job.preferred_skills].map((skill) => skill.id));
  const keywordTerms = new Set(candidate.keyword_terms);

  return deepFreeze({
    overall_score: clamp(Math.round(weighted), 0, 100),
    factor_scores: factorScores,
    matched_skills: [...job.required_skills, ...job.preferred_skills].filter((skill) => candidateIds.has(skill.id)),
    missing_required_skills: byNameLengthDesc(job.required_skills.filter((skill) => !candidateIds.has(skill.id))),
    missing_preferred_skills: byNameLengthDesc(job.preferred_skills.filter((skill) => !candidateIds.has(skill.id))),
    missing_keywords: job.industry_keywords.filter((keyword) => !keywordTerms.has(keyword)),
    additional_skills: candidate.skills.filter((skill) => !jobIds.has(skill.id)),
    responsibility_matches: responsibilityMatches,
  });
}

function scoreSkillMatch(job: JobRequirementProfile, candidateIds: ReadonlySet<string>): number {
  const matchedRequired = job.required_skills.filter((skill) => candidateIds.has(skill.id)).length;
  const matchedPreferred = job.preferred_skills.filter((skill) => candidateIds.has(skill.id)).length;
  const base = (100 * matchedRequired) / Math.max(1, job.required_skills.length);
  const bonus =
    job.preferred_skills.length > 0 ? (PREFERRED_BONUS_MAX * matchedPreferred) / job.preferred_skills.length : 0;
  return clamp(Math.round(base + bonus), 0, 100);
}

/** Same band 100, one band apart 70, two apart 40; unspecified on either side never penalizes. */
export function scoreExperienceAlignment(required: ExperienceLevel, candidate: ExperienceLevel): number {
  const requiredRank = levelRank(required);
  const candidateRank = levelRank(candidate);
  if (requiredRank === null || candidateRank === null) {
    return 100;
  }
  const distance = Math.abs(requiredRank - candidateRank);
  if (distance === 0) {
    return 100;
  }
  return distance === 1 ? 70 : 40;
}

function scoreKeywordCoverage(keywords: ReadonlyArray<string>, terms: ReadonlyArray<string>): number {
  const termSet = new Set(terms);
  const covered = keywords.filter((keyword) => termSet.has(keyword)).length;
  return clamp(Math.round((100 * covered) / Math.max(1, keywords.length)), 0, 100);
}

function scoreResponsibilityAlignment(matches: ReadonlyArray<ResponsibilityMatch>): number {
  if (matches.length === 0) {
    return 0;
  }
  const mean = matches.reduce((sum, match) => sum + match.best_overlap, 0) / matches.length;
  return clamp(Math.round(mean * 100), 0, 100);
}

function matchResponsibilities(
  responsibilities: ReadonlyArray<string>,
  bullets: ReadonlyArray<string>,
  context: ScoringContext,
): ResponsibilityMatch[] {
  const bulletTokens = bullets.map((bullet) => ({ bullet, tokens: overlapTokens(bullet, context) }));
  return responsibilities.map((responsibility) => {
    const tokens = overlapTokens(responsibility, context);
    let bestOverlap = 0;
    let bestBullet: string | null = null;
    for (const candidate of bulletTokens) {
      const overlap = jaccard(tokens, candidate.tokens);
      if (overlap > bestOverlap) {
        bestOverlap = overlap;
        bestBullet = candidate.bullet;
      }
    }
    return {
      responsibility,
      best_overlap: round4(bestOverlap),
      best_bullet: bestBullet,
    };
  });
}

export function overlapTokens(text: string, context: Pick<ScoringContext, "canonicalVerb">): Set<string> {
  return new Set(wordTokens(text).map((token) => context.canonicalVerb(token)));
}

/** Longest names first; equal lengths keep extraction order. */
function byNameLengthDesc(skills: ReadonlyArray<Skill>): Skill[] {
  return [...skills].sort((left, right) => right.name.length - left.name.length);
}

function clamp(value: number, min: number, max: number): number {
  if (value < min) {
    return min;
  }
  if (value > max) {
    return max;
  }
  return value;
}

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}
