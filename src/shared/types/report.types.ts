import { CandidateProfile, JobRequirementProfile } from "./profile.types";
import { Skill } from "./skill.types";

export type FactorName =
  | "skill_match"
  | "experience_alignment"
  | "keyword_coverage"
  | "responsibility_alignment";

export type FactorScores = Readonly<Record<FactorName, number>>;

export type FactorWeights = Readonly<Record<FactorName, number>>;

export interface ResponsibilityMatch {
  readonly responsibility: string;
  /** Best Jaccard overlap against a single experience bullet, 0..1. */
  readonly best_overlap: number;
  readonly best_bullet: string | null;
}

export interface CompatibilityReport {
  readonly overall_score: number;
  readonly factor_scores: FactorScores;
  readonly matched_skills: ReadonlyArray<Skill>;
  readonly missing_required_skills: ReadonlyArray<Skill>;
  readonly missing_preferred_skills: ReadonlyArray<Skill>;
  readonly missing_keywords: ReadonlyArray<string>;
  readonly additional_skills: ReadonlyArray<Skill>;
  readonly responsibility_matches: ReadonlyArray<ResponsibilityMatch>;
}

export type SkillPriority = "high" | "medium";

export interface SkillRecommendation {
  readonly skill: Skill;
  readonly priority: SkillPriority;
  readonly rationale: string;
  readonly learning_suggestion: string;
}

export type AdviceSection = "summary" | "skills" | "experience";

export interface OptimizationAdvice {
  readonly skill_recommendations: ReadonlyArray<SkillRecommendation>;
  readonly keyword_recommendations: ReadonlyArray<string>;
  readonly section_advice: Readonly<Partial<Record<AdviceSection, ReadonlyArray<string>>>>;
  readonly tailoring_suggestions: ReadonlyArray<string>;
  readonly interview_focus_areas: ReadonlyArray<string>;
  readonly ats_tips: ReadonlyArray<string>;
}

export interface AdvisedCompatibilityReport extends CompatibilityReport {
  readonly optimization_advice: OptimizationAdvice;
}

export interface AnalysisResult {
  readonly job_profile: JobRequirementProfile;
  readonly candidate_profile: CandidateProfile;
  readonly report: AdvisedCompatibilityReport;
}
