import { CandidateProfile, JobRequirementProfile } from "../shared/types/profile.types";
import {
  AdviceSection,
  CompatibilityReport,
  OptimizationAdvice,
  ResponsibilityMatch,
  SkillPriority,
  SkillRecommendation,
} from "../shared/types/report.types";
import { ExperienceLevel, IndustryCategory, Skill } from "../shared/types/skill.types";
import { deepFreeze } from "../shared/utils/freeze.util";
import { uniqueStrings } from "../shared/utils/text.util";
import { learningSuggestion } from "./learning-suggestions";

const SUMMARY_SKILL_LIMIT = 3;

const RATIONALE: Record<SkillPriority, string> = {
  high: "required by the target role but absent from the candidate profile",
  medium: "preferred by the target role but absent from the candidate profile",
};

export const ATS_TIPS: ReadonlyArray<string> = [
  "Use exact keyword matches from the job description",
  "Include keywords in multiple sections (summary, experience, skills)",
  "Use both acronyms and full forms (e.g., 'AI' and 'Artificial Intelligence')",
  "Match the job description's language and terminology",
];

/**
 * Template-driven advice derived from a report. The profiles only supply
 * names (role title, responsibilities, culture signals) for phrasing.
 */
export function generateOptimizationAdvice(
  report: CompatibilityReport,
  job: JobRequirementProfile,
  candidate: CandidateProfile,
): OptimizationAdvice {
  return deepFreeze({
    skill_recommendations: [
      ...report.missing_required_skills.map((skill) => recommend(skill, "high")),
      ...report.missing_preferred_skills.map((skill) => recommend(skill, "medium")),
    ],
    keyword_recommendations: uniqueStrings(
      report.missing_keywords.map((keyword) => keyword.trim().toLowerCase()).filter((keyword) => keyword.length > 0),
    ),
    section_advice: buildSectionAdvice(report, job, candidate),
    tailoring_suggestions: buildTailoringSuggestions(job),
    interview_focus_areas: buildInterviewFocusAreas(report, job),
    ats_tips: [...ATS_TIPS],
  });
}

function recommend(skill: Skill, priority: SkillPriority): SkillRecommendation {
  return {
    skill,
    priority,
    rationale: RATIONALE[priority],
    learning_suggestion: learningSuggestion(skill),
  };
}

function buildSectionAdvice(
  report: CompatibilityReport,
  job: JobRequirementProfile,
  candidate: CandidateProfile,
): Partial<Record<AdviceSection, string[]>> {
  const advice: Partial<Record<AdviceSection, string[]>> = {};

  const summary: string[] = [];
  const topMissing = report.missing_required_skills.slice(0, SUMMARY_SKILL_LIMIT).map((skill) => skill.name);
  if (topMissing.length > 0) {
    summary.push(`Mention ${joinList(topMissing)} in your professional summary.`);
  }
  if (job.job_title) {
    summary.push(`Use the role title "${job.job_title}" in the opening line of your summary.`);
  }
  if (summary.length > 0) {
    advice.summary = summary;
  }

  const present = new Set(candidate.skills.map((skill) => skill.id));
  const skills = [...report.missing_required_skills, ...report.missing_preferred_skills]
    .filter((skill) => !present.has(skill.id))
    .map((skill) => `Add ${skill.name} to your skills section.`);
  if (skills.length > 0) {
    advice.skills = uniqueStrings(skills);
  }

  const weakest = report.responsibility_matches.reduce<ResponsibilityMatch | null>(
    (lowest, match) => (lowest === null || match.best_overlap < lowest.best_overlap ? match : lowest),
    null,
  );
  if (weakest && weakest.best_overlap < 1) {
    const experience = [`Use measurable outcomes tied to ${lowerFirst(weakest.responsibility)}.`];
    if (weakest.best_bullet) {
      experience.push(`Rework "${weakest.best_bullet}" to state the result it produced.`);
    }
    advice.experience = experience;
  }

  return advice;
}

function buildTailoringSuggestions(job: JobRequirementProfile): string[] {
  const suggestions = [
    `Customize your professional summary to emphasize fit for the ${job.job_title ?? "target"} role.`,
  ];
  if (job.culture_signals.length > 0) {
    suggestions.push(`Highlight experiences that demonstrate ${joinList(job.culture_signals.slice(0, 2))}.`);
  }
  if (job.responsibilities.length > 0) {
    suggestions.push(`Lead with experience related to: ${job.responsibilities[0]}.`);
  }
  if (job.industry_keywords.length > 0) {
    suggestions.push(`Incorporate industry terms: ${job.industry_keywords.slice(0, 3).join(", ")}.`);
  }
  suggestions.push(industryTailoring(job.industry));
  suggestions.push(
    "Reorder bullet points to prioritize the most relevant experience.",
    "Use the same terminology as the job posting.",
  );
  return suggestions;
}

function industryTailoring(industry: IndustryCategory): string {
  switch (industry) {
    case "technology":
      return "Name the systems, scale and technologies behind each achievement.";
    case "finance":
      return "Quantify results in monetary terms and mention the compliance or risk controls you worked within.";
    case "healthcare":
      return "Mention patient outcomes and the regulatory and data privacy standards you followed.";
    case "education":
      return "Describe learner outcomes and the programs or curricula you contributed to.";
    case "marketing":
      return "Show campaign metrics such as conversion, reach or growth that you drove.";
    case "general":
      return "Tie each achievement to a measurable business outcome.";
    default:
      return assertNever(industry);
  }
}

function buildInterviewFocusAreas(report: CompatibilityReport, job: JobRequirementProfile): string[] {
  const areas: string[] = [];
  if (job.required_skills.length > 0) {
    areas.push(`Prepare examples demonstrating ${joinList(job.required_skills.slice(0, 2).map((skill) => skill.name))}.`);
  }
  if (job.responsibilities.length > 0) {
    areas.push(`Practice discussing experience with: ${job.responsibilities[0]}.`);
  }
  const levelFocus = levelFocusArea(job.experience_level);
  if (levelFocus) {
    areas.push(levelFocus);
  }
  if (job.culture_signals.length > 0) {
    areas.push(`Prepare examples showing a ${job.culture_signals[0]} mindset.`);
  }
  if (report.missing_required_skills.length > 0) {
    areas.push(`Be ready to explain how you would close the gap in ${report.missing_required_skills[0].name}.`);
  }
  return areas;
}

function levelFocusArea(level: ExperienceLevel): string | null {
  switch (level) {
    case "senior":
      return "Prepare leadership and mentoring examples.";
    case "mid":
      return "Prepare examples of work you owned from start to finish.";
    case "entry":
      return "Emphasize learning agility and growth potential.";
    case "unspecified":
      return null;
    default:
      return assertNever(level);
  }
}

function joinList(items: ReadonlyArray<string>): string {
  if (items.length <= 1) {
    return items.join("");
  }
  return `${items.slice(0, -1).join(", ")} and ${items[items.length - 1]}`;
}

function lowerFirst(value: string): string {
  return /^[A-Z][a-z]/.test(value) ? `${value[0].toLowerCase()}${value.slice(1)}` : value;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${String(value)}`);
}
