import { MatchingConfig } from "../config/matching-config";
import { CandidateDocumentInput, CandidateProfile } from "../shared/types/profile.types";
import { DocumentSection } from "../shared/types/section.types";
import { Skill } from "../shared/types/skill.types";
import { deepFreeze } from "../shared/utils/freeze.util";
import { stripListMarker, uniqueStrings } from "../shared/utils/text.util";
import { SkillDictionary } from "../skills/skill-dictionary";
import { SkillSet } from "../skills/skill-set";
import { prepareDocumentText } from "./document-text";
import {
  isDateRangeOnly,
  parseEmploymentYears,
  parseStatedYears,
  yearsToLevel,
} from "./parsers/experience-level.parser";
import { keywordTerms } from "./parsers/keyword-phrases.parser";
import { sectionText, splitSections } from "./parsers/sections.parser";

export interface CandidateProfilingOptions {
  inferredSkills?: ReadonlyArray<string>;
  inferenceDegraded?: boolean;
  /** Year that open ranges ("2020 - Present") end at. Defaults to the current year. */
  referenceYear?: number;
}

export class CandidateProfiler {
  constructor(
    private readonly config: MatchingConfig,
    private readonly dictionary: SkillDictionary,
  ) {}

  /** Normalized text, validated the same way profile() does. */
  prepare(text: string): string {
    return prepareDocumentText(text, "candidate_profiling", this.config.settings.minTokens, "candidate_document");
  }

  profile(input: CandidateDocumentInput, options: CandidateProfilingOptions = {}): CandidateProfile {
    const text = this.prepare(input.text);
    const referenceYear = options.referenceYear ?? new Date().getFullYear();

    const skills = new SkillSet(this.dictionary.findSkills(text));
    skills.addAll(this.toSkills(input.skills ?? []));
    skills.addAll(this.toSkills(options.inferredSkills ?? []));

    const sections = splitSections(text, this.config.settings.sectionHeaders);
    const years = maxOf(
      parseStatedYears(text),
      parseEmploymentYears(sectionText(employmentSections(sections)), referenceYear),
    );

    return deepFreeze({
      skills: skills.toArray(),
      experience_level: yearsToLevel(years, this.config.settings.experienceBands),
      years_of_experience: years,
      experience_bullets: extractBullets(sections),
      keyword_terms: keywordTerms(text, (word) => this.dictionary.isStopword(word)),
      inference_degraded: options.inferenceDegraded ?? false,
    });
  }

  private toSkills(terms: ReadonlyArray<string>): Skill[] {
    return terms.flatMap((term) => {
      const skill = this.dictionary.toSkill(term);
      return skill ? [skill] : [];
    });
  }
}

/**
 * Sections whose date ranges count as employment: the experience sections,
 * or everything but education when the CV has no experience heading.
 */
function employmentSections(sections: ReadonlyArray<DocumentSection>): DocumentSection[] {
  const experience = sections.filter((section) => section.kind === "experience");
  if (experience.length > 0) {
    return experience;
  }
  return sections.filter((section) => section.kind !== "education");
}

function extractBullets(sections: ReadonlyArray<DocumentSection>): string[] {
  const lines = sections
    .filter((section) => section.kind === "experience")
    .flatMap((section) => section.lines)
    .map((line) => stripListMarker(line))
    .filter((line) => line.length > 0 && !isDateRangeOnly(line));
  return uniqueStrings(lines);
}

function maxOf(left: number | null, right: number | null): number | null {
  if (left === null) {
    return right;
  }
  if (right === null) {
    return left;
  }
  return Math.max(left, right);
}
