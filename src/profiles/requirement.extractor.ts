import { MatchingConfig, SignalIndustry } from "../config/matching-config";
import { InferredJobTerms, JobPostingInput, JobRequirementProfile } from "../shared/types/profile.types";
import { DocumentSection } from "../shared/types/section.types";
import { IndustryCategory, INDUSTRY_CATEGORIES, Skill } from "../shared/types/skill.types";
import { deepFreeze } from "../shared/utils/freeze.util";
import { containsPhrase, escapeRegExp, stripListMarker, uniqueStrings } from "../shared/utils/text.util";
import { SkillDictionary } from "../skills/skill-dictionary";
import { SkillSet } from "../skills/skill-set";
import { prepareDocumentText } from "./document-text";
import { inferRequiredLevel } from "./parsers/experience-level.parser";
import { topKeywordPhrases } from "./parsers/keyword-phrases.parser";
import { sectionText, splitSections } from "./parsers/sections.parser";

export interface RequirementExtractionOptions {
  inferred?: InferredJobTerms;
  inferenceDegraded?: boolean;
}

export interface RequirementSpans {
  required: string;
  preferred: string;
}

const REQUIREMENT_LIKE: ReadonlyArray<DocumentSection["kind"]> = ["requirements", "skills", "experience"];
const SENTENCE_BREAK = /(?<=[.!?])\s+(?=[A-Z])/;

export class RequirementExtractor {
  constructor(
    private readonly config: MatchingConfig,
    private readonly dictionary: SkillDictionary,
  ) {}

  /** Requirement-like and preferred text, for handing to the inference collaborator. */
  spans(input: JobPostingInput): RequirementSpans {
    const sections = splitSections(this.prepare(input.text), this.config.settings.sectionHeaders);
    return {
      required: sectionText(requirementSections(sections)),
      preferred: sectionText(sections.filter((section) => section.kind === "preferred")),
    };
  }

  extract(input: JobPostingInput, options: RequirementExtractionOptions = {}): JobRequirementProfile {
    const text = this.prepare(input.text);
    const settings = this.config.settings;
    const sections = splitSections(text, settings.sectionHeaders);

    const required = new SkillSet(this.dictionary.findSkills(sectionText(requirementSections(sections))));
    required.addAll(this.toSkills(options.inferred?.required ?? []));

    const preferredCandidates = new SkillSet(
      this.dictionary.findSkills(sectionText(sections.filter((section) => section.kind === "preferred"))),
    );
    preferredCandidates.addAll(this.toSkills(options.inferred?.preferred ?? []));
    const preferred = preferredCandidates.toArray().filter((skill) => !required.has(skill.id));

    const capturedIds = new Set([...required.toArray(), ...preferred].map((skill) => skill.id));
    const industryKeywords = topKeywordPhrases(
      text,
      (word) => this.dictionary.isStopword(word),
      (phrase) => capturedIds.has(phrase) || capturedIds.has(this.dictionary.resolve(phrase)?.id ?? ""),
      settings.industryKeywordLimit,
    );

    return deepFreeze({
      job_title: cleanOptional(input.job_title),
      company: cleanOptional(input.company),
      required_skills: required.toArray(),
      preferred_skills: preferred,
      experience_level: inferRequiredLevel(
        text,
        {
          entry: this.dictionary.seniorityWords("entry"),
          mid: this.dictionary.seniorityWords("mid"),
          senior: this.dictionary.seniorityWords("senior"),
        },
        settings.experienceBands,
      ),
      responsibilities: extractResponsibilities(sections),
      industry_keywords: industryKeywords,
      culture_signals: this.dictionary.cultureSignals.filter((signal) => containsPhrase(text, signal)),
      industry: this.detectIndustry(text),
      inference_degraded: options.inferenceDegraded ?? false,
    });
  }

  private prepare(text: string): string {
    return prepareDocumentText(text, "requirement_extraction", this.config.settings.minTokens, "job_posting");
  }

  private toSkills(terms: ReadonlyArray<string>): Skill[] {
    return terms.flatMap((term) => {
      const skill = this.dictionary.toSkill(term);
      return skill ? [skill] : [];
    });
  }

  private detectIndustry(text: string): IndustryCategory {
    let best: IndustryCategory = "general";
    let bestHits = 0;
    for (const industry of INDUSTRY_CATEGORIES) {
      if (industry === "general") {
        continue;
      }
      const hits = this.countSignalHits(text, industry);
      if (hits > bestHits) {
        best = industry;
        bestHits = hits;
      }
    }
    return best;
  }

  private countSignalHits(text: string, industry: SignalIndustry): number {
    return this.dictionary.industrySignals(industry).reduce((total, signal) => {
      const pattern = new RegExp(`(?:^|[^a-z0-9])${escapeRegExp(signal)}(?=$|[^a-z0-9])`, "gi");
      return total + (text.match(pattern)?.length ?? 0);
    }, 0);
  }
}

/** Requirement-like sections; the intro stands in when there are none. */
function requirementSections(sections: ReadonlyArray<DocumentSection>): DocumentSection[] {
  const requirementLike = sections.filter((section) => REQUIREMENT_LIKE.includes(section.kind));
  if (requirementLike.length > 0) {
    return requirementLike;
  }
  return sections.filter((section) => section.kind === "intro");
}

function extractResponsibilities(sections: ReadonlyArray<DocumentSection>): string[] {
  const lines = sections
    .filter((section) => section.kind === "responsibilities")
    .flatMap((section) => section.lines)
    .flatMap((line) => stripListMarker(line).split(SENTENCE_BREAK))
    .map((line) => line.trim().replace(/[.;]+$/, ""))
    .filter((line) => line.length > 0);
  return uniqueStrings(lines);
}

function cleanOptional(value: string | null | undefined): string | null {
  const trimmed = typeof value === "string" ? value.trim() : "";
  return trimmed.length > 0 ? trimmed : null;
}
