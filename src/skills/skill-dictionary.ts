import { SeniorityBand, SignalIndustry, SkillDictionaryData } from "../config/matching-config";
import { KnownSkillCategory, Skill } from "../shared/types/skill.types";
import { normalizeTerm } from "../shared/utils/text.util";
import { SkillSet } from "./skill-set";

interface CanonicalSkill {
  id: string;
  name: string;
  category: KnownSkillCategory;
}

const TOKEN_SEPARATORS = /[\s,;:()[\]{}"!?|<>]+/;

/**
 * Read-only lookup over the versioned skill dictionary: alias resolution,
 * n-gram skill matching, stopwords and action-verb synonyms.
 */
export class SkillDictionary {
  readonly version: string;
  private readonly aliasIndex = new Map<string, CanonicalSkill>();
  private readonly maxAliasWords: number;
  private readonly stopwords: ReadonlySet<string>;
  private readonly verbHeads = new Map<string, string>();

  constructor(private readonly data: SkillDictionaryData) {
    this.version = data.version;
    let maxWords = 1;
    for (const entry of data.skills) {
      const canonical: CanonicalSkill = {
        id: normalizeTerm(entry.name),
        name: entry.name,
        category: entry.category,
      };
      for (const alias of [entry.name, ...entry.aliases]) {
        const key = normalizeTerm(alias);
        if (!key || this.aliasIndex.has(key)) {
          continue;
        }
        this.aliasIndex.set(key, canonical);
        maxWords = Math.max(maxWords, key.split(" ").length);
      }
    }
    this.maxAliasWords = maxWords;
    this.stopwords = new Set(data.stopwords);
    for (const group of data.actionVerbs) {
      const head = group[0];
      for (const verb of group) {
        if (!this.verbHeads.has(verb)) {
          this.verbHeads.set(verb, head);
        }
      }
    }
  }

  /** Resolves a surface term against the dictionary; null when unknown. */
  resolve(term: string): Skill | null {
    const surface = term.trim();
    const canonical = this.lookup(normalizeTerm(surface));
    if (!canonical) {
      return null;
    }
    return { ...canonical, surface_forms: [surface] };
  }

  /** Like resolve, but keeps unknown terms as skills of category "unknown". */
  toSkill(term: string): Skill | null {
    const known = this.resolve(term);
    if (known) {
      return known;
    }
    const surface = term.trim();
    const id = normalizeTerm(surface);
    if (!id) {
      return null;
    }
    return { id, name: surface, category: "unknown", surface_forms: [surface] };
  }

  /** Greedy longest-alias matching, line by line. */
  findSkills(text: string): Skill[] {
    const found = new SkillSet();
    for (const line of text.split("\n")) {
      const tokens = this.tokenize(line);
      let index = 0;
      while (index < tokens.length) {
        const width = this.matchAt(tokens, index);
        if (width === 0) {
          index += 1;
          continue;
        }
        const surface = tokens.slice(index, index + width).join(" ");
        const skill = this.resolve(surface);
        if (skill) {
          found.add(skill);
        }
        index += width;
      }
    }
    return found.toArray();
  }

  isStopword(word: string): boolean {
    return this.stopwords.has(word);
  }

  canonicalVerb(token: string): string {
    return this.verbHeads.get(token) ?? token;
  }

  seniorityWords(band: SeniorityBand): ReadonlyArray<string> {
    return this.data.seniorityWords[band];
  }

  get cultureSignals(): ReadonlyArray<string> {
    return this.data.cultureSignals;
  }

  industrySignals(industry: SignalIndustry): ReadonlyArray<string> {
    return this.data.industries[industry];
  }

  private lookup(key: string): CanonicalSkill | undefined {
    if (!key) {
      return undefined;
    }
    const direct = this.aliasIndex.get(key);
    if (direct) {
      return direct;
    }
    if (key.length > 3 && key.endsWith("s")) {
      return this.aliasIndex.get(key.slice(0, -1));
    }
    return undefined;
  }

  private matchAt(tokens: ReadonlyArray<string>, index: number): number {
    const maxWidth = Math.min(this.maxAliasWords, tokens.length - index);
    for (let width = maxWidth; width >= 1; width -= 1) {
      if (this.lookup(normalizeTerm(tokens.slice(index, index + width).join(" ")))) {
        return width;
      }
    }
    return 0;
  }

  private tokenize(line: string): string[] {
    const tokens: string[] = [];
    for (const raw of line.split(TOKEN_SEPARATORS)) {
      const token = raw.replace(/^[-–—*•'`]+/, "").replace(/[.\-'`]+$/, "");
      if (!token) {
        continue;
      }
      if (token.includes("/") && !this.lookup(normalizeTerm(token))) {
        tokens.push(...token.split("/").filter((part) => part.length > 0));
        continue;
      }
      tokens.push(token);
    }
    return tokens;
  }
}
