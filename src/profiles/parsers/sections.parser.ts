import { DocumentSection, SECTION_KINDS, SectionKind } from "../../shared/types/section.types";
import { escapeRegExp } from "../../shared/utils/text.util";

export type SectionHeaders = Readonly<Record<SectionKind, ReadonlyArray<string>>>;

interface HeaderMatcher {
  index: Map<string, SectionKind>;
  inlineSplit: RegExp | null;
  prefixed: RegExp | null;
}

const HEADING_DECORATION = /^[#>*\-–—•\s]+/;
/** Common words that read as a heading only at the start of a line. */
const LINE_START_ONLY = new Set(["company", "profile", "bonus", "pluses", "perks", "courses", "you have"]);

/**
 * Splits text into labeled sections. A heading is a line equal to a header
 * synonym (decoration and trailing colon ignored) or a "<synonym>:" prefix.
 * Whitespace-collapsed text is first broken before an inline "<synonym>:"
 * that follows a sentence end.
 */
export function splitSections(text: string, headers: SectionHeaders): DocumentSection[] {
  const matcher = buildHeaderMatcher(headers);
  const source = matcher.inlineSplit ? text.replace(matcher.inlineSplit, "$1\n$2:") : text;

  const sections: Array<{ kind: DocumentSection["kind"]; heading: string | null; lines: string[] }> = [];
  let current: (typeof sections)[number] = { kind: "intro", heading: null, lines: [] };
  sections.push(current);

  for (const rawLine of source.split("\n")) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }

    const bare = line.replace(HEADING_DECORATION, "").replace(/[\s:]+$/, "").replace(/\s+/g, " ").toLowerCase();
    const exactKind = matcher.index.get(bare);
    if (exactKind) {
      current = { kind: exactKind, heading: line.replace(/[\s:]+$/, ""), lines: [] };
      sections.push(current);
      continue;
    }

    const prefixed = matcher.prefixed ? line.match(matcher.prefixed) : null;
    const prefixKind = prefixed ? matcher.index.get(prefixed[1].replace(/\s+/g, " ").toLowerCase()) : undefined;
    if (prefixed && prefixKind) {
      current = { kind: prefixKind, heading: prefixed[1], lines: [prefixed[2].trim()] };
      sections.push(current);
      continue;
    }

    current.lines.push(line);
  }

  return sections
    .filter((section) => section.lines.length > 0)
    .map((section) => Object.freeze({ ...section, lines: Object.freeze([...section.lines]) }));
}

export function hasHeadings(sections: ReadonlyArray<DocumentSection>): boolean {
  return sections.some((section) => section.heading !== null);
}

export function sectionText(sections: ReadonlyArray<DocumentSection>): string {
  return sections.map((section) => section.lines.join("\n")).join("\n");
}

function buildHeaderMatcher(headers: SectionHeaders): HeaderMatcher {
  const index = new Map<string, SectionKind>();
  for (const kind of SECTION_KINDS) {
    for (const synonym of headers[kind]) {
      const key = synonym.trim().replace(/\s+/g, " ").toLowerCase();
      if (key && !index.has(key)) {
        index.set(key, kind);
      }
    }
  }
  if (index.size === 0) {
    return { index, inlineSplit: null, prefixed: null };
  }

  const synonyms = Array.from(index.keys());
  const inlineSynonyms = synonyms.filter((synonym) => !LINE_START_ONLY.has(synonym));

  return {
    index,
    inlineSplit:
      inlineSynonyms.length > 0
        ? new RegExp(`([.!?])[ \\t]+(${alternationOf(inlineSynonyms)})[ \\t]*:`, "gi")
        : null,
    prefixed: new RegExp(`^[#>*\\-–—•\\s]*(${alternationOf(synonyms)})\\s*:\\s*(.+)$`, "i"),
  };
}

function alternationOf(synonyms: ReadonlyArray<string>): string {
  return [...synonyms]
    .sort((left, right) => right.length - left.length)
    .map((synonym) => escapeRegExp(synonym).replace(/ /g, "\\s+"))
    .join("|");
}
