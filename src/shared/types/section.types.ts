export const SECTION_KINDS = [
  "requirements",
  "preferred",
  "responsibilities",
  "experience",
  "skills",
  "education",
  "summary",
  "about",
  "benefits",
] as const;

export type SectionKind = (typeof SECTION_KINDS)[number];

export interface DocumentSection {
  /** "intro" holds the text before the first recognized heading. */
  readonly kind: SectionKind | "intro";
  readonly heading: string | null;
  readonly lines: ReadonlyArray<string>;
}
