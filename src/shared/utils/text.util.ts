const BULLET_GLYPHS = /^\s*[•·▪▫◦‣⁃*]\s*/;
const LIST_MARKER = /^\s*(?:[-–—•·▪▫◦‣⁃*]|\d{1,2}[.)])\s+/;
const PAGE_MARKER = /\bpage\s+\d+(?:\s+of\s+\d+)?\b/gi;
const WORD_TOKEN = /[\p{L}\p{N}][\p{L}\p{N}+#.'-]*/gu;

/**
 * Cleans extracted document text: NFKC, unified line endings and bullets,
 * page markers dropped, horizontal whitespace collapsed, blank lines removed.
 */
export function normalizeDocumentText(text: string): string {
  return text
    .normalize("NFKC")
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((line) =>
      line
        .replace(BULLET_GLYPHS, "- ")
        .replace(PAGE_MARKER, " ")
        .replace(/[ \t\f\v]+/g, " ")
        .trim(),
    )
    .filter((line) => line.length > 0)
    .join("\n");
}

export function countWordTokens(text: string): number {
  return text.match(WORD_TOKEN)?.length ?? 0;
}

/** Lowercase, punctuation stripped (keeps + # . / - inside terms), whitespace collapsed. */
export function normalizeTerm(value: string): string {
  return value
    .normalize("NFKC")
    .toLowerCase()
    .replace(/[^a-z0-9+#./\- ]+/g, " ")
    .replace(/\s+/g, " ")
    .trim()
    .replace(/^[-/]+/, "")
    .replace(/[-/.]+$/, "")
    .trim();
}

export function wordTokens(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9+#]+/)
    .filter((token) => token.length > 0);
}

export function stripListMarker(line: string): string {
  return line.replace(LIST_MARKER, "").trim();
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Case-insensitive whole-phrase test that also works for terms like "c++". */
export function containsPhrase(text: string, phrase: string): boolean {
  const pattern = new RegExp(`(?:^|[^a-z0-9])${escapeRegExp(phrase.toLowerCase())}(?=$|[^a-z0-9])`, "i");
  return pattern.test(text);
}

export function jaccard<T>(left: ReadonlySet<T>, right: ReadonlySet<T>): number {
  if (left.size === 0 && right.size === 0) {
    return 0;
  }
  let intersection = 0;
  for (const item of left) {
    if (right.has(item)) {
      intersection += 1;
    }
  }
  return intersection / (left.size + right.size - intersection);
}

export function uniqueStrings(values: Iterable<string>): string[] {
  return Array.from(new Set(values));
}
