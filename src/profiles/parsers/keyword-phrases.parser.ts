export interface PhraseStat {
  phrase: string;
  count: number;
  firstIndex: number;
  words: number;
}

const FRAGMENT_BREAKS = /[\n.,;:!?()[\]{}|"/•]+/;
const PHRASE_WORD = /^[a-z][a-z0-9+#-]*$/;
const MIN_WORDS = 2;
const MAX_WORDS = 3;

/**
 * Counts every 2-3 word run of consecutive content words. Runs never cross
 * punctuation, line breaks, numbers or stopwords.
 */
export function collectPhrases(text: string, isStopword: (word: string) => boolean): PhraseStat[] {
  const stats = new Map<string, PhraseStat>();
  let position = 0;

  for (const fragment of text.toLowerCase().split(FRAGMENT_BREAKS)) {
    let run: string[] = [];
    let runStart = position;
    const flush = (): void => {
      addRunPhrases(run, runStart, stats);
      run = [];
    };

    for (const raw of fragment.split(/\s+/)) {
      if (!raw) {
        continue;
      }
      const word = raw.replace(/^['`-]+|['`-]+$/g, "");
      if (PHRASE_WORD.test(word) && word.length >= 2 && !isStopword(word)) {
        if (run.length === 0) {
          runStart = position;
        }
        run.push(word);
      } else {
        flush();
      }
      position += 1;
    }
    flush();
  }

  return Array.from(stats.values());
}

/** Frequency desc, then first occurrence, then fewer words, then alphabetical. */
export function rankPhrases(stats: ReadonlyArray<PhraseStat>): PhraseStat[] {
  return [...stats].sort(
    (left, right) =>
      right.count - left.count ||
      left.firstIndex - right.firstIndex ||
      left.words - right.words ||
      left.phrase.localeCompare(right.phrase),
  );
}

export function topKeywordPhrases(
  text: string,
  isStopword: (word: string) => boolean,
  exclude: (phrase: string) => boolean,
  limit: number,
): string[] {
  return rankPhrases(collectPhrases(text, isStopword))
    .filter((stat) => !exclude(stat.phrase))
    .slice(0, limit)
    .map((stat) => stat.phrase);
}

/** All distinct phrases in first-seen order. */
export function keywordTerms(text: string, isStopword: (word: string) => boolean): string[] {
  return collectPhrases(text, isStopword)
    .sort((left, right) => left.firstIndex - right.firstIndex || left.words - right.words)
    .map((stat) => stat.phrase);
}

function addRunPhrases(run: ReadonlyArray<string>, runStart: number, stats: Map<string, PhraseStat>): void {
  for (let offset = 0; offset < run.length; offset += 1) {
    for (let width = MIN_WORDS; width <= MAX_WORDS && offset + width <= run.length; width += 1) {
      const phrase = run.slice(offset, offset + width).join(" ");
      const existing = stats.get(phrase);
      if (existing) {
        existing.count += 1;
        continue;
      }
      stats.set(phrase, { phrase, count: 1, firstIndex: runStart + offset, words: width });
    }
  }
}
