import { SeniorityBand } from "../../config/matching-config";
import { ExperienceLevel } from "../../shared/types/skill.types";
import { containsPhrase } from "../../shared/utils/text.util";

export interface ExperienceBands {
  midFromYears: number;
  seniorFromYears: number;
}

const MONTHS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"] as const;
const MONTH_PATTERN = "(jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)[a-z]*\\.?";
const RANGE_SEPARATOR = "(?:-|–|—|to|until)";

/** "3-5 years", "5+ yrs", or a bare figure only when "experience" follows. */
const REQUIRED_YEARS =
  /\b(\d{1,2})\s*(?:\+|(?:-|–|—|to)\s*\d{1,2}\s*\+?)\s*(?:years?|yrs?)\b|\b(\d{1,2})\s*(?:years?|yrs?)\s+(?:of\s+)?(?:[a-z-]+\s+){0,2}experience\b/gi;
const STATED_YEARS =
  /\b(\d{1,2}(?:\.\d)?)\s*\+?\s*(?:years?|yrs?)\s+(?:of\s+)?(?:[a-z-]+\s+){0,2}experience\b/gi;
const EMPLOYMENT_RANGE = new RegExp(
  `(?:\\b${MONTH_PATTERN}\\s+)?\\b((?:19|20)\\d{2})\\s*${RANGE_SEPARATOR}\\s*(?:${MONTH_PATTERN}\\s+)?((?:19|20)\\d{2}|present|current|now)\\b`,
  "gi",
);

const BAND_RANK: Record<SeniorityBand, number> = {
  entry: 0,
  mid: 1,
  senior: 2,
};

/** entry 0, mid 1, senior 2; unspecified has no rank. */
export function levelRank(level: ExperienceLevel): number | null {
  return level === "unspecified" ? null : BAND_RANK[level];
}

export function yearsToLevel(years: number | null, bands: ExperienceBands): ExperienceLevel {
  if (years === null) {
    return "unspecified";
  }
  if (years >= bands.seniorFromYears) {
    return "senior";
  }
  if (years >= bands.midFromYears) {
    return "mid";
  }
  return "entry";
}

/** Largest lower bound among "3-5 years", "5+ years", "2 years of experience" mentions. */
export function parseRequiredYears(text: string): number | null {
  let best: number | null = null;
  for (const match of text.matchAll(REQUIRED_YEARS)) {
    const value = Number(match[1] ?? match[2]);
    if (Number.isFinite(value) && (best === null || value > best)) {
      best = value;
    }
  }
  return best;
}

/** Highest seniority band whose word appears in the text. */
export function parseSeniorityBand(
  text: string,
  words: Readonly<Record<SeniorityBand, ReadonlyArray<string>>>,
): SeniorityBand | null {
  const bands: SeniorityBand[] = ["senior", "mid", "entry"];
  for (const band of bands) {
    if (words[band].some((word) => containsPhrase(text, word))) {
      return band;
    }
  }
  return null;
}

/**
 * Numeric and lexical signals are combined; when they disagree the higher
 * band wins.
 */
export function inferRequiredLevel(
  text: string,
  words: Readonly<Record<SeniorityBand, ReadonlyArray<string>>>,
  bands: ExperienceBands,
): ExperienceLevel {
  const numeric = yearsToLevel(parseRequiredYears(text), bands);
  const lexical = parseSeniorityBand(text, words);
  if (numeric === "unspecified") {
    return lexical ?? "unspecified";
  }
  if (!lexical) {
    return numeric;
  }
  return BAND_RANK[lexical] > BAND_RANK[numeric] ? lexical : numeric;
}

/** Largest explicit "N years of experience" figure. */
export function parseStatedYears(text: string): number | null {
  let best: number | null = null;
  for (const match of text.matchAll(STATED_YEARS)) {
    const value = Number(match[1]);
    if (Number.isFinite(value) && (best === null || value > best)) {
      best = value;
    }
  }
  return best;
}

/**
 * Total years covered by employment date ranges ("2018 - 2021",
 * "Jan 2019 – Present"), overlapping ranges merged. Open ranges end at the
 * reference year.
 */
export function parseEmploymentYears(text: string, referenceYear: number): number | null {
  const intervals: Array<[number, number]> = [];
  for (const match of text.matchAll(EMPLOYMENT_RANGE)) {
    const start = Number(match[2]) * 12 + monthIndex(match[1]);
    const endRaw = match[4].toLowerCase();
    const end = /^\d{4}$/.test(endRaw) ? Number(endRaw) * 12 + monthIndex(match[3]) : referenceYear * 12;
    if (end > start) {
      intervals.push([start, end]);
    }
  }
  if (intervals.length === 0) {
    return null;
  }

  intervals.sort((left, right) => left[0] - right[0]);
  let totalMonths = 0;
  let [currentStart, currentEnd] = intervals[0];
  for (const [start, end] of intervals.slice(1)) {
    if (start <= currentEnd) {
      currentEnd = Math.max(currentEnd, end);
      continue;
    }
    totalMonths += currentEnd - currentStart;
    currentStart = start;
    currentEnd = end;
  }
  totalMonths += currentEnd - currentStart;
  return Math.round((totalMonths / 12) * 10) / 10;
}

export function isDateRangeOnly(line: string): boolean {
  const stripped = line.replace(EMPLOYMENT_RANGE, " ").replace(/[\s|,()–—-]+/g, "");
  return stripped.length === 0 && line.trim().length > 0;
}

function monthIndex(value: string | undefined): number {
  if (!value) {
    return 0;
  }
  const index = MONTHS.findIndex((month) => month === value.slice(0, 3).toLowerCase());
  return index < 0 ? 0 : index;
}
