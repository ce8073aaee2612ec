import { readFileSync } from "node:fs";
import path from "node:path";
import { Logger } from "../config/logger";
import { MatchingConfig, createMatchingConfig } from "../config/matching-config";
import { CandidateProfile, JobRequirementProfile } from "../shared/types/profile.types";
import { Skill, SkillCategory } from "../shared/types/skill.types";
import { normalizeTerm } from "../shared/utils/text.util";

const CONFIG_DIR = path.resolve(__dirname, "../../config");

export function readConfigJson(fileName: string): unknown {
  const parsed: unknown = JSON.parse(readFileSync(path.join(CONFIG_DIR, fileName), "utf8"));
  return parsed;
}

export function loadTestConfig(): MatchingConfig {
  return createMatchingConfig(readConfigJson("matching.config.json"), readConfigJson("skill-dictionary.json"));
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export interface LogEntry {
  level: "debug" | "info" | "warn" | "error";
  message: string;
  meta?: Record<string, unknown>;
}

export function createRecordingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    debug(message, meta) {
      entries.push({ level: "debug", message, meta });
    },
    info(message, meta) {
      entries.push({ level: "info", message, meta });
    },
    warn(message, meta) {
      entries.push({ level: "warn", message, meta });
    },
    error(message, meta) {
      entries.push({ level: "error", message, meta });
    },
  };
}

export function skill(name: string, category: SkillCategory = "tool"): Skill {
  return { id: normalizeTerm(name), name, category, surface_forms: [name] };
}

export function jobProfile(overrides: Partial<JobRequirementProfile> = {}): JobRequirementProfile {
  return {
    job_title: null,
    company: null,
    required_skills: [],
    preferred_skills: [],
    experience_level: "mid",
    responsibilities: [],
    industry_keywords: [],
    culture_signals: [],
    industry: "general",
    inference_degraded: false,
    ...overrides,
  };
}

export function candidateProfile(overrides: Partial<CandidateProfile> = {}): CandidateProfile {
  return {
    skills: [],
    experience_level: "mid",
    years_of_experience: 3,
    experience_bullets: [],
    keyword_terms: [],
    inference_degraded: false,
    ...overrides,
  };
}

export const SAMPLE_POSTING = [
  "Senior Backend Engineer",
  "Acme Payments builds a fintech platform for online payments. We are a collaborative, remote-first team.",
  "Requirements:",
  "- 5+ years of experience with Python and PostgreSQL",
  "- Experience building REST APIs and data pipelines",
  "- Strong communication skills",
  "Nice to have:",
  "- Docker, Kubernetes and Python",
  "Responsibilities:",
  "- Design REST APIs for payment processing. Mentor junior engineers",
  "- Build data pipelines for payment processing",
].join("\n");

export const SAMPLE_CV = [
  "Jane Doe",
  "Summary: Backend developer with 6 years of experience building APIs.",
  "Skills: Python, SQL, Docker, Git",
  "Experience",
  "Software Engineer, Acme Corp",
  "Jan 2019 - Present",
  "- Led a team of 4 engineers building payment services",
  "- Improved PostgreSQL query latency by 40%",
  "Developer, Beta Ltd",
  "2016 - 2018",
  "- Developed REST APIs in Node.js",
  "Education",
  "BSc Computer Science, 2015",
].join("\n");

export async function noSleep(): Promise<void> {}

/** Walks nested records and arrays of an untyped JSON value. */
export function pick(value: unknown, ...path: Array<string | number>): unknown {
  let current = value;
  for (const key of path) {
    if (typeof key === "number") {
      current = Array.isArray(current) ? current[key] : undefined;
    } else if (typeof current === "object" && current !== null && !Array.isArray(current)) {
      current = Object.getOwnPropertyDescriptor(current, key)?.value;
    } else {
      current = undefined;
    }
  }
  return current;
}

/** Ids of an untyped list of skills. */
export function skillIds(value: unknown): unknown[] {
  return Array.isArray(value) ? value.map((item) => pick(item, "id")) : [];
}
