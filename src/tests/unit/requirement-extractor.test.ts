import assert from "node:assert/strict";
import { test } from "node:test";
import { RequirementExtractor } from "../../profiles/requirement.extractor";
import { ExtractionError } from "../../shared/errors";
import { SkillDictionary } from "../../skills/skill-dictionary";
import { loadTestConfig } from "../helpers";

const config = loadTestConfig();
const extractor = new RequirementExtractor(config, new SkillDictionary(config.dictionary));

const POSTING = [
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

test("extract captures required and preferred skills from their sections", () => {
  const profile = extractor.extract({ text: POSTING, job_title: "  Senior Backend Engineer " });

  assert.equal(profile.job_title, "Senior Backend Engineer");
  assert.equal(profile.company, null);
  assert.deepEqual(
    profile.required_skills.map((skill) => skill.id),
    ["python", "postgresql", "rest apis", "communication"],
  );
  assert.deepEqual(
    profile.preferred_skills.map((skill) => skill.id),
    ["docker", "kubernetes"],
  );
  assert.deepEqual(profile.required_skills[3].surface_forms, ["communication skills"]);
  assert.equal(profile.inference_degraded, false);
});

test("extract reads level, responsibilities, culture signals and industry", () => {
  const profile = extractor.extract({ text: POSTING });

  assert.equal(profile.experience_level, "senior");
  assert.deepEqual(profile.responsibilities, [
    "Design REST APIs for payment processing",
    "Mentor junior engineers",
    "Build data pipelines for payment processing",
  ]);
  assert.deepEqual(profile.culture_signals, ["collaborative", "remote-first", "remote"]);
  assert.equal(profile.industry, "finance");
});

test("industry keywords are ranked phrases that exclude captured skills", () => {
  const profile = extractor.extract({ text: POSTING });

  assert.equal(profile.industry_keywords.length, 15);
  assert.deepEqual(profile.industry_keywords.slice(0, 3), ["data pipelines", "payment processing", "senior backend"]);
  assert.equal(profile.industry_keywords.includes("rest apis"), false);
});

test("inferred terms are merged by union and never overlap across buckets", () => {
  const profile = extractor.extract(
    { text: POSTING },
    {
      inferred: { required: ["GraphQL", "Payment Reconciliation"], preferred: ["Python", "Figma"] },
      inferenceDegraded: true,
    },
  );

  assert.deepEqual(
    profile.required_skills.map((skill) => skill.id),
    ["python", "postgresql", "rest apis", "communication", "graphql", "payment reconciliation"],
  );
  assert.equal(profile.required_skills[5].category, "unknown");
  assert.deepEqual(
    profile.preferred_skills.map((skill) => skill.id),
    ["docker", "kubernetes", "figma"],
  );
  assert.equal(profile.inference_degraded, true);
});

test("spans returns the requirement and preferred text handed to inference", () => {
  const spans = extractor.spans({ text: POSTING });
  assert.equal(
    spans.required,
    [
      "- 5+ years of experience with Python and PostgreSQL",
      "- Experience building REST APIs and data pipelines",
      "- Strong communication skills",
    ].join("\n"),
  );
  assert.equal(spans.preferred, "- Docker, Kubernetes and Python");
});

test("a posting without headings is read entirely as requirements", () => {
  const text =
    "We need a developer who knows Python and Docker and can write SQL queries for our reporting platform every single day of the week.";
  const profile = extractor.extract({ text });

  assert.deepEqual(
    profile.required_skills.map((skill) => skill.id),
    ["python", "docker", "sql"],
  );
  assert.deepEqual(profile.preferred_skills, []);
  assert.deepEqual(profile.responsibilities, []);
});

test("empty and too-short postings raise ExtractionError", () => {
  assert.throws(
    () => extractor.extract({ text: "   \n " }),
    (error: unknown) =>
      error instanceof ExtractionError &&
      error.code === "empty_text" &&
      error.stage === "requirement_extraction" &&
      error.input === "job_posting",
  );
  assert.throws(
    () => extractor.extract({ text: "Python developer wanted" }),
    (error: unknown) => error instanceof ExtractionError && error.code === "too_short",
  );
});

test("extracted profiles are frozen", () => {
  const profile = extractor.extract({ text: POSTING });
  assert.equal(Object.isFrozen(profile), true);
  assert.equal(Object.isFrozen(profile.required_skills), true);
});
