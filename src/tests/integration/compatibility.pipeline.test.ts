import assert from "node:assert/strict";
import { test } from "node:test";
import { SkillInferenceCollaborator, SkillInferenceService } from "../../ai/skill-inference.service";
import { CompatibilityPipeline } from "../../matching/compatibility.pipeline";
import { AnalysisTimeoutError, ExtractionError } from "../../shared/errors";
import {
  SAMPLE_CV,
  SAMPLE_POSTING,
  createRecordingLogger,
  loadTestConfig,
  noSleep,
  silentLogger,
} from "../helpers";

const config = loadTestConfig();

function buildPipeline(collaborator: SkillInferenceCollaborator | null, logger = silentLogger) {
  const inference = new SkillInferenceService(collaborator, logger, { timeoutMs: 200, backoffMs: 0, sleep: noSleep });
  return new CompatibilityPipeline(config, inference, logger, { referenceYear: 2024 });
}

const PAIR = { job: { text: SAMPLE_POSTING, job_title: "Senior Backend Engineer" }, candidate: { text: SAMPLE_CV } };

test("dictionary-only analysis scores the pair and attaches advice", async () => {
  const result = await buildPipeline(null).analyze(PAIR);

  assert.deepEqual(
    result.report.matched_skills.map((skill) => skill.id),
    ["python", "postgresql", "rest apis", "docker"],
  );
  assert.deepEqual(result.report.missing_required_skills.map((skill) => skill.id), ["communication"]);
  assert.deepEqual(result.report.missing_preferred_skills.map((skill) => skill.id), ["kubernetes"]);
  assert.equal(result.report.factor_scores.skill_match, 80);
  assert.equal(result.report.factor_scores.experience_alignment, 100);
  assert.deepEqual(
    result.report.optimization_advice.skill_recommendations.map((item) => [item.skill.id, item.priority]),
    [
      ["communication", "high"],
      ["kubernetes", "medium"],
    ],
  );
  assert.equal(result.job_profile.inference_degraded, false);
  assert.equal(result.candidate_profile.inference_degraded, false);
  assert.ok(Object.isFrozen(result.report));
});

test("inferred terms are merged into both profiles by union", async () => {
  const calls: string[] = [];
  const collaborator: SkillInferenceCollaborator = {
    async proposeTerms(span, documentKind) {
      calls.push(documentKind);
      if (documentKind === "candidate_document") {
        return ["Kubernetes"];
      }
      return span.includes("PostgreSQL") ? ["GraphQL"] : [];
    },
  };

  const result = await buildPipeline(collaborator).analyze(PAIR);

  assert.deepEqual(calls.sort(), ["candidate_document", "job_posting", "job_posting"]);
  assert.deepEqual(
    result.job_profile.required_skills.map((skill) => skill.id),
    ["python", "postgresql", "rest apis", "communication", "graphql"],
  );
  assert.ok(result.candidate_profile.skills.some((skill) => skill.id === "kubernetes"));
  assert.deepEqual(result.report.missing_required_skills.map((skill) => skill.id), ["communication", "graphql"]);
  assert.deepEqual(result.report.missing_preferred_skills, []);
  assert.equal(result.report.factor_scores.skill_match, 70);
});

test("a failing collaborator degrades to the dictionary-only result", async () => {
  const logger = createRecordingLogger();
  const failing: SkillInferenceCollaborator = {
    async proposeTerms() {
      throw new Error("upstream unavailable");
    },
  };

  const degraded = await buildPipeline(failing, logger).analyze(PAIR);
  const baseline = await buildPipeline(null).analyze(PAIR);

  assert.equal(degraded.job_profile.inference_degraded, true);
  assert.equal(degraded.candidate_profile.inference_degraded, true);
  assert.deepEqual(degraded.report, baseline.report);
  assert.equal(
    logger.entries.filter((entry) => entry.message === "inference.fallback.dictionary_only").length,
    3,
  );
});

test("a batch reports each failing pair in place", async () => {
  const results = await buildPipeline(null).analyzeBatch([
    PAIR,
    { job: { text: "   " }, candidate: { text: SAMPLE_CV } },
    { job: { text: SAMPLE_POSTING }, candidate: { text: "Python developer" } },
  ]);

  assert.equal(results.length, 3);
  assert.equal(results[0].ok, true);
  assert.deepEqual(results[1], {
    ok: false,
    error: {
      kind: "ExtractionError",
      stage: "requirement_extraction",
      code: "empty_text",
      message: "job_posting text is empty",
      input: "job_posting",
    },
  });
  assert.deepEqual(results[2], {
    ok: false,
    error: {
      kind: "ExtractionError",
      stage: "candidate_profiling",
      code: "too_short",
      message: "candidate_document text has 2 tokens, at least 20 are required",
      input: "candidate_document",
    },
  });
});

test("empty input is rejected before inference runs", async () => {
  let calls = 0;
  const pipeline = buildPipeline({
    async proposeTerms() {
      calls += 1;
      return [];
    },
  });

  await assert.rejects(pipeline.buildJobProfile({ text: "" }), ExtractionError);
  assert.equal(calls, 0);
});

test("an analysis that outlives its deadline fails with a timeout", async () => {
  const hanging: SkillInferenceCollaborator = {
    proposeTerms: () => new Promise<string[]>(() => undefined),
  };

  await assert.rejects(
    buildPipeline(hanging).analyze(PAIR, { timeoutMs: 30 }),
    (error: unknown) =>
      error instanceof AnalysisTimeoutError &&
      error.code === "timeout" &&
      error.message === "Analysis did not finish within 30ms",
  );
});
