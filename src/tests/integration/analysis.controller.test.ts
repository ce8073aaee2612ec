import assert from "node:assert/strict";
import { Server } from "node:http";
import { AddressInfo } from "node:net";
import { after, before, test } from "node:test";
import { createApp } from "../../app";
import { loadEnv } from "../../config/env";
import { SAMPLE_CV, SAMPLE_POSTING, loadTestConfig, pick, silentLogger, skillIds } from "../helpers";

let server: Server;
let baseUrl = "";

before(async () => {
  const { app } = createApp(loadEnv({ LOG_LEVEL: "error" }), loadTestConfig(), {
    logger: silentLogger,
    referenceYear: 2024,
  });
  server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
  });
  const address: AddressInfo | string | null = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Server has no TCP address");
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

after(async () => {
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
});

async function postJson(route: string, body: unknown): Promise<{ status: number; body: unknown }> {
  const response = await fetch(`${baseUrl}${route}`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
  const parsed: unknown = await response.json();
  return { status: response.status, body: parsed };
}

test("GET /health reports versions and inference state", async () => {
  const response = await fetch(`${baseUrl}/health`);
  const body: unknown = await response.json();

  assert.equal(response.status, 200);
  assert.deepEqual(body, {
    ok: true,
    dictionary_version: "2026.10.1",
    config_version: "2026.10.1",
    inference_enabled: false,
  });
});

test("POST /analyses returns profiles and the advised report", async () => {
  const { status, body } = await postJson("/analyses", {
    job: { text: SAMPLE_POSTING, job_title: "Senior Backend Engineer" },
    candidate: { text: SAMPLE_CV },
  });

  assert.equal(status, 200);
  assert.equal(pick(body, "ok"), true);
  assert.equal(pick(body, "result", "job_profile", "job_title"), "Senior Backend Engineer");
  assert.equal(pick(body, "result", "candidate_profile", "years_of_experience"), 7);
  assert.deepEqual(skillIds(pick(body, "result", "report", "matched_skills")), [
    "python",
    "postgresql",
    "rest apis",
    "docker",
  ]);
  assert.equal(pick(body, "result", "report", "factor_scores", "skill_match"), 80);
  assert.equal(pick(body, "result", "report", "optimization_advice", "skill_recommendations", 0, "priority"), "high");
});

test("POST /profiles/job and /reports score separately built profiles", async () => {
  const job = await postJson("/profiles/job", { text: SAMPLE_POSTING });
  const candidate = await postJson("/profiles/candidate", { text: SAMPLE_CV, skills: ["Kubernetes"] });

  assert.equal(job.status, 200);
  assert.equal(candidate.status, 200);
  assert.deepEqual(skillIds(pick(job.body, "profile", "preferred_skills")), ["docker", "kubernetes"]);

  const report = await postJson("/reports", {
    job_profile: pick(job.body, "profile"),
    candidate_profile: pick(candidate.body, "profile"),
  });

  assert.equal(report.status, 200);
  assert.deepEqual(skillIds(pick(report.body, "report", "missing_required_skills")), ["communication"]);
  assert.deepEqual(pick(report.body, "report", "missing_preferred_skills"), []);
  assert.equal(pick(report.body, "report", "factor_scores", "skill_match"), 85);
});

test("POST /reports matches a required skill against the candidate's synonym", async () => {
  const report = await postJson("/reports", {
    job_profile: {
      required_skills: ["JS"],
      preferred_skills: [],
      experience_level: "mid",
      responsibilities: [],
      industry_keywords: [],
    },
    candidate_profile: { skills: ["JavaScript"], experience_level: "mid", experience_bullets: [] },
  });

  assert.equal(report.status, 200);
  assert.deepEqual(skillIds(pick(report.body, "report", "matched_skills")), ["javascript"]);
  assert.deepEqual(pick(report.body, "report", "missing_required_skills"), []);
  assert.equal(pick(report.body, "report", "factor_scores", "skill_match"), 100);
});

test("malformed JSON is a 400", async () => {
  const { status, body } = await postJson("/analyses", "{not json");

  assert.equal(status, 400);
  assert.deepEqual(body, {
    ok: false,
    error: {
      kind: "InvalidRequestError",
      stage: "request",
      code: "invalid_body",
      message: "Request body is not valid JSON",
    },
  });
});

test("a body of the wrong shape is a 400 naming the field", async () => {
  const { status, body } = await postJson("/analyses", { job: { text: 42 }, candidate: { text: SAMPLE_CV } });

  assert.equal(status, 400);
  assert.equal(pick(body, "error", "message"), "body.job.text must be a string");
});

test("empty posting text is a 422 extraction error", async () => {
  const { status, body } = await postJson("/profiles/job", { text: "" });

  assert.equal(status, 422);
  assert.deepEqual(body, {
    ok: false,
    error: {
      kind: "ExtractionError",
      stage: "requirement_extraction",
      code: "empty_text",
      message: "job_posting text is empty",
      input: "job_posting",
    },
  });
});

test("a missing profile on /reports is a 422 scoring error", async () => {
  const { status, body } = await postJson("/reports", { job_profile: null, candidate_profile: null });

  assert.equal(status, 422);
  assert.equal(pick(body, "error", "kind"), "ScoringError");
  assert.equal(pick(body, "error", "code"), "missing_profile");
  assert.equal(pick(body, "error", "input"), "job_profile");
});

test("POST /analyses/batch isolates failing pairs", async () => {
  const { status, body } = await postJson("/analyses/batch", {
    pairs: [
      { job: { text: SAMPLE_POSTING }, candidate: { text: SAMPLE_CV } },
      { job: { text: SAMPLE_POSTING }, candidate: { text: "" } },
    ],
  });

  assert.equal(status, 200);
  assert.equal(pick(body, "results", 0, "ok"), true);
  assert.equal(pick(body, "results", 0, "result", "report", "factor_scores", "skill_match"), 80);
  assert.equal(pick(body, "results", 1, "ok"), false);
  assert.equal(pick(body, "results", 1, "error", "code"), "empty_text");
  assert.equal(pick(body, "results", 1, "error", "stage"), "candidate_profiling");
});

test("a batch above the pair limit is a 400", async () => {
  const pair = { job: { text: SAMPLE_POSTING }, candidate: { text: SAMPLE_CV } };
  const { status, body } = await postJson("/analyses/batch", { pairs: Array.from({ length: 51 }, () => pair) });

  assert.equal(status, 400);
  assert.equal(pick(body, "error", "message"), "body.pairs accepts at most 50 pairs");
});
