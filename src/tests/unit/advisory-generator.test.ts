import assert from "node:assert/strict";
import { test } from "node:test";
import { ATS_TIPS, generateOptimizationAdvice } from "../../advisory/advisory.generator";
import { learningSuggestion } from "../../advisory/learning-suggestions";
import { ScoringContext, calculateCompatibility } from "../../matching/scoring/compatibility-score";
import { SkillDictionary } from "../../skills/skill-dictionary";
import { candidateProfile, jobProfile, loadTestConfig, skill } from "../helpers";

const config = loadTestConfig();
const dictionary = new SkillDictionary(config.dictionary);
const context: ScoringContext = {
  weights: config.settings.weights,
  canonicalVerb: (token) => dictionary.canonicalVerb(token),
};

const python = skill("Python", "language");
const sql = skill("SQL", "language");
const airflow = skill("Airflow", "unknown");
const docker = skill("Docker");

const job = jobProfile({
  job_title: "Data Engineer",
  required_skills: [python, sql, airflow],
  preferred_skills: [docker],
  experience_level: "senior",
  responsibilities: ["Build data pipelines", "Manage a team of 5 engineers"],
  industry_keywords: ["data pipelines", "stream processing"],
  culture_signals: ["collaborative", "remote-first"],
  industry: "technology",
});
const candidate = candidateProfile({
  skills: [python],
  experience_bullets: ["led a team of 5 engineers on a release", "Built reporting dashboards"],
  keyword_terms: ["data pipelines"],
});

function adviseFor(jobInput = job, candidateInput = candidate) {
  const report = calculateCompatibility(jobInput, candidateInput, context);
  return generateOptimizationAdvice(report, jobInput, candidateInput);
}

test("skill recommendations list missing required skills as high before preferred as medium", () => {
  const advice = adviseFor();
  assert.deepEqual(
    advice.skill_recommendations.map((item) => [item.skill.name, item.priority]),
    [
      ["Airflow", "high"],
      ["SQL", "high"],
      ["Docker", "medium"],
    ],
  );
  assert.equal(
    advice.skill_recommendations[0].rationale,
    "required by the target role but absent from the candidate profile",
  );
  assert.equal(
    advice.skill_recommendations[2].rationale,
    "preferred by the target role but absent from the candidate profile",
  );
  assert.equal(
    advice.skill_recommendations[1].learning_suggestion,
    "Build a small project in SQL, publish it, and link it from your CV so the skill is backed by code.",
  );
  assert.equal(
    advice.skill_recommendations[0].learning_suggestion,
    "Consider a short online course on Airflow, or state your willingness to learn it if you have no hands-on experience yet.",
  );
});

test("section advice covers summary, skills and the weakest responsibility", () => {
  const advice = adviseFor();
  assert.deepEqual(advice.section_advice, {
    summary: [
      "Mention Airflow and SQL in your professional summary.",
      'Use the role title "Data Engineer" in the opening line of your summary.',
    ],
    skills: [
      "Add Airflow to your skills section.",
      "Add SQL to your skills section.",
      "Add Docker to your skills section.",
    ],
    experience: [
      "Use measurable outcomes tied to build data pipelines.",
      'Rework "Built reporting dashboards" to state the result it produced.',
    ],
  });
  assert.deepEqual(advice.keyword_recommendations, ["stream processing"]);
});

test("tailoring suggestions include the industry line for the closed industry set", () => {
  const advice = adviseFor();
  assert.deepEqual(advice.tailoring_suggestions, [
    "Customize your professional summary to emphasize fit for the Data Engineer role.",
    "Highlight experiences that demonstrate collaborative and remote-first.",
    "Lead with experience related to: Build data pipelines.",
    "Incorporate industry terms: data pipelines, stream processing.",
    "Name the systems, scale and technologies behind each achievement.",
    "Reorder bullet points to prioritize the most relevant experience.",
    "Use the same terminology as the job posting.",
  ]);

  const general = adviseFor(jobProfile({ required_skills: [python] }), candidateProfile({ skills: [python] }));
  assert.deepEqual(general.tailoring_suggestions, [
    "Customize your professional summary to emphasize fit for the target role.",
    "Tie each achievement to a measurable business outcome.",
    "Reorder bullet points to prioritize the most relevant experience.",
    "Use the same terminology as the job posting.",
  ]);
});

test("interview focus areas follow the role level and culture", () => {
  const advice = adviseFor();
  assert.deepEqual(advice.interview_focus_areas, [
    "Prepare examples demonstrating Python and SQL.",
    "Practice discussing experience with: Build data pipelines.",
    "Prepare leadership and mentoring examples.",
    "Prepare examples showing a collaborative mindset.",
    "Be ready to explain how you would close the gap in Airflow.",
  ]);
  assert.deepEqual(advice.ats_tips, [...ATS_TIPS]);
});

test("a fully matching candidate gets no section advice", () => {
  const advice = adviseFor(
    jobProfile({ required_skills: [python, sql], preferred_skills: [docker] }),
    candidateProfile({ skills: [python, sql, docker] }),
  );
  assert.deepEqual(advice.section_advice, {});
  assert.deepEqual(advice.skill_recommendations, []);
  assert.equal("skills" in advice.section_advice, false);
});

test("section advice never contains empty entries", () => {
  const advice = adviseFor();
  for (const lines of Object.values(advice.section_advice)) {
    if (!lines) {
      assert.fail("section advice holds an undefined entry");
    }
    assert.ok(lines.length > 0);
    assert.ok(lines.every((line) => line.trim().length > 0));
  }
});

test("learning suggestions are chosen by skill category", () => {
  assert.equal(
    learningSuggestion(skill("Communication", "soft_skill")),
    "Pick one concrete situation where you showed communication and describe it together with its outcome.",
  );
  assert.equal(
    learningSuggestion(skill("PMP", "certification")),
    'Review the PMP exam requirements and list the certification as "in progress" once you are enrolled.',
  );
});
