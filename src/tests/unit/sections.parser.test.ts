import assert from "node:assert/strict";
import { test } from "node:test";
import { hasHeadings, sectionText, splitSections } from "../../profiles/parsers/sections.parser";
import { loadTestConfig } from "../helpers";

const headers = loadTestConfig().settings.sectionHeaders;

test("splitSections labels heading lines and prefixed headings", () => {
  const text = [
    "Acme Analytics is hiring.",
    "Requirements:",
    "- Python",
    "- SQL",
    "Nice to have: Docker",
    "What you'll do",
    "- Build data pipelines",
  ].join("\n");

  assert.deepEqual(splitSections(text, headers), [
    { kind: "intro", heading: null, lines: ["Acme Analytics is hiring."] },
    { kind: "requirements", heading: "Requirements", lines: ["- Python", "- SQL"] },
    { kind: "preferred", heading: "Nice to have", lines: ["Docker"] },
    { kind: "responsibilities", heading: "What you'll do", lines: ["- Build data pipelines"] },
  ]);
});

test("splitSections breaks whitespace-collapsed text before inline headings after a sentence end", () => {
  const sections = splitSections("Summary: Backend engineer. Skills: Python, Go", headers);
  assert.deepEqual(sections, [
    { kind: "summary", heading: "Summary", lines: ["Backend engineer."] },
    { kind: "skills", heading: "Skills", lines: ["Python, Go"] },
  ]);
  assert.equal(sectionText(sections), "Backend engineer.\nPython, Go");
});

test("a header word inside a sentence does not open a section", () => {
  const text = [
    "Requirements:",
    "- Two years at a product company: Python and SQL daily",
    "- Docker and Kubernetes in production",
    "We are a small team. Company: Acme builds payroll tools",
  ].join("\n");

  assert.deepEqual(splitSections(text, headers), [
    {
      kind: "requirements",
      heading: "Requirements",
      lines: [
        "- Two years at a product company: Python and SQL daily",
        "- Docker and Kubernetes in production",
        "We are a small team. Company: Acme builds payroll tools",
      ],
    },
  ]);
});

test("inline text without a sentence end before the header word stays together", () => {
  const sections = splitSections("Backend engineer skills: Python, Go", headers);
  assert.deepEqual(sections, [{ kind: "intro", heading: null, lines: ["Backend engineer skills: Python, Go"] }]);
});

test("text without headings stays in a single intro section", () => {
  const sections = splitSections("Just some words here", headers);
  assert.deepEqual(sections, [{ kind: "intro", heading: null, lines: ["Just some words here"] }]);
  assert.equal(hasHeadings(sections), false);
});

test("markdown decoration around headings is ignored and empty sections are dropped", () => {
  const sections = splitSections("## Benefits\n### Responsibilities\n- Own the roadmap", headers);
  assert.deepEqual(sections, [
    { kind: "responsibilities", heading: "### Responsibilities", lines: ["- Own the roadmap"] },
  ]);
  assert.equal(hasHeadings(sections), true);
});
