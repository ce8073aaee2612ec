export type SkillExtractionDocumentKind = "job_posting" | "candidate_document";

export const SKILL_EXTRACTION_V1_PROMPT = `You extract skill terms from a span of recruiting text.

You receive:
- document_kind, either "job_posting" or "candidate_document".
- span, plain text taken from the document.

Rules:
- List technical skills, tools, languages, certifications and soft skills named in the span.
- One term per item, no descriptions, no seniority words, no years.
- Do not repeat a term.
- Return an empty list when the span names no skills.
- Do not wrap in markdown.

Output JSON:
{
  "skills": ["string"]
}

Return only valid JSON.`;

export function buildSkillExtractionV1Prompt(input: {
  documentKind: SkillExtractionDocumentKind;
  span: string;
}): string {
  return [
    SKILL_EXTRACTION_V1_PROMPT,
    "",
    "Input JSON:",
    JSON.stringify(
      {
        document_kind: input.documentKind,
        span: input.span,
      },
      null,
      2,
    ),
  ].join("\n");
}
