import { ExtractionError } from "../shared/errors";
import { countWordTokens, normalizeDocumentText } from "../shared/utils/text.util";

export function prepareDocumentText(
  text: string,
  stage: "requirement_extraction" | "candidate_profiling",
  minTokens: number,
  inputLabel: string,
): string {
  const normalized = normalizeDocumentText(typeof text === "string" ? text : "");
  if (!normalized) {
    throw new ExtractionError(stage, "empty_text", `${inputLabel} text is empty`, { input: inputLabel });
  }
  const tokens = countWordTokens(normalized);
  if (tokens < minTokens) {
    throw new ExtractionError(
      stage,
      "too_short",
      `${inputLabel} text has ${tokens} tokens, at least ${minTokens} are required`,
      { input: inputLabel },
    );
  }
  return normalized;
}
