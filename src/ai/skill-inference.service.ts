import { Logger } from "../config/logger";
import { InferenceCollaboratorError, errorMessage } from "../shared/errors";
import { StructuredJsonClient } from "./llm.client";
import { callWithRetry, toCollaboratorError, tryParseJsonObject } from "./llm.safe";
import {
  SkillExtractionDocumentKind,
  buildSkillExtractionV1Prompt,
} from "./prompts/skills/skill-extraction.v1.prompt";

export const INFERENCE_MAX_ATTEMPTS = 2;
const MAX_PROPOSED_TERMS = 40;
const MAX_TERM_LENGTH = 60;

/** Proposes skill terms for a span of text. Results are advisory only. */
export interface SkillInferenceCollaborator {
  proposeTerms(span: string, documentKind: SkillExtractionDocumentKind): Promise<string[]>;
}

export interface InferenceOutcome {
  terms: string[];
  degraded: boolean;
}

export interface SkillInferenceOptions {
  timeoutMs: number;
  backoffMs: number;
  maxAttempts?: number;
  sleep?: (ms: number) => Promise<void>;
}

export class LlmSkillInferenceCollaborator implements SkillInferenceCollaborator {
  constructor(private readonly llmClient: StructuredJsonClient) {}

  async proposeTerms(span: string, documentKind: SkillExtractionDocumentKind): Promise<string[]> {
    const prompt = buildSkillExtractionV1Prompt({ documentKind, span });
    const raw = await this.llmClient.generateStructuredJson(prompt, 400, {
      promptName: "skill_extraction_v1",
    });
    const parsed = tryParseJsonObject(raw);
    if (!parsed.ok) {
      throw new InferenceCollaboratorError("invalid_response", "Skill extraction output is not a JSON object");
    }
    const skills = parsed.data.skills;
    if (!Array.isArray(skills)) {
      throw new InferenceCollaboratorError("invalid_response", "Skill extraction output has no skills array");
    }
    return sanitizeProposedTerms(skills);
  }
}

export class SkillInferenceService {
  constructor(
    private readonly collaborator: SkillInferenceCollaborator | null,
    private readonly logger: Logger,
    private readonly options: SkillInferenceOptions,
  ) {}

  isEnabled(): boolean {
    return this.collaborator !== null;
  }

  /**
   * Never throws. After the last failed attempt the outcome is empty and
   * marked degraded so callers fall back to dictionary-only extraction.
   */
  async propose(span: string, documentKind: SkillExtractionDocumentKind): Promise<InferenceOutcome> {
    const collaborator = this.collaborator;
    if (!collaborator || !span.trim()) {
      return { terms: [], degraded: false };
    }

    const startedAt = Date.now();
    try {
      const terms = await callWithRetry((attempt) => {
        this.logger.debug("inference.attempt", { documentKind, attempt });
        return collaborator.proposeTerms(span, documentKind);
      }, {
        label: `skill inference (${documentKind})`,
        maxAttempts: this.options.maxAttempts ?? INFERENCE_MAX_ATTEMPTS,
        backoffMs: this.options.backoffMs,
        timeoutMs: this.options.timeoutMs,
        logger: this.logger,
        sleep: this.options.sleep,
      });
      return { terms: sanitizeProposedTerms(terms), degraded: false };
    } catch (error) {
      const failure = toCollaboratorError(error, "skill inference");
      this.logger.warn("inference.fallback.dictionary_only", {
        documentKind,
        stage: failure.stage,
        error_code: failure.code,
        latency_ms: Date.now() - startedAt,
        error: errorMessage(failure),
      });
      return { terms: [], degraded: true };
    }
  }
}

function sanitizeProposedTerms(values: ReadonlyArray<unknown>): string[] {
  const seen = new Set<string>();
  const terms: string[] = [];
  for (const value of values) {
    if (typeof value !== "string") {
      continue;
    }
    const term = value.replace(/\s+/g, " ").trim();
    const key = term.toLowerCase();
    if (!term || term.length > MAX_TERM_LENGTH || seen.has(key)) {
      continue;
    }
    seen.add(key);
    terms.push(term);
    if (terms.length >= MAX_PROPOSED_TERMS) {
      break;
    }
  }
  return terms;
}
