export type PipelineStage =
  | "requirement_extraction"
  | "candidate_profiling"
  | "inference"
  | "scoring"
  | "advisory"
  | "pipeline";

export type EngineErrorKind =
  | "ExtractionError"
  | "InferenceCollaboratorError"
  | "ScoringError"
  | "AnalysisTimeoutError";

export interface EngineErrorJson {
  kind: EngineErrorKind;
  stage: PipelineStage;
  code: string;
  message: string;
  input?: string;
}

interface EngineErrorOptions {
  input?: string;
  cause?: unknown;
}

export abstract class EngineError extends Error {
  abstract readonly kind: EngineErrorKind;
  readonly input?: string;

  protected constructor(
    readonly stage: PipelineStage,
    readonly code: string,
    message: string,
    options?: EngineErrorOptions,
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.input = options?.input;
  }

  toJSON(): EngineErrorJson {
    const json: EngineErrorJson = {
      kind: this.kind,
      stage: this.stage,
      code: this.code,
      message: this.message,
    };
    if (this.input) {
      json.input = this.input;
    }
    return json;
  }
}

/** Input text is empty or too short to build a profile from. Not retried. */
export class ExtractionError extends EngineError {
  readonly kind = "ExtractionError";

  constructor(
    stage: "requirement_extraction" | "candidate_profiling",
    code: "empty_text" | "too_short",
    message: string,
    options?: EngineErrorOptions,
  ) {
    super(stage, code, message, options);
  }
}

export class InferenceCollaboratorError extends EngineError {
  readonly kind = "InferenceCollaboratorError";

  constructor(
    code: "timeout" | "transient_failure" | "collaborator_failure" | "invalid_response",
    message: string,
    options?: EngineErrorOptions,
  ) {
    super("inference", code, message, options);
  }

  get transient(): boolean {
    return this.code === "timeout" || this.code === "transient_failure";
  }
}

/** Profiles handed to the scorer are missing or malformed. Fatal for one pair only. */
export class ScoringError extends EngineError {
  readonly kind = "ScoringError";

  constructor(code: "missing_profile" | "malformed_profile", message: string, options?: EngineErrorOptions) {
    super("scoring", code, message, options);
  }
}

export class AnalysisTimeoutError extends EngineError {
  readonly kind = "AnalysisTimeoutError";

  constructor(timeoutMs: number, options?: EngineErrorOptions) {
    super("pipeline", "timeout", `Analysis did not finish within ${timeoutMs}ms`, options);
  }
}

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

export interface ErrorDescription {
  kind: EngineErrorKind | "InternalError";
  stage: PipelineStage;
  code: string;
  message: string;
  input?: string;
}

/** Serializable form of any thrown value. Non-engine errors are reported as internal. */
export function describeError(error: unknown): ErrorDescription {
  if (isEngineError(error)) {
    return error.toJSON();
  }
  return {
    kind: "InternalError",
    stage: "pipeline",
    code: "internal_error",
    message: errorMessage(error),
  };
}
