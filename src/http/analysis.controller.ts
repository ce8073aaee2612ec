import { randomUUID } from "node:crypto";
import { NextFunction, Request, Response, Router } from "express";
import { Logger, logContext } from "../config/logger";
import { AnalysisPair, CompatibilityPipeline } from "../matching/compatibility.pipeline";
import {
  AnalysisTimeoutError,
  ErrorDescription,
  ExtractionError,
  ScoringError,
  describeError,
} from "../shared/errors";
import { CandidateDocumentInput, JobPostingInput } from "../shared/types/profile.types";

export const MAX_BATCH_PAIRS = 50;

interface AnalysisControllerDeps {
  pipeline: CompatibilityPipeline;
  logger: Logger;
  analysisTimeoutMs: number;
  inferenceEnabled: boolean;
}

interface InvalidRequestDescription {
  kind: "InvalidRequestError";
  stage: "request";
  code: "invalid_body";
  message: string;
}

type HttpErrorDescription = ErrorDescription | InvalidRequestDescription;

/** The request body does not have the expected shape. */
export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidRequestError";
  }
}

type JsonHandler = (request: Request, requestId: string) => Promise<Record<string, unknown>> | Record<string, unknown>;

export function buildAnalysisController(deps: AnalysisControllerDeps): Router {
  const router = Router();

  router.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({
      ok: true,
      dictionary_version: deps.pipeline.dictionaryVersion,
      config_version: deps.pipeline.configVersion,
      inference_enabled: deps.inferenceEnabled,
    });
  });

  router.post(
    "/profiles/job",
    jsonRoute(deps, "profiles.job", async (request, requestId) => {
      const input = parseJobInput(requireRecord(request.body, "body"), "body");
      return { profile: await deps.pipeline.buildJobProfile(input, { request_id: requestId }) };
    }),
  );

  router.post(
    "/profiles/candidate",
    jsonRoute(deps, "profiles.candidate", async (request, requestId) => {
      const input = parseCandidateInput(requireRecord(request.body, "body"), "body");
      return { profile: await deps.pipeline.buildCandidateProfile(input, { request_id: requestId }) };
    }),
  );

  router.post(
    "/reports",
    jsonRoute(deps, "reports", (request) => {
      const body = requireRecord(request.body, "body");
      return { report: deps.pipeline.scoreSubmittedProfiles(body.job_profile, body.candidate_profile) };
    }),
  );

  router.post(
    "/analyses",
    jsonRoute(deps, "analyses", async (request, requestId) => {
      const pair = parsePair(requireRecord(request.body, "body"), "body");
      const result = await deps.pipeline.analyze(pair, {
        timeoutMs: deps.analysisTimeoutMs,
        requestId,
      });
      return { result };
    }),
  );

  router.post(
    "/analyses/batch",
    jsonRoute(deps, "analyses.batch", async (request, requestId) => {
      const body = requireRecord(request.body, "body");
      if (!Array.isArray(body.pairs)) {
        throw new InvalidRequestError("body.pairs must be an array");
      }
      if (body.pairs.length > MAX_BATCH_PAIRS) {
        throw new InvalidRequestError(`body.pairs accepts at most ${MAX_BATCH_PAIRS} pairs`);
      }
      const pairs = body.pairs.map((item: unknown, index: number) =>
        parsePair(requireRecord(item, `body.pairs[${index}]`), `body.pairs[${index}]`),
      );
      const results = await deps.pipeline.analyzeBatch(pairs, {
        timeoutMs: deps.analysisTimeoutMs,
        requestId,
      });
      return { results };
    }),
  );

  return router;
}

/** Express error middleware for bodies that express.json() could not parse. */
export function handleBodyParseError(logger: Logger) {
  return (error: unknown, _request: Request, response: Response, next: NextFunction): void => {
    if (!(error instanceof SyntaxError)) {
      next(error);
      return;
    }
    logger.warn("http.body.parse_failed", { error: error.message });
    response.status(400).json({ ok: false, error: invalidRequest("Request body is not valid JSON") });
  };
}

export function httpStatusFor(error: unknown): number {
  if (error instanceof InvalidRequestError) {
    return 400;
  }
  if (error instanceof ExtractionError || error instanceof ScoringError) {
    return 422;
  }
  if (error instanceof AnalysisTimeoutError) {
    return 504;
  }
  return 500;
}

function jsonRoute(deps: AnalysisControllerDeps, route: string, handler: JsonHandler) {
  return async (request: Request, response: Response): Promise<void> => {
    const startedAt = Date.now();
    const requestId = request.header("x-request-id")?.trim() || randomUUID();
    try {
      const payload = await handler(request, requestId);
      logContext(deps.logger, "info", "http.request.completed", {
        request_id: requestId,
        route,
        latency_ms: Date.now() - startedAt,
        ok: true,
      });
      response.status(200).json({ ok: true, ...payload });
    } catch (error) {
      const status = httpStatusFor(error);
      const description = describeHttpError(error);
      logContext(
        deps.logger,
        status >= 500 ? "error" : "warn",
        "http.request.failed",
        {
          request_id: requestId,
          route,
          stage: description.stage,
          latency_ms: Date.now() - startedAt,
          ok: false,
          error_code: description.code,
        },
        { status, error: description.message },
      );
      response.status(status).json({ ok: false, error: description });
    }
  };
}

function describeHttpError(error: unknown): HttpErrorDescription {
  if (error instanceof InvalidRequestError) {
    return invalidRequest(error.message);
  }
  const description = describeError(error);
  if (description.kind === "InternalError") {
    return { ...description, message: "Internal error" };
  }
  return description;
}

function invalidRequest(message: string): InvalidRequestDescription {
  return { kind: "InvalidRequestError", stage: "request", code: "invalid_body", message };
}

function requireRecord(value: unknown, field: string): Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new InvalidRequestError(`${field} must be a JSON object`);
  }
  return { ...value };
}

function parsePair(body: Record<string, unknown>, field: string): AnalysisPair {
  return {
    job: parseJobInput(requireRecord(body.job, `${field}.job`), `${field}.job`),
    candidate: parseCandidateInput(requireRecord(body.candidate, `${field}.candidate`), `${field}.candidate`),
  };
}

function parseJobInput(body: Record<string, unknown>, field: string): JobPostingInput {
  return {
    text: requireText(body.text, `${field}.text`),
    job_title: optionalText(body.job_title, `${field}.job_title`),
    company: optionalText(body.company, `${field}.company`),
  };
}

function parseCandidateInput(body: Record<string, unknown>, field: string): CandidateDocumentInput {
  const skills = body.skills;
  if (skills === undefined || skills === null) {
    return { text: requireText(body.text, `${field}.text`) };
  }
  if (!Array.isArray(skills) || skills.some((item) => typeof item !== "string")) {
    throw new InvalidRequestError(`${field}.skills must be an array of strings`);
  }
  return {
    text: requireText(body.text, `${field}.text`),
    skills: skills.filter((item): item is string => typeof item === "string"),
  };
}

/** Empty strings are accepted here; the extractor reports them as ExtractionError. */
function requireText(value: unknown, field: string): string {
  if (typeof value !== "string") {
    throw new InvalidRequestError(`${field} must be a string`);
  }
  return value;
}

function optionalText(value: unknown, field: string): string | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== "string") {
    throw new InvalidRequestError(`${field} must be a string`);
  }
  return value;
}
