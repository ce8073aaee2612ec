import express, { Express } from "express";
import { LlmClient } from "./ai/llm.client";
import {
  LlmSkillInferenceCollaborator,
  SkillInferenceCollaborator,
  SkillInferenceService,
} from "./ai/skill-inference.service";
import { EnvConfig } from "./config/env";
import { createLogger, Logger } from "./config/logger";
import { MatchingConfig } from "./config/matching-config";
import { buildAnalysisController, handleBodyParseError } from "./http/analysis.controller";
import { CompatibilityPipeline } from "./matching/compatibility.pipeline";

export interface AppContext {
  app: Express;
  pipeline: CompatibilityPipeline;
  logger: Logger;
}

export interface AppOverrides {
  logger?: Logger;
  /** Replaces the OpenAI-backed collaborator; null disables inference. */
  collaborator?: SkillInferenceCollaborator | null;
  sleep?: (ms: number) => Promise<void>;
  referenceYear?: number;
}

export function createApp(env: EnvConfig, matchingConfig: MatchingConfig, overrides: AppOverrides = {}): AppContext {
  const logger = overrides.logger ?? createLogger({ minLevel: env.logLevel });
  const app = express();

  app.use(express.json({ limit: "2mb" }));

  const collaborator = resolveCollaborator(env, logger, overrides);
  const inference = new SkillInferenceService(collaborator, logger, {
    timeoutMs: env.inferenceTimeoutMs,
    backoffMs: env.inferenceBackoffMs,
    sleep: overrides.sleep,
  });
  const pipeline = new CompatibilityPipeline(matchingConfig, inference, logger, {
    referenceYear: overrides.referenceYear,
  });

  app.use(
    buildAnalysisController({
      pipeline,
      logger,
      analysisTimeoutMs: env.analysisTimeoutMs,
      inferenceEnabled: inference.isEnabled(),
    }),
  );
  app.use(handleBodyParseError(logger));

  return { app, pipeline, logger };
}

function resolveCollaborator(
  env: EnvConfig,
  logger: Logger,
  overrides: AppOverrides,
): SkillInferenceCollaborator | null {
  if (overrides.collaborator !== undefined) {
    return overrides.collaborator;
  }
  if (!env.inferenceEnabled || !env.openaiApiKey) {
    return null;
  }
  return new LlmSkillInferenceCollaborator(new LlmClient(env.openaiApiKey, logger, env.openaiChatModel));
}
