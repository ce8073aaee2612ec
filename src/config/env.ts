import dotenv from "dotenv";
import { LogLevel, isLogLevel } from "./logger";

dotenv.config();

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  logLevel: LogLevel;
  openaiApiKey?: string;
  openaiChatModel: string;
  inferenceEnabled: boolean;
  inferenceTimeoutMs: number;
  inferenceBackoffMs: number;
  analysisTimeoutMs: number;
  matchingConfigPath: string;
  skillDictionaryPath: string;
}

type EnvSource = Record<string, string | undefined>;

function getOptionalTrimmed(source: EnvSource, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: EnvSource = process.env): EnvConfig {
  const portRaw = source.PORT ?? "3000";
  const port = Number(portRaw);
  const logLevelRaw = (source.LOG_LEVEL ?? "info").trim().toLowerCase();
  const inferenceEnabledRaw = source.INFERENCE_ENABLED ?? "true";
  const inferenceTimeoutRaw = source.INFERENCE_TIMEOUT_MS ?? "8000";
  const inferenceBackoffRaw = source.INFERENCE_BACKOFF_MS ?? "250";
  const analysisTimeoutRaw = source.ANALYSIS_TIMEOUT_MS ?? "30000";
  const inferenceTimeoutMs = Number(inferenceTimeoutRaw);
  const inferenceBackoffMs = Number(inferenceBackoffRaw);
  const analysisTimeoutMs = Number(analysisTimeoutRaw);
  const openaiApiKey = getOptionalTrimmed(source, "OPENAI_API_KEY");

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!isLogLevel(logLevelRaw)) {
    throw new Error(`Invalid LOG_LEVEL value: ${logLevelRaw}`);
  }
  if (!Number.isInteger(inferenceTimeoutMs) || inferenceTimeoutMs <= 0) {
    throw new Error(`Invalid INFERENCE_TIMEOUT_MS value: ${inferenceTimeoutRaw}`);
  }
  if (!Number.isInteger(inferenceBackoffMs) || inferenceBackoffMs < 0) {
    throw new Error(`Invalid INFERENCE_BACKOFF_MS value: ${inferenceBackoffRaw}`);
  }
  if (!Number.isInteger(analysisTimeoutMs) || analysisTimeoutMs <= 0) {
    throw new Error(`Invalid ANALYSIS_TIMEOUT_MS value: ${analysisTimeoutRaw}`);
  }

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    port,
    logLevel: logLevelRaw,
    openaiApiKey,
    openaiChatModel: getOptionalTrimmed(source, "OPENAI_CHAT_MODEL") ?? "gpt-4o-mini",
    inferenceEnabled: parseBoolean(inferenceEnabledRaw) && Boolean(openaiApiKey),
    inferenceTimeoutMs,
    inferenceBackoffMs,
    analysisTimeoutMs,
    matchingConfigPath: getOptionalTrimmed(source, "MATCHING_CONFIG_PATH") ?? "config/matching.config.json",
    skillDictionaryPath: getOptionalTrimmed(source, "SKILL_DICTIONARY_PATH") ?? "config/skill-dictionary.json",
  };
}

function parseBoolean(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  throw new Error(`Invalid boolean value: ${value}`);
}
