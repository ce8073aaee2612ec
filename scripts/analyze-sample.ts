import { readFile } from "node:fs/promises";
import path from "node:path";
import { createApp } from "../src/app";
import { loadEnv } from "../src/config/env";
import { loadMatchingConfig } from "../src/config/matching-config";

const SAMPLES_DIR = path.resolve(__dirname, "samples");

async function main(): Promise<void> {
  const [jobPath, cvPath] = process.argv.slice(2);
  const env = loadEnv();
  const matchingConfig = await loadMatchingConfig({
    settingsPath: path.resolve(env.matchingConfigPath),
    dictionaryPath: path.resolve(env.skillDictionaryPath),
  });
  const { pipeline, logger } = createApp(env, matchingConfig);

  const [jobText, cvText] = await Promise.all([
    readFile(jobPath ?? path.join(SAMPLES_DIR, "job-posting.txt"), "utf8"),
    readFile(cvPath ?? path.join(SAMPLES_DIR, "cv.txt"), "utf8"),
  ]);

  const result = await pipeline.analyze(
    { job: { text: jobText }, candidate: { text: cvText } },
    { timeoutMs: env.analysisTimeoutMs, requestId: "sample" },
  );
  logger.info("analyze.sample.completed", {
    overall_score: result.report.overall_score,
    inference_enabled: env.inferenceEnabled,
  });
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(result, null, 2));
}

void main().catch((error) => {
  // eslint-disable-next-line no-console
  console.error("[analyze:sample] failed", error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
