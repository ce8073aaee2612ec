import path from "node:path";
import { createApp } from "./app";
import { loadEnv } from "./config/env";
import { loadMatchingConfig } from "./config/matching-config";

async function bootstrap(): Promise<void> {
  const env = loadEnv();
  const matchingConfig = await loadMatchingConfig({
    settingsPath: path.resolve(env.matchingConfigPath),
    dictionaryPath: path.resolve(env.skillDictionaryPath),
  });
  const { app, pipeline, logger } = createApp(env, matchingConfig);

  app.listen(env.port, () => {
    logger.info("Server started", { port: env.port });
    logger.info("Matching config loaded", {
      configVersion: pipeline.configVersion,
      dictionaryVersion: pipeline.dictionaryVersion,
      skills: matchingConfig.dictionary.skills.length,
    });
    logger.info("Skill inference", {
      enabled: env.inferenceEnabled,
      modelName: env.inferenceEnabled ? env.openaiChatModel : undefined,
    });
  });
}

bootstrap().catch((error: unknown) => {
  process.stderr.write(`Failed to start: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
