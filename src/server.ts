import { createApp } from "./app";
import { INTAKE_SYSTEM_PROMPT } from "./ai/system/intake.system";
import { loadEnv } from "./config/env";

async function bootstrap(): Promise<void> {
  const env = loadEnv();
  const { app, logger, stateService } = createApp(env);

  const idleTtlMs = env.sessionIdleTtlMinutes * 60_000;
  setInterval(() => {
    const evicted = stateService.evictIdle(idleTtlMs);
    if (evicted.length) {
      logger.info("intake.sessions.evicted", { count: evicted.length });
    }
  }, env.sessionSweepIntervalMinutes * 60_000);

  app.listen(env.port, () => {
    logger.info("Server started", { port: env.port });
    logger.info(`LLM chat model: ${env.openaiChatModel}`);
    logger.info("LLM system prompt loaded", { length: INTAKE_SYSTEM_PROMPT.length });
    logger.info("RATE_LIMITING", {
      enabled: env.rateLimitEnabled,
      requests: env.rateLimitRequests,
      periodSec: env.rateLimitPeriodSec,
    });
    logger.info("Session sweep started", {
      idleTtlMinutes: env.sessionIdleTtlMinutes,
      intervalMinutes: env.sessionSweepIntervalMinutes,
    });
  });
}

void bootstrap();
