import express, { Express, NextFunction, Request, Response } from "express";
import { AssistantReplyService } from "./ai/assistant-reply.service";
import { LlmClient } from "./ai/llm.client";
import { buildRetryPolicy } from "./ai/llm.safe";
import { SentimentService } from "./ai/sentiment.service";
import { EnvConfig } from "./config/env";
import { createLogger, Logger } from "./config/logger";
import { buildSessionController } from "./http/session.controller";
import { IntakeEngine } from "./intake/intake.engine";
import {
  AdapterCallSettings,
  CandidateStore,
  ProfileExtractor,
  QuestionGenerator,
  ReplyComposer,
  SentimentClassifier,
} from "./intake/intake.ports";
import { IntakeService } from "./intake/intake.service";
import { ProfileExtractionService } from "./intake/profile-extraction.service";
import { QuestionGenerationService } from "./intake/question-generation.service";
import { errorMessage } from "./shared/errors";
import { RateLimiter, SlidingWindowRateLimiter } from "./shared/utils/rate-limit";
import { StateService } from "./state/state.service";
import { CandidateStorageService } from "./storage/candidate-storage.service";

export interface AppContext {
  app: Express;
  logger: Logger;
  intakeService: IntakeService;
  stateService: StateService;
}

/** Collaborators that tests and the simulation script replace. */
export interface AppOverrides {
  logger?: Logger;
  rateLimiter?: RateLimiter;
  extractor?: ProfileExtractor;
  questionGenerator?: QuestionGenerator;
  replyComposer?: ReplyComposer;
  sentimentClassifier?: SentimentClassifier;
  candidateStore?: CandidateStore;
  stateService?: StateService;
}

export function createApp(env: EnvConfig, overrides: AppOverrides = {}): AppContext {
  const logger =
    overrides.logger ??
    createLogger({
      minLevel: env.logLevel,
      file: env.logFile ? { path: env.logFile } : undefined,
    });
  const app = express();

  app.use(express.json({ limit: "256kb" }));

  const rateLimiter =
    overrides.rateLimiter ??
    new SlidingWindowRateLimiter({
      enabled: env.rateLimitEnabled,
      maxRequests: env.rateLimitRequests,
      windowMs: env.rateLimitPeriodSec * 1000,
    });
  const adapterSettings: AdapterCallSettings = {
    timeoutMs: env.llmTimeoutMs,
    retry: buildRetryPolicy(env.llmMaxAttempts),
  };

  let llmClient: LlmClient | undefined;
  const getLlmClient = (): LlmClient => {
    llmClient ??= new LlmClient(
      {
        apiKey: env.openaiApiKey,
        baseUrl: env.openaiBaseUrl,
        model: env.openaiChatModel,
        temperature: env.modelTemperature,
      },
      logger,
    );
    return llmClient;
  };

  const engine = new IntakeEngine(
    {
      extractor:
        overrides.extractor ?? new ProfileExtractionService(getLlmClient(), rateLimiter, logger, adapterSettings),
      questionGenerator:
        overrides.questionGenerator ??
        new QuestionGenerationService(getLlmClient(), rateLimiter, logger, adapterSettings),
      replyComposer:
        overrides.replyComposer ?? new AssistantReplyService(getLlmClient(), rateLimiter, logger, adapterSettings),
      sentimentClassifier:
        overrides.sentimentClassifier ?? new SentimentService(getLlmClient(), rateLimiter, logger, adapterSettings),
      candidateStore: overrides.candidateStore ?? new CandidateStorageService(env.dataDir, logger),
      logger,
    },
    {
      maxConsecutiveErrors: env.maxConsecutiveErrors,
      maxMessageLength: env.maxMessageLength,
      maxAnswerLength: env.maxAnswerLength,
    },
  );
  const stateService = overrides.stateService ?? new StateService();
  const intakeService = new IntakeService(stateService, engine, logger);

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({ ok: true });
  });

  app.use("/sessions", buildSessionController({ intakeService, logger }));

  app.use((error: unknown, _request: Request, response: Response, next: NextFunction) => {
    if (response.headersSent) {
      next(error);
      return;
    }
    if (isBodyParseError(error)) {
      response.status(400).json({ ok: false, error: "Invalid JSON body" });
      return;
    }
    logger.error("http.unhandled_error", { error: errorMessage(error) });
    response.status(500).json({ ok: false, error: "Internal server error" });
  });

  return { app, logger, intakeService, stateService };
}

function isBodyParseError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "type" in error &&
    error.type === "entity.parse.failed"
  );
}
