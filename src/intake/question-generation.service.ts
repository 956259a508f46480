import { JsonLlmClient, callJsonPromptSafe } from "../ai/llm.safe";
import { buildTechnicalQuestionsV1Prompt } from "../ai/prompts/questions/technical-questions.v1.prompt";
import { Logger, logContext } from "../config/logger";
import { hasTechItems, toTechStackJson } from "../profiles/profile.schemas";
import { GenerationFailure, RateLimitExceeded, errorMessage } from "../shared/errors";
import { TechStack } from "../shared/types/candidate.types";
import { QuestionSet } from "../shared/types/question-set.types";
import { RateLimiter } from "../shared/utils/rate-limit";
import { AdapterCallSettings, QuestionGenerator } from "./intake.ports";
import { buildFallbackQuestionSet, normalizeGeneratedQuestionSet } from "./question-set.guard";

export const QUESTION_GENERATION_KEY = "question_generation";

export class QuestionGenerationService implements QuestionGenerator {
  constructor(
    private readonly llmClient: JsonLlmClient,
    private readonly rateLimiter: RateLimiter,
    private readonly logger: Logger,
    private readonly settings: AdapterCallSettings = {},
  ) {}

  async generate(techStack: TechStack | undefined): Promise<QuestionSet> {
    try {
      return await this.generateFromModel(techStack);
    } catch (error) {
      logContext(
        this.logger,
        "warn",
        "questions.generation.fallback_used",
        {
          adapter: QUESTION_GENERATION_KEY,
          ok: false,
          error_code: error instanceof RateLimitExceeded ? "rate_limited" : "generation_failed",
        },
        { error: errorMessage(error) },
      );
      return buildFallbackQuestionSet(techStack);
    }
  }

  private async generateFromModel(techStack: TechStack | undefined): Promise<QuestionSet> {
    if (!hasTechItems(techStack)) {
      throw new GenerationFailure("Tech stack is empty");
    }
    if (!this.rateLimiter.allow(QUESTION_GENERATION_KEY)) {
      throw new RateLimitExceeded(QUESTION_GENERATION_KEY);
    }

    const safe = await callJsonPromptSafe<Record<string, unknown>>({
      llmClient: this.llmClient,
      logger: this.logger,
      prompt: buildTechnicalQuestionsV1Prompt({ techStackJson: toTechStackJson(techStack) }),
      maxTokens: 1200,
      promptName: "technical_questions_v1",
      schemaHint: "Question set JSON: { questions: [{ topic: string, questions: string[] }] }.",
      ...this.settings,
    });
    if (!safe.ok) {
      throw new GenerationFailure(`Question generation failed: ${safe.error_code}`);
    }
    const set = normalizeGeneratedQuestionSet(safe.data);
    if (!set) {
      throw new GenerationFailure("Question generation returned no usable topics");
    }
    logContext(
      this.logger,
      "info",
      "questions.generation.completed",
      { adapter: QUESTION_GENERATION_KEY, ok: true },
      { topics: set.topics.length },
    );
    return set;
  }
}
