import { JsonLlmClient, callJsonPromptSafe } from "../ai/llm.safe";
import { buildProfileExtractionV1Prompt } from "../ai/prompts/candidate/profile-extraction.v1.prompt";
import { Logger, logContext } from "../config/logger";
import { normalizeExtractedFields } from "../profiles/profile.schemas";
import { ExtractionFailure, RateLimitExceeded } from "../shared/errors";
import { ExtractedProfileFields } from "../shared/types/candidate.types";
import { ConversationStep } from "../shared/types/state.types";
import { RateLimiter } from "../shared/utils/rate-limit";
import { AdapterCallSettings, ProfileExtractor } from "./intake.ports";

export const PROFILE_EXTRACTION_KEY = "profile_extraction";

export class ProfileExtractionService implements ProfileExtractor {
  constructor(
    private readonly llmClient: JsonLlmClient,
    private readonly rateLimiter: RateLimiter,
    private readonly logger: Logger,
    private readonly settings: AdapterCallSettings = {},
  ) {}

  async extract(message: string, step: ConversationStep): Promise<ExtractedProfileFields> {
    if (!this.rateLimiter.allow(PROFILE_EXTRACTION_KEY)) {
      throw new RateLimitExceeded(PROFILE_EXTRACTION_KEY);
    }

    const startedAt = Date.now();
    const safe = await callJsonPromptSafe<Record<string, unknown>>({
      llmClient: this.llmClient,
      logger: this.logger,
      prompt: buildProfileExtractionV1Prompt({ message, step }),
      maxTokens: 600,
      promptName: "profile_extraction_v1",
      schemaHint:
        "Candidate patch JSON with optional keys full_name, email, phone, years_experience, desired_positions, current_location, tech_stack, language_preference.",
      ...this.settings,
    });
    if (!safe.ok) {
      logContext(this.logger, "warn", "profile.extraction.failed", {
        adapter: PROFILE_EXTRACTION_KEY,
        step,
        latency_ms: Date.now() - startedAt,
        ok: false,
        error_code: safe.error_code,
      });
      throw new ExtractionFailure(`Profile extraction failed: ${safe.error_code}`);
    }

    const fields = normalizeExtractedFields(safe.data);
    if (!fields) {
      throw new ExtractionFailure("Profile extraction returned a non-object payload");
    }
    logContext(
      this.logger,
      "debug",
      "profile.extraction.completed",
      {
        adapter: PROFILE_EXTRACTION_KEY,
        step,
        latency_ms: Date.now() - startedAt,
        ok: true,
      },
      { fields: Object.keys(fields) },
    );
    return fields;
  }
}
