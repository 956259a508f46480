import { Logger, logContext } from "../config/logger";
import { AdapterCallSettings, AssistantReplyInput, ReplyComposer } from "../intake/intake.ports";
import { assistantReplyFallbackMessage } from "../chat/messages";
import { RateLimiter } from "../shared/utils/rate-limit";
import { ConversationTurn } from "../shared/types/state.types";
import { CandidateProfile } from "../shared/types/candidate.types";
import { TextLlmClient, callTextPromptSafe } from "./llm.safe";
import { buildAssistantReplyV1Prompt } from "./prompts/conversation/assistant-reply.v1.prompt";

export const ASSISTANT_REPLY_KEY = "assistant_reply";
const HISTORY_TURNS = 6;

export class AssistantReplyService implements ReplyComposer {
  constructor(
    private readonly llmClient: TextLlmClient,
    private readonly rateLimiter: RateLimiter,
    private readonly logger: Logger,
    private readonly settings: AdapterCallSettings = {},
  ) {}

  async compose(input: AssistantReplyInput): Promise<string> {
    if (!this.rateLimiter.allow(ASSISTANT_REPLY_KEY)) {
      logContext(this.logger, "warn", "assistant.reply.rate_limited", {
        adapter: ASSISTANT_REPLY_KEY,
        ok: false,
        error_code: "rate_limited",
      });
      return assistantReplyFallbackMessage();
    }

    const safe = await callTextPromptSafe({
      llmClient: this.llmClient,
      logger: this.logger,
      prompt: buildAssistantReplyV1Prompt({
        history: formatHistory(input.history),
        candidateJson: JSON.stringify(toPromptProfile(input.profile)),
        message: input.message,
        missingFields: input.missingFields,
      }),
      maxTokens: 320,
      promptName: "assistant_reply_v1",
      ...this.settings,
    });
    if (!safe.ok || !safe.text) {
      logContext(this.logger, "warn", "assistant.reply.failed", {
        adapter: ASSISTANT_REPLY_KEY,
        ok: false,
        error_code: safe.ok ? "empty_reply" : safe.error_code,
      });
      return assistantReplyFallbackMessage();
    }
    return safe.text;
  }
}

function formatHistory(history: ReadonlyArray<ConversationTurn>): string {
  return history
    .slice(-HISTORY_TURNS)
    .map((turn) => `User: ${turn.user}\nAssistant: ${turn.assistant}`)
    .join("\n");
}

// Contact details stay out of the prompt.
function toPromptProfile(profile: CandidateProfile): Record<string, unknown> {
  return {
    full_name: profile.fullName ?? null,
    years_experience: profile.yearsExperience ?? null,
    desired_positions: profile.desiredPositions ?? [],
    current_location: profile.currentLocation ?? null,
    tech_stack: profile.techStack ?? null,
    language_preference: profile.languagePreference ?? null,
  };
}
