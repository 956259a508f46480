import { Logger, logContext } from "../config/logger";
import { AdapterCallSettings, SentimentClassifier } from "../intake/intake.ports";
import { RateLimiter } from "../shared/utils/rate-limit";
import { SentimentLabel } from "../shared/types/state.types";
import { TextLlmClient, callTextPromptSafe } from "./llm.safe";
import { buildSentimentV1Prompt } from "./prompts/conversation/sentiment.v1.prompt";

export const SENTIMENT_KEY = "sentiment";

const LABELS: ReadonlyArray<SentimentLabel> = ["positive", "neutral", "negative"];

export class SentimentService implements SentimentClassifier {
  constructor(
    private readonly llmClient: TextLlmClient,
    private readonly rateLimiter: RateLimiter,
    private readonly logger: Logger,
    private readonly settings: AdapterCallSettings = {},
  ) {}

  async classify(message: string): Promise<SentimentLabel> {
    if (!message.trim() || !this.rateLimiter.allow(SENTIMENT_KEY)) {
      return "neutral";
    }
    const safe = await callTextPromptSafe({
      llmClient: this.llmClient,
      logger: this.logger,
      prompt: buildSentimentV1Prompt({ message }),
      maxTokens: 5,
      promptName: "sentiment_v1",
      ...this.settings,
    });
    if (!safe.ok) {
      logContext(this.logger, "debug", "sentiment.classification.failed", {
        adapter: SENTIMENT_KEY,
        ok: false,
        error_code: safe.error_code,
      });
      return "neutral";
    }
    return parseSentimentLabel(safe.text);
  }
}

export function parseSentimentLabel(raw: string): SentimentLabel {
  const normalized = raw.trim().toLowerCase().replace(/[^a-z]/g, "");
  return LABELS.find((label) => label === normalized) ?? "neutral";
}
