import { AssistantReplyService } from "../src/ai/assistant-reply.service";
import { JsonLlmClient, NO_RETRY_POLICY, TextLlmClient } from "../src/ai/llm.safe";
import { SentimentService } from "../src/ai/sentiment.service";
import { createLogger } from "../src/config/logger";
import { IntakeEngine } from "../src/intake/intake.engine";
import { CandidateStore } from "../src/intake/intake.ports";
import { IntakeService } from "../src/intake/intake.service";
import { ProfileExtractionService } from "../src/intake/profile-extraction.service";
import { QuestionGenerationService } from "../src/intake/question-generation.service";
import { SlidingWindowRateLimiter } from "../src/shared/utils/rate-limit";
import { StateService } from "../src/state/state.service";

/**
 * Offline walk through a full intake. The model is replaced by scripted
 * JSON keyed by prompt name, so the safe-call layer still runs end to end.
 */
class ScriptedLlmClient implements JsonLlmClient, TextLlmClient {
  private readonly queues = new Map<string, string[]>();

  script(promptName: string, responses: string[]): void {
    this.queues.set(promptName, [...responses]);
  }

  async generateStructuredJson(_prompt: string, _maxTokens: number, options?: { promptName?: string }): Promise<string> {
    return this.next(options?.promptName ?? "", "{}");
  }

  async generateAssistantReply(_prompt: string, _maxTokens?: number, options?: { promptName?: string }): Promise<string> {
    return this.next(options?.promptName ?? "", "neutral");
  }

  private next(promptName: string, fallback: string): string {
    return this.queues.get(promptName)?.shift() ?? fallback;
  }
}

const memoryStore: CandidateStore = {
  async store(profile) {
    return profile.consentToStore ? "candidate_simulated" : null;
  },
};

async function run(): Promise<void> {
  const logger = createLogger({ minLevel: "warn" });
  const llm = new ScriptedLlmClient();
  llm.script("profile_extraction_v1", [
    JSON.stringify({ full_name: "Sample Candidate", email: "sample@example.com" }),
    JSON.stringify({ phone: "+1 555 010 0199" }),
    "{}",
    JSON.stringify({ desired_positions: ["Backend Engineer"] }),
    JSON.stringify({ current_location: "Lisbon" }),
    "```json\n{\"tech_stack\": {\"programming_languages\": [\"TypeScript\"], \"databases\": [\"PostgreSQL\"]}}\n```",
  ]);
  llm.script("technical_questions_v1", ["not json at all"]);
  llm.script("technical_questions_v1_json_repair", ["still not json"]);

  const rateLimiter = new SlidingWindowRateLimiter({ enabled: true, maxRequests: 50, windowMs: 60_000 });
  const settings = { retry: NO_RETRY_POLICY };
  const engine = new IntakeEngine(
    {
      extractor: new ProfileExtractionService(llm, rateLimiter, logger, settings),
      questionGenerator: new QuestionGenerationService(llm, rateLimiter, logger, settings),
      replyComposer: new AssistantReplyService(llm, rateLimiter, logger, settings),
      sentimentClassifier: new SentimentService(llm, rateLimiter, logger, settings),
      candidateStore: memoryStore,
      logger,
    },
    { maxConsecutiveErrors: 3, maxMessageLength: 1000, maxAnswerLength: 5000 },
  );
  const service = new IntakeService(new StateService(), engine, logger);

  const started = service.start();
  process.stdout.write(`assistant: ${started.reply}\n`);
  await service.setConsent(started.sessionId, true);

  const messages = [
    "Hi, I'm Sample Candidate, sample@example.com",
    "My phone is +1 555 010 0199",
    "I worked at a studio from 2016 to 2022",
    "Backend Engineer roles please",
    "I live in Lisbon",
    "TypeScript and PostgreSQL mostly",
    "Answer one",
    "Answer two",
    "That's all from me, bye",
  ];
  for (const text of messages) {
    const result = await service.handleMessage(started.sessionId, text);
    process.stdout.write(`user: ${text}\n`);
    process.stdout.write(`assistant [${result.step} ${result.progress}%]: ${result.reply}\n`);
    for (const warning of result.warnings) {
      process.stdout.write(`  warning: ${warning}\n`);
    }
    if (result.candidateId) {
      process.stdout.write(`  stored as ${result.candidateId}\n`);
    }
  }
}

void run();
