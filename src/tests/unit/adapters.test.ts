import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { AssistantReplyService } from "../../ai/assistant-reply.service";
import { JsonLlmClient, NO_RETRY_POLICY, TextLlmClient } from "../../ai/llm.safe";
import { SentimentService, parseSentimentLabel } from "../../ai/sentiment.service";
import { createNoopLogger } from "../../config/logger";
import { ProfileExtractionService } from "../../intake/profile-extraction.service";
import { QuestionGenerationService } from "../../intake/question-generation.service";
import { ExtractionFailure, RateLimitExceeded } from "../../shared/errors";
import { RateLimiter } from "../../shared/utils/rate-limit";

const logger = createNoopLogger();
const settings = { retry: NO_RETRY_POLICY };
const openLimiter: RateLimiter = { allow: () => true };
const closedLimiter: RateLimiter = { allow: () => false };

function jsonClient(...responses: string[]): JsonLlmClient {
  return {
    async generateStructuredJson() {
      return responses.shift() ?? "{}";
    },
  };
}

function textClient(reply: string | Error): TextLlmClient {
  return {
    async generateAssistantReply() {
      if (reply instanceof Error) {
        throw reply;
      }
      return reply;
    },
  };
}

const techStack = {
  programming_languages: ["Go"],
  frameworks: [],
  databases: ["Redis"],
  tools: [],
};

describe("ProfileExtractionService", () => {
  it("normalises the model output", async () => {
    const service = new ProfileExtractionService(
      jsonClient('{"full_name": "Jane Doe", "email": "jane@example.com", "phone": null}'),
      openLimiter,
      logger,
      settings,
    );
    assert.deepEqual(await service.extract("I'm Jane", "collect_info"), {
      fullName: "Jane Doe",
      email: "jane@example.com",
    });
  });

  it("raises ExtractionFailure for unusable output", async () => {
    const service = new ProfileExtractionService(jsonClient("nope", "still nope"), openLimiter, logger, settings);
    await assert.rejects(service.extract("hi", "collect_info"), ExtractionFailure);
  });

  it("raises RateLimitExceeded without calling the model", async () => {
    let called = false;
    const client: JsonLlmClient = {
      async generateStructuredJson() {
        called = true;
        return "{}";
      },
    };
    const service = new ProfileExtractionService(client, closedLimiter, logger, settings);
    await assert.rejects(service.extract("hi", "collect_info"), (error: unknown) => {
      assert.ok(error instanceof RateLimitExceeded);
      assert.equal(error.message, "Rate limit exceeded for profile_extraction");
      return true;
    });
    assert.equal(called, false);
  });
});

describe("QuestionGenerationService", () => {
  it("uses well-formed model questions", async () => {
    const service = new QuestionGenerationService(
      jsonClient(
        JSON.stringify({
          questions: [
            { topic: "Go", questions: ["What is a goroutine?", "How do you use context?", "How do you profile?"] },
            { topic: "Redis", questions: ["When would you use a sorted set?", "How does expiry work?", "What is pipelining?"] },
          ],
        }),
      ),
      openLimiter,
      logger,
      settings,
    );
    const set = await service.generate(techStack);
    assert.equal(set.source, "llm");
    assert.deepEqual(
      set.topics.map((topic) => topic.questions.length),
      [3, 3],
    );
  });

  it("falls back on malformed output", async () => {
    const service = new QuestionGenerationService(jsonClient('{"questions": []}'), openLimiter, logger, settings);
    const set = await service.generate(techStack);
    assert.equal(set.source, "fallback");
    assert.deepEqual(
      set.topics.map((topic) => topic.topic),
      ["Go", "Redis"],
    );
  });

  it("falls back when rate limited", async () => {
    const service = new QuestionGenerationService(jsonClient(), closedLimiter, logger, settings);
    const set = await service.generate(techStack);
    assert.equal(set.source, "fallback");
  });

  it("falls back to the generic topic without a tech stack", async () => {
    const service = new QuestionGenerationService(jsonClient(), openLimiter, logger, settings);
    const set = await service.generate(undefined);
    assert.deepEqual(
      set.topics.map((topic) => topic.topic),
      ["Your Experience"],
    );
  });
});

describe("AssistantReplyService", () => {
  const input = {
    history: [],
    profile: { consentToStore: false },
    message: "What happens next?",
    missingFields: [],
  };

  it("returns the model reply", async () => {
    const service = new AssistantReplyService(textClient("We will be in touch."), openLimiter, logger, settings);
    assert.equal(await service.compose(input), "We will be in touch.");
  });

  it("apologises when the model fails", async () => {
    const service = new AssistantReplyService(textClient(new Error("HTTP 500")), openLimiter, logger, settings);
    assert.equal(
      await service.compose(input),
      "I'm sorry, I'm having trouble responding right now. Please try again.",
    );
  });

  it("apologises when rate limited", async () => {
    const service = new AssistantReplyService(textClient("unused"), closedLimiter, logger, settings);
    assert.equal(
      await service.compose(input),
      "I'm sorry, I'm having trouble responding right now. Please try again.",
    );
  });
});

describe("SentimentService", () => {
  it("parses labels loosely", () => {
    assert.equal(parseSentimentLabel(" Positive."), "positive");
    assert.equal(parseSentimentLabel("NEGATIVE"), "negative");
    assert.equal(parseSentimentLabel("mixed"), "neutral");
  });

  it("returns the classified label", async () => {
    const service = new SentimentService(textClient("negative"), openLimiter, logger, settings);
    assert.equal(await service.classify("This is frustrating"), "negative");
  });

  it("defaults to neutral on failure", async () => {
    const service = new SentimentService(textClient(new Error("HTTP 401")), openLimiter, logger, settings);
    assert.equal(await service.classify("Great, thanks"), "neutral");
  });
});
