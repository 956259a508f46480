import assert from "node:assert/strict";
import { describe, it } from "node:test";
import {
  buildFallbackQuestionSet,
  flattenTechStack,
  normalizeGeneratedQuestionSet,
} from "../../intake/question-set.guard";

describe("buildFallbackQuestionSet", () => {
  it("returns one generic topic for an empty stack", () => {
    const set = buildFallbackQuestionSet({});
    assert.equal(set.source, "fallback");
    assert.equal(set.topics.length, 1);
    assert.equal(set.topics[0]?.topic, "Your Experience");
    assert.deepEqual(set.topics[0]?.questions, [
      "Describe your most challenging project.",
      "How do you approach learning new technologies?",
      "What's your experience with team collaboration?",
      "How do you ensure code quality?",
    ]);
  });

  it("caps at five technologies with four template questions each", () => {
    const set = buildFallbackQuestionSet({
      programming_languages: ["Python", "Go", "Rust"],
      frameworks: ["Django"],
      databases: ["Redis", "Python"],
      tools: ["Docker"],
    });
    assert.deepEqual(
      set.topics.map((topic) => topic.topic),
      ["Python", "Go", "Rust", "Django", "Redis"],
    );
    assert.deepEqual(set.topics[1]?.questions, [
      "Describe your experience with Go.",
      "What are the key features of Go?",
      "How do you debug issues in Go?",
      "Give an example project using Go.",
    ]);
  });

  it("freezes the generated set", () => {
    const set = buildFallbackQuestionSet(undefined);
    assert.equal(Object.isFrozen(set), true);
    assert.equal(Object.isFrozen(set.topics), true);
    assert.equal(Object.isFrozen(set.topics[0]?.questions), true);
  });
});

describe("flattenTechStack", () => {
  it("keeps category order and drops duplicates", () => {
    assert.deepEqual(
      flattenTechStack({ programming_languages: ["TypeScript"], tools: ["Git", "TypeScript", " "] }),
      ["TypeScript", "Git"],
    );
  });
});

describe("normalizeGeneratedQuestionSet", () => {
  it("keeps well-formed topics", () => {
    const set = normalizeGeneratedQuestionSet({
      questions: [
        { topic: "Go", questions: ["What is a goroutine?", " ", 42, "How do channels block?"] },
        { topic: "", questions: ["orphan"] },
        { topic: "Redis", questions: [] },
      ],
    });
    assert.ok(set);
    assert.equal(set.source, "llm");
    assert.deepEqual(set.topics, [{ topic: "Go", questions: ["What is a goroutine?", "How do channels block?"] }]);
  });

  it("returns null when nothing usable remains", () => {
    assert.equal(normalizeGeneratedQuestionSet({ questions: [] }), null);
    assert.equal(normalizeGeneratedQuestionSet({ topics: [] }), null);
    assert.equal(normalizeGeneratedQuestionSet("Go"), null);
  });
});
