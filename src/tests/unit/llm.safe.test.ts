import assert from "node:assert/strict";
import { describe, it } from "node:test";
import {
  JsonLlmClient,
  NO_RETRY_POLICY,
  buildRetryPolicy,
  callJsonPromptSafe,
  callTextPromptSafe,
  tryParseJsonObject,
} from "../../ai/llm.safe";

function scriptedJsonClient(responses: Array<string | Error>): JsonLlmClient & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    async generateStructuredJson(_prompt, _maxTokens, options) {
      calls.push(options?.promptName ?? "");
      const next = responses.shift();
      if (next instanceof Error) {
        throw next;
      }
      return next ?? "{}";
    },
  };
}

describe("tryParseJsonObject", () => {
  it("accepts fenced and noisy JSON objects", () => {
    assert.deepEqual(tryParseJsonObject('```json\n{"a": 1}\n```'), { ok: true, data: { a: 1 } });
    assert.deepEqual(tryParseJsonObject('Sure! {"a": {"b": 2}} hope that helps'), {
      ok: true,
      data: { a: { b: 2 } },
    });
  });

  it("rejects arrays, scalars and broken JSON", () => {
    assert.deepEqual(tryParseJsonObject("[1, 2]"), { ok: false });
    assert.deepEqual(tryParseJsonObject("42"), { ok: false });
    assert.deepEqual(tryParseJsonObject("{broken"), { ok: false });
  });
});

describe("buildRetryPolicy", () => {
  it("doubles the backoff between attempts", () => {
    assert.deepEqual(buildRetryPolicy(3), { maxAttempts: 3, backoffMs: [1_000, 2_000] });
    assert.deepEqual(buildRetryPolicy(0), { maxAttempts: 1, backoffMs: [] });
  });
});

describe("callJsonPromptSafe", () => {
  it("retries transient errors with the configured backoff", async () => {
    const waits: number[] = [];
    const client = scriptedJsonClient([new Error("HTTP 503 upstream"), new Error("socket ECONNRESET"), '{"ok": true}']);
    const result = await callJsonPromptSafe({
      llmClient: client,
      prompt: "p",
      maxTokens: 100,
      promptName: "probe",
      schemaHint: "probe",
      retry: { maxAttempts: 3, backoffMs: [5, 10] },
      sleep: async (ms) => {
        waits.push(ms);
      },
    });
    assert.deepEqual(result, { ok: true, data: { ok: true } });
    assert.deepEqual(waits, [5, 10]);
    assert.equal(client.calls.length, 3);
  });

  it("does not retry non-transient errors", async () => {
    const client = scriptedJsonClient([new Error("HTTP 401 unauthorized"), '{"ok": true}']);
    const result = await callJsonPromptSafe({
      llmClient: client,
      prompt: "p",
      maxTokens: 100,
      promptName: "probe",
      schemaHint: "probe",
      sleep: async () => undefined,
    });
    assert.deepEqual(result, { ok: false, error_code: "llm_failure" });
    assert.equal(client.calls.length, 1);
  });

  it("reports the last transient error once attempts run out", async () => {
    const client = scriptedJsonClient([new Error("HTTP 429 rate limit"), new Error("HTTP 429 rate limit")]);
    const result = await callJsonPromptSafe({
      llmClient: client,
      prompt: "p",
      maxTokens: 100,
      promptName: "probe",
      schemaHint: "probe",
      retry: { maxAttempts: 2, backoffMs: [1] },
      sleep: async () => undefined,
    });
    assert.deepEqual(result, { ok: false, error_code: "transient_failure" });
  });

  it("runs one repair pass for unparseable output", async () => {
    const client = scriptedJsonClient(["not json", '{"fixed": 1}']);
    const result = await callJsonPromptSafe({
      llmClient: client,
      prompt: "p",
      maxTokens: 100,
      promptName: "probe",
      schemaHint: "probe",
      retry: NO_RETRY_POLICY,
    });
    assert.deepEqual(result, { ok: true, data: { fixed: 1 } });
    assert.deepEqual(client.calls, ["probe", "probe_json_repair"]);
  });

  it("fails when the repair pass is still not JSON", async () => {
    const client = scriptedJsonClient(["not json", "still not json"]);
    const result = await callJsonPromptSafe({
      llmClient: client,
      prompt: "p",
      maxTokens: 100,
      promptName: "probe",
      schemaHint: "probe",
      retry: NO_RETRY_POLICY,
    });
    assert.deepEqual(result, { ok: false, error_code: "json_parse_failed", raw: "still not json" });
  });

  it("applies the validator", async () => {
    const client = scriptedJsonClient(['{"label": 3}']);
    const result = await callJsonPromptSafe({
      llmClient: client,
      prompt: "p",
      maxTokens: 100,
      promptName: "probe",
      schemaHint: "probe",
      retry: NO_RETRY_POLICY,
      validate: (value): value is { label: string } =>
        typeof value === "object" && value !== null && "label" in value && typeof value.label === "string",
    });
    assert.deepEqual(result, { ok: false, error_code: "schema_invalid", raw: '{"label": 3}' });
  });

  it("times out slow calls", async () => {
    const client: JsonLlmClient = {
      generateStructuredJson: () => new Promise<string>(() => undefined),
    };
    const result = await callJsonPromptSafe({
      llmClient: client,
      prompt: "p",
      maxTokens: 100,
      promptName: "probe",
      schemaHint: "probe",
      timeoutMs: 10,
      retry: NO_RETRY_POLICY,
    });
    assert.deepEqual(result, { ok: false, error_code: "timeout" });
  });
});

describe("callTextPromptSafe", () => {
  it("trims the reply text", async () => {
    const result = await callTextPromptSafe({
      llmClient: { generateAssistantReply: async () => "  Positive \n" },
      prompt: "p",
      promptName: "probe",
      retry: NO_RETRY_POLICY,
    });
    assert.deepEqual(result, { ok: true, text: "Positive" });
  });
});
