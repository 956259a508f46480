import { Logger } from "../config/logger";
import { INTAKE_SYSTEM_PROMPT } from "./system/intake.system";
import { buildJsonRepairV1Prompt } from "./prompts/utils/json-repair.v1.prompt";

export interface JsonLlmClient {
  generateStructuredJson(prompt: string, maxTokens: number, options?: { promptName?: string }): Promise<string>;
}

export interface TextLlmClient {
  generateAssistantReply(prompt: string, maxTokens?: number, options?: { promptName?: string }): Promise<string>;
}

/**
 * Attempt budget for one adapter call. `backoffMs[i]` is the wait before
 * attempt i + 2; the last entry is reused when the schedule is shorter.
 */
export interface RetryPolicy {
  maxAttempts: number;
  backoffMs: ReadonlyArray<number>;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoffMs: [1_000, 2_000, 4_000],
};

export const NO_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 1,
  backoffMs: [],
};

export function buildRetryPolicy(maxAttempts: number): RetryPolicy {
  const attempts = Math.max(1, Math.floor(maxAttempts));
  const backoffMs: number[] = [];
  for (let index = 0; index < attempts - 1; index += 1) {
    backoffMs.push(Math.min(10_000, 1_000 * 2 ** index));
  }
  return { maxAttempts: attempts, backoffMs };
}

interface SafeCallCommon {
  promptName: string;
  logger?: Logger;
  timeoutMs?: number;
  retry?: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
}

export interface JsonSafeCallArgs<T> extends SafeCallCommon {
  llmClient: JsonLlmClient;
  prompt: string;
  maxTokens: number;
  schemaHint: string;
  validate?: (value: unknown) => value is T;
}

export interface TextSafeCallArgs extends SafeCallCommon {
  llmClient: TextLlmClient;
  prompt: string;
  maxTokens?: number;
}

type CallErrorCode = "timeout" | "transient_failure" | "llm_failure";

export type SafeJsonResult<T> =
  | {
      ok: true;
      data: T;
    }
  | {
      ok: false;
      error_code: "missing_system_prompt" | CallErrorCode | "json_parse_failed" | "schema_invalid";
      raw?: string;
    };

export type SafeTextResult =
  | { ok: true; text: string }
  | { ok: false; error_code: "missing_system_prompt" | CallErrorCode };

const DEFAULT_TIMEOUT_MS = 25_000;

export async function callJsonPromptSafe<T>(args: JsonSafeCallArgs<T>): Promise<SafeJsonResult<T>> {
  if (!INTAKE_SYSTEM_PROMPT.trim()) {
    return { ok: false, error_code: "missing_system_prompt" };
  }

  const initial = await attemptWithRetry(args, args.promptName, () =>
    args.llmClient.generateStructuredJson(args.prompt, args.maxTokens, { promptName: args.promptName }),
  );
  if (!initial.ok) {
    return initial;
  }

  const parsed = tryParseJsonObject(initial.value);
  if (parsed.ok) {
    return validateParsed(args, parsed.data, initial.value);
  }

  const repairPromptName = `${args.promptName}_json_repair`;
  const repairPrompt = buildJsonRepairV1Prompt({
    schemaHint: args.schemaHint,
    raw: initial.value,
  });
  const repaired = await attemptWithRetry(args, repairPromptName, () =>
    args.llmClient.generateStructuredJson(repairPrompt, Math.max(240, Math.min(2400, args.maxTokens)), {
      promptName: repairPromptName,
    }),
  );
  if (!repaired.ok) {
    return repaired;
  }
  const repairedParsed = tryParseJsonObject(repaired.value);
  if (!repairedParsed.ok) {
    return { ok: false, error_code: "json_parse_failed", raw: repaired.value };
  }
  return validateParsed(args, repairedParsed.data, repaired.value);
}

export async function callTextPromptSafe(args: TextSafeCallArgs): Promise<SafeTextResult> {
  if (!INTAKE_SYSTEM_PROMPT.trim()) {
    return { ok: false, error_code: "missing_system_prompt" };
  }

  const result = await attemptWithRetry(args, args.promptName, () =>
    args.llmClient.generateAssistantReply(args.prompt, args.maxTokens ?? 240, {
      promptName: args.promptName,
    }),
  );
  if (!result.ok) {
    return result;
  }
  return { ok: true, text: result.value.trim() };
}

function validateParsed<T>(
  args: JsonSafeCallArgs<T>,
  data: unknown,
  raw: string,
): SafeJsonResult<T> {
  if (args.validate) {
    return args.validate(data) ? { ok: true, data } : { ok: false, error_code: "schema_invalid", raw };
  }
  return { ok: true, data: data as T };
}

async function attemptWithRetry(
  args: SafeCallCommon,
  promptName: string,
  call: () => Promise<string>,
): Promise<{ ok: true; value: string } | { ok: false; error_code: CallErrorCode }> {
  const policy = args.retry ?? DEFAULT_RETRY_POLICY;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  const timeoutMs = normalizeTimeout(args.timeoutMs);
  const sleep = args.sleep ?? defaultSleep;
  let lastErrorCode: CallErrorCode = "llm_failure";

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      return { ok: true, value: await withTimeout(call(), timeoutMs) };
    } catch (error) {
      lastErrorCode = classifyError(error);
      if (!isTransientError(error) || attempt >= maxAttempts) {
        break;
      }
      const waitMs = backoffFor(policy, attempt);
      args.logger?.warn("llm.safe.retry", {
        promptName,
        attempt,
        waitMs,
        errorCode: lastErrorCode,
      });
      await sleep(waitMs);
    }
  }

  return { ok: false, error_code: lastErrorCode };
}

function backoffFor(policy: RetryPolicy, attempt: number): number {
  if (!policy.backoffMs.length) {
    return 0;
  }
  const index = Math.min(attempt - 1, policy.backoffMs.length - 1);
  return Math.max(0, policy.backoffMs[index] ?? 0);
}

/**
 * Accepts bare JSON, JSON inside markdown fences, or JSON surrounded by
 * prose. Only objects count; arrays and scalars are rejected.
 */
export function tryParseJsonObject(raw: string): { ok: true; data: Record<string, unknown> } | { ok: false } {
  const text = stripCodeFence(raw.trim());
  const firstBrace = text.indexOf("{");
  const lastBrace = text.lastIndexOf("}");
  if (firstBrace < 0 || lastBrace < 0 || lastBrace <= firstBrace) {
    return { ok: false };
  }
  try {
    const parsed: unknown = JSON.parse(text.slice(firstBrace, lastBrace + 1));
    if (!isJsonObject(parsed)) {
      return { ok: false };
    }
    return { ok: true, data: parsed };
  } catch {
    return { ok: false };
  }
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stripCodeFence(text: string): string {
  let output = text;
  if (output.startsWith("```json")) {
    output = output.slice(7);
  } else if (output.startsWith("```")) {
    output = output.slice(3);
  }
  if (output.endsWith("```")) {
    output = output.slice(0, -3);
  }
  return output.trim();
}

function normalizeTimeout(value?: number): number {
  if (typeof value === "number" && Number.isFinite(value) && value > 0) {
    return Math.round(value);
  }
  return DEFAULT_TIMEOUT_MS;
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error("timeout"));
    }, timeoutMs);
    promise
      .then((value) => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

function classifyError(error: unknown): CallErrorCode {
  if (isTimeoutError(error)) {
    return "timeout";
  }
  return isTransientError(error) ? "transient_failure" : "llm_failure";
}

function isTimeoutError(error: unknown): boolean {
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return message.includes("timeout");
}

function isTransientError(error: unknown): boolean {
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return (
    message.includes("timeout") ||
    message.includes("econnreset") ||
    message.includes("network") ||
    message.includes("429") ||
    message.includes("rate limit") ||
    message.includes("http 500") ||
    message.includes("http 502") ||
    message.includes("http 503") ||
    message.includes("http 504")
  );
}
