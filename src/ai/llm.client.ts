import fetch from "node-fetch";
import { Logger } from "../config/logger";
import { INTAKE_SYSTEM_PROMPT } from "./system/intake.system";

const JSON_EXECUTION_SYSTEM_PROMPT = [
  "You are a JSON generator.",
  "Output only valid JSON.",
  "No markdown, no explanations.",
  "Follow the requested schema exactly.",
].join(" ");

export interface LlmClientConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  temperature: number;
}

export interface ChatCompletionsRequestBody {
  model: string;
  temperature: number;
  messages: Array<{
    role: "system" | "user";
    content: string;
  }>;
  max_tokens: number;
  response_format?: { type: "json_object" };
}

interface ChatCompletionsResponse {
  choices: Array<{
    message: {
      content?: string | null;
    };
  }>;
}

export interface LlmCallOptions {
  promptName?: string;
  temperature?: number;
}

export class LlmClient {
  constructor(
    private readonly config: LlmClientConfig,
    private readonly logger: Logger,
  ) {
    if (!INTAKE_SYSTEM_PROMPT.trim()) {
      throw new Error("INTAKE_SYSTEM_PROMPT is empty. Refusing to start.");
    }
  }

  async generateStructuredJson(
    prompt: string,
    maxTokens: number,
    options?: LlmCallOptions,
  ): Promise<string> {
    const requestBody = this.buildJsonRequestBody(prompt, maxTokens, options?.temperature);
    return this.complete(requestBody, prompt, options?.promptName ?? "structured_json");
  }

  async generateAssistantReply(
    prompt: string,
    maxTokens = 240,
    options?: LlmCallOptions,
  ): Promise<string> {
    const requestBody = this.buildTextRequestBody(prompt, maxTokens, options?.temperature);
    const content = await this.complete(requestBody, prompt, options?.promptName ?? "assistant_reply");
    return content.trim();
  }

  buildJsonRequestBody(prompt: string, maxTokens: number, temperature?: number): ChatCompletionsRequestBody {
    return {
      model: this.config.model,
      temperature: temperature ?? this.config.temperature,
      messages: [
        { role: "system", content: INTAKE_SYSTEM_PROMPT },
        { role: "system", content: JSON_EXECUTION_SYSTEM_PROMPT },
        { role: "user", content: prompt },
      ],
      max_tokens: maxTokens,
      response_format: { type: "json_object" },
    };
  }

  buildTextRequestBody(prompt: string, maxTokens: number, temperature?: number): ChatCompletionsRequestBody {
    return {
      model: this.config.model,
      temperature: temperature ?? this.config.temperature,
      messages: [
        { role: "system", content: INTAKE_SYSTEM_PROMPT },
        { role: "user", content: prompt },
      ],
      max_tokens: maxTokens,
    };
  }

  private async complete(
    requestBody: ChatCompletionsRequestBody,
    prompt: string,
    promptName: string,
  ): Promise<string> {
    const startedAt = Date.now();
    try {
      const response = await fetch(`${this.config.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          authorization: `Bearer ${this.config.apiKey}`,
          "content-type": "application/json",
        },
        body: JSON.stringify(requestBody),
      });

      if (!response.ok) {
        const body = await response.text();
        throw new Error(`LLM API error: HTTP ${response.status} - ${body}`);
      }

      const body = (await response.json()) as ChatCompletionsResponse;
      const content = body.choices[0]?.message?.content;
      if (!content) {
        throw new Error("LLM response does not contain message content");
      }

      this.logger.info("llm.call.completed", {
        promptName,
        latencyMs: Date.now() - startedAt,
        maxTokens: requestBody.max_tokens,
        tokenEstimate: estimateTokenCount(prompt, content),
      });
      return content;
    } catch (error) {
      this.logger.warn("llm.call.failed", {
        promptName,
        latencyMs: Date.now() - startedAt,
        maxTokens: requestBody.max_tokens,
        error: error instanceof Error ? error.message : "Unknown error",
      });
      throw error;
    }
  }
}

function estimateTokenCount(prompt: string, output: string): number {
  const totalChars = prompt.length + output.length;
  return Math.max(1, Math.round(totalChars / 4));
}
