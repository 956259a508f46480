import dotenv from "dotenv";
import { LogLevel } from "./logger";

dotenv.config();

export interface EnvConfig {
  port: number;
  logLevel: LogLevel;
  logFile?: string;
  openaiApiKey: string;
  openaiBaseUrl: string;
  openaiChatModel: string;
  modelTemperature: number;
  llmTimeoutMs: number;
  llmMaxAttempts: number;
  dataDir: string;
  rateLimitEnabled: boolean;
  rateLimitRequests: number;
  rateLimitPeriodSec: number;
  maxConsecutiveErrors: number;
  maxMessageLength: number;
  maxAnswerLength: number;
  sessionIdleTtlMinutes: number;
  sessionSweepIntervalMinutes: number;
}

type EnvSource = Record<string, string | undefined>;

function getRequiredString(source: EnvSource, name: string): string {
  const value = source[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  const trimmed = value.trim();
  if (!trimmed) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return trimmed;
}

function getOptionalTrimmed(source: EnvSource, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: EnvSource = process.env): EnvConfig {
  const portRaw = source.PORT ?? "3000";
  const port = Number(portRaw);
  const temperatureRaw = source.MODEL_TEMPERATURE ?? "0.2";
  const modelTemperature = Number(temperatureRaw);
  const llmTimeoutRaw = source.LLM_TIMEOUT_MS ?? "25000";
  const llmTimeoutMs = Number(llmTimeoutRaw);
  const llmMaxAttemptsRaw = source.LLM_MAX_ATTEMPTS ?? "3";
  const llmMaxAttempts = Number(llmMaxAttemptsRaw);
  const rateLimitEnabled = parseBoolean("ENABLE_RATE_LIMITING", source.ENABLE_RATE_LIMITING ?? "true");
  const rateLimitRequestsRaw = source.RATE_LIMIT_REQUESTS ?? "10";
  const rateLimitRequests = Number(rateLimitRequestsRaw);
  const rateLimitPeriodRaw = source.RATE_LIMIT_PERIOD_SEC ?? "60";
  const rateLimitPeriodSec = Number(rateLimitPeriodRaw);
  const maxErrorsRaw = source.MAX_CONSECUTIVE_ERRORS ?? "3";
  const maxConsecutiveErrors = Number(maxErrorsRaw);
  const maxMessageLengthRaw = source.MAX_MESSAGE_LENGTH ?? "1000";
  const maxMessageLength = Number(maxMessageLengthRaw);
  const maxAnswerLengthRaw = source.MAX_ANSWER_LENGTH ?? "5000";
  const maxAnswerLength = Number(maxAnswerLengthRaw);
  const idleTtlRaw = source.SESSION_IDLE_TTL_MINUTES ?? "60";
  const sessionIdleTtlMinutes = Number(idleTtlRaw);
  const sweepIntervalRaw = source.SESSION_SWEEP_INTERVAL_MINUTES ?? "5";
  const sessionSweepIntervalMinutes = Number(sweepIntervalRaw);
  const logLevel = parseLogLevel((source.LOG_LEVEL ?? "info").trim().toLowerCase());

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isFinite(modelTemperature) || modelTemperature < 0 || modelTemperature > 2) {
    throw new Error(`Invalid MODEL_TEMPERATURE value: ${temperatureRaw}. Expected number between 0 and 2.`);
  }
  if (!Number.isInteger(llmTimeoutMs) || llmTimeoutMs < 1000) {
    throw new Error(`Invalid LLM_TIMEOUT_MS value: ${llmTimeoutRaw}`);
  }
  if (!Number.isInteger(llmMaxAttempts) || llmMaxAttempts < 1 || llmMaxAttempts > 5) {
    throw new Error(`Invalid LLM_MAX_ATTEMPTS value: ${llmMaxAttemptsRaw}`);
  }
  if (!Number.isInteger(rateLimitRequests) || rateLimitRequests < 1) {
    throw new Error(`Invalid RATE_LIMIT_REQUESTS value: ${rateLimitRequestsRaw}`);
  }
  if (!Number.isFinite(rateLimitPeriodSec) || rateLimitPeriodSec <= 0) {
    throw new Error(`Invalid RATE_LIMIT_PERIOD_SEC value: ${rateLimitPeriodRaw}`);
  }
  if (!Number.isInteger(maxConsecutiveErrors) || maxConsecutiveErrors < 0) {
    throw new Error(`Invalid MAX_CONSECUTIVE_ERRORS value: ${maxErrorsRaw}`);
  }
  if (!Number.isInteger(maxMessageLength) || maxMessageLength < 1) {
    throw new Error(`Invalid MAX_MESSAGE_LENGTH value: ${maxMessageLengthRaw}`);
  }
  if (!Number.isInteger(maxAnswerLength) || maxAnswerLength < 1) {
    throw new Error(`Invalid MAX_ANSWER_LENGTH value: ${maxAnswerLengthRaw}`);
  }
  if (!Number.isFinite(sessionIdleTtlMinutes) || sessionIdleTtlMinutes <= 0) {
    throw new Error(`Invalid SESSION_IDLE_TTL_MINUTES value: ${idleTtlRaw}`);
  }
  if (!Number.isFinite(sessionSweepIntervalMinutes) || sessionSweepIntervalMinutes <= 0) {
    throw new Error(`Invalid SESSION_SWEEP_INTERVAL_MINUTES value: ${sweepIntervalRaw}`);
  }

  return {
    port,
    logLevel,
    logFile: getOptionalTrimmed(source, "LOG_FILE"),
    openaiApiKey: getRequiredString(source, "OPENAI_API_KEY"),
    openaiBaseUrl: (getOptionalTrimmed(source, "OPENAI_BASE_URL") ?? "https://api.openai.com/v1").replace(/\/+$/, ""),
    openaiChatModel: getOptionalTrimmed(source, "OPENAI_CHAT_MODEL") ?? "gpt-4o-mini",
    modelTemperature,
    llmTimeoutMs,
    llmMaxAttempts,
    dataDir: getOptionalTrimmed(source, "DATA_DIR") ?? "data",
    rateLimitEnabled,
    rateLimitRequests,
    rateLimitPeriodSec,
    maxConsecutiveErrors,
    maxMessageLength,
    maxAnswerLength,
    sessionIdleTtlMinutes,
    sessionSweepIntervalMinutes,
  };
}

function parseBoolean(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  throw new Error(`Invalid ${name} value: ${value}. Expected true or false.`);
}

function parseLogLevel(value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid LOG_LEVEL value: ${value}`);
}
