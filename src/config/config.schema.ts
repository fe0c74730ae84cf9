import { createAppError, ERROR_CODES } from "../orchestrator/errors.js";
import { DEFAULT_POLLING_CONFIG } from "./defaults.js";

export type SecretsConfig = {
  practicum_token: string;
  telegram_token: string;
  telegram_chat_id: string;
};

export type PollingConfig = {
  endpoint: string;
  retry_period_ms: number;
  request_timeout_ms: number;
};

export type NotifierConfig = SecretsConfig & PollingConfig;

export type RawNotifierConfig = {
  [K in keyof NotifierConfig]?: string;
};

// Env variable behind each field, used in error details.
export const ENV_VARIABLES: Record<keyof NotifierConfig, string> = {
  practicum_token: "PRACTICUM_TOKEN",
  telegram_token: "TELEGRAM_TOKEN",
  telegram_chat_id: "TELEGRAM_CHAT_ID",
  endpoint: "PRACTICUM_ENDPOINT",
  retry_period_ms: "RETRY_PERIOD_MS",
  request_timeout_ms: "REQUEST_TIMEOUT_MS"
};

function invalid(field: keyof NotifierConfig, reason: string) {
  const variable = ENV_VARIABLES[field];
  return createAppError({
    code: ERROR_CODES.CONFIG_ENV_INVALID,
    message: `${variable} ${reason}`,
    category: "CONFIG",
    details: { variable }
  });
}

function requireSecret(raw: RawNotifierConfig, field: keyof SecretsConfig): string {
  const value = raw[field]?.trim();
  if (!value) {
    const variable = ENV_VARIABLES[field];
    throw createAppError({
      code: ERROR_CODES.CONFIG_ENV_MISSING,
      message: `Отсутствует обязательная переменная окружения ${variable}`,
      category: "CONFIG",
      details: { variable }
    });
  }
  return value;
}

function normalizePositiveInt(
  value: string | undefined,
  fallback: number,
  field: keyof PollingConfig
): number {
  const trimmed = value?.trim();
  if (!trimmed) {
    return fallback;
  }
  const parsed = Number(trimmed);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw invalid(field, "must be a positive integer");
  }
  return parsed;
}

function normalizeEndpoint(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim();
  if (!trimmed) {
    return fallback;
  }
  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    throw invalid("endpoint", "must be an absolute URL");
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw invalid("endpoint", "must use http or https");
  }
  return trimmed;
}

export function validateSecretsConfig(raw: RawNotifierConfig): SecretsConfig {
  return {
    practicum_token: requireSecret(raw, "practicum_token"),
    telegram_token: requireSecret(raw, "telegram_token"),
    telegram_chat_id: requireSecret(raw, "telegram_chat_id")
  };
}

export function validatePollingConfig(raw: RawNotifierConfig = {}): PollingConfig {
  const defaults = DEFAULT_POLLING_CONFIG;
  return {
    endpoint: normalizeEndpoint(raw.endpoint, defaults.endpoint),
    retry_period_ms: normalizePositiveInt(
      raw.retry_period_ms,
      defaults.retry_period_ms,
      "retry_period_ms"
    ),
    request_timeout_ms: normalizePositiveInt(
      raw.request_timeout_ms,
      defaults.request_timeout_ms,
      "request_timeout_ms"
    )
  };
}

export function validateNotifierConfig(raw: RawNotifierConfig): NotifierConfig {
  return {
    ...validateSecretsConfig(raw),
    ...validatePollingConfig(raw)
  };
}
