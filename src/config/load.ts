import { validateNotifierConfig } from "./config.schema.js";
import type { NotifierConfig } from "./config.schema.js";

export function loadNotifierConfig(
  env: NodeJS.ProcessEnv = process.env
): NotifierConfig {
  return validateNotifierConfig({
    practicum_token: env.PRACTICUM_TOKEN,
    telegram_token: env.TELEGRAM_TOKEN,
    telegram_chat_id: env.TELEGRAM_CHAT_ID,
    endpoint: env.PRACTICUM_ENDPOINT,
    retry_period_ms: env.RETRY_PERIOD_MS,
    request_timeout_ms: env.REQUEST_TIMEOUT_MS
  });
}
