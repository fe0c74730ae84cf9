import type { PollingConfig } from "./config.schema.js";

export const DEFAULT_POLLING_CONFIG: PollingConfig = {
  endpoint: "https://practicum.yandex.ru/api/user_api/homework_statuses/",
  retry_period_ms: 10 * 60 * 1000,
  request_timeout_ms: 15000
};
