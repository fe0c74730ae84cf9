import { loadNotifierConfig } from "./config/load.js";
import { AppError, describeError } from "./orchestrator/errors.js";
import { runPollingLoop } from "./orchestrator/loop.js";
import type { Cursor } from "./orchestrator/types.js";
import { createPracticumClient } from "./providers/practicum/index.js";
import type { FetchLike } from "./providers/practicum/index.js";
import { createTelegramNotifier } from "./providers/telegram/index.js";
import type { TelegramSender } from "./providers/telegram/index.js";

export type StartNotifierOptions = {
  env?: NodeJS.ProcessEnv;
  fetch?: FetchLike;
  telegramApi?: TelegramSender;
  signal?: AbortSignal;
  maxIterations?: number;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

/**
 * Reads the config once and wires the client, the notifier and the loop.
 * Config errors throw before either client is constructed.
 */
export async function startNotifier(options: StartNotifierOptions = {}): Promise<Cursor> {
  const config = loadNotifierConfig(options.env ?? process.env);

  const client = createPracticumClient({
    token: config.practicum_token,
    endpoint: config.endpoint,
    timeoutMs: config.request_timeout_ms,
    fetch: options.fetch
  });
  const notifier = createTelegramNotifier({
    bot_token: config.telegram_token,
    chat_id: config.telegram_chat_id,
    api: options.telegramApi
  });

  return runPollingLoop({
    client,
    notifier,
    retryPeriodMs: config.retry_period_ms,
    signal: options.signal,
    maxIterations: options.maxIterations,
    now: options.now,
    sleep: options.sleep
  });
}

/**
 * Logs a failure that escaped `startNotifier` at fatal level and exits
 * with code 1.
 */
export function handleStartupFailure(
  error: unknown,
  exit: (code: number) => void = (code) => process.exit(code)
): void {
  if (error instanceof AppError && error.category === "CONFIG") {
    console.error({
      level: "fatal",
      message: "notifier_config_invalid",
      code: error.code,
      variable: error.details?.variable,
      error: error.message
    });
  } else {
    console.error({
      level: "fatal",
      message: "notifier_start_failed",
      error: describeError(error)
    });
  }
  exit(1);
}
