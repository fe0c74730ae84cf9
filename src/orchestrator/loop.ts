import { checkResponse, extractCursor } from "../validator/index.js";
import { parseStatus } from "../renderer/index.js";
import { AppError, describeError } from "./errors.js";
import type { ApiClient, Cursor, Notifier } from "./types.js";

export type PollingDeps = {
  client: ApiClient;
  notifier: Notifier;
};

export type PollingLoopOptions = PollingDeps & {
  retryPeriodMs: number;
  initialCursor?: Cursor;
  signal?: AbortSignal;
  /** Stops after this many iterations; unbounded when omitted. */
  maxIterations?: number;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

export const FAILURE_MESSAGE_PREFIX = "Сбой в работе программы";

export function toUnixSeconds(ms: number): Cursor {
  return Math.floor(ms / 1000);
}

function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}

/**
 * One poll cycle. Returns the cursor for the next cycle; it only moves when
 * the API answered with a usable `current_date`.
 */
export async function runIteration(cursor: Cursor, deps: PollingDeps): Promise<Cursor> {
  let nextCursor = cursor;
  try {
    const answer = await deps.client.getApiAnswer(cursor);
    if (!answer.ok) {
      throw answer.error;
    }

    nextCursor = extractCursor(answer.body, cursor);
    const homework = checkResponse(answer.body);
    const message = parseStatus(homework);
    if (homework !== null) {
      await deps.notifier.sendMessage(message);
    }
  } catch (error) {
    const message = `${FAILURE_MESSAGE_PREFIX}: ${describeError(error)}`;
    console.error({
      message: "poll_iteration_failed",
      cursor,
      code: error instanceof AppError ? error.code : undefined,
      error: describeError(error)
    });
    await deps.notifier.sendMessage(message);
  }
  return nextCursor;
}

export async function runPollingLoop(options: PollingLoopOptions): Promise<Cursor> {
  const now = options.now ?? (() => Date.now());
  const sleep = options.sleep ?? defaultSleep;
  const { signal, maxIterations, retryPeriodMs } = options;
  let cursor = options.initialCursor ?? toUnixSeconds(now());
  let iterations = 0;

  console.info({
    message: "polling_loop_started",
    cursor,
    retry_period_ms: retryPeriodMs
  });

  while (!signal?.aborted) {
    if (maxIterations !== undefined && iterations >= maxIterations) {
      break;
    }
    cursor = await runIteration(cursor, options);
    iterations += 1;
    await sleep(retryPeriodMs, signal);
  }

  console.info({ message: "polling_loop_stopped", cursor, iterations });
  return cursor;
}
