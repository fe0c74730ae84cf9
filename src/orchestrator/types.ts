import type { AppError } from "./errors.js";

export type HomeworkStatus = "approved" | "reviewing" | "rejected";

export type PollResponse = {
  homeworks: unknown[];
  current_date?: unknown;
  [field: string]: unknown;
};

/** Unix timestamp in seconds, the `from_date` of the next poll. */
export type Cursor = number;

export type ApiAnswer =
  | { ok: true; body: unknown }
  | { ok: false; error: AppError };

export type ApiClient = {
  getApiAnswer(cursor: Cursor): Promise<ApiAnswer>;
};

export type Notifier = {
  sendMessage(text: string): Promise<boolean>;
};
