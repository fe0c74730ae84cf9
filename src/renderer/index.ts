import { createAppError, ERROR_CODES } from "../orchestrator/errors.js";
import type { HomeworkStatus } from "../orchestrator/types.js";
import { isRecord } from "../utils/guards.js";

export const HOMEWORK_VERDICTS: Readonly<Record<HomeworkStatus, string>> = Object.freeze({
  approved: "Работа проверена: ревьюеру всё понравилось. Ура!",
  reviewing: "Работа взята на проверку ревьюером.",
  rejected: "Работа проверена: у ревьюера есть замечания."
});

export const NO_UPDATE_MESSAGE = "Статус проверки работы не изменился";

function isHomeworkStatus(value: unknown): value is HomeworkStatus {
  return (
    typeof value === "string" &&
    Object.prototype.hasOwnProperty.call(HOMEWORK_VERDICTS, value)
  );
}

function recordError(
  code:
    | typeof ERROR_CODES.HOMEWORK_NAME_MISSING
    | typeof ERROR_CODES.HOMEWORK_STATUS_MISSING
    | typeof ERROR_CODES.HOMEWORK_STATUS_EMPTY
    | typeof ERROR_CODES.HOMEWORK_STATUS_UNKNOWN,
  message: string,
  details?: Record<string, unknown>
) {
  return createAppError({
    code,
    message,
    category: "VALIDATION",
    details
  });
}

export function formatStatusChange(homeworkName: string, status: HomeworkStatus): string {
  return `Изменился статус проверки работы "${homeworkName}". ${HOMEWORK_VERDICTS[status]}`;
}

/**
 * Builds the chat message for a homework entry. `null` is the no-update
 * value produced by the response check.
 */
export function parseStatus(homework: unknown): string {
  if (homework === null) {
    console.debug({ message: "homework_status_unchanged" });
    return NO_UPDATE_MESSAGE;
  }

  const record = isRecord(homework) ? homework : {};
  if (!("homework_name" in record)) {
    throw recordError(ERROR_CODES.HOMEWORK_NAME_MISSING, 'Отсутствует ключ "homework_name"');
  }
  if (!("status" in record)) {
    throw recordError(ERROR_CODES.HOMEWORK_STATUS_MISSING, 'Отсутствует ключ "status"');
  }

  const status = record.status;
  if (status === null || status === undefined || status === "") {
    throw recordError(ERROR_CODES.HOMEWORK_STATUS_EMPTY, "Статус проверки работы пуст");
  }
  if (!isHomeworkStatus(status)) {
    throw recordError(
      ERROR_CODES.HOMEWORK_STATUS_UNKNOWN,
      `Статус проверки не соответствует ожидаемым вариантам: ${String(status)}`,
      { status }
    );
  }

  const message = formatStatusChange(String(record.homework_name), status);
  console.debug({ message: "homework_status_changed", status, text: message });
  return message;
}
