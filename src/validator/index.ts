import type { ErrorObject } from "ajv";
import { AppError, createAppError, ERROR_CODES } from "../orchestrator/errors.js";
import type { Cursor } from "../orchestrator/types.js";
import { describeType, isRecord } from "../utils/guards.js";
import { validatePollResponseSchema } from "./ajv.js";

function schemaViolation(
  code:
    | typeof ERROR_CODES.RESPONSE_NOT_OBJECT
    | typeof ERROR_CODES.RESPONSE_FIELD_MISSING
    | typeof ERROR_CODES.RESPONSE_HOMEWORKS_NOT_LIST
    | typeof ERROR_CODES.RESPONSE_SCHEMA_INVALID,
  message: string,
  details?: Record<string, unknown>
): AppError {
  return createAppError({
    code,
    message,
    category: "VALIDATION",
    details
  });
}

function toSchemaViolation(input: unknown, errors: ErrorObject[]): AppError {
  const rootType = errors.find(
    (error) => error.instancePath === "" && error.keyword === "type"
  );
  if (rootType || !isRecord(input)) {
    const actual = describeType(input);
    return schemaViolation(
      ERROR_CODES.RESPONSE_NOT_OBJECT,
      `Некорректный тип данных ответа API: ${actual}`,
      { actual }
    );
  }

  const missing = errors.find((error) => error.keyword === "required");
  if (missing) {
    const field = String(missing.params.missingProperty);
    return schemaViolation(
      ERROR_CODES.RESPONSE_FIELD_MISSING,
      `Отсутствует ключ "${field}"`,
      { field }
    );
  }

  const listType = errors.find(
    (error) => error.instancePath === "/homeworks" && error.keyword === "type"
  );
  if (listType) {
    const actual = describeType(input.homeworks);
    return schemaViolation(
      ERROR_CODES.RESPONSE_HOMEWORKS_NOT_LIST,
      `Некорректный тип данных homeworks: ${actual}`,
      { actual }
    );
  }

  return schemaViolation(
    ERROR_CODES.RESPONSE_SCHEMA_INVALID,
    "Ответ API не соответствует схеме",
    {
      errors: errors.map((error) => `${error.instancePath} ${error.message ?? ""}`.trim())
    }
  );
}

/**
 * Checks the poll response and returns the first homework entry.
 *
 * Returns `null` when the list is empty or its first entry is an empty
 * mapping, meaning nothing changed since the cursor. Any other entry is
 * returned as is.
 */
export function checkResponse(input: unknown): unknown {
  const result = validatePollResponseSchema(input);
  if (!result.ok) {
    throw toSchemaViolation(input, result.errors);
  }

  const [first] = result.value.homeworks;
  if (first === undefined || (isRecord(first) && Object.keys(first).length === 0)) {
    return null;
  }
  return first;
}

export function extractCursor(input: unknown, fallback: Cursor): Cursor {
  if (!isRecord(input)) {
    return fallback;
  }
  const value = input.current_date;
  if (typeof value === "number" && Number.isInteger(value) && value >= 0) {
    return value;
  }
  return fallback;
}
