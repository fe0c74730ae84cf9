export type ErrorCategory = "CONFIG" | "PROVIDER" | "VALIDATION";

export class AppError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly details?: Record<string, unknown>;

  constructor(params: {
    code: string;
    message: string;
    category: ErrorCategory;
    details?: Record<string, unknown>;
  }) {
    super(params.message);
    this.name = "AppError";
    this.code = params.code;
    this.category = params.category;
    this.details = params.details;
  }
}

export const ERROR_CODES = {
  CONFIG_ENV_MISSING: "CONFIG_ENV_MISSING",
  CONFIG_ENV_INVALID: "CONFIG_ENV_INVALID",
  API_UNEXPECTED_STATUS: "API_UNEXPECTED_STATUS",
  API_REQUEST_FAILED: "API_REQUEST_FAILED",
  API_EMPTY_RESPONSE: "API_EMPTY_RESPONSE",
  API_RESPONSE_NOT_JSON: "API_RESPONSE_NOT_JSON",
  RESPONSE_NOT_OBJECT: "RESPONSE_NOT_OBJECT",
  RESPONSE_FIELD_MISSING: "RESPONSE_FIELD_MISSING",
  RESPONSE_HOMEWORKS_NOT_LIST: "RESPONSE_HOMEWORKS_NOT_LIST",
  RESPONSE_SCHEMA_INVALID: "RESPONSE_SCHEMA_INVALID",
  HOMEWORK_NAME_MISSING: "HOMEWORK_NAME_MISSING",
  HOMEWORK_STATUS_MISSING: "HOMEWORK_STATUS_MISSING",
  HOMEWORK_STATUS_EMPTY: "HOMEWORK_STATUS_EMPTY",
  HOMEWORK_STATUS_UNKNOWN: "HOMEWORK_STATUS_UNKNOWN"
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export function createAppError(params: {
  code: ErrorCode;
  message: string;
  category: ErrorCategory;
  details?: Record<string, unknown>;
}): AppError {
  return new AppError(params);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
