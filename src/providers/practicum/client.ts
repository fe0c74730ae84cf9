import { createAppError, describeError, ERROR_CODES } from "../../orchestrator/errors.js";
import type { ApiAnswer, ApiClient, Cursor } from "../../orchestrator/types.js";

type FetchResponse = {
  ok: boolean;
  status: number;
  body?: { cancel(): Promise<void> } | null;
  text(): Promise<string>;
};

export type FetchLike = (input: string, init?: RequestInit) => Promise<FetchResponse>;

export type PracticumClientOptions = {
  token: string;
  endpoint: string;
  timeoutMs: number;
  fetch?: FetchLike;
};

const HTTP_OK = 200;

export function buildPracticumUrl(endpoint: string, cursor: Cursor): string {
  const url = new URL(endpoint);
  url.searchParams.set("from_date", String(cursor));
  return url.toString();
}

function requestFailed(endpoint: string, message: string, cause: string) {
  return createAppError({
    code: ERROR_CODES.API_REQUEST_FAILED,
    message,
    category: "PROVIDER",
    details: { endpoint, cause }
  });
}

async function discardBody(response: FetchResponse): Promise<void> {
  if (!response.body) {
    return;
  }
  try {
    await response.body.cancel();
  } catch (error) {
    console.debug({
      message: "practicum_body_discard_failed",
      error: describeError(error)
    });
  }
}

function parseBody(endpoint: string, text: string): ApiAnswer {
  if (!text.trim()) {
    return {
      ok: false,
      error: createAppError({
        code: ERROR_CODES.API_EMPTY_RESPONSE,
        message: `Эндпоинт ${endpoint} вернул пустой ответ`,
        category: "PROVIDER",
        details: { endpoint }
      })
    };
  }
  try {
    return { ok: true, body: JSON.parse(text) };
  } catch (error) {
    return {
      ok: false,
      error: createAppError({
        code: ERROR_CODES.API_RESPONSE_NOT_JSON,
        message: `Эндпоинт ${endpoint} вернул ответ не в формате JSON`,
        category: "PROVIDER",
        details: { endpoint, cause: describeError(error) }
      })
    };
  }
}

/**
 * Client for the homework statuses endpoint.
 *
 * `getApiAnswer` never rejects: transport failures, non-200 statuses and
 * unreadable bodies come back as `{ ok: false, error }` so the caller
 * decides what a missing answer means for the iteration.
 */
export function createPracticumClient(options: PracticumClientOptions): ApiClient {
  const fetchImpl: FetchLike = options.fetch ?? fetch;
  const { endpoint, timeoutMs } = options;
  const headers = {
    accept: "application/json",
    authorization: `OAuth ${options.token}`
  };

  return {
    async getApiAnswer(cursor: Cursor): Promise<ApiAnswer> {
      const url = buildPracticumUrl(endpoint, cursor);
      // One deadline for the headers and the body.
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), timeoutMs);

      const transportFailure = (error: unknown, action: string): ApiAnswer => {
        const cause = describeError(error);
        const timedOut =
          controller.signal.aborted ||
          (error instanceof Error && error.name === "AbortError");
        const appError = requestFailed(
          endpoint,
          timedOut
            ? `Эндпоинт ${endpoint} не ответил за ${timeoutMs} мс`
            : `Сбой при ${action} ${endpoint}: ${cause}`,
          cause
        );
        console.error({
          message: "practicum_request_failed",
          endpoint,
          error: appError.message
        });
        return { ok: false, error: appError };
      };

      try {
        let response: FetchResponse;
        try {
          response = await fetchImpl(url, {
            method: "GET",
            headers,
            signal: controller.signal
          });
        } catch (error) {
          return transportFailure(error, "запросе к эндпоинту");
        }

        if (response.status !== HTTP_OK) {
          await discardBody(response);
          return {
            ok: false,
            error: createAppError({
              code: ERROR_CODES.API_UNEXPECTED_STATUS,
              message: `Эндпоинт ${endpoint} недоступен. Код ответа API: ${response.status}`,
              category: "PROVIDER",
              details: { endpoint, status: response.status }
            })
          };
        }

        let text: string;
        try {
          text = await response.text();
        } catch (error) {
          return transportFailure(error, "чтении ответа эндпоинта");
        }
        return parseBody(endpoint, text);
      } finally {
        clearTimeout(timeout);
      }
    }
  };
}
