import { readFileSync } from "node:fs";
import { Ajv } from "ajv";
import type { ErrorObject } from "ajv";
import type { PollResponse } from "../orchestrator/types.js";

const schemaPath = new URL("./schema/poll_response.schema.json", import.meta.url);
const schema = JSON.parse(readFileSync(schemaPath, "utf-8")) as Record<
  string,
  unknown
>;

const ajv = new Ajv({ allErrors: true, strict: true });
const validatePollResponse = ajv.compile<PollResponse>(schema);

export type SchemaValidationResult =
  | { ok: true; value: PollResponse }
  | { ok: false; errors: ErrorObject[] };

export function validatePollResponseSchema(input: unknown): SchemaValidationResult {
  if (validatePollResponse(input)) {
    return { ok: true, value: input };
  }

  const errors = validatePollResponse.errors ? validatePollResponse.errors.slice() : [];
  return { ok: false, errors };
}
