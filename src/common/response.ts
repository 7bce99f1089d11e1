import { STATUS_CODES } from "node:http";
import type { HttpResponse } from "./http.js";
import { RequestError } from "./types.js";

export type HttpOutcome =
  | { kind: "failure"; error: unknown }
  | ({ kind: "response" } & HttpResponse);

/**
 * Turn the result of a GET into decoded JSON.
 *
 * Only `200` counts as success. Any other status becomes `BadResponse` with
 * the reason phrase, falling back to the standard phrase for the code when
 * the server sent none.
 */
export function unwrapResponse(outcome: HttpOutcome): unknown {
  if (outcome.kind === "failure") {
    throw RequestError.getFailed(outcome.error);
  }

  if (outcome.status !== 200) {
    const reason = outcome.statusText || (STATUS_CODES[outcome.status] ?? "");
    throw RequestError.badResponse(reason, outcome.status);
  }

  try {
    const value: unknown = JSON.parse(outcome.body);
    return value;
  } catch (err) {
    throw RequestError.notJson(err);
  }
}

export function expectArray(value: unknown): unknown[] {
  if (!Array.isArray(value)) throw RequestError.invalidReturn();
  return value;
}
