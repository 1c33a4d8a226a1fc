import { jobError, type JobError } from "../errors.js";
import type { HttpResult } from "../http.js";
import { parseErrorBody, shortBody } from "../stability/errorBody.js";

export type PollOutcome =
  | { kind: "succeeded"; payload: Uint8Array }
  | { kind: "failed"; error: JobError }
  | { kind: "processing" }
  | { kind: "unclassified"; httpStatus: number; detail: string };

// invalid parameters, expired result, internal server error
const TERMINAL_ERROR_STATUSES = new Set([400, 404, 500]);

/**
 * Classifies one result-poll response. 400/404/500 are deliberately not
 * told apart beyond the fields captured from the body.
 */
export function interpretPollResponse(result: HttpResult): PollOutcome {
  if (result.status === 200) {
    return { kind: "succeeded", payload: result.body };
  }
  if (result.status === 202) {
    return { kind: "processing" };
  }
  if (TERMINAL_ERROR_STATUSES.has(result.status)) {
    const body = parseErrorBody(result);
    return {
      kind: "failed",
      error: jobError("JobFailed", { httpStatus: result.status, ...body }),
    };
  }
  return {
    kind: "unclassified",
    httpStatus: result.status,
    detail: result.status === 0 ? result.text || "transport failure" : shortBody(result),
  };
}
