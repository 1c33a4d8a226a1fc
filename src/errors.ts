export type JobErrorKind =
  | "SubmissionRejected"
  | "JobFailed"
  | "Unclassified"
  | "Timeout"
  | "LocalIOFailure"
  | "Internal";

/** Failure details recorded on a tracker once it reaches the failed status. */
export interface JobError {
  kind: JobErrorKind;
  httpStatus: number | null;
  id: string | null;
  name: string | null;
  messages: string[];
}

export function jobError(
  kind: JobErrorKind,
  fields: Partial<Omit<JobError, "kind">> = {},
): JobError {
  return {
    kind,
    httpStatus: fields.httpStatus ?? null,
    id: fields.id ?? null,
    name: fields.name ?? null,
    messages: fields.messages ?? [],
  };
}

export function describeJobError(error: JobError): string {
  const head = error.name ? `${error.kind}:${error.name}` : error.kind;
  const status = error.httpStatus !== null ? ` (${error.httpStatus})` : "";
  const detail = error.messages.length ? ` ${error.messages.join("; ")}` : "";
  return `${head}${status}${detail}`;
}

export class ConfigError extends Error {
  constructor(
    readonly variable: string,
    message: string,
  ) {
    super(`${variable}: ${message}`);
    this.name = "ConfigError";
  }
}

export class LocalIOError extends Error {
  constructor(
    readonly path: string,
    readonly code: string | null,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "LocalIOError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
