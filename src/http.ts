import { safeJsonParse } from "./env.js";

export type MultipartField =
  | { name: string; value: string }
  | { name: string; bytes: Uint8Array; filename: string; contentType: string };

export interface HttpRequest {
  method: "GET" | "POST";
  url: string;
  headers?: Record<string, string>;
  multipart?: MultipartField[];
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface HttpResult {
  ok: boolean;
  status: number;
  contentType: string;
  headers: Record<string, string>;
  body: Uint8Array;
  json?: unknown;
  text?: string;
  requestId?: string;
}

export type HttpTransport = (request: HttpRequest) => Promise<HttpResult>;

function isTextual(contentType: string): boolean {
  return contentType.includes("json") || contentType.startsWith("text/");
}

function buildForm(fields: MultipartField[]): FormData {
  const form = new FormData();
  for (const field of fields) {
    if ("bytes" in field) {
      form.append(field.name, new Blob([field.bytes], { type: field.contentType }), field.filename);
    } else {
      form.append(field.name, field.value);
    }
  }
  return form;
}

/**
 * Wraps a raw status/body pair the way every transport reports it.
 * JSON and text bodies are decoded; binary bodies are left as bytes only.
 */
export function toHttpResult(status: number, headers: Record<string, string>, body: Uint8Array): HttpResult {
  const lower: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) lower[key.toLowerCase()] = value;
  const contentType = (lower["content-type"] || "").toLowerCase();
  const result: HttpResult = {
    ok: status >= 200 && status < 300,
    status,
    contentType,
    headers: lower,
    body,
    requestId: lower["x-request-id"] || undefined,
  };
  if (isTextual(contentType) || (!contentType && body.length > 0 && body[0] === 0x7b)) {
    const text = new TextDecoder().decode(body);
    result.text = text;
    const json = text ? safeJsonParse(text) : null;
    if (json !== null) result.json = json;
  }
  return result;
}

export const fetchTransport: HttpTransport = async (request) => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), request.timeoutMs || 30000);
  const onAbort = () => controller.abort();
  if (request.signal?.aborted) controller.abort();
  request.signal?.addEventListener("abort", onAbort, { once: true });
  try {
    const res = await fetch(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.multipart ? buildForm(request.multipart) : undefined,
      signal: controller.signal,
    });
    const body = new Uint8Array(await res.arrayBuffer());
    const headers: Record<string, string> = {};
    res.headers.forEach((value, key) => {
      headers[key] = value;
    });
    return toHttpResult(res.status, headers, body);
  } catch (e) {
    // Transport failures never throw; callers classify status 0.
    return {
      ok: false,
      status: 0,
      contentType: "",
      headers: {},
      body: new Uint8Array(0),
      text: e instanceof Error ? e.message : String(e),
    };
  } finally {
    clearTimeout(timer);
    request.signal?.removeEventListener("abort", onAbort);
  }
};
