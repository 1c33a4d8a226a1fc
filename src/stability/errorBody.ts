import { z } from "zod";
import type { HttpResult } from "../http.js";

const ErrorBodySchema = z.object({
  id: z.string().optional(),
  name: z.string().optional(),
  errors: z.array(z.string()).optional(),
});

export interface ErrorBody {
  id: string | null;
  name: string | null;
  messages: string[];
}

/** Error/metadata fields of a JSON response body; absent fields come back null or empty. */
export function parseErrorBody(result: HttpResult): ErrorBody {
  const parsed = ErrorBodySchema.safeParse(result.json);
  if (!parsed.success) {
    return { id: null, name: null, messages: [] };
  }
  return {
    id: parsed.data.id ?? null,
    name: parsed.data.name ?? null,
    messages: parsed.data.errors ?? [],
  };
}

export function shortBody(result: HttpResult): string {
  const text = result.text ?? "";
  return text.length > 300 ? `${text.slice(0, 300)}…` : text;
}
