import { z } from "zod";
import { jobError, type JobError } from "../errors.js";
import type { HttpResult } from "../http.js";
import { parseErrorBody, shortBody } from "../stability/errorBody.js";
import type { InputImage, VideoGenerationApi } from "../stability/client.js";

export const VideoParamsSchema = z.object({
  motionBucketId: z.number().int().min(1).max(255).default(222),
  seed: z.number().int().min(0).max(4294967294).optional(),
  cfgScale: z.number().min(0).max(10).optional(),
});

export type VideoParams = z.input<typeof VideoParamsSchema>;

export type SubmissionOutcome =
  | { accepted: true; generationId: string }
  | { accepted: false; error: JobError };

const SubmissionAcceptedSchema = z.object({ id: z.string().min(1) });

export function interpretSubmissionResponse(result: HttpResult): SubmissionOutcome {
  const body = parseErrorBody(result);

  if (body.name) {
    return {
      accepted: false,
      error: jobError("SubmissionRejected", { httpStatus: result.status, ...body }),
    };
  }

  if (result.status === 200) {
    const parsed = SubmissionAcceptedSchema.safeParse(result.json);
    if (parsed.success) return { accepted: true, generationId: parsed.data.id };
    return {
      accepted: false,
      error: jobError("SubmissionRejected", {
        httpStatus: 200,
        name: "missing_generation_id",
        messages: ["submission response did not carry a generation id"],
      }),
    };
  }

  const fallback = result.status === 0 ? result.text || "transport failure" : shortBody(result);
  return {
    accepted: false,
    error: jobError("SubmissionRejected", {
      httpStatus: result.status,
      id: body.id,
      name: result.status === 0 ? "transport_error" : `http_${result.status}`,
      messages: body.messages.length ? body.messages : fallback ? [fallback] : [],
    }),
  };
}

/**
 * Issues the creation request. Exactly one network call, none at all when
 * the parameters fail validation.
 */
export async function submitVideoJob(
  api: VideoGenerationApi,
  image: InputImage,
  params: VideoParams = {},
  signal?: AbortSignal,
): Promise<SubmissionOutcome> {
  const checked = VideoParamsSchema.safeParse(params);
  if (!checked.success) {
    return {
      accepted: false,
      error: jobError("SubmissionRejected", {
        name: "invalid_parameters",
        messages: checked.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      }),
    };
  }

  const result = await api.submitImageToVideo({ image, ...checked.data }, signal);
  return interpretSubmissionResponse(result);
}
