import { z } from "zod";
import { LocalIOError } from "../errors.js";
import type { Logger } from "../logger.js";
import { parseErrorBody, shortBody } from "../stability/errorBody.js";
import type { ImageGenerationApi } from "../stability/client.js";
import type { ArtifactMaterializer } from "../video/materializer.js";

export const ASPECT_RATIOS = ["1:1", "16:9", "9:16", "4:5", "5:4", "3:2", "2:3", "9:21", "21:9"] as const;

export const ImagePromptSchema = z.object({
  prompt: z.string().trim().min(1, "prompt is required"),
  aspectRatio: z.enum(ASPECT_RATIOS).default("1:1"),
});

export interface ImagePrompt {
  prompt: string;
  aspectRatio?: string;
}

export interface ImageGenerationResult {
  status: number;
  finishReason: string | null;
  seed: string | null;
  imagePath: string | null;
  errorName: string | null;
  errorMessages: string[];
}

/**
 * Text-to-image: a single request whose 200 response body is the image.
 * There is no job to track; the bytes are saved straight away.
 */
export class ImageGenerator {
  private readonly results: ImageGenerationResult[] = [];

  constructor(
    private readonly api: ImageGenerationApi,
    private readonly materializer: ArtifactMaterializer,
    private readonly log: Logger,
    private readonly now: () => number = Date.now,
  ) {}

  /** Results of this generator's calls, oldest first. */
  history(): readonly ImageGenerationResult[] {
    return this.results;
  }

  async generate(input: ImagePrompt): Promise<ImageGenerationResult> {
    const checked = ImagePromptSchema.safeParse(input);
    if (!checked.success) {
      return this.record({
        status: 0,
        finishReason: null,
        seed: null,
        imagePath: null,
        errorName: "invalid_parameters",
        errorMessages: checked.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      });
    }

    const { prompt, aspectRatio } = checked.data;
    const res = await this.api.generateImage({ prompt, aspectRatio, outputFormat: "png" });
    const finishReason = res.headers["finish-reason"] ?? null;
    const seed = res.headers["seed"] ?? null;

    if (res.status !== 200) {
      const body = parseErrorBody(res);
      const messages = body.messages.length ? body.messages : [shortBody(res)].filter(Boolean);
      this.log.warn(`Error: ${res.status} ${messages.join("; ")}`, { action: "generate" });
      return this.record({
        status: res.status,
        finishReason,
        seed,
        imagePath: null,
        errorName: body.name ?? (res.status === 0 ? "transport_error" : `http_${res.status}`),
        errorMessages: messages,
      });
    }

    try {
      const imagePath = await this.materializer.write(res.body, this.now());
      this.log.info(`Saved image to ${imagePath}`, { action: "generate", finishReason });
      return this.record({ status: 200, finishReason, seed, imagePath, errorName: null, errorMessages: [] });
    } catch (e) {
      if (!(e instanceof LocalIOError)) throw e;
      this.log.error("Saving image failed", e, { action: "generate", path: e.path });
      return this.record({
        status: 200,
        finishReason,
        seed,
        imagePath: null,
        errorName: "LocalIOFailure",
        errorMessages: [e.message],
      });
    }
  }

  private record(result: ImageGenerationResult): ImageGenerationResult {
    this.results.push(result);
    return result;
  }
}
