import { fetchTransport, type HttpResult, type HttpTransport, type MultipartField } from "../http.js";
import type { RunnerConfig } from "../config.js";

export interface InputImage {
  bytes: Uint8Array;
  filename: string;
  contentType: string;
}

export interface VideoSubmissionRequest {
  image: InputImage;
  motionBucketId: number;
  seed?: number;
  cfgScale?: number;
}

export interface ImageGenerationRequest {
  prompt: string;
  aspectRatio: string;
  outputFormat: "png";
}

export interface VideoGenerationApi {
  submitImageToVideo(request: VideoSubmissionRequest, signal?: AbortSignal): Promise<HttpResult>;
  fetchVideoResult(generationId: string, signal?: AbortSignal): Promise<HttpResult>;
}

export interface ImageGenerationApi {
  generateImage(request: ImageGenerationRequest, signal?: AbortSignal): Promise<HttpResult>;
}

type ClientConfig = Pick<RunnerConfig, "apiKey" | "videoEndpoint" | "imageBaseUrl" | "imageModel" | "httpTimeoutMs">;

export class StabilityClient implements VideoGenerationApi, ImageGenerationApi {
  constructor(
    private readonly config: ClientConfig,
    private readonly transport: HttpTransport = fetchTransport,
  ) {}

  private authHeaders(accept?: string): Record<string, string> {
    const headers: Record<string, string> = { Authorization: `Bearer ${this.config.apiKey}` };
    if (accept) headers.Accept = accept;
    return headers;
  }

  submitImageToVideo(request: VideoSubmissionRequest, signal?: AbortSignal): Promise<HttpResult> {
    const multipart: MultipartField[] = [
      { name: "image", ...request.image },
      { name: "motion_bucket_id", value: String(request.motionBucketId) },
    ];
    if (request.seed !== undefined) multipart.push({ name: "seed", value: String(request.seed) });
    if (request.cfgScale !== undefined) multipart.push({ name: "cfg_scale", value: String(request.cfgScale) });

    return this.transport({
      method: "POST",
      url: this.config.videoEndpoint,
      headers: this.authHeaders(),
      multipart,
      timeoutMs: this.config.httpTimeoutMs,
      signal,
    });
  }

  fetchVideoResult(generationId: string, signal?: AbortSignal): Promise<HttpResult> {
    return this.transport({
      method: "GET",
      url: `${this.config.videoEndpoint}/result/${encodeURIComponent(generationId)}`,
      headers: this.authHeaders("video/*"),
      timeoutMs: this.config.httpTimeoutMs,
      signal,
    });
  }

  generateImage(request: ImageGenerationRequest, signal?: AbortSignal): Promise<HttpResult> {
    return this.transport({
      method: "POST",
      url: `${this.config.imageBaseUrl}/generate/${this.config.imageModel}`,
      headers: this.authHeaders("image/*"),
      multipart: [
        { name: "prompt", value: request.prompt },
        { name: "aspect_ratio", value: request.aspectRatio },
        { name: "output_format", value: request.outputFormat },
      ],
      timeoutMs: this.config.httpTimeoutMs,
      signal,
    });
  }
}
