import { promises as fs } from "node:fs";
import path from "node:path";
import type { RunnerConfig } from "./config.js";
import { IMAGE_EXTENSIONS, latestFile } from "./gallery.js";
import type { HttpTransport } from "./http.js";
import { ImageGenerator } from "./image/imageGenerator.js";
import type { Logger } from "./logger.js";
import { StabilityClient, type InputImage } from "./stability/client.js";
import { ArtifactMaterializer, IMAGE_ARTIFACT, VIDEO_ARTIFACT } from "./video/materializer.js";
import { systemClock, type Clock } from "./video/pollScheduler.js";
import type { VideoJobDeps } from "./video/videoJobTracker.js";

const MIME_BY_EXTENSION: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".webp": "image/webp",
};

export async function loadInputImage(filePath: string): Promise<InputImage> {
  const ext = path.extname(filePath).toLowerCase();
  const contentType = MIME_BY_EXTENSION[ext];
  if (!contentType) {
    throw new Error(`Unsupported input image type "${ext || "(none)"}"; expected one of ${IMAGE_EXTENSIONS.join(", ")}`);
  }
  const bytes = new Uint8Array(await fs.readFile(filePath));
  return { bytes, filename: path.basename(filePath), contentType };
}

/**
 * Input image for a video job: the given path, or the most recently
 * generated image when none is given.
 */
export async function resolveInputImagePath(config: RunnerConfig, given?: string): Promise<string> {
  const trimmed = (given || "").trim();
  if (trimmed) return path.resolve(trimmed);
  const latest = await latestFile(config.imageOutputDir, IMAGE_EXTENSIONS);
  if (!latest) throw new Error(`No input image given and none found in ${config.imageOutputDir}`);
  return latest;
}

export interface RunnerOverrides {
  transport?: HttpTransport;
  clock?: Clock;
}

export function createVideoJobDeps(config: RunnerConfig, log: Logger, overrides: RunnerOverrides = {}): VideoJobDeps {
  return {
    api: new StabilityClient(config, overrides.transport),
    materializer: new ArtifactMaterializer(config.videoOutputDir, VIDEO_ARTIFACT),
    clock: overrides.clock ?? systemClock,
    logger: log,
    placeholders: { pending: config.pendingPlaceholder, error: config.errorPlaceholder },
    poll: {
      minIntervalMs: config.pollIntervalMs,
      timeoutMs: config.pollTimeoutMs,
      maxUnclassifiedPolls: config.maxUnclassifiedPolls,
    },
  };
}

export function createImageGenerator(config: RunnerConfig, log: Logger, overrides: RunnerOverrides = {}): ImageGenerator {
  const clock = overrides.clock ?? systemClock;
  return new ImageGenerator(
    new StabilityClient(config, overrides.transport),
    new ArtifactMaterializer(config.imageOutputDir, IMAGE_ARTIFACT),
    log,
    () => clock.now(),
  );
}
