import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { toHttpResult, type HttpResult } from "../../src/http.js";
import { Logger } from "../../src/logger.js";
import type { VideoGenerationApi, VideoSubmissionRequest } from "../../src/stability/client.js";
import { ArtifactMaterializer, VIDEO_ARTIFACT } from "../../src/video/materializer.js";
import type { Clock } from "../../src/video/pollScheduler.js";
import type { VideoJobDeps } from "../../src/video/videoJobTracker.js";

export const T0 = new Date(2026, 0, 15, 9, 30, 0).getTime();

/** Sleeping advances virtual time immediately. */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(public current: number = T0) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new Error("aborted");
    this.sleeps.push(ms);
    this.current += ms;
    await Promise.resolve();
  }
}

/** Sleeps stay pending until `release()` or an abort. */
export class GatedClock implements Clock {
  private readonly waiting: Array<{ ms: number; resolve: () => void }> = [];

  constructor(public current: number = T0) {}

  now(): number {
    return this.current;
  }

  get pendingSleeps(): number {
    return this.waiting.length;
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new Error("aborted"));
        return;
      }
      this.waiting.push({ ms, resolve });
      signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
    });
  }

  async release(): Promise<void> {
    const next = this.waiting.shift();
    if (!next) throw new Error("no pending sleep");
    this.current += next.ms;
    next.resolve();
    await flush();
  }
}

export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function jsonResponse(status: number, body: unknown): HttpResult {
  return toHttpResult(status, { "Content-Type": "application/json" }, new TextEncoder().encode(JSON.stringify(body)));
}

export function binaryResponse(status: number, bytes: Uint8Array, contentType = "video/mp4"): HttpResult {
  return toHttpResult(status, { "Content-Type": contentType }, bytes);
}

type PollStep = HttpResult | (() => Promise<HttpResult>);

export class ScriptedVideoApi implements VideoGenerationApi {
  readonly submissions: VideoSubmissionRequest[] = [];
  readonly polls: Array<{ generationId: string; at: number }> = [];

  constructor(
    private readonly submitResult: HttpResult,
    private readonly pollSteps: PollStep[],
    private readonly clock: Clock,
  ) {}

  async submitImageToVideo(request: VideoSubmissionRequest): Promise<HttpResult> {
    this.submissions.push(request);
    return this.submitResult;
  }

  async fetchVideoResult(generationId: string): Promise<HttpResult> {
    this.polls.push({ generationId, at: this.clock.now() });
    const step = this.pollSteps.shift();
    if (!step) throw new Error(`unexpected poll #${this.polls.length}`);
    return typeof step === "function" ? step() : step;
  }
}

export const DUMMY_IMAGE = {
  bytes: new Uint8Array(128 * 128 * 3).fill(127),
  filename: "dummy.png",
  contentType: "image/png",
};

export const PLACEHOLDERS = { pending: "/placeholders/video_pending.png", error: "/placeholders/video_error.png" };

export function quietLogger(): Logger {
  return new Logger("error");
}

export async function makeTempDir(prefix = "media-job-runner-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function makeDeps(
  api: VideoGenerationApi,
  clock: Clock,
  outputDir: string,
  poll: Partial<VideoJobDeps["poll"]> = {},
): VideoJobDeps {
  return {
    api,
    materializer: new ArtifactMaterializer(outputDir, VIDEO_ARTIFACT),
    clock,
    logger: quietLogger(),
    placeholders: PLACEHOLDERS,
    poll: { minIntervalMs: 11_000, timeoutMs: 0, maxUnclassifiedPolls: 5, ...poll },
  };
}
