import { randomUUID } from "node:crypto";
import { LocalIOError, describeJobError, errorMessage, jobError, type JobError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { InputImage, VideoGenerationApi } from "../stability/client.js";
import {
  displayPath,
  initialState,
  isTerminal,
  transition,
  type Placeholders,
  type VideoJobEvent,
  type VideoJobState,
  type VideoJobStatus,
} from "./jobState.js";
import type { ArtifactMaterializer } from "./materializer.js";
import { runPollLoop, type Clock, type PollLoopExit } from "./pollScheduler.js";
import { interpretPollResponse } from "./statusInterpreter.js";
import { submitVideoJob, type VideoParams } from "./submission.js";

export interface PollSettings {
  minIntervalMs: number;
  timeoutMs: number;
  maxUnclassifiedPolls: number;
}

export interface VideoJobDeps {
  api: VideoGenerationApi;
  materializer: ArtifactMaterializer;
  clock: Clock;
  logger: Logger;
  placeholders: Placeholders;
  poll: PollSettings;
}

export interface VideoJobSnapshot extends VideoJobState {
  trackerId: string;
  displayPath: string;
}

export type SnapshotListener = (snapshot: VideoJobSnapshot) => void;

export interface SubmitOptions {
  params?: VideoParams;
  onChange?: SnapshotListener;
  /** Aborting it cancels the tracker, including a submission still in flight. */
  signal?: AbortSignal;
}

/**
 * One video generation request from submission to its terminal status.
 * State is only ever replaced through `transition`; callers read snapshots.
 */
export class VideoJobTracker {
  readonly trackerId = randomUUID();
  private state: VideoJobState;
  private readonly controller = new AbortController();
  private readonly log: Logger;
  private settled: Promise<VideoJobSnapshot> | null = null;

  private constructor(
    private readonly deps: VideoJobDeps,
    private readonly onChange?: SnapshotListener,
  ) {
    this.state = initialState(deps.clock.now());
    this.log = deps.logger.child({ trackerId: this.trackerId });
  }

  /**
   * Sends the creation request and, when accepted, starts polling in the
   * background. Resolves as soon as the submission outcome is known.
   */
  static async submit(image: InputImage, deps: VideoJobDeps, options: SubmitOptions = {}): Promise<VideoJobTracker> {
    const tracker = new VideoJobTracker(deps, options.onChange);
    if (options.signal?.aborted) tracker.cancel();
    options.signal?.addEventListener("abort", () => tracker.cancel(), { once: true });
    await tracker.start(image, options.params ?? {});
    return tracker;
  }

  status(): VideoJobStatus {
    return this.state.status;
  }

  artifact(): string | null {
    return this.state.artifactPath;
  }

  displayPath(): string {
    return displayPath(this.state, this.deps.placeholders);
  }

  snapshot(): VideoJobSnapshot {
    return {
      ...this.state,
      error: this.state.error ? { ...this.state.error, messages: [...this.state.error.messages] } : null,
      trackerId: this.trackerId,
      displayPath: this.displayPath(),
    };
  }

  isPending(): boolean {
    return !isTerminal(this.state.status) && !this.state.cancelled;
  }

  /** Resolves with the final snapshot once polling has stopped. */
  whenSettled(): Promise<VideoJobSnapshot> {
    return this.settled ?? Promise.resolve(this.snapshot());
  }

  /** Stops further polling. The status stays at its last observed value. */
  cancel(): void {
    if (!this.isPending()) return;
    this.apply({ type: "cancelled" });
    this.controller.abort();
    this.log.info("Polling cancelled", { action: "cancel", status: this.state.status });
  }

  private apply(event: VideoJobEvent): void {
    const next = transition(this.state, event);
    if (next === this.state) return;
    const previous = this.state.status;
    this.state = next;
    if (previous !== next.status) {
      this.log.info(`Status ${previous} -> ${next.status}`, {
        action: event.type,
        generationId: next.generationId ?? undefined,
      });
    }
    this.onChange?.(this.snapshot());
  }

  private fail(error: JobError, at: number | null): void {
    this.log.warn(`Generation failed: ${describeJobError(error)}`, { action: "fail" });
    this.apply({ type: "failed", at, error, placeholderPath: this.deps.placeholders.error });
  }

  private async start(image: InputImage, params: VideoParams): Promise<void> {
    this.log.info(`Submitting ${image.filename} (${image.bytes.length} bytes)`, { action: "submit" });
    const outcome = await submitVideoJob(this.deps.api, image, params, this.controller.signal);
    if (this.controller.signal.aborted) {
      this.log.info("Cancelled during submission; not polling", { action: "submit" });
      return;
    }

    if (!outcome.accepted) {
      for (const message of outcome.error.messages) {
        this.log.warn(`Error: ${message}`, { action: "submit" });
      }
      this.apply({ type: "rejected", error: outcome.error, placeholderPath: this.deps.placeholders.error });
      return;
    }

    this.apply({ type: "accepted", generationId: outcome.generationId });
    this.settled = this.pollUntilSettled(outcome.generationId);
  }

  private async pollUntilSettled(generationId: string): Promise<VideoJobSnapshot> {
    const { clock, poll } = this.deps;
    let exit: PollLoopExit;
    try {
      exit = await runPollLoop({
        clock,
        startTime: this.state.startTime,
        lastPollTime: this.state.lastPollTime,
        minIntervalMs: poll.minIntervalMs,
        timeoutMs: poll.timeoutMs,
        isPending: () => this.isPending(),
        poll: (at) => this.checkStatus(generationId, at),
        signal: this.controller.signal,
      });
    } catch (e) {
      this.log.error("Polling stopped unexpectedly", e instanceof Error ? e : undefined, { action: "poll" });
      this.fail(jobError("Internal", { name: "poll_loop_error", messages: [errorMessage(e)] }), null);
      return this.snapshot();
    }

    if (exit === "timed_out") {
      this.fail(
        jobError("Timeout", {
          name: "poll_timeout",
          messages: [`no terminal status after ${poll.timeoutMs} ms`],
        }),
        null,
      );
    }
    this.log.info(`Finished polling for generation status (${exit})`, { action: "poll", pollCount: this.state.pollCount });
    return this.snapshot();
  }

  private async checkStatus(generationId: string, at: number): Promise<void> {
    this.log.debug(`Checking status of generation ${generationId}`, { action: "poll" });
    const result = await this.deps.api.fetchVideoResult(generationId, this.controller.signal);
    if (this.controller.signal.aborted) return;

    const outcome = interpretPollResponse(result);
    switch (outcome.kind) {
      case "processing":
        this.log.info(`STATUS ${result.status} :: still processing, checking again later`, { action: "poll" });
        this.apply({ type: "polled", at, outcome: "processing" });
        return;

      case "unclassified": {
        this.log.warn(`STATUS ${outcome.httpStatus} :: unclassified response ${outcome.detail}`, { action: "poll" });
        this.apply({ type: "polled", at, outcome: "unclassified" });
        if (this.state.unclassifiedStreak >= this.deps.poll.maxUnclassifiedPolls) {
          this.fail(
            jobError("Unclassified", {
              httpStatus: outcome.httpStatus,
              name: "unclassified_status",
              messages: [`${this.state.unclassifiedStreak} consecutive unclassified responses`, outcome.detail].filter(
                Boolean,
              ),
            }),
            null,
          );
        }
        return;
      }

      case "failed":
        this.fail(outcome.error, at);
        return;

      case "succeeded":
        await this.materialize(outcome.payload, at);
        return;
    }
  }

  private async materialize(payload: Uint8Array, at: number): Promise<void> {
    let artifactPath: string;
    try {
      artifactPath = await this.deps.materializer.write(payload, this.deps.clock.now());
    } catch (e) {
      if (!(e instanceof LocalIOError)) throw e;
      this.log.error("Saving video failed", e, { action: "materialize", path: e.path });
      this.fail(
        jobError("LocalIOFailure", { name: e.code ?? "io_error", messages: [e.message] }),
        at,
      );
      return;
    }
    if (this.controller.signal.aborted) {
      this.log.info(`Discarding ${artifactPath}: polling was cancelled`, { action: "materialize" });
      await this.deps.materializer.discard(artifactPath);
      return;
    }
    this.log.info(`Saved video to ${artifactPath}`, { action: "materialize", bytes: payload.length });
    this.apply({ type: "materialized", at, artifactPath });
  }
}
