import type { JobError } from "../errors.js";

export type VideoJobStatus = "submitted" | "processing" | "succeeded" | "failed";

export interface VideoJobState {
  readonly status: VideoJobStatus;
  readonly generationId: string | null;
  readonly startTime: number;
  readonly lastPollTime: number;
  readonly pollCount: number;
  readonly unclassifiedStreak: number;
  readonly error: JobError | null;
  readonly artifactPath: string | null;
  readonly cancelled: boolean;
}

export type VideoJobEvent =
  | { type: "accepted"; generationId: string }
  | { type: "rejected"; error: JobError; placeholderPath: string }
  | { type: "polled"; at: number; outcome: "processing" | "unclassified" }
  | { type: "materialized"; at: number; artifactPath: string }
  | { type: "failed"; at: number | null; error: JobError; placeholderPath: string }
  | { type: "cancelled" };

export interface Placeholders {
  pending: string;
  error: string;
}

export function initialState(now: number): VideoJobState {
  return {
    status: "submitted",
    generationId: null,
    startTime: now,
    lastPollTime: now,
    pollCount: 0,
    unclassifiedStreak: 0,
    error: null,
    artifactPath: null,
    cancelled: false,
  };
}

export function isTerminal(status: VideoJobStatus): boolean {
  return status === "succeeded" || status === "failed";
}

/**
 * Applies one event. Events that are not allowed from the current status
 * return `state` itself, so no event can leave a terminal status.
 */
export function transition(state: VideoJobState, event: VideoJobEvent): VideoJobState {
  if (isTerminal(state.status)) return state;

  switch (event.type) {
    case "accepted":
      if (state.status !== "submitted") return state;
      return { ...state, status: "processing", generationId: event.generationId };

    case "rejected":
      if (state.status !== "submitted") return state;
      return { ...state, status: "failed", error: event.error, artifactPath: event.placeholderPath };

    case "polled":
      if (state.status !== "processing" || state.cancelled) return state;
      return {
        ...state,
        lastPollTime: event.at,
        pollCount: state.pollCount + 1,
        unclassifiedStreak: event.outcome === "unclassified" ? state.unclassifiedStreak + 1 : 0,
      };

    case "materialized":
      if (state.status !== "processing" || state.cancelled) return state;
      return {
        ...state,
        status: "succeeded",
        lastPollTime: event.at,
        pollCount: state.pollCount + 1,
        unclassifiedStreak: 0,
        artifactPath: event.artifactPath,
      };

    case "failed":
      if (state.status !== "processing" || state.cancelled) return state;
      return {
        ...state,
        status: "failed",
        lastPollTime: event.at ?? state.lastPollTime,
        pollCount: event.at === null ? state.pollCount : state.pollCount + 1,
        error: event.error,
        artifactPath: event.placeholderPath,
      };

    case "cancelled":
      if (state.cancelled) return state;
      return { ...state, cancelled: true };
  }
}

/** Render target for the presentation layer; never null. */
export function displayPath(state: VideoJobState, placeholders: Placeholders): string {
  return state.artifactPath ?? (state.status === "failed" ? placeholders.error : placeholders.pending);
}
