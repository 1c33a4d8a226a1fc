import { sleep } from "../env.js";

export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};

export type PollLoopExit = "settled" | "cancelled" | "timed_out";

export interface PollLoopOptions {
  clock: Clock;
  startTime: number;
  lastPollTime: number;
  minIntervalMs: number;
  /** 0 disables the ceiling. */
  timeoutMs: number;
  isPending: () => boolean;
  poll: (at: number) => Promise<void>;
  signal?: AbortSignal;
}

/**
 * Drives one job's status checks. A check is issued only once strictly more
 * than `minIntervalMs` has passed since the previous one; between checks the
 * loop sleeps on the clock instead of spinning.
 */
export async function runPollLoop(options: PollLoopOptions): Promise<PollLoopExit> {
  const { clock, signal, minIntervalMs, timeoutMs, startTime } = options;
  let lastPollTime = options.lastPollTime;

  for (;;) {
    if (signal?.aborted) return "cancelled";
    if (!options.isPending()) return "settled";

    const now = clock.now();
    if (timeoutMs > 0 && now - startTime >= timeoutMs) return "timed_out";

    const elapsed = now - lastPollTime;
    if (elapsed > minIntervalMs) {
      lastPollTime = now;
      await options.poll(now);
      continue;
    }

    const untilDue = minIntervalMs - elapsed + 1;
    const untilTimeout = timeoutMs > 0 ? startTime + timeoutMs - now : untilDue;
    try {
      await clock.sleep(Math.min(untilDue, untilTimeout), signal);
    } catch (e) {
      if (signal?.aborted) return "cancelled";
      throw e;
    }
  }
}
