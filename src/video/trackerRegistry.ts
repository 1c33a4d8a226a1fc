import type { VideoJobTracker } from "./videoJobTracker.js";

/**
 * Caller-owned set of trackers for one session. Holds at most `maxEntries`;
 * the oldest trackers that are no longer polling are evicted first and
 * pending trackers are never evicted, so the size may exceed the limit
 * while many jobs are in flight.
 */
export class TrackerRegistry {
  private readonly trackers = new Map<string, VideoJobTracker>();

  constructor(private readonly maxEntries = 50) {}

  add(tracker: VideoJobTracker): void {
    this.trackers.delete(tracker.trackerId);
    this.trackers.set(tracker.trackerId, tracker);
    this.evict();
  }

  get(trackerId: string): VideoJobTracker | null {
    return this.trackers.get(trackerId) ?? null;
  }

  /** Newest first. */
  list(): VideoJobTracker[] {
    return [...this.trackers.values()].reverse();
  }

  pending(): VideoJobTracker[] {
    return this.list().filter((t) => t.isPending());
  }

  get size(): number {
    return this.trackers.size;
  }

  cancelAll(): void {
    for (const tracker of this.trackers.values()) tracker.cancel();
  }

  private evict(): void {
    if (this.trackers.size <= this.maxEntries) return;
    for (const [id, tracker] of this.trackers) {
      if (this.trackers.size <= this.maxEntries) return;
      if (!tracker.isPending()) this.trackers.delete(id);
    }
  }
}
