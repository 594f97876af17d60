import type { JobId } from "@rendercache/shared";

import { NOOP_SINK, type NotificationSink } from "./notificationSink.js";

/**
 * Live job id -> channel bindings. Every operation completes synchronously,
 * so no caller can observe a half-applied update. The registry holds
 * references only; channels are opened and closed by their own handlers.
 */
export class CorrelationRegistry<C extends NotificationSink = NotificationSink> {
  private readonly channels = new Map<JobId, C>();

  get size(): number {
    return this.channels.size;
  }

  /** Binds `channel` to `jobId`; returns the channel it replaced, if any. */
  register(jobId: JobId, channel: C): C | null {
    const previous = this.channels.get(jobId) ?? null;
    this.channels.set(jobId, channel);
    return previous === channel ? null : previous;
  }

  lookup(jobId: JobId): C | null {
    return this.channels.get(jobId) ?? null;
  }

  /**
   * Removes the binding. With `channel`, only when it is still the bound one,
   * so a replaced channel closing late cannot evict its successor.
   */
  unregister(jobId: JobId, channel?: C): boolean {
    const current = this.channels.get(jobId);
    if (!current) return false;
    if (channel && current !== channel) return false;
    this.channels.delete(jobId);
    return true;
  }

  sinkFor(jobId: JobId): NotificationSink {
    return this.channels.get(jobId) ?? NOOP_SINK;
  }
}
