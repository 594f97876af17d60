import type { JobNotificationV1 } from "@rendercache/shared";

/**
 * Where the worker sends a job's notifications. Delivery is best effort:
 * `notify` reports whether the message was handed to a live channel, and a
 * `false` is never an error.
 */
export interface NotificationSink {
  notify(msg: JobNotificationV1): boolean;
}

export const NOOP_SINK: NotificationSink = Object.freeze({
  notify: () => false,
});
