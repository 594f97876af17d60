import {
  encodeServerMessage,
  isTerminalNotification,
  type ChannelErrorMessageV1,
  type JobId,
  type JobNotificationV1,
  type JobSubscribedMessageV1,
  type ServerMessageV1,
} from "@rendercache/shared";

import type { LoggerLike } from "../observability/traceContext.js";
import type { NotificationSink } from "./notificationSink.js";

export const ChannelState = {
  Opened: "opened",
  Registered: "registered",
  Notified: "notified",
  Terminal: "terminal",
  Closed: "closed",
} as const;

export type ChannelState = (typeof ChannelState)[keyof typeof ChannelState];

export const CloseCode = {
  Normal: 1000,
  Superseded: 4000,
} as const;

/** The transport a channel writes to; `send` settles once the frame is flushed or fails. */
export interface ChannelTransport {
  readonly isOpen: boolean;
  send(text: string): Promise<void>;
  close(code: number, reason: string): void;
}

export class ChannelStateError extends Error {
  constructor(from: ChannelState, to: ChannelState) {
    super(`illegal channel transition ${from} -> ${to}`);
    this.name = "ChannelStateError";
  }
}

/**
 * Server side of one notification channel.
 *
 * opened -> registered -> notified -> terminal -> closed; closed is also
 * reachable from every state and has no way out.
 */
export class NotificationChannel implements NotificationSink {
  readonly channel_id: string;
  private readonly transport: ChannelTransport;
  private readonly logger: LoggerLike;
  private currentState: ChannelState = ChannelState.Opened;
  private boundJobId: JobId | null = null;

  constructor(channel_id: string, transport: ChannelTransport, logger: LoggerLike) {
    this.channel_id = channel_id;
    this.transport = transport;
    this.logger = logger;
  }

  get state(): ChannelState {
    return this.currentState;
  }

  get jobId(): JobId | null {
    return this.boundJobId;
  }

  bind(jobId: JobId): void {
    if (this.currentState !== ChannelState.Opened) {
      throw new ChannelStateError(this.currentState, ChannelState.Registered);
    }
    this.boundJobId = jobId;
    this.currentState = ChannelState.Registered;
  }

  notify(msg: JobNotificationV1): boolean {
    if (this.currentState === ChannelState.Closed || !this.transport.isOpen) return false;
    if (this.currentState === ChannelState.Opened || this.currentState === ChannelState.Terminal) {
      this.logger.debug(
        { event: "channel.notify.dropped", channel_id: this.channel_id, state: this.currentState, type: msg.type },
        "notification not deliverable in current state",
      );
      return false;
    }
    if (msg.job_id !== this.boundJobId) return false;

    const terminal = isTerminalNotification(msg);
    this.currentState = terminal ? ChannelState.Terminal : ChannelState.Notified;
    this.deliver(msg, terminal);
    return true;
  }

  acknowledge(msg: JobSubscribedMessageV1): void {
    this.deliver(msg, false);
  }

  reject(msg: ChannelErrorMessageV1): void {
    this.deliver(msg, false);
  }

  close(code: number, reason: string): void {
    if (this.currentState === ChannelState.Closed) return;
    this.currentState = ChannelState.Closed;
    if (this.transport.isOpen) this.transport.close(code, reason);
  }

  /** Records that the transport went away; returns false if it was already closed. */
  markClosed(): boolean {
    if (this.currentState === ChannelState.Closed) return false;
    this.currentState = ChannelState.Closed;
    return true;
  }

  private deliver(msg: ServerMessageV1, closeAfter: boolean): void {
    if (!this.transport.isOpen) return;
    void this.transport.send(encodeServerMessage(msg)).then(
      () => {
        if (closeAfter) this.close(CloseCode.Normal, "job finished");
      },
      (err: unknown) => {
        this.logger.warn(
          {
            event: "channel.send.failed",
            channel_id: this.channel_id,
            job_id: this.boundJobId,
            type: msg.type,
            err_message: err instanceof Error ? err.message : String(err),
          },
          "notification send failed, closing channel",
        );
        this.close(CloseCode.Normal, "send failed");
      },
    );
  }
}
