import { isJobId, type JobId } from "./ids.js";
import type { JobPhase } from "./jobs.js";

export interface SubscribeMessageV1 {
  type: "subscribe";
  job_id: JobId;
}

export type ClientMessageV1 = SubscribeMessageV1;

export interface JobSubscribedMessageV1 {
  type: "job.subscribed";
  job_id: JobId;
  phase: JobPhase;
}

export interface JobProcessingMessageV1 {
  type: "job.processing";
  job_id: JobId;
}

export interface JobCompletedMessageV1 {
  type: "job.completed";
  job_id: JobId;
  output_ref: string;
  download_url: string;
  cached: boolean;
}

export interface JobFailedMessageV1 {
  type: "job.failed";
  job_id: JobId;
  reason: string;
}

export const ChannelErrorCode = {
  InvalidMessage: "invalid_message",
  InvalidJobId: "invalid_job_id",
  UnknownJob: "unknown_job",
  AlreadySubscribed: "already_subscribed",
  Internal: "internal_error",
} as const;

export type ChannelErrorCode = (typeof ChannelErrorCode)[keyof typeof ChannelErrorCode];

export interface ChannelErrorMessageV1 {
  type: "channel.error";
  reason_code: ChannelErrorCode;
  reason: string;
}

export type JobNotificationV1 =
  | JobProcessingMessageV1
  | JobCompletedMessageV1
  | JobFailedMessageV1;

export type ServerMessageV1 =
  | JobSubscribedMessageV1
  | JobNotificationV1
  | ChannelErrorMessageV1;

export function isTerminalNotification(
  msg: ServerMessageV1,
): msg is JobCompletedMessageV1 | JobFailedMessageV1 {
  return msg.type === "job.completed" || msg.type === "job.failed";
}

export type ParseClientMessageResult =
  | { ok: true; message: ClientMessageV1 }
  | { ok: false; reason_code: ChannelErrorCode; reason: string };

export function parseClientMessage(raw: string): ParseClientMessageResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { ok: false, reason_code: ChannelErrorCode.InvalidMessage, reason: "message is not valid JSON" };
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    return { ok: false, reason_code: ChannelErrorCode.InvalidMessage, reason: "message must be an object" };
  }

  const type = "type" in parsed ? parsed.type : undefined;
  if (type !== "subscribe") {
    return {
      ok: false,
      reason_code: ChannelErrorCode.InvalidMessage,
      reason: `unsupported message type: ${String(type)}`,
    };
  }
  const rawJobId = "job_id" in parsed ? parsed.job_id : undefined;
  const job_id = typeof rawJobId === "string" ? rawJobId.trim() : rawJobId;
  if (!isJobId(job_id)) {
    return { ok: false, reason_code: ChannelErrorCode.InvalidJobId, reason: "job_id is missing or malformed" };
  }
  return { ok: true, message: { type: "subscribe", job_id } };
}

export function encodeServerMessage(msg: ServerMessageV1): string {
  return JSON.stringify(msg);
}
