import type { JobId } from "./ids.js";

export const JobPhase = {
  Pending: "pending",
  Queued: "queued",
  Processing: "processing",
} as const;

export type JobPhase = (typeof JobPhase)[keyof typeof JobPhase];

export interface JobV1 {
  job_id: JobId;
  fingerprint: string;
  input_ref: string;
  output_ref: string;
}

export interface JobStatusV1 {
  job_id: JobId;
  phase: JobPhase;
  fingerprint: string;
  output_ref: string;
}

export interface SubmissionCachedV1 {
  status: "cached";
  fingerprint: string;
  output_ref: string;
  download_url: string;
}

export interface SubmissionAcceptedV1 {
  status: "accepted";
  job_id: JobId;
  fingerprint: string;
  output_ref: string;
  channel_path: string;
}

export type SubmissionResultV1 = SubmissionCachedV1 | SubmissionAcceptedV1;

export const OUTPUT_ROUTE_PREFIX = "/v1/outputs/";
export const CHANNEL_PATH = "/v1/jobs/channel";

export function downloadUrlFor(output_ref: string): string {
  return `${OUTPUT_ROUTE_PREFIX}${encodeURIComponent(output_ref)}`;
}
