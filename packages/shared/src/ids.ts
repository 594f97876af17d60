import { ulid } from "ulid";

export type JobId = `job_${string}`;

const JOB_ID_RE = /^job_[0-9A-HJKMNP-TV-Z]{26}$/;

function withPrefix<T extends string>(prefix: T): `${T}${string}` {
  return `${prefix}${ulid()}` as `${T}${string}`;
}

export function newJobId(): JobId {
  return withPrefix("job_");
}

export function isJobId(value: unknown): value is JobId {
  return typeof value === "string" && JOB_ID_RE.test(value);
}
