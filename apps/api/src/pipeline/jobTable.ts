import { JobPhase, type JobId, type JobStatusV1, type JobV1 } from "@rendercache/shared";

type JobEntry = {
  job: JobV1;
  phase: JobPhase;
  created_at_ms: number;
};

/** Jobs the process currently knows about, from ticket issue until a terminal outcome. */
export class JobTable {
  private readonly entries = new Map<JobId, JobEntry>();
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  get size(): number {
    return this.entries.size;
  }

  add(job: JobV1): void {
    this.entries.set(job.job_id, { job, phase: JobPhase.Pending, created_at_ms: this.now() });
  }

  get(jobId: JobId): JobV1 | null {
    return this.entries.get(jobId)?.job ?? null;
  }

  phase(jobId: JobId): JobPhase | null {
    return this.entries.get(jobId)?.phase ?? null;
  }

  status(jobId: JobId): JobStatusV1 | null {
    const entry = this.entries.get(jobId);
    if (!entry) return null;
    return {
      job_id: entry.job.job_id,
      phase: entry.phase,
      fingerprint: entry.job.fingerprint,
      output_ref: entry.job.output_ref,
    };
  }

  setPhase(jobId: JobId, phase: JobPhase): boolean {
    const entry = this.entries.get(jobId);
    if (!entry) return false;
    entry.phase = phase;
    return true;
  }

  hasFingerprint(fingerprint: string): boolean {
    for (const entry of this.entries.values()) {
      if (entry.job.fingerprint === fingerprint) return true;
    }
    return false;
  }

  remove(jobId: JobId): boolean {
    return this.entries.delete(jobId);
  }

  countByPhase(): Record<JobPhase, number> {
    const counts: Record<JobPhase, number> = { pending: 0, queued: 0, processing: 0 };
    for (const entry of this.entries.values()) counts[entry.phase] += 1;
    return counts;
  }

  /** Drops tickets that were never activated within `ttlMs`. */
  expirePending(ttlMs: number): JobV1[] {
    const cutoff = this.now() - ttlMs;
    const expired: JobV1[] = [];
    for (const [jobId, entry] of this.entries) {
      if (entry.phase !== JobPhase.Pending || entry.created_at_ms > cutoff) continue;
      this.entries.delete(jobId);
      expired.push(entry.job);
    }
    return expired;
  }
}
