import assert from "node:assert/strict";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { isJobId, type JobId, type JobV1, type SubmissionAcceptedV1 } from "@rendercache/shared";

import { ContractViolationError } from "../src/contracts/render_contract.js";
import type { LoggerLike } from "../src/observability/traceContext.js";
import { CorrelationRegistry } from "../src/pipeline/correlationRegistry.js";
import { DedupCache } from "../src/pipeline/dedupCache.js";
import { deriveFingerprint } from "../src/pipeline/fingerprint.js";
import { JobTable } from "../src/pipeline/jobTable.js";
import { NotificationChannel, type ChannelTransport } from "../src/pipeline/notificationChannel.js";
import { RenderService, inputRefFor, outputRefFor } from "../src/pipeline/renderService.js";
import { BoundedQueue } from "../src/pipeline/workQueue.js";

const silentLogger: LoggerLike = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

class FakeTransport implements ChannelTransport {
  isOpen = true;
  readonly sent: unknown[] = [];
  readonly closes: Array<{ code: number; reason: string }> = [];

  send(text: string): Promise<void> {
    this.sent.push(JSON.parse(text));
    return Promise.resolve();
  }

  close(code: number, reason: string): void {
    this.isOpen = false;
    this.closes.push({ code, reason });
  }
}

function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

let channelSeq = 0;
function openChannel(): { channel: NotificationChannel; transport: FakeTransport } {
  const transport = new FakeTransport();
  channelSeq += 1;
  return { channel: new NotificationChannel(`ch_${channelSeq}`, transport, silentLogger), transport };
}

type Harness = {
  service: RenderService;
  cache: DedupCache;
  queue: BoundedQueue<JobV1>;
  registry: CorrelationRegistry<NotificationChannel>;
  jobs: JobTable;
  uploadDir: string;
};

async function harness(root: string, opts: { capacity?: number; now?: () => number } = {}): Promise<Harness> {
  const cache = await DedupCache.open(path.join(root, "file_hashes.json"));
  const queue = new BoundedQueue<JobV1>(opts.capacity ?? 4);
  const registry = new CorrelationRegistry<NotificationChannel>();
  const jobs = new JobTable(opts.now);
  const uploadDir = path.join(root, "uploads");
  const service = new RenderService({ cache, queue, registry, jobs, uploadDir, logger: silentLogger });
  return { service, cache, queue, registry, jobs, uploadDir };
}

async function submitFresh(service: RenderService, content: string): Promise<SubmissionAcceptedV1> {
  const result = await service.submit(Buffer.from(content));
  assert.equal(result.status, "accepted");
  if (result.status !== "accepted") throw new Error("expected an accepted submission");
  return result;
}

async function main(): Promise<void> {
  const tmp = await mkdtemp(path.join(os.tmpdir(), "rendercache-service-"));
  try {
    // fresh content yields a pending ticket and a stored input
    {
      const h = await harness(path.join(tmp, "fresh"));
      const fingerprint = deriveFingerprint(Buffer.from("solid fresh"));
      const accepted = await submitFresh(h.service, "solid fresh");

      assert.ok(isJobId(accepted.job_id));
      assert.equal(accepted.fingerprint, fingerprint);
      assert.equal(accepted.output_ref, `output-${fingerprint}.png`);
      assert.equal(accepted.channel_path, "/v1/jobs/channel");
      assert.equal(inputRefFor(fingerprint), `input-${fingerprint}.stl`);
      assert.equal(outputRefFor(fingerprint), accepted.output_ref);

      const stored = await readFile(path.join(h.uploadDir, `input-${fingerprint}.stl`), "utf8");
      assert.equal(stored, "solid fresh");
      assert.deepEqual(h.service.status(accepted.job_id), {
        job_id: accepted.job_id,
        phase: "pending",
        fingerprint,
        output_ref: accepted.output_ref,
      });
      assert.equal(h.queue.size, 0);

      // the same content twice before completion yields two tickets
      const again = await submitFresh(h.service, "solid fresh");
      assert.notEqual(again.job_id, accepted.job_id);
      assert.equal(again.fingerprint, fingerprint);
    }

    // cached content never creates a job
    {
      const h = await harness(path.join(tmp, "cached"));
      const fingerprint = deriveFingerprint(Buffer.from("solid cached"));
      await h.cache.record(fingerprint, outputRefFor(fingerprint));

      const result = await h.service.submit(Buffer.from("solid cached"));
      assert.deepEqual(result, {
        status: "cached",
        fingerprint,
        output_ref: `output-${fingerprint}.png`,
        download_url: `/v1/outputs/output-${fingerprint}.png`,
      });
      assert.equal(h.jobs.size, 0);
    }

    // subscribing activates the ticket
    {
      const h = await harness(path.join(tmp, "subscribe"));
      const accepted = await submitFresh(h.service, "solid subscribe");
      const first = openChannel();

      const outcome = await h.service.subscribe(accepted.job_id, first.channel);
      assert.deepEqual(outcome, { ok: true, phase: "queued", activated: true });
      assert.equal(h.queue.size, 1);
      assert.equal(h.jobs.phase(accepted.job_id), "queued");
      assert.equal(h.registry.lookup(accepted.job_id), first.channel);

      await settle();
      assert.deepEqual(first.transport.sent, [{ type: "job.subscribed", job_id: accepted.job_id, phase: "queued" }]);

      // a second channel replaces the first without enqueuing again
      const second = openChannel();
      const replaced = await h.service.subscribe(accepted.job_id, second.channel);
      assert.deepEqual(replaced, { ok: true, phase: "queued", activated: false });
      assert.equal(h.queue.size, 1);
      assert.equal(h.registry.lookup(accepted.job_id), second.channel);
      assert.deepEqual(first.transport.closes, [{ code: 4000, reason: "superseded by a newer channel" }]);

      const dequeued = await h.queue.dequeue();
      assert.equal(dequeued?.job_id, accepted.job_id);
    }

    // unknown job ids are reported, not bound
    {
      const h = await harness(path.join(tmp, "unknown"));
      const missing: JobId = "job_01HZY3Q8J6K2M4N5P7R9S1T3V5";
      const { channel } = openChannel();
      const outcome = await h.service.subscribe(missing, channel);
      assert.deepEqual(outcome, {
        ok: false,
        reason_code: "unknown_job",
        reason: `no active job ${missing}`,
      });
      assert.equal(channel.state, "opened");
      assert.equal(h.registry.size, 0);
    }

    // a saturated queue holds the subscription open until a slot drains
    {
      const h = await harness(path.join(tmp, "saturated"), { capacity: 1 });
      const a = await submitFresh(h.service, "solid a");
      const b = await submitFresh(h.service, "solid b");

      await h.service.subscribe(a.job_id, openChannel().channel);
      let bSettled = false;
      const bOutcome = h.service.subscribe(b.job_id, openChannel().channel).then((outcome) => {
        bSettled = true;
        return outcome;
      });

      await settle();
      assert.equal(bSettled, false);
      assert.equal(h.queue.blockedProducers, 1);

      const head = await h.queue.dequeue();
      assert.equal(head?.job_id, a.job_id);
      assert.deepEqual(await bOutcome, { ok: true, phase: "queued", activated: true });
      const next = await h.queue.dequeue();
      assert.equal(next?.job_id, b.job_id);
    }

    // a closed queue fails the job on its channel
    {
      const h = await harness(path.join(tmp, "closed"));
      const accepted = await submitFresh(h.service, "solid closed");
      h.queue.close();
      const { channel, transport } = openChannel();

      const outcome = await h.service.subscribe(accepted.job_id, channel);
      assert.deepEqual(outcome, { ok: true, phase: "queued", activated: false });
      assert.equal(h.jobs.get(accepted.job_id), null);

      await settle();
      assert.deepEqual(transport.sent, [
        { type: "job.subscribed", job_id: accepted.job_id, phase: "queued" },
        { type: "job.failed", job_id: accepted.job_id, reason: "service is shutting down" },
      ]);
      assert.deepEqual(transport.closes, [{ code: 1000, reason: "job finished" }]);
    }

    // tickets nobody subscribes to expire, and their inputs go with them
    {
      let clock = 1_000;
      const h = await harness(path.join(tmp, "expire"), { now: () => clock });
      const stale = await submitFresh(h.service, "solid stale");
      const sharedOld = await submitFresh(h.service, "solid shared");
      clock = 5_000;
      const fresh = await submitFresh(h.service, "solid recent");
      const sharedNew = await submitFresh(h.service, "solid shared");
      const active = await submitFresh(h.service, "solid active");
      await h.service.subscribe(active.job_id, openChannel().channel);

      clock = 6_000;
      assert.equal(await h.service.sweepExpiredTickets(2_000), 2);
      assert.equal(h.service.status(stale.job_id), null);
      assert.equal(h.service.status(sharedOld.job_id), null);
      assert.equal(h.service.status(fresh.job_id)?.phase, "pending");
      assert.equal(h.service.status(sharedNew.job_id)?.phase, "pending");
      assert.equal(h.service.status(active.job_id)?.phase, "queued");

      await assert.rejects(readFile(path.join(h.uploadDir, `input-${stale.fingerprint}.stl`)), { code: "ENOENT" });
      assert.equal(await readFile(path.join(h.uploadDir, `input-${sharedNew.fingerprint}.stl`), "utf8"), "solid shared");
      assert.equal(await readFile(path.join(h.uploadDir, `input-${fresh.fingerprint}.stl`), "utf8"), "solid recent");

      clock = 10_000;
      assert.equal(await h.service.sweepExpiredTickets(2_000), 2);
      await assert.rejects(readFile(path.join(h.uploadDir, `input-${sharedNew.fingerprint}.stl`)), { code: "ENOENT" });
      assert.equal(h.service.status(active.job_id)?.phase, "queued");
    }

    // an unwritable upload directory is a contract error
    {
      const root = path.join(tmp, "unwritable");
      const h = await harness(root);
      await rm(root, { recursive: true, force: true });
      await writeFile(root, "not a directory");

      await assert.rejects(h.service.submit(Buffer.from("solid lost")), (err: unknown) => {
        assert.ok(err instanceof ContractViolationError);
        assert.equal(err.reason_code, "input_unwritable");
        assert.equal(err.message, "failed to save uploaded content");
        return true;
      });
      assert.equal(h.jobs.size, 0);
    }
  } finally {
    await rm(tmp, { recursive: true, force: true });
  }
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
