import type { ActivatedJob } from "../../core/jobs/activatedJob";
import { JobQueueOverflowError, type JobQueue } from "../../core/jobs/jobQueue";
import type { JobSubscriptionParams, OriginClient, WorkerHandle } from "../../ports/OriginClient";
import { logEvent, toErrorMessage } from "../../shared/logging/log";
import { classifyActivatedJob } from "./job.validation";

export type WorkerSetParams = Omit<JobSubscriptionParams, "jobType"> & {
  jobTypes: string[];
  jobHeaderTopic: string;
};

/**
 * One activation subscription per job type. Valid jobs land in the queue, invalid ones
 * are failed back to the engine. Fail-command and overflow errors are logged and kept
 * away from the subscription: a handler that throws stops the flow of jobs for its type.
 */
export class JobWorkerSet {
  private handles: WorkerHandle[] = [];

  constructor(private readonly queue: JobQueue) {}

  get size(): number {
    return this.handles.length;
  }

  open(client: OriginClient, params: WorkerSetParams): void {
    const { jobTypes, jobHeaderTopic, ...subscription } = params;
    for (const jobType of new Set(jobTypes)) {
      const handle = client.openWorker({ ...subscription, jobType }, (job) =>
        this.onJobActivated(client, job, jobHeaderTopic)
      );
      this.handles.push(handle);
    }
  }

  async closeAll(): Promise<void> {
    const handles = this.handles;
    this.handles = [];

    for (const handle of handles) {
      try {
        await handle.close();
      } catch (err) {
        logEvent("warn", {
          event: "source.worker_close_failed",
          jobType: handle.jobType,
          reason: toErrorMessage(err)
        });
      }
    }
  }

  private async onJobActivated(client: OriginClient, job: ActivatedJob, headerName: string): Promise<void> {
    const decision = classifyActivatedJob(job, headerName);

    if (decision.action === "fail") {
      logEvent("warn", decision.log);
      try {
        await client.failJob({ jobKey: job.key, retries: decision.retries, errorMessage: decision.errorMessage });
      } catch (err) {
        logEvent("warn", {
          event: "source.fail_command_failed",
          jobKey: job.key,
          reason: toErrorMessage(err)
        });
      }
      return;
    }

    try {
      this.queue.enqueue(job);
      logEvent("debug", { event: "source.job_activated", jobKey: job.key, jobType: job.type });
    } catch (err) {
      if (!(err instanceof JobQueueOverflowError)) throw err;
      // Left activated; the engine hands it out again once the job timeout expires.
      logEvent("warn", {
        event: "source.queue_overflow",
        jobKey: job.key,
        capacity: err.capacity
      });
    }
  }
}
