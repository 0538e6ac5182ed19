import { JobQueue } from "../../core/jobs/jobQueue";
import { LifecycleStateCell, type LifecycleState } from "../../core/lifecycle/lifecycleState";
import type { SourceOffset, SourceRecord } from "../../core/records/sourceRecord";
import { translateJob } from "../../core/records/translateJob";
import { OperationCancelledError, type OriginClient, type OriginClientFactory } from "../../ports/OriginClient";
import { raceWithAbort } from "../../shared/concurrency/abort";
import { logEvent, toErrorMessage } from "../../shared/logging/log";
import { readPackageVersion } from "../../shared/version/version";
import { JobWorkerSet } from "./jobWorkerSet";
import { parseSourceTaskConfig, type SourceTaskConfig, type SourceTaskProps } from "./source.config";
import { classifyCommitFailure } from "./source-task.error-handler";

export type PollResult =
  | { kind: "batch"; records: SourceRecord[] }
  | { kind: "no_data" }
  | { kind: "end_of_stream" };

export type CommitOutcome =
  | { status: "completed"; jobKey: string }
  | { status: "cancelled"; jobKey: string };

const NO_DATA: PollResult = { kind: "no_data" };
const END_OF_STREAM: PollResult = { kind: "end_of_stream" };

/**
 * Turns jobs pushed by the activation workers into batches pulled by `poll`, and completes
 * each job when its record is committed.
 *
 * `stop()` only flags the stop. Workers and the client are released by the first poll that
 * sees the stop with an empty queue, so teardown never overlaps a drain.
 */
export class SourceTask {
  private readonly lifecycle = new LifecycleStateCell();
  private queue = new JobQueue();
  private workers = new JobWorkerSet(this.queue);
  private client: OriginClient | null = null;
  private config: SourceTaskConfig | null = null;
  private teardown: Promise<void> | null = null;

  constructor(private readonly createClient: OriginClientFactory) {}

  get state(): LifecycleState {
    return this.lifecycle.current();
  }

  version(): string {
    return readPackageVersion();
  }

  async start(props: SourceTaskProps): Promise<void> {
    if (this.lifecycle.current() !== "idle") {
      throw new Error(`Source task cannot start from state '${this.lifecycle.current()}'`);
    }

    const config = parseSourceTaskConfig(props);
    this.config = config;
    this.queue = new JobQueue(config.queueCapacity);
    this.workers = new JobWorkerSet(this.queue);
    this.client = this.createClient({
      gatewayAddress: config.gatewayAddress,
      requestTimeoutMs: config.requestTimeoutMs
    });

    // Workers go last: opening a subscription starts activating jobs immediately.
    try {
      this.workers.open(this.client, {
        jobTypes: config.jobTypes,
        jobHeaderTopic: config.jobHeaderTopic,
        workerName: config.workerName,
        maxJobsActive: config.maxJobsToActivate,
        requestTimeoutMs: config.requestTimeoutMs,
        jobTimeoutMs: config.jobTimeoutMs,
        pollIntervalMs: config.pollIntervalMs,
        fetchVariables: config.jobVariables
      });
    } catch (err) {
      await this.close();
      throw err;
    }

    this.lifecycle.transition("running");
    logEvent("info", {
      event: "source.started",
      jobTypes: config.jobTypes,
      workerName: config.workerName,
      header: config.jobHeaderTopic
    });
  }

  async poll(signal?: AbortSignal): Promise<PollResult> {
    if (signal?.aborted) {
      throw new OperationCancelledError("poll", "poll aborted", signal.reason);
    }

    switch (this.lifecycle.current()) {
      case "idle":
        return NO_DATA;
      case "stopped":
        return END_OF_STREAM;
      case "running":
        return this.drain() ?? NO_DATA;
      case "stopping": {
        // Jobs that arrived while the stop was being requested are still delivered.
        const batch = this.drain();
        if (batch) return batch;

        this.teardown ??= this.runTeardown();
        await raceWithAbort(this.teardown, "poll", signal);
        return END_OF_STREAM;
      }
    }
  }

  stop(): void {
    if (this.lifecycle.transition("stopping")) return;
    this.lifecycle.transition("stopped");
  }

  async commitRecord(record: SourceRecord, signal?: AbortSignal): Promise<CommitOutcome> {
    return this.completeJob(record.sourceOffset.key, signal);
  }

  async commit(offsets: SourceOffset[], signal?: AbortSignal): Promise<CommitOutcome[]> {
    return Promise.all(offsets.map((offset) => this.completeJob(offset.key, signal)));
  }

  private drain(): PollResult | undefined {
    const jobs = this.queue.drainAll();
    if (jobs.length === 0) return undefined;

    const topicHeader = this.config?.jobHeaderTopic;
    if (topicHeader == null) {
      throw new Error("Source task has queued jobs but no configuration");
    }

    logEvent("debug", { event: "source.polled", jobs: jobs.length });
    return { kind: "batch", records: jobs.map((job) => translateJob(job, topicHeader)) };
  }

  private async completeJob(jobKey: string, signal?: AbortSignal): Promise<CommitOutcome> {
    const client = this.client;

    try {
      if (client == null) {
        throw new OperationCancelledError("complete", "Origin client already closed");
      }
      await raceWithAbort(client.completeJob(jobKey), "complete", signal);
      return { status: "completed", jobKey };
    } catch (err) {
      const decision = classifyCommitFailure(err, { jobKey });
      if (decision.action === "fail") throw decision.error;

      logEvent("debug", decision.log);
      return { status: "cancelled", jobKey };
    }
  }

  private async runTeardown(): Promise<void> {
    await this.close();
    this.lifecycle.transition("stopped");
    logEvent("info", { event: "source.stopped" });
  }

  private async close(): Promise<void> {
    await this.workers.closeAll();

    const client = this.client;
    this.client = null;
    if (client == null) return;

    try {
      await client.close();
    } catch (err) {
      logEvent("warn", { event: "source.client_close_failed", reason: toErrorMessage(err) });
    }
  }
}
