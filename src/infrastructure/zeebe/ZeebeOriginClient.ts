import { ZBClient, type Job } from "zeebe-node";
import type { ActivatedJob } from "../../core/jobs/activatedJob";
import {
  OperationCancelledError,
  type CancellableOperation,
  type FailJobCommand,
  type JobActivationHandler,
  type JobSubscriptionParams,
  type OriginClient,
  type OriginConnectionConfig,
  type WorkerHandle
} from "../../ports/OriginClient";
import { raceWithAbort } from "../../shared/concurrency/abort";

// gRPC status code for a call cancelled on the client side (e.g. channel closed).
const GRPC_CANCELLED = 1;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

export const isGrpcCancellation = (err: unknown): boolean => {
  if (!isRecord(err)) return false;
  if (err.code === GRPC_CANCELLED) return true;
  return typeof err.message === "string" && /\bCANCELLED\b/.test(err.message);
};

const toCancellation = (operation: CancellableOperation, err: unknown): unknown =>
  isGrpcCancellation(err) ? new OperationCancelledError(operation, `${operation} cancelled by gateway`, err) : err;

/**
 * Custom headers are string-valued on the wire; anything else is dropped.
 */
export const toActivatedJob = (job: Job): ActivatedJob => {
  const customHeaders: Record<string, string> = {};
  for (const [name, value] of Object.entries(job.customHeaders)) {
    if (typeof value === "string") customHeaders[name] = value;
  }

  return {
    key: job.key,
    type: job.type,
    processInstanceKey: job.processInstanceKey,
    bpmnProcessId: job.bpmnProcessId,
    processDefinitionVersion: job.processDefinitionVersion,
    processDefinitionKey: job.processKey,
    elementId: job.elementId,
    elementInstanceKey: job.elementInstanceKey,
    customHeaders,
    worker: job.worker,
    retries: job.retries,
    deadline: job.deadline,
    variables: { ...job.variables }
  };
};

class ZeebeWorkerHandle implements WorkerHandle {
  constructor(
    readonly jobType: string,
    private readonly worker: { close(): Promise<unknown> }
  ) {}

  async close(): Promise<void> {
    await this.worker.close();
  }
}

/**
 * Origin client backed by the Zeebe gRPC gateway.
 * Activated jobs are forwarded, not completed: they stay locked until their record is committed.
 *
 * Commands are sent once (`retry: false`): a gateway that cannot be reached rejects the command
 * instead of retrying it forever. `close()` cancels every command still in flight, including
 * those the gRPC client would otherwise settle as if they had succeeded.
 */
export class ZeebeOriginClient implements OriginClient {
  private readonly zbc: ZBClient;
  private readonly closing = new AbortController();

  constructor(config: OriginConnectionConfig) {
    this.zbc = new ZBClient(config.gatewayAddress, {
      loglevel: "NONE",
      longPoll: config.requestTimeoutMs,
      retry: false
    });
  }

  openWorker(params: JobSubscriptionParams, handler: JobActivationHandler): WorkerHandle {
    const worker = this.zbc.createWorker({
      taskType: params.jobType,
      id: params.workerName,
      maxJobsToActivate: params.maxJobsActive,
      longPoll: params.requestTimeoutMs,
      timeout: params.jobTimeoutMs,
      pollInterval: params.pollIntervalMs,
      fetchVariable: params.fetchVariables.length > 0 ? params.fetchVariables : undefined,
      taskHandler: async (job) => {
        await handler(toActivatedJob(job));
        return job.forward();
      }
    });

    return new ZeebeWorkerHandle(params.jobType, worker);
  }

  async failJob(command: FailJobCommand): Promise<void> {
    await this.send("fail", () =>
      this.zbc.failJob({
        jobKey: command.jobKey,
        retries: command.retries,
        errorMessage: command.errorMessage,
        retryBackOff: 0
      })
    );
  }

  async completeJob(jobKey: string): Promise<void> {
    await this.send("complete", () => this.zbc.completeJob({ jobKey, variables: {} }));
  }

  async close(): Promise<void> {
    this.closing.abort("Origin client closed");
    await this.zbc.close();
  }

  private async send(operation: CancellableOperation, command: () => Promise<void>): Promise<void> {
    if (this.closing.signal.aborted) {
      throw new OperationCancelledError(operation, `${operation} aborted`, this.closing.signal.reason);
    }
    try {
      await raceWithAbort(command(), operation, this.closing.signal);
    } catch (err) {
      throw toCancellation(operation, err);
    }
  }
}

export const createZeebeOriginClient = (config: OriginConnectionConfig): OriginClient => new ZeebeOriginClient(config);
