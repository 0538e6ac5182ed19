import type { ActivatedJob } from "../core/jobs/activatedJob";

export type CancellableOperation = "poll" | "complete" | "fail";

/**
 * Raised when an operation was aborted, typically because the connection was closed
 * while shutting down. Callers decide whether it is expected.
 */
export class OperationCancelledError extends Error {
  readonly operation: CancellableOperation;

  constructor(operation: CancellableOperation, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "OperationCancelledError";
    this.operation = operation;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type JobSubscriptionParams = {
  jobType: string;
  workerName: string;
  maxJobsActive: number;
  requestTimeoutMs: number;
  jobTimeoutMs: number;
  pollIntervalMs: number;
  fetchVariables: string[]; // empty fetches all variables
};

export type JobActivationHandler = (job: ActivatedJob) => Promise<void>;

export interface WorkerHandle {
  readonly jobType: string;
  close(): Promise<void>;
}

export type FailJobCommand = {
  jobKey: string;
  retries: number;
  errorMessage: string;
};

export interface OriginClient {
  openWorker(params: JobSubscriptionParams, handler: JobActivationHandler): WorkerHandle;
  failJob(command: FailJobCommand): Promise<void>;
  completeJob(jobKey: string): Promise<void>;
  close(): Promise<void>;
}

export type OriginConnectionConfig = {
  gatewayAddress: string;
  requestTimeoutMs: number;
};

export type OriginClientFactory = (config: OriginConnectionConfig) => OriginClient;
