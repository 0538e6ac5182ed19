import type { ActivatedJob } from "../../../src/core/jobs/activatedJob";
import type {
  FailJobCommand,
  JobActivationHandler,
  JobSubscriptionParams,
  OriginClient,
  OriginConnectionConfig
} from "../../../src/ports/OriginClient";

export const createJob = (overrides: Partial<ActivatedJob> = {}): ActivatedJob => ({
  key: "1042",
  type: "A",
  processInstanceKey: "2251799813685251",
  bpmnProcessId: "order-process",
  processDefinitionVersion: 1,
  processDefinitionKey: "2251799813685249",
  elementId: "publish-order",
  elementInstanceKey: "2251799813685260",
  customHeaders: { kafkaTopic: "orders" },
  worker: "kafka-connector",
  retries: 3,
  deadline: "1700000000000",
  variables: { orderId: "o-1" },
  ...overrides
});

export type FakeWorker = {
  params: JobSubscriptionParams;
  handler: JobActivationHandler;
  close: jest.Mock<Promise<void>, []>;
};

/**
 * In-process stand-in for the workflow engine: records every command and lets
 * tests push jobs through the handler of the worker registered for a job type.
 */
export const createFakeOriginClient = () => {
  const workers: FakeWorker[] = [];
  const failJob = jest.fn(async (_command: FailJobCommand): Promise<void> => undefined);
  const completeJob = jest.fn(async (_jobKey: string): Promise<void> => undefined);
  const close = jest.fn(async (): Promise<void> => undefined);

  const client: OriginClient = {
    openWorker: (params, handler) => {
      const worker: FakeWorker = { params, handler, close: jest.fn(async (): Promise<void> => undefined) };
      workers.push(worker);
      return { jobType: params.jobType, close: worker.close };
    },
    failJob,
    completeJob,
    close
  };

  const factory = jest.fn((_config: OriginConnectionConfig): OriginClient => client);

  const deliver = async (job: ActivatedJob): Promise<void> => {
    const worker = workers.find((w) => w.params.jobType === job.type);
    if (!worker) throw new Error(`no worker for job type ${job.type}`);
    await worker.handler(job);
  };

  return { client, factory, workers, failJob, completeJob, close, deliver };
};
