/**
 * A job claimed from the workflow engine. Immutable once received.
 *
 * Keys are 64-bit integers. They are carried as decimal strings because
 * JavaScript numbers cannot hold them once the partition bits are set.
 */
export type ActivatedJob = {
  readonly key: string;
  readonly type: string;
  readonly processInstanceKey: string;
  readonly bpmnProcessId: string;
  readonly processDefinitionVersion: number;
  readonly processDefinitionKey: string;
  readonly elementId: string;
  readonly elementInstanceKey: string;
  readonly customHeaders: Readonly<Record<string, string>>;
  readonly worker: string;
  readonly retries: number;
  readonly deadline: string;
  readonly variables: Readonly<Record<string, unknown>>;
};

// Keys reserve the low 51 bits for the per-partition counter.
const KEY_BITS = 51n;

export const isJobKey = (key: string): boolean => /^\d+$/.test(key.trim());

export const parseJobKey = (key: string): bigint => {
  if (!isJobKey(key)) {
    throw new Error(`Invalid job key: ${key}`);
  }
  return BigInt(key.trim());
};

// Own string-valued headers only; "constructor" and friends are not headers.
export const readCustomHeader = (job: ActivatedJob, name: string): string | undefined => {
  if (!Object.hasOwn(job.customHeaders, name)) return undefined;
  const value: unknown = job.customHeaders[name];
  return typeof value === "string" ? value : undefined;
};

export const decodePartitionId = (key: string): number => Number(parseJobKey(key) >> KEY_BITS);

export const serializeJob = (job: ActivatedJob): string =>
  JSON.stringify({
    key: job.key,
    type: job.type,
    processInstanceKey: job.processInstanceKey,
    bpmnProcessId: job.bpmnProcessId,
    processDefinitionVersion: job.processDefinitionVersion,
    processDefinitionKey: job.processDefinitionKey,
    elementId: job.elementId,
    elementInstanceKey: job.elementInstanceKey,
    customHeaders: job.customHeaders,
    worker: job.worker,
    retries: job.retries,
    deadline: job.deadline,
    variables: job.variables
  });
