import { decodePartitionId, parseJobKey, readCustomHeader, serializeJob, type ActivatedJob } from "../jobs/activatedJob";
import type { SourceRecord } from "./sourceRecord";

export class UntranslatableJobError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UntranslatableJobError";
  }
}

/**
 * Maps a validated job onto an emittable record:
 * - topic from the configured custom header
 * - partition decoded from the job key
 * - offset and record key are the job key itself
 * - value is the whole job as JSON
 */
export const translateJob = (job: ActivatedJob, topicHeader: string): SourceRecord => {
  const topic = readCustomHeader(job, topicHeader);
  if (topic == null || topic === "") {
    throw new UntranslatableJobError(`Job ${job.key} has no topic header '${topicHeader}'`);
  }

  return {
    sourcePartition: { partitionId: decodePartitionId(job.key) },
    sourceOffset: { key: job.key },
    topic,
    key: parseJobKey(job.key),
    value: serializeJob(job)
  };
};
