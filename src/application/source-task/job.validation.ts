import { isJobKey, readCustomHeader, type ActivatedJob } from "../../core/jobs/activatedJob";

type JobInvalidLog =
  | {
      event: "source.job_invalid";
      jobKey: string;
      jobType: string;
      header: string;
    }
  | {
      event: "source.job_key_invalid";
      jobKey: string;
      jobType: string;
    };

export type JobValidationDecision =
  | {
      action: "enqueue";
      topic: string;
    }
  | {
      action: "fail";
      retries: number;
      errorMessage: string;
      log: JobInvalidLog;
    };

export const missingTopicMessage = (headerName: string): string =>
  `Expected a kafka topic to be defined as a custom header with key '${headerName}', but none found`;

export const invalidKeyMessage = (key: string): string => `Expected a decimal job key, but got '${key}'`;

/**
 * Decides what happens to a freshly activated job. Invalid jobs are always failed back
 * to the engine for now; ignoring or raising would be decided here as well.
 * An enqueue decision guarantees that the job translates into a record.
 */
export const classifyActivatedJob = (job: ActivatedJob, headerName: string): JobValidationDecision => {
  if (!isJobKey(job.key)) {
    return {
      action: "fail",
      retries: job.retries - 1,
      errorMessage: invalidKeyMessage(job.key),
      log: { event: "source.job_key_invalid", jobKey: job.key, jobType: job.type }
    };
  }

  const topic = readCustomHeader(job, headerName);
  if (topic != null && topic !== "") {
    return { action: "enqueue", topic };
  }

  return {
    action: "fail",
    retries: job.retries - 1,
    errorMessage: missingTopicMessage(headerName),
    log: {
      event: "source.job_invalid",
      jobKey: job.key,
      jobType: job.type,
      header: headerName
    }
  };
};
