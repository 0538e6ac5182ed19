export type SourceTaskConfig = {
  gatewayAddress: string;
  requestTimeoutMs: number;
  jobTypes: string[];
  jobHeaderTopic: string;
  jobVariables: string[];
  maxJobsToActivate: number;
  jobTimeoutMs: number;
  pollIntervalMs: number;
  workerName: string;
  queueCapacity: number;
};

export type SourceTaskProps = Readonly<Record<string, string | undefined>>;

export const sourceConfigKeys = {
  gatewayAddress: "zeebe.client.gateway.address",
  requestTimeoutMs: "zeebe.client.requestTimeout",
  jobTypes: "job.types",
  jobHeaderTopic: "job.header.topics",
  jobVariables: "job.variables",
  maxJobsToActivate: "max.jobs.to.activate",
  jobTimeoutMs: "job.timeout",
  pollIntervalMs: "job.poll.interval",
  workerName: "worker.name",
  queueCapacity: "job.queue.capacity"
} as const;

export const defaultSourceTaskConfig: SourceTaskConfig = {
  gatewayAddress: "localhost:26500",
  requestTimeoutMs: 10000,
  jobTypes: ["kafka"],
  jobHeaderTopic: "kafka-topic",
  jobVariables: [],
  maxJobsToActivate: 100,
  jobTimeoutMs: 5000,
  pollIntervalMs: 5000,
  workerName: "kafka-connector",
  queueCapacity: 0
};

export const sourceConfigCaps = {
  requestTimeoutMs: { min: 1000, max: 600000 },
  maxJobsToActivate: { min: 1, max: 10000 },
  jobTimeoutMs: { min: 1, max: 86400000 },
  pollIntervalMs: { min: 1, max: 3600000 },
  queueCapacity: { min: 0, max: 1000000 }
} as const;

const parseIntInRange = (
  props: SourceTaskProps,
  key: string,
  range: { min: number; max: number },
  fallback: number
): number => {
  const raw = props[key];
  if (raw == null || raw.trim() === "") return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${key}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }
  return value;
};

const parseNonEmptyString = (props: SourceTaskProps, key: string, fallback: string): string => {
  const raw = props[key];
  if (raw == null) return fallback;

  const normalized = raw.trim();
  if (normalized === "") {
    throw new Error(`${key} must not be empty`);
  }
  return normalized;
};

const parseList = (props: SourceTaskProps, key: string, fallback: string[]): string[] => {
  const raw = props[key];
  if (raw == null) return fallback;

  return raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");
};

/**
 * Parses connector properties. Throws on the first invalid value so that nothing
 * irreversible (client, workers) is created from a half-valid configuration.
 */
export const parseSourceTaskConfig = (props: SourceTaskProps): SourceTaskConfig => {
  const jobTypes = Array.from(new Set(parseList(props, sourceConfigKeys.jobTypes, defaultSourceTaskConfig.jobTypes)));
  if (jobTypes.length === 0) {
    throw new Error(`${sourceConfigKeys.jobTypes} must list at least one job type`);
  }

  return {
    gatewayAddress: parseNonEmptyString(props, sourceConfigKeys.gatewayAddress, defaultSourceTaskConfig.gatewayAddress),
    requestTimeoutMs: parseIntInRange(
      props,
      sourceConfigKeys.requestTimeoutMs,
      sourceConfigCaps.requestTimeoutMs,
      defaultSourceTaskConfig.requestTimeoutMs
    ),
    jobTypes,
    jobHeaderTopic: parseNonEmptyString(props, sourceConfigKeys.jobHeaderTopic, defaultSourceTaskConfig.jobHeaderTopic),
    jobVariables: parseList(props, sourceConfigKeys.jobVariables, defaultSourceTaskConfig.jobVariables),
    maxJobsToActivate: parseIntInRange(
      props,
      sourceConfigKeys.maxJobsToActivate,
      sourceConfigCaps.maxJobsToActivate,
      defaultSourceTaskConfig.maxJobsToActivate
    ),
    jobTimeoutMs: parseIntInRange(
      props,
      sourceConfigKeys.jobTimeoutMs,
      sourceConfigCaps.jobTimeoutMs,
      defaultSourceTaskConfig.jobTimeoutMs
    ),
    pollIntervalMs: parseIntInRange(
      props,
      sourceConfigKeys.pollIntervalMs,
      sourceConfigCaps.pollIntervalMs,
      defaultSourceTaskConfig.pollIntervalMs
    ),
    workerName: parseNonEmptyString(props, sourceConfigKeys.workerName, defaultSourceTaskConfig.workerName),
    queueCapacity: parseIntInRange(
      props,
      sourceConfigKeys.queueCapacity,
      sourceConfigCaps.queueCapacity,
      defaultSourceTaskConfig.queueCapacity
    )
  };
};
