import {
  bridgeRunCaps,
  defaultBridgeRunConfig,
  resolveBridgeRunConfig,
  type BridgeRunConfig
} from "../../application/run-bridge/bridge.config";
import { sourceConfigKeys } from "../../application/source-task/source.config";
import type { Env } from "./env";

export type RuntimeConfig = {
  sourceProps: Record<string, string>;
  runConfig: BridgeRunConfig;
  healthPort?: number;
};

// Environment variable -> connector property. Unset variables fall back to connector defaults.
const envToSourceProp: ReadonlyArray<[string, string]> = [
  ["BRIDGE_JOB_TYPES", sourceConfigKeys.jobTypes],
  ["BRIDGE_JOB_HEADER_TOPICS", sourceConfigKeys.jobHeaderTopic],
  ["BRIDGE_JOB_VARIABLES", sourceConfigKeys.jobVariables],
  ["BRIDGE_MAX_JOBS_TO_ACTIVATE", sourceConfigKeys.maxJobsToActivate],
  ["BRIDGE_JOB_TIMEOUT_MS", sourceConfigKeys.jobTimeoutMs],
  ["BRIDGE_POLL_INTERVAL_MS", sourceConfigKeys.pollIntervalMs],
  ["BRIDGE_WORKER_NAME", sourceConfigKeys.workerName],
  ["BRIDGE_QUEUE_CAPACITY", sourceConfigKeys.queueCapacity],
  ["ZEEBE_REQUEST_TIMEOUT_MS", sourceConfigKeys.requestTimeoutMs]
];

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

export const loadRuntimeConfigFromEnv = (
  base: Pick<Env, "ZEEBE_GATEWAY_ADDRESS">,
  env: NodeJS.ProcessEnv = process.env
): RuntimeConfig => {
  const sourceProps: Record<string, string> = {
    [sourceConfigKeys.gatewayAddress]: base.ZEEBE_GATEWAY_ADDRESS
  };
  for (const [name, key] of envToSourceProp) {
    const raw = env[name];
    if (raw != null && raw.trim() !== "") sourceProps[key] = raw.trim();
  }

  const runConfig = resolveBridgeRunConfig({
    commitConcurrency:
      parseOptionalIntInRange(env, "BRIDGE_COMMIT_CONCURRENCY", bridgeRunCaps.commitConcurrency) ??
      defaultBridgeRunConfig.commitConcurrency,
    idleDelayMs:
      parseOptionalIntInRange(env, "BRIDGE_IDLE_DELAY_MS", bridgeRunCaps.idleDelayMs) ?? defaultBridgeRunConfig.idleDelayMs
  });

  const healthPort = parseOptionalIntInRange(env, "BRIDGE_HEALTH_PORT", { min: 1, max: 65535 });

  return healthPort == null ? { sourceProps, runConfig } : { sourceProps, runConfig, healthPort };
};
