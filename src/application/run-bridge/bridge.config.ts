export type BridgeRunConfig = {
  commitConcurrency: number;
  idleDelayMs: number;
};

export type BridgeRunConfigInput = Partial<BridgeRunConfig>;

export const defaultBridgeRunConfig: BridgeRunConfig = {
  commitConcurrency: 10,
  idleDelayMs: 250
};

export const bridgeRunCaps = {
  commitConcurrency: { min: 1, max: 50 },
  idleDelayMs: { min: 10, max: 60000 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const resolveBridgeRunConfig = (input: BridgeRunConfigInput = {}): BridgeRunConfig => {
  const config = { ...defaultBridgeRunConfig, ...input };
  assertIntegerInRange(
    "commitConcurrency",
    config.commitConcurrency,
    bridgeRunCaps.commitConcurrency.min,
    bridgeRunCaps.commitConcurrency.max
  );
  assertIntegerInRange("idleDelayMs", config.idleDelayMs, bridgeRunCaps.idleDelayMs.min, bridgeRunCaps.idleDelayMs.max);
  return config;
};
