#!/usr/bin/env node
import { runBridgeProcess } from "../composition/root";
import { isDebugMode } from "../shared/logging/log";

type ErrorContext = Partial<{
  jobKey: string;
  batch: number;
  records: number;
}>;

type CliErrorEnvelope = {
  event: "bridge.failed";
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  stack?: string;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitizedContext: ErrorContext = {};
  if (typeof value.jobKey === "string" && /^\d+$/.test(value.jobKey)) {
    sanitizedContext.jobKey = value.jobKey;
  }
  for (const key of ["batch", "records"] as const) {
    const raw = value[key];
    if (typeof raw === "number" && Number.isFinite(raw)) {
      sanitizedContext[key] = raw;
    }
  }

  return Object.keys(sanitizedContext).length > 0 ? sanitizedContext : undefined;
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "bridge.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

export const executeBridgeCli = async (): Promise<void> => {
  try {
    await runBridgeProcess();
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeBridgeCli();
}
