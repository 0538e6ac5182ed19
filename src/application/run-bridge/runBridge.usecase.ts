import type { RecordSink } from "../../ports/RecordSink";
import { pause } from "../../shared/concurrency/abort";
import { createLimiter } from "../../shared/concurrency/limiter";
import { logEvent, toErrorMessage } from "../../shared/logging/log";
import type { CommitOutcome, SourceTask } from "../source-task/sourceTask";
import { wrapSinkFailure } from "../source-task/source-task.error-handler";
import { resolveBridgeRunConfig, type BridgeRunConfigInput } from "./bridge.config";

export type BridgeSource = Pick<SourceTask, "poll" | "stop" | "commitRecord">;

export type BridgeRunSummary = {
  batches: number;
  records: number;
  committed: number;
  cancelledCommits: number;
};

export const createBridgeRunSummaryTracker = () => {
  let batches = 0;
  let records = 0;
  let committed = 0;
  let cancelledCommits = 0;

  return {
    nextBatchNumber: () => batches + 1,
    addBatch: (outcomes: CommitOutcome[]) => {
      batches += 1;
      records += outcomes.length;
      for (const outcome of outcomes) {
        if (outcome.status === "completed") committed += 1;
        else cancelledCommits += 1;
      }
    },
    summary: (): BridgeRunSummary => ({ batches, records, committed, cancelledCommits })
  };
};

// Uncommitted jobs stay activated and are handed out again once their job timeout expires.
const drainToEndOfStream = async (task: BridgeSource): Promise<void> => {
  task.stop();
  while ((await task.poll()).kind !== "end_of_stream") {
    // discard
  }
};

/**
 * Host loop: poll the task, write each batch to the sink, then commit every record of it.
 * Returns once the task reports end of stream, which follows `task.stop()` or an abort of `signal`.
 */
export const runBridge = async (deps: {
  task: BridgeSource;
  sink: RecordSink;
  config?: BridgeRunConfigInput;
  signal?: AbortSignal;
}): Promise<BridgeRunSummary> => {
  const { task, sink, signal } = deps;
  const config = resolveBridgeRunConfig(deps.config);
  const limit = createLimiter(config.commitConcurrency);
  const tracker = createBridgeRunSummaryTracker();

  const onAbort = () => task.stop();
  if (signal?.aborted) task.stop();
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    while (true) {
      const result = await task.poll();
      if (result.kind === "end_of_stream") break;
      if (result.kind === "no_data") {
        // An abort cuts the idle wait short so the stop is seen on the next poll.
        await pause(config.idleDelayMs, signal);
        continue;
      }

      const batch = tracker.nextBatchNumber();
      try {
        await sink.write(result.records);
      } catch (error) {
        throw wrapSinkFailure(error, { batch, records: result.records.length });
      }

      // Commit only after the sink has the records, never before.
      const outcomes = await Promise.all(result.records.map((record) => limit(() => task.commitRecord(record))));
      tracker.addBatch(outcomes);
    }
  } catch (error) {
    await drainToEndOfStream(task).catch((drainError: unknown) => {
      logEvent("warn", { event: "bridge.drain_failed", reason: toErrorMessage(drainError) });
    });
    throw error;
  } finally {
    signal?.removeEventListener("abort", onAbort);
  }

  const summary = tracker.summary();
  logEvent("info", { event: "bridge.completed", ...summary });
  return summary;
};
