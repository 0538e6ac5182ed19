export type { ActivatedJob } from "./core/jobs/activatedJob";
export { decodePartitionId, serializeJob } from "./core/jobs/activatedJob";
export { JobQueue, JobQueueOverflowError } from "./core/jobs/jobQueue";
export type { LifecycleState } from "./core/lifecycle/lifecycleState";
export type { SourceOffset, SourcePartition, SourceRecord } from "./core/records/sourceRecord";
export { translateJob } from "./core/records/translateJob";
export {
  OperationCancelledError,
  type FailJobCommand,
  type JobSubscriptionParams,
  type OriginClient,
  type OriginClientFactory,
  type WorkerHandle
} from "./ports/OriginClient";
export type { RecordSink } from "./ports/RecordSink";
export { SourceTask, type CommitOutcome, type PollResult } from "./application/source-task/sourceTask";
export { SourceTaskError } from "./application/source-task/source-task.error-handler";
export { sourceConfigKeys, parseSourceTaskConfig } from "./application/source-task/source.config";
export { runBridge, type BridgeRunSummary } from "./application/run-bridge/runBridge.usecase";
export { ZeebeOriginClient, createZeebeOriginClient } from "./infrastructure/zeebe/ZeebeOriginClient";
export { MongoRecordSink } from "./infrastructure/mongo/MongoRecordSink";
