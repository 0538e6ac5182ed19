import { OperationCancelledError } from "../../ports/OriginClient";
import { toErrorMessage } from "../../shared/logging/log";

export type SourceTaskFailureCode = "commit_failed" | "sink_write_failed";

export type SourceTaskErrorContext = {
  jobKey?: string;
  batch?: number;
  records?: number;
};

export class SourceTaskError extends Error {
  readonly code: SourceTaskFailureCode;
  readonly context: SourceTaskErrorContext;

  constructor(args: { code: SourceTaskFailureCode; message: string; context: SourceTaskErrorContext; cause?: unknown }) {
    super(args.message, { cause: args.cause });
    this.name = "SourceTaskError";
    this.code = args.code;
    this.context = args.context;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

type CommitCancelledLog = {
  event: "source.commit_cancelled";
  jobKey: string;
  reason: string;
};

export type CommitFailureDecision =
  | {
      action: "tolerate";
      log: CommitCancelledLog;
    }
  | {
      action: "fail";
      error: SourceTaskError;
    };

/**
 * A complete command cancelled by a concurrent shutdown is expected; everything else
 * is a transport failure for the caller.
 */
export const classifyCommitFailure = (reason: unknown, context: { jobKey: string }): CommitFailureDecision => {
  if (reason instanceof OperationCancelledError) {
    return {
      action: "tolerate",
      log: {
        event: "source.commit_cancelled",
        jobKey: context.jobKey,
        reason: reason.message
      }
    };
  }

  const cause = reason instanceof Error ? reason.cause ?? reason : reason;
  return {
    action: "fail",
    error: new SourceTaskError({
      code: "commit_failed",
      message: `Complete command failed for job ${context.jobKey}: ${toErrorMessage(reason)}`,
      context,
      cause
    })
  };
};

export const wrapSinkFailure = (reason: unknown, context: { batch: number; records: number }): SourceTaskError => {
  const cause = reason instanceof Error ? reason.cause ?? reason : reason;
  return new SourceTaskError({
    code: "sink_write_failed",
    message: `Record sink write failed at batch=${context.batch} (${context.records} records): ${toErrorMessage(reason)}`,
    context,
    cause
  });
};
