import type { ActivatedJob } from "./activatedJob";

export class JobQueueOverflowError extends Error {
  readonly capacity: number;
  readonly jobKey: string;

  constructor(capacity: number, jobKey: string) {
    super(`Job queue is full (capacity=${capacity}), rejected job ${jobKey}`);
    this.name = "JobQueueOverflowError";
    this.capacity = capacity;
    this.jobKey = jobKey;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Buffer between the activation workers (many producers) and poll (single consumer).
 * Every mutation runs to completion on the event loop, so a drain never observes
 * a half-applied enqueue.
 */
export class JobQueue {
  private jobs: ActivatedJob[] = [];

  /**
   * @param capacity maximum number of buffered jobs; 0 means unbounded
   */
  constructor(private readonly capacity = 0) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new Error("capacity must be an integer >= 0");
    }
  }

  get size(): number {
    return this.jobs.length;
  }

  enqueue(job: ActivatedJob): void {
    if (this.capacity > 0 && this.jobs.length >= this.capacity) {
      throw new JobQueueOverflowError(this.capacity, job.key);
    }
    this.jobs.push(job);
  }

  /** Removes and returns everything queued right now. Never waits. */
  drainAll(): ActivatedJob[] {
    if (this.jobs.length === 0) return [];
    const drained = this.jobs;
    this.jobs = [];
    return drained;
  }
}
