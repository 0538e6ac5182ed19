export type LifecycleState = "idle" | "running" | "stopping" | "stopped";

const allowedTransitions: Record<LifecycleState, readonly LifecycleState[]> = {
  idle: ["running", "stopped"],
  running: ["stopping"],
  stopping: ["stopped"],
  stopped: []
};

/**
 * Shared lifecycle cell read by poll and written by start/stop.
 * Refused transitions leave the state unchanged and return false.
 */
export class LifecycleStateCell {
  private state: LifecycleState = "idle";

  current(): LifecycleState {
    return this.state;
  }

  transition(to: LifecycleState): boolean {
    if (!allowedTransitions[this.state].includes(to)) return false;
    this.state = to;
    return true;
  }
}
