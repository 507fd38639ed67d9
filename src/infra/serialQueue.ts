import { toAbortError } from "./deadline.js";

/**
 * FIFO queue running one task at a time. Used for tool instances that do not
 * support concurrent executions. Tasks whose signal fired while they were
 * waiting are skipped instead of started late.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pendingCount = 0;

  /** Number of tasks queued or running. */
  public get pending(): number {
    return this.pendingCount;
  }

  public run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    this.pendingCount += 1;
    const result = this.tail.then(() => {
      if (signal?.aborted) {
        throw toAbortError(signal);
      }
      return task();
    });
    const release = (): void => {
      this.pendingCount -= 1;
    };
    // The chain only tracks completion; each caller observes its own outcome through `result`.
    this.tail = result.then(release, release);
    return result;
  }
}
