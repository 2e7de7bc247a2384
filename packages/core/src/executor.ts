/**
 * Suspended state of a task, owned by an executor from registration until
 * the executor finalizes it.
 */
export interface Continuation {
  /** Run until the next suspension point. */
  resume(): void;
  done(): boolean;
  /** Called exactly once by the owning executor when it drops a finished continuation. */
  destroy(): void;
}

export interface Executor {
  schedule(continuation: Continuation): void;
}

export function isExecutor(value: unknown): value is Executor {
  return (
    typeof value === "object" &&
    value !== null &&
    "schedule" in value &&
    typeof value.schedule === "function"
  );
}
