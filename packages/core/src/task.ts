import { ResultChannel, type Future } from "./channel.js";
import { isExecutor, type Continuation, type Executor } from "./executor.js";
import { isUnit, type Unit } from "./unit.js";

/**
 * 兩種暫停點：
 * - `yield executor`：把自己註冊到 executor（只有第一次有效）
 * - `yield unit`：讓出一輪
 */
export type Suspension = Executor | Unit;

export type TaskBody<T> = Generator<Suspension, T, void>;

export type TaskStatus = "unregistered" | "registered" | "complete";

export interface TaskOptions<T> {
  onSuccess?: (value: T) => void;
  onError?: (error: unknown) => void;
  /** hook 自己丟出的錯誤；預設在下一個 microtask 重新丟出 */
  onHookError?: (error: unknown) => void;
}

function rethrowLater(error: unknown) {
  queueMicrotask(() => {
    throw error;
  });
}

/**
 * A single-value suspendable computation.
 *
 * The body runs synchronously up to its first suspension as soon as the task
 * is constructed. Its first action should be `yield executor`; a body that
 * never registers is never resumed and its future stays pending.
 *
 * @example
 * function* countUp(executor: Executor, from: number): TaskBody<number> {
 *   yield executor;
 *   let acc = 0;
 *   for (let i = from; i < 10; i++) {
 *     acc++;
 *     yield unit;
 *   }
 *   return acc;
 * }
 *
 * const future = spawn(countUp(executor, 8));
 */
export class Task<T> implements Continuation {
  private state: TaskStatus = "unregistered";
  private finalized = false;
  private readonly channel = new ResultChannel<T>();

  readonly future: Future<T> = this.channel.future;

  constructor(
    private readonly body: TaskBody<T>,
    private readonly options: TaskOptions<T> = {}
  ) {
    this.advance();
  }

  status(): TaskStatus {
    return this.state;
  }

  done() {
    return this.state === "complete";
  }

  resume() {
    if (this.done()) return;
    this.advance();
  }

  destroy() {
    if (!this.done()) throw new Error("Cannot destroy a task that has not completed");
    this.finalized = true;
  }

  isFinalized() {
    return this.finalized;
  }

  private advance() {
    let step: IteratorResult<Suspension, T>;
    try {
      step = this.body.next();
    } catch (e) {
      this.fail(e);
      return;
    }

    if (step.done) {
      this.complete(step.value);
      return;
    }
    const marker = step.value;
    if (isUnit(marker)) return;
    if (isExecutor(marker)) this.register(marker);
    else this.fail(new TypeError("A task may only yield an executor or unit"));
  }

  private register(executor: Executor) {
    // 重複 `yield executor` 不能再排一次，否則同一個 task 會在隊列裡出現兩次
    if (this.state !== "unregistered") return;
    this.state = "registered";
    executor.schedule(this);
  }

  private complete(value: T) {
    this.state = "complete";
    this.channel.resolve(value);
    this.runHook(() => this.options.onSuccess?.(value));
  }

  private fail(error: unknown) {
    this.state = "complete";
    this.channel.reject(error);
    this.runHook(() => this.options.onError?.(error));
  }

  // 結果已經寫進 channel 了，hook 的錯誤不能再從 resume() 漏出去
  private runHook(hook: () => void) {
    try {
      hook();
    } catch (e) {
      (this.options.onHookError ?? rethrowLater)(e);
    }
  }
}

export function spawn<T>(body: TaskBody<T>, options?: TaskOptions<T>): Future<T> {
  return new Task(body, options).future;
}
