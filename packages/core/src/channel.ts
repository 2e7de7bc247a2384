import { ChannelSettledError, FutureNotReadyError } from "./errors.js";

export type Ok<T> = { readonly ok: true; readonly value: T };
export type Failed = { readonly ok: false; readonly error: unknown };
export type Outcome<T> = Ok<T> | Failed;

export type FutureStatus = "pending" | "success" | "error";

type Listener<T> = (outcome: Outcome<T>) => void;

/**
 * 單一生產者 / 單一消費者的結果槽。
 *
 * 生產端（task 本體或它的錯誤處理）只能寫入一次：value 或 error。
 * 消費端拿 `future`，可以非阻塞地 poll，也可以 `wait()`。
 */
export class ResultChannel<T> {
  private outcome: Outcome<T> | undefined;
  private listeners: Listener<T>[] = [];

  readonly future: Future<T> = new Future(this);

  resolve(value: T) {
    this.settle({ ok: true, value });
  }

  reject(error: unknown) {
    this.settle({ ok: false, error });
  }

  isSettled() {
    return this.outcome !== undefined;
  }

  /** @internal */
  peek(): Outcome<T> | undefined {
    return this.outcome;
  }

  /** @internal */
  subscribe(listener: Listener<T>) {
    if (this.outcome) {
      listener(this.outcome);
      return;
    }
    this.listeners.push(listener);
  }

  private settle(outcome: Outcome<T>) {
    if (this.outcome) throw new ChannelSettledError();
    this.outcome = outcome;

    const pending = this.listeners;
    this.listeners = [];
    for (const listener of pending) listener(outcome);
  }
}

export class Future<T> {
  constructor(private readonly channel: ResultChannel<T>) {}

  isReady() {
    return this.channel.isSettled();
  }

  status(): FutureStatus {
    const outcome = this.channel.peek();
    if (!outcome) return "pending";
    return outcome.ok ? "success" : "error";
  }

  poll(): Outcome<T> | undefined {
    return this.channel.peek();
  }

  /**
   * 不會阻塞：還沒完成就丟 FutureNotReadyError，
   * 失敗的話把當初捕捉到的 error 原樣丟出來。
   */
  get(): T {
    const outcome = this.channel.peek();
    if (!outcome) throw new FutureNotReadyError();
    if (!outcome.ok) throw outcome.error;
    return outcome.value;
  }

  wait(): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.channel.subscribe((outcome) => {
        if (outcome.ok) resolve(outcome.value);
        else reject(outcome.error);
      });
    });
  }
}

export function readyFuture<T>(value: T): Future<T> {
  const channel = new ResultChannel<T>();
  channel.resolve(value);
  return channel.future;
}

export function failedFuture<T = never>(error: unknown): Future<T> {
  const channel = new ResultChannel<T>();
  channel.reject(error);
  return channel.future;
}

export function isReady<T>(future: Future<T>) {
  return future.isReady();
}
