import { InvalidHandleError, type Future, type Unit } from "@cotask/core";
import { backendFor } from "./strategy.js";
import type { Backend, Composer, SinkTarget, Sink, Strategy } from "./types.js";

export class FutureComposer<T> implements Composer<T> {
  private valid = true;

  constructor(
    readonly strategy: Strategy,
    private readonly future: Future<T>,
    private readonly backend: Backend = backendFor(strategy)
  ) {}

  isValid() {
    return this.valid;
  }

  getFuture(): Future<T> {
    if (!this.valid) throw new InvalidHandleError();
    this.valid = false;
    return this.future;
  }

  map<U>(fn: (value: T) => U): Composer<U> {
    return this.derive(this.backend.map(this.getFuture(), fn));
  }

  flatmap<U>(fn: (value: T) => Future<U>): Composer<U> {
    return this.derive(this.backend.flatmap(this.getFuture(), fn));
  }

  join<U>(other: Future<U>): Composer<[T, U]> {
    return this.derive(this.backend.join(this.getFuture(), other));
  }

  private derive<U>(future: Future<U>): Composer<U> {
    return new FutureComposer(this.strategy, future, this.backend);
  }
}

export function toSink<T>(target: SinkTarget<T>): Sink<T> {
  if (!Array.isArray(target)) return target;
  const items: T[] = target;
  return {
    write: (value) => {
      items.push(value);
    },
  };
}

/**
 * @example
 * const final = compose(readyFuture(123), cooperative(executor))
 *   .map((n) => String(n))
 *   .flatmap((s) => lookup(s))
 *   .getFuture();
 */
export function compose<T>(future: Future<T>, strategy: Strategy): Composer<T> {
  return new FutureComposer(strategy, future);
}

/**
 * 依照輸入順序等每個 future 完成並寫進 sink；
 * 任一個失敗，整體就以那個 error 失敗（前面的值已經寫進去了）。
 */
export function collect<T>(
  futures: readonly Future<T>[],
  target: SinkTarget<T>,
  strategy: Strategy
): Composer<Unit> {
  const backend = backendFor(strategy);
  return new FutureComposer(strategy, backend.collect(futures, toSink(target)), backend);
}
