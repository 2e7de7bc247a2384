import type { Executor, Future, Unit } from "@cotask/core";

export type Strategy =
  | { kind: "cooperative"; executor: Executor }
  | { kind: "detached" };


/** 只接受依序寫入：index 一定是 0, 1, ..., n-1 */
export interface Sink<T> {
  write(value: T, index: number): void;
}

export type SinkTarget<T> = T[] | Sink<T>;

/**
 * 同一組 combinator 的兩種執行方式。
 * 每個方法都會消耗輸入的 future，回傳一個新的 future。
 */
export interface Backend {
  map<T, U>(input: Future<T>, fn: (value: T) => U): Future<U>;
  flatmap<T, U>(input: Future<T>, fn: (value: T) => Future<U>): Future<U>;
  join<T, U>(left: Future<T>, right: Future<U>): Future<[T, U]>;
  collect<T>(inputs: readonly Future<T>[], sink: Sink<T>): Future<Unit>;
}

export interface Composer<T> {
  readonly strategy: Strategy;
  map<U>(fn: (value: T) => U): Composer<U>;
  flatmap<U>(fn: (value: T) => Future<U>): Composer<U>;
  join<U>(other: Future<U>): Composer<[T, U]>;
  /** 只能取一次，之後這個 composer 就失效了 */
  getFuture(): Future<T>;
  isValid(): boolean;
}
