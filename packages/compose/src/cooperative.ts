import { spawn, unit, type Executor, type Future, type TaskBody, type Unit } from "@cotask/core";
import type { Backend, Sink } from "./types.js";

function* untilReady<T>(future: Future<T>): Generator<Unit, void, void> {
  while (!future.isReady()) yield unit;
}

function rethrowFailure<T>(future: Future<T>) {
  const outcome = future.poll();
  if (outcome && !outcome.ok) throw outcome.error;
}

function* mapBody<T, U>(executor: Executor, input: Future<T>, fn: (value: T) => U): TaskBody<U> {
  yield executor;
  yield* untilReady(input);
  return fn(input.get());
}

function* flatmapBody<T, U>(
  executor: Executor,
  input: Future<T>,
  fn: (value: T) => Future<U>
): TaskBody<U> {
  yield executor;
  yield* untilReady(input);
  const next = fn(input.get());
  yield* untilReady(next);
  return next.get();
}

function* joinBody<T, U>(executor: Executor, left: Future<T>, right: Future<U>): TaskBody<[T, U]> {
  yield executor;
  for (;;) {
    // 不管哪一邊先失敗都直接結束，不等另一邊
    rethrowFailure(left);
    rethrowFailure(right);
    if (left.isReady() && right.isReady()) return [left.get(), right.get()];
    yield unit;
  }
}

function* collectBody<T>(executor: Executor, inputs: readonly Future<T>[], sink: Sink<T>): TaskBody<Unit> {
  yield executor;
  for (const [index, input] of inputs.entries()) {
    yield* untilReady(input);
    sink.write(input.get(), index);
  }
  return unit;
}

/**
 * Every combinator becomes a task on the given executor that polls its
 * inputs once per sweep, so results show up at sweep cadence.
 */
export class CooperativeBackend implements Backend {
  constructor(readonly executor: Executor) {}

  map<T, U>(input: Future<T>, fn: (value: T) => U): Future<U> {
    return spawn(mapBody(this.executor, input, fn));
  }

  flatmap<T, U>(input: Future<T>, fn: (value: T) => Future<U>): Future<U> {
    return spawn(flatmapBody(this.executor, input, fn));
  }

  join<T, U>(left: Future<T>, right: Future<U>): Future<[T, U]> {
    return spawn(joinBody(this.executor, left, right));
  }

  collect<T>(inputs: readonly Future<T>[], sink: Sink<T>): Future<Unit> {
    return spawn(collectBody(this.executor, inputs, sink));
  }
}
