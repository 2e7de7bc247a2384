import { ResultChannel, unit, type Failed, type Future, type Outcome, type Unit } from "@cotask/core";
import type { Backend, Sink } from "./types.js";

function publish<T>(work: Promise<T>): Future<T> {
  const channel = new ResultChannel<T>();
  void work.then(
    (value) => channel.resolve(value),
    (error: unknown) => channel.reject(error)
  );
  return channel.future;
}

function isFailed(outcome: Outcome<unknown> | undefined): outcome is Failed {
  return outcome !== undefined && !outcome.ok;
}

/**
 * 每一段都是一條獨立的 promise chain，自己等輸入完成。
 * 不需要 executor，但每一段在輸入完成前都會掛著。
 */
export class DetachedBackend implements Backend {
  map<T, U>(input: Future<T>, fn: (value: T) => U): Future<U> {
    return publish(input.wait().then(fn));
  }

  flatmap<T, U>(input: Future<T>, fn: (value: T) => Future<U>): Future<U> {
    return publish(input.wait().then((value) => fn(value).wait()));
  }

  join<T, U>(left: Future<T>, right: Future<U>): Future<[T, U]> {
    return publish(
      new Promise<[T, U]>((resolve, reject) => {
        const check = () => {
          const l = left.poll();
          const r = right.poll();
          if (isFailed(l)) return reject(l.error);
          if (isFailed(r)) return reject(r.error);
          if (l && r) resolve([l.value, r.value]);
        };
        void left.wait().then(check, check);
        void right.wait().then(check, check);
      })
    );
  }

  collect<T>(inputs: readonly Future<T>[], sink: Sink<T>): Future<Unit> {
    const written = inputs.reduce<Promise<void>>(
      (prev, input, index) =>
        prev.then(() => input.wait()).then((value) => sink.write(value, index)),
      Promise.resolve()
    );
    return publish(written.then(() => unit));
  }
}
