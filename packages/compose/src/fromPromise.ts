import { ResultChannel, type Future } from "@cotask/core";

export interface FromPromiseOptions<T> {
  onSuccess?: (value: T) => void;
  onError?: (error: unknown) => void;
}

/**
 * 把外部的 promise 接進 future，之後就能用 compose() 串起來。
 * makePromise 同步丟出的錯誤也會變成失敗的 future。
 */
export function fromPromise<T>(
  makePromise: () => PromiseLike<T>,
  options: FromPromiseOptions<T> = {}
): Future<T> {
  const channel = new ResultChannel<T>();

  let p: PromiseLike<T>;
  try {
    p = makePromise();
  } catch (err) {
    channel.reject(err);
    options.onError?.(err);
    return channel.future;
  }

  void p.then(
    (result) => {
      channel.resolve(result);
      options.onSuccess?.(result);
    },
    (err: unknown) => {
      channel.reject(err);
      options.onError?.(err);
    }
  );

  return channel.future;
}

export function toPromise<T>(future: Future<T>): Promise<T> {
  return future.wait();
}
