import { describe, it, expect, vi } from "vitest";
import { readyFuture } from "@cotask/core";
import { compose } from "../composer.js";
import { fromPromise, toPromise } from "../fromPromise.js";
import { detached } from "../strategy.js";

// 小工具：讓 microtask queue 跑完
const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe("fromPromise", () => {
  it("建立當下就呼叫 makePromise，future 進入 pending", () => {
    const makePromise = vi.fn(
      () => new Promise<number>(() => { /* 永遠 pending */ })
    );

    const future = fromPromise(makePromise);

    expect(makePromise).toHaveBeenCalledTimes(1);
    expect(future.status()).toBe("pending");
  });

  it("resolve 之後 future 拿到值，並呼叫 onSuccess", async () => {
    let resolveFn!: (v: number) => void;
    const onSuccess = vi.fn();

    const future = fromPromise(
      () => new Promise<number>((resolve) => { resolveFn = resolve; }),
      { onSuccess }
    );

    resolveFn(42);
    await tick();

    expect(future.get()).toBe(42);
    expect(onSuccess).toHaveBeenCalledWith(42);
  });

  it("reject 之後 future 失敗，並呼叫 onError", async () => {
    const onError = vi.fn();
    const err = new Error("boom");

    const future = fromPromise(() => Promise.reject(err), { onError });
    await tick();

    expect(future.poll()).toEqual({ ok: false, error: err });
    expect(onError).toHaveBeenCalledWith(err);
  });

  it("makePromise 同步丟錯也會變成失敗的 future", () => {
    const err = new Error("sync");
    const onError = vi.fn();

    const future = fromPromise((): Promise<number> => { throw err; }, { onError });

    expect(future.status()).toBe("error");
    expect(onError).toHaveBeenCalledWith(err);
  });

  it("可以直接接進 compose()", async () => {
    const final = compose(fromPromise(() => Promise.resolve(20)), detached())
      .map((n) => n + 1)
      .getFuture();

    await expect(toPromise(final)).resolves.toBe(21);
  });

  it("toPromise() 就是 wait()", async () => {
    await expect(toPromise(readyFuture("ok"))).resolves.toBe("ok");
  });
});
