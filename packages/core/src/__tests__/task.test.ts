import { describe, expect, it, vi } from "vitest";
import type { Executor } from "../executor.js";
import { RoundRobinExecutor } from "../round-robin.js";
import { Task, spawn, type TaskBody } from "../task.js";
import { unit } from "../unit.js";

describe("task", () => {
  it("runs the body up to its first suspension on construction", () => {
    const executor = new RoundRobinExecutor();
    const log: string[] = [];

    function* body(): TaskBody<number> {
      log.push("before register");
      yield executor;
      log.push("after register");
      return 1;
    }

    const task = new Task(body());

    expect(log).toEqual(["before register"]);
    expect(task.status()).toBe("registered");
    expect(task.future.isReady()).toBe(false);

    executor.step();
    expect(log).toEqual(["before register", "after register"]);
    expect(task.status()).toBe("complete");
    expect(task.future.get()).toBe(1);
  });

  it("a body without suspension points completes immediately", () => {
    function* immediate(): TaskBody<number> {
      return 7;
    }

    const task = new Task(immediate());

    expect(task.status()).toBe("complete");
    expect(task.future.get()).toBe(7);
  });

  it("a body that never registers stays inert", () => {
    const executor = new RoundRobinExecutor();

    function* inert(): TaskBody<number> {
      yield unit;
      return 1;
    }

    const task = new Task(inert());
    executor.step();
    executor.step();

    expect(executor.size()).toBe(0);
    expect(task.status()).toBe("unregistered");
    expect(task.future.status()).toBe("pending");
  });

  it("registers only once even across different executors", () => {
    const first = new RoundRobinExecutor();
    const second = new RoundRobinExecutor();

    function* body(): TaskBody<string> {
      yield first;
      yield second;
      return "done";
    }

    const future = spawn(body());
    first.runUntilIdle();

    expect(second.size()).toBe(0);
    expect(future.get()).toBe("done");
  });

  it("captures a thrown error instead of raising it", () => {
    const executor = new RoundRobinExecutor();
    const boom = new Error("boom");

    function* failing(): TaskBody<number> {
      yield executor;
      throw boom;
    }

    const future = spawn(failing());
    expect(() => executor.step()).not.toThrow();

    expect(future.poll()).toEqual({ ok: false, error: boom });
  });

  it("calls onSuccess / onError after the channel is written", () => {
    const executor = new RoundRobinExecutor();
    const onSuccess = vi.fn();
    const onError = vi.fn();

    function* answer(ex: Executor): TaskBody<number> {
      yield ex;
      return 42;
    }
    function* failing(ex: Executor): TaskBody<number> {
      yield ex;
      throw new Error("nope");
    }

    const good = new Task(answer(executor), { onSuccess, onError });
    const bad = new Task(failing(executor), { onSuccess, onError });
    executor.step();

    expect(onSuccess).toHaveBeenCalledTimes(1);
    expect(onSuccess).toHaveBeenCalledWith(42);
    expect(onError).toHaveBeenCalledTimes(1);
    expect(good.future.isReady()).toBe(true);
    expect(bad.future.status()).toBe("error");
  });

  it("is finalized by the executor on the sweep after it completes", () => {
    const executor = new RoundRobinExecutor();

    function* body(): TaskBody<number> {
      yield executor;
      return 1;
    }

    const task = new Task(body());
    executor.step();
    expect(task.done()).toBe(true);
    expect(task.isFinalized()).toBe(false);

    executor.step();
    expect(task.isFinalized()).toBe(true);
  });

  it("refuses to be destroyed before it completes", () => {
    const executor = new RoundRobinExecutor();

    function* body(): TaskBody<number> {
      yield executor;
      yield unit;
      return 1;
    }

    const task = new Task(body());
    expect(() => task.destroy()).toThrow("Cannot destroy a task that has not completed");
  });
});
