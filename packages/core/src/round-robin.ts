import { setImmediate as nextTurn } from "node:timers/promises";
import { ExecutorStalledError } from "./errors.js";
import type { Continuation, Executor } from "./executor.js";

export interface SweepStats {
  resumed: number;
  finalized: number;
  size: number;
}

export interface RoundRobinOptions {
  /** continuation 在 resume / destroy 時丟出的錯誤；沒給的話 sweep 結束後會重新丟出 */
  onError?: (error: unknown) => void;
  onSweep?: (stats: SweepStats) => void;
  /** runUntilIdle() 的預設上限 */
  maxSteps?: number;
}

const DEFAULT_MAX_STEPS = 10000;

/**
 * 每次 step 把整個隊列掃一輪：已完成的 destroy 並移除，其餘各 resume 一次。
 *
 * sweep 期間進來的 schedule() 先放在 incoming，sweep 結束才接到隊列尾端，
 * 所以同一輪裡不會被重複拜訪。
 */
export class RoundRobinExecutor implements Executor {
  private queue: Continuation[] = [];
  private incoming: Continuation[] = [];
  private sweeping = false;
  private running = false;
  private loop: Promise<void> | null = null;

  constructor(private readonly options: RoundRobinOptions = {}) {}

  schedule(continuation: Continuation) {
    if (this.sweeping) this.incoming.push(continuation);
    else this.queue.push(continuation);
  }

  step() {
    if (this.sweeping) throw new Error("step() cannot run inside a sweep");
    this.sweeping = true;

    const kept: Continuation[] = [];
    const failures: unknown[] = [];
    let resumed = 0;
    let finalized = 0;

    try {
      for (const c of this.queue) {
        try {
          if (c.done()) {
            finalized++;
            c.destroy();
            continue;
          }
          c.resume();
          resumed++;
          kept.push(c);
        } catch (e) {
          // 丟錯的 continuation 直接從隊列拿掉
          failures.push(e);
        }
      }
    } finally {
      this.queue = kept.concat(this.incoming);
      this.incoming = [];
      this.sweeping = false;
    }

    this.options.onSweep?.({ resumed, finalized, size: this.size() });
    this.report(failures);
  }

  size() {
    return this.queue.length + this.incoming.length;
  }

  /**
   * 在背景一直 step，每輪之間讓出一次 event loop，直到 stop()。
   * 回傳的 promise 在 loop 結束時 settle。
   */
  start(): Promise<void> {
    this.running = true;
    this.loop ??= this.drive();
    return this.loop;
  }

  /** 只停止之後的 sweep，不清理任何 continuation */
  stop() {
    this.running = false;
  }

  isRunning() {
    return this.running && this.loop !== null;
  }

  runUntilIdle(maxSteps = this.options.maxSteps ?? DEFAULT_MAX_STEPS) {
    let steps = 0;
    while (this.size() > 0) {
      if (steps >= maxSteps) throw new ExecutorStalledError(steps, this.size());
      this.step();
      steps++;
    }
    return steps;
  }

  private async drive() {
    try {
      while (this.running) {
        await nextTurn();
        if (!this.running) break;
        this.step();
      }
    } catch (e) {
      this.running = false;
      throw e;
    } finally {
      this.loop = null;
    }
  }

  private report(failures: unknown[]) {
    if (failures.length === 0) return;
    const { onError } = this.options;
    if (onError) {
      for (const e of failures) onError(e);
      return;
    }
    if (failures.length === 1) throw failures[0];
    throw new AggregateError(failures, `${failures.length} continuations failed during a sweep`);
  }
}
