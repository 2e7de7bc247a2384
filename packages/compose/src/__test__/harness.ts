import { RoundRobinExecutor } from "@cotask/core";
import { cooperative, detached } from "../strategy.js";
import type { Strategy } from "../types.js";

export interface Harness {
  strategy: Strategy;
  /** 讓目前能前進的東西都前進一下 */
  flush: () => Promise<void>;
}

export function cooperativeHarness(): Harness & { executor: RoundRobinExecutor } {
  const executor = new RoundRobinExecutor();
  return {
    executor,
    strategy: cooperative(executor),
    flush: async () => {
      for (let i = 0; i < 10; i++) executor.step();
    },
  };
}

export function detachedHarness(): Harness {
  return {
    strategy: detached(),
    // setTimeout 觸發前 microtask 一定都跑完了
    flush: () => new Promise<void>((resolve) => setTimeout(resolve, 0)),
  };
}

export const harnesses: Array<{ name: string; make: () => Harness }> = [
  { name: "cooperative", make: cooperativeHarness },
  { name: "detached", make: detachedHarness },
];
