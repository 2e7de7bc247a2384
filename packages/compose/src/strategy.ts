import type { Executor } from "@cotask/core";
import { CooperativeBackend } from "./cooperative.js";
import { DetachedBackend } from "./detached.js";
import type { Backend, Strategy } from "./types.js";

export function cooperative(executor: Executor): Strategy {
  return { kind: "cooperative", executor };
}

export function detached(): Strategy {
  return { kind: "detached" };
}

export function backendFor(strategy: Strategy): Backend {
  switch (strategy.kind) {
    case "cooperative":
      return new CooperativeBackend(strategy.executor);
    case "detached":
      return new DetachedBackend();
  }
}
