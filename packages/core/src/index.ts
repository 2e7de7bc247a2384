export { unit, isUnit, type Unit } from "./unit.js";

export {
  ResultChannel,
  Future,
  readyFuture,
  failedFuture,
  isReady,
  type Outcome,
  type Ok,
  type Failed,
  type FutureStatus,
} from "./channel.js";

export { isExecutor, type Executor, type Continuation } from "./executor.js";
export { RoundRobinExecutor, type RoundRobinOptions, type SweepStats } from "./round-robin.js";
export { Task, spawn, type TaskBody, type TaskOptions, type TaskStatus, type Suspension } from "./task.js";

export {
  CotaskError,
  ChannelSettledError,
  FutureNotReadyError,
  InvalidHandleError,
  ExecutorStalledError,
} from "./errors.js";
