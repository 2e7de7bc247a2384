export class CotaskError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** 對同一個 channel 寫入第二次 */
export class ChannelSettledError extends CotaskError {
  constructor() {
    super("Result channel already holds a terminal value");
  }
}

export class FutureNotReadyError extends CotaskError {
  constructor() {
    super("Future is not ready");
  }
}

/** composer 的 handle 已經被取出過 */
export class InvalidHandleError extends CotaskError {
  constructor() {
    super("Invalid future.");
  }
}

export class ExecutorStalledError extends CotaskError {
  constructor(readonly steps: number, readonly pending: number) {
    super(`Executor still has ${pending} pending continuation(s) after ${steps} steps`);
  }
}
