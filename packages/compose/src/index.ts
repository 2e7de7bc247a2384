export { compose, collect, toSink, FutureComposer } from "./composer.js";
export { cooperative, detached, backendFor } from "./strategy.js";
export { CooperativeBackend } from "./cooperative.js";
export { DetachedBackend } from "./detached.js";
export { fromPromise, toPromise, type FromPromiseOptions } from "./fromPromise.js";
export type { Backend, Composer, Sink, SinkTarget, Strategy } from "./types.js";
