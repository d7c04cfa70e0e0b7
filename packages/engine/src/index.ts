/**
 * Graph building, state persistence, routing, execution and debugging.
 */
export * from './config';
export * from './engine';
export * from './graph/builder';
export * from './state/stateCache';
export * from './state/stateStore';
export { JsonValueSchema, JsonObjectSchema, StateRecordSchema } from './state/schemas';
export * from './routing/history';
export * from './routing/backtrack';
export * from './routing/router';
export * from './execution/status';
export * from './execution/workerPool';
export * from './execution/executor';
export * from './debug/traceRecorder';
export * from './debug/breakpoints';
export * from './debug/debugger';
export * from './debug/replay';
export * from './debug/analysis';
export * from './debug/export';
export { withTimeout } from './utils/timeout';
export { createDeferred, sleep, type Deferred } from './utils/async';
