export { createAggregator, AggregatorDriver } from './actorLoop.js';
export type { Aggregator, AggregatorOptions, AggregatorState } from './actorLoop.js';
export { AggregatorHandle } from './handle.js';
export { AggregatorClosedError, isAggregatorClosed } from './errors.js';
export type { AsyncResult } from './replyBridge.js';
export type { AggregatorStats, RaidBoss } from './types.js';
