export * from './types.js';
export * from './time-normalizer.js';
export * from './recharge-ledger.js';
export * from './usage-computer.js';
export * from './ladder-tier-resolver.js';
export * from './daily-history.js';
export * from './history-store.js';
export * from './projection.js';
export * from './engine.js';
export * from './service.js';
