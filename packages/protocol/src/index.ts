// @bhr/protocol
// Shared data types and value objects for the blackhole router coordinator.

export * from './types/index.js';
export * from './network/index.js';
export * from './validation/index.js';
