// Re-export all protocol types

export * from './common.js';
export * from './blocks.js';
export * from './whitelist.js';
