// Re-export all schema tables
export * from './blocks.js';
export * from './whitelist.js';
