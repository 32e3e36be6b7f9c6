// @bhr/repositories
// Repository interfaces and implementations for storage-independent data access.
//
// Interfaces define WHAT operations are available; the Postgres and in-memory
// implementations fulfil them. The runtime codes against the interfaces only.

export * from './interfaces/index.js';
export * as postgres from './postgres/index.js';
export * as memory from './in-memory/index.js';
