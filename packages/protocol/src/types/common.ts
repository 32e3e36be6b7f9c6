// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * Opaque identifier (UUID for persisted rows)
 */
export type Id = string;

/**
 * Opaque identity of an enforcement agent, e.g. "bgp1".
 * Agents are not registered up front; the first report introduces them.
 */
export type AgentId = string;
