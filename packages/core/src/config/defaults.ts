import type { LogLevel } from './types';

/**
 * Default constants for engine configuration
 */

export const ROUTING_DEFAULTS = {
  HISTORY_WEIGHT: 0.3,
  DEFAULT_SUCCESS_RATE: 0.5,
  PROBABILISTIC_JITTER: 0.2,
  EXCLUSIVE_BOOST: 0.2,
  AI_BOOST: 1.2,
  CLOSE_CONTENDER_THRESHOLD: 0.3,
} as const;

export const ENGINE_DEFAULTS = {
  MAX_CONCURRENCY: 16,
  MAX_QUEUED_TASKS: 1_000,
  NODE_TIMEOUT_MS: 30_000,
  /** Kept well below the node timeout; the router falls back to plain scoring. */
  ADVISOR_TIMEOUT_MS: 2_000,
  MAX_STEPS: 500,
  CHECKPOINT_POLICY: "every_node" as const,
  BACKTRACK_ON_FAILURE: false,
} as const;

export const STORAGE_DEFAULTS = {
  /** States whose serialized size reaches this go to blob storage. */
  INLINE_STATE_THRESHOLD_BYTES: 10_240,
  STATE_CACHE_TTL_MS: 5 * 60_000,
  STATE_CACHE_MAX_ENTRIES: 1_000,
} as const;

export const TRACE_DEFAULTS = {
  MAX_TRACE_EVENTS: 10_000,
  SNAPSHOT_EVERY_NODES: 5,
  SLOW_NODE_THRESHOLD_MS: 1_000,
  RETAINED_EXECUTIONS: 1_000,
} as const;

/**
 * Logging Configuration
 */
export const LOGGING_DEFAULTS = {
  LEVEL: "info" satisfies LogLevel,
} as const;
