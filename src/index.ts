/**
 * copybatch — Public API Entry Point
 *
 * Batched, identity-preserving deep copies with lazy resolution.
 */

// Main class
export { DeepCopyBatcher } from './batcher.js';
export { CopyHandle } from './handle.js';
export type { HandleStatus } from './handle.js';
export { LazyCopy } from './lazy.js';

// Copy primitives
export { structuredClonePrimitive, graphCopyPrimitive, copyOne } from './primitives.js';
export { estimateBytes } from './size.js';
export { resolveConfig, batcherOptionsSchema, DEFAULT_MAX_ITEMS, DEFAULT_SLOW_FLUSH_MS } from './config.js';

// Error class
export { CopyBatchError, mapCopyError } from './errors.js';

// Types
export type {
  AliasPolicy,
  BatcherOptions,
  BatcherStatus,
  Consistency,
  CopyBatchErrorCode,
  CopyBatchEvents,
  CopyPrimitive,
  DeferOptions,
  FlushReceipt,
  FlushTrigger,
  Resolvable,
  ResolvedBatcherConfig,
  SizeEstimator,
} from './types.js';
