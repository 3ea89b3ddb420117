/**
 * copybatch — All shared types and interfaces
 *
 * Every other module imports its types from here. This file imports nothing
 * at runtime, so there are no circular dependencies.
 */

// ─── Policies ────────────────────────────────────────────────────────────────

/** When the source is snapshotted: at flush/read time, or at defer time. */
export type Consistency = 'at_access' | 'strict';

/** Whether repeated references to one source in a batch share one output. */
export type AliasPolicy = 'preserve' | 'duplicate';

export type FlushTrigger = 'explicit' | 'auto' | 'access';

export interface DeferOptions {
  consistency?: Consistency;
  alias?: AliasPolicy;
}

// ─── Copy Primitive ──────────────────────────────────────────────────────────

/**
 * The deep-copy capability the batcher orchestrates.
 *
 * Contract: the output has the same length and order as the input; each output
 * deep-equals its input; identical inputs map to identical outputs; cycles are
 * reproduced, not unrolled; one uncopyable root fails the whole call.
 */
export interface CopyPrimitive {
  readonly name: string;
  copyMany(roots: readonly unknown[]): unknown[];
}

export type SizeEstimator = (root: unknown) => number;

// ─── Configuration ───────────────────────────────────────────────────────────

export interface BatcherOptions {
  /** Queue length that triggers an auto-flush. Default 64. */
  maxItems?: number;
  /** Advisory byte cap on queued roots, measured by `sizeOf`. Unset disables measuring. */
  maxBytes?: number;
  consistency?: Consistency;
  alias?: AliasPolicy;
  /** Flushes at or over this duration emit `slow-flush`. Default 100. */
  slowFlushMs?: number;
  logging?: boolean | 'verbose';
  primitive?: CopyPrimitive;
  sizeOf?: SizeEstimator;
}

export interface ResolvedBatcherConfig {
  readonly maxItems: number;
  readonly maxBytes: number | null;
  readonly consistency: Consistency;
  readonly alias: AliasPolicy;
  readonly slowFlushMs: number;
  readonly logging: boolean | 'verbose';
  readonly primitive: CopyPrimitive;
  readonly sizeOf: SizeEstimator;
}

// ─── Flush Receipt ───────────────────────────────────────────────────────────

export interface FlushReceipt {
  trigger: FlushTrigger;
  entries: number;
  preserveEntries: number;
  duplicateEntries: number;
  /** Distinct roots handed to the primitive by the preserve partition. */
  uniqueRoots: number;
  /** Number of primitive invocations this flush made. */
  copyCalls: number;
  bytes: number;
  duration: number;
  success: boolean;
}

// ─── Status ──────────────────────────────────────────────────────────────────

export interface BatcherStatus {
  pending: number;
  pendingBytes: number;
  flushing: boolean;
  flushes: number;
  failedFlushes: number;
  resolved: number;
  strictCopies: number;
  config: {
    maxItems: number;
    maxBytes: number | null;
    consistency: Consistency;
    alias: AliasPolicy;
    primitive: string;
  };
}

// ─── Error Codes ─────────────────────────────────────────────────────────────

export type CopyBatchErrorCode =
  | 'INVALID_CONFIG'
  | 'UNCOPYABLE_OBJECT'
  | 'COPY_CONTRACT_VIOLATION'
  | 'REENTRANT_FLUSH'
  | 'FOREIGN_HANDLE'
  | 'UNSUPPORTED_OPERATION'
  | 'INTERNAL_ERROR';

// ─── Event Types ─────────────────────────────────────────────────────────────

export interface CopyBatchEvents {
  deferred: { handleId: number; alias: AliasPolicy; pending: number };
  'strict-copy': { handleId: number; durationMs: number };
  flush: { trigger: FlushTrigger; durationMs: number; receipt: FlushReceipt };
  'slow-flush': { trigger: FlushTrigger; durationMs: number; threshold: number };
  'flush-failed': { code: CopyBatchErrorCode; message: string; fix: string; entries: number };
}

// ─── Lazy Resolution ─────────────────────────────────────────────────────────

/** A value that can be forced on demand and asked whether it already has been. */
export interface Resolvable<T> {
  resolve(): T;
  readonly materialized: boolean;
}
