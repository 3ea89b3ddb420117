/**
 * DeepCopyBatcher — batched, identity-preserving deep copies
 *
 * Deferred copy requests queue up and resolve together in one flush:
 *
 *   defer(root) → queue
 *     → flush (explicit, auto at threshold, or first read of any handle)
 *     → duplicate entries: one primitive call each
 *     → preserve entries: dedup by identity, one primitive call for all
 *     → settle every handle, or fail every handle
 *     → receipt → logger (emit event)
 *
 * Every method is synchronous, so each call runs to completion before any
 * other task touches the queue. Re-entry is only possible from user code the
 * copy primitive runs (getters, custom primitives); see flushQueue().
 */

import type {
  AliasPolicy,
  BatcherOptions,
  BatcherStatus,
  CopyBatchEvents,
  DeferOptions,
  FlushReceipt,
  FlushTrigger,
  ResolvedBatcherConfig,
} from './types.js';
import {
  CopyBatchError,
  foreignHandleError,
  mapCopyError,
  reentrantFlushError,
} from './errors.js';
import { CopyBatchEventEmitter } from './events.js';
import { CopyBatchLogger } from './logger.js';
import { resolveConfig } from './config.js';
import { createReceipt } from './receipts.js';
import { copyManyChecked, copyOne } from './primitives.js';
import { CopyHandle } from './handle.js';
import { LazyCopy } from './lazy.js';

interface PendingEntry {
  readonly handle: CopyHandle<unknown>;
  readonly root: unknown;
  readonly alias: AliasPolicy;
}

interface CopyResult {
  settled: Array<{ handle: CopyHandle<unknown>; value: unknown }>;
  uniqueRoots: number;
  copyCalls: number;
}

export class DeepCopyBatcher {
  readonly config: ResolvedBatcherConfig;
  private emitter: CopyBatchEventEmitter;
  private logger: CopyBatchLogger;
  private queue: PendingEntry[] = [];
  private pendingBytes = 0;
  private flushing = false;
  private nextHandleId = 1;
  private flushCount = 0;
  private failedFlushCount = 0;
  private resolvedCount = 0;
  private strictCount = 0;

  /**
   * Throws CopyBatchError INVALID_CONFIG for bad options.
   */
  constructor(options: BatcherOptions = {}) {
    this.config = resolveConfig(options);
    this.emitter = new CopyBatchEventEmitter();
    this.logger = new CopyBatchLogger(
      {
        enabled: this.config.logging !== false,
        verbose: this.config.logging === 'verbose',
        slowFlushMs: this.config.slowFlushMs,
      },
      this.emitter,
    );
  }

  // ─── Deferral ──────────────────────────────────────────────────────────────

  /**
   * Request a deep copy of `root` without performing it yet.
   *
   * With `consistency: 'strict'` the copy happens now and the returned handle
   * is already ready. Otherwise the request is queued and the copy reflects
   * `root` as it is when the batch flushes. Reaching `maxItems` (or `maxBytes`)
   * flushes before returning, and a failure of that flush is thrown here.
   */
  defer<T>(root: T, options: DeferOptions = {}): CopyHandle<T> {
    const consistency = options.consistency ?? this.config.consistency;
    const alias = options.alias ?? this.config.alias;
    const handle = new CopyHandle<T>(this.nextHandleId++, this);

    if (consistency === 'strict') {
      this.copyNow(handle, root);
      return handle;
    }

    const bytes = this.config.maxBytes === null ? 0 : this.measureRoot(root);
    this.queue.push({ handle, root, alias });
    this.pendingBytes += bytes;
    this.logger.logDefer(handle.id, alias, this.queue.length);

    // Entries queued from inside a running flush wait for the next trigger.
    if (!this.flushing && this.shouldFlush()) {
      this.flushQueue('auto');
    }
    return handle;
  }

  /**
   * defer() wrapped in a LazyCopy that resolves on first use.
   */
  deferProxy<T>(root: T, options: DeferOptions = {}): LazyCopy<T> {
    return new LazyCopy(this, this.defer(root, options));
  }

  deferMany<T>(roots: readonly T[], options: DeferOptions = {}): CopyHandle<T>[] {
    return roots.map(root => this.defer(root, options));
  }

  // ─── Resolution ────────────────────────────────────────────────────────────

  /**
   * Return the copy behind `handle`, flushing the whole queue first if the
   * handle is still pending. A handle whose flush failed rethrows that error.
   */
  get<T>(handle: CopyHandle<T>): T {
    if (handle.owner !== this) {
      throw foreignHandleError(handle.id);
    }
    if (handle.status === 'pending') {
      if (this.flushing) throw reentrantFlushError('get', handle.id);
      this.flushQueue('access');
    }
    return handle.unwrap();
  }

  /**
   * Resolve every queued entry in one batch. No-op on an empty queue.
   */
  flush(): FlushReceipt {
    return this.flushQueue('explicit');
  }

  get pending(): number {
    return this.queue.length;
  }

  // ─── Status & Events ───────────────────────────────────────────────────────

  status(): BatcherStatus {
    return {
      pending: this.queue.length,
      pendingBytes: this.pendingBytes,
      flushing: this.flushing,
      flushes: this.flushCount,
      failedFlushes: this.failedFlushCount,
      resolved: this.resolvedCount,
      strictCopies: this.strictCount,
      config: {
        maxItems: this.config.maxItems,
        maxBytes: this.config.maxBytes,
        consistency: this.config.consistency,
        alias: this.config.alias,
        primitive: this.config.primitive.name,
      },
    };
  }

  on<E extends keyof CopyBatchEvents>(event: E, listener: (payload: CopyBatchEvents[E]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<E extends keyof CopyBatchEvents>(event: E, listener: (payload: CopyBatchEvents[E]) => void): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<E extends keyof CopyBatchEvents>(event: E, listener: (payload: CopyBatchEvents[E]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  // ─── Flush Internals ───────────────────────────────────────────────────────

  /** Estimator failures count as 0 bytes; the copy reports real problems at flush. */
  private measureRoot(root: unknown): number {
    try {
      return measure(this.config.sizeOf(root));
    } catch {
      return 0;
    }
  }

  private shouldFlush(): boolean {
    if (this.queue.length >= this.config.maxItems) return true;
    return this.config.maxBytes !== null && this.pendingBytes >= this.config.maxBytes;
  }

  /**
   * The single flush routine behind flush(), auto-flush and get().
   *
   * The queue is swapped out before copying: entries deferred while the
   * primitive runs land in the next batch, and a failed flush leaves an empty
   * queue behind. Failure is all-or-nothing; every handle of the snapshot is
   * failed with the same error and nothing is retried.
   */
  private flushQueue(trigger: FlushTrigger): FlushReceipt {
    const startTime = Date.now();
    if (this.flushing) {
      throw reentrantFlushError('flush');
    }
    if (this.queue.length === 0) {
      return createReceipt({ trigger, startTime });
    }

    const snapshot = this.queue;
    const bytes = this.pendingBytes;
    this.queue = [];
    this.pendingBytes = 0;

    const preserve: PendingEntry[] = [];
    const duplicate: PendingEntry[] = [];
    for (const entry of snapshot) {
      if (entry.alias === 'duplicate') duplicate.push(entry);
      else preserve.push(entry);
    }

    let result: CopyResult | CopyBatchError;
    this.flushing = true;
    try {
      result = this.copyEntries(preserve, duplicate);
    } catch (err) {
      result = mapCopyError(err, 'flush');
    } finally {
      this.flushing = false;
    }

    if (result instanceof CopyBatchError) {
      for (const entry of snapshot) entry.handle.fail(result);
      this.failedFlushCount++;
      this.logger.logFlushFailure(result, snapshot.length);
      throw result;
    }

    for (const { handle, value } of result.settled) handle.settle(value);
    this.resolvedCount += result.settled.length;
    this.flushCount++;

    const receipt = createReceipt({
      trigger,
      startTime,
      preserveEntries: preserve.length,
      duplicateEntries: duplicate.length,
      uniqueRoots: result.uniqueRoots,
      copyCalls: result.copyCalls,
      bytes,
    });
    this.logger.logFlush(receipt);
    return receipt;
  }

  /**
   * Run the primitive over both partitions. Settles nothing: the caller only
   * settles once every copy has succeeded.
   */
  private copyEntries(preserve: PendingEntry[], duplicate: PendingEntry[]): CopyResult {
    const { primitive } = this.config;
    const settled: CopyResult['settled'] = [];
    let copyCalls = 0;

    // Each duplicate entry gets its own call, so equal identities still
    // produce distinct outputs.
    for (const entry of duplicate) {
      settled.push({ handle: entry.handle, value: copyOne(primitive, entry.root) });
      copyCalls++;
    }

    if (preserve.length === 0) {
      return { settled, uniqueRoots: 0, copyCalls };
    }

    const inputs: unknown[] = [];
    const indexByRoot = new Map<unknown, number>();
    const slots: Array<{ handle: CopyHandle<unknown>; index: number }> = [];
    for (const entry of preserve) {
      let index = indexByRoot.get(entry.root);
      if (index === undefined) {
        index = inputs.length;
        indexByRoot.set(entry.root, index);
        inputs.push(entry.root);
      }
      slots.push({ handle: entry.handle, index });
    }

    const outputs = copyManyChecked(primitive, inputs);
    copyCalls++;
    for (const { handle, index } of slots) {
      settled.push({ handle, value: outputs[index] });
    }

    return { settled, uniqueRoots: inputs.length, copyCalls };
  }

  private copyNow(handle: CopyHandle<unknown>, root: unknown): void {
    const startTime = Date.now();
    let copy: unknown;
    try {
      copy = copyOne(this.config.primitive, root);
    } catch (err) {
      throw mapCopyError(err, 'defer');
    }
    handle.settle(copy);
    this.strictCount++;
    this.logger.logStrictCopy(handle.id, Date.now() - startTime);
  }
}

function measure(bytes: number): number {
  return Number.isFinite(bytes) && bytes > 0 ? bytes : 0;
}
