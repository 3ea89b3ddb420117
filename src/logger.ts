/**
 * copybatch Logger — Structured flush logging
 *
 * Emits flush events with timing and receipt, slow-flush warnings, and
 * per-defer events in verbose mode.
 */

import type { AliasPolicy, FlushReceipt } from './types.js';
import type { CopyBatchError } from './errors.js';
import type { CopyBatchEventEmitter } from './events.js';

export interface LoggerConfig {
  enabled: boolean;
  verbose: boolean;
  slowFlushMs: number;
}

export class CopyBatchLogger {
  private config: LoggerConfig;
  private emitter: CopyBatchEventEmitter;

  constructor(config: LoggerConfig, emitter: CopyBatchEventEmitter) {
    this.config = config;
    this.emitter = emitter;
  }

  /**
   * Log a completed flush.
   */
  logFlush(receipt: FlushReceipt): void {
    if (!this.config.enabled) return;

    this.emitter.emit('flush', {
      trigger: receipt.trigger,
      durationMs: receipt.duration,
      receipt,
    });

    if (receipt.duration >= this.config.slowFlushMs) {
      this.emitter.emit('slow-flush', {
        trigger: receipt.trigger,
        durationMs: receipt.duration,
        threshold: this.config.slowFlushMs,
      });
    }
  }

  /**
   * Failed flushes are reported even with logging disabled: the entries they
   * carried are gone.
   */
  logFlushFailure(error: CopyBatchError, entries: number): void {
    this.emitter.emit('flush-failed', {
      code: error.code,
      message: error.message,
      fix: error.fix,
      entries,
    });
  }

  logDefer(handleId: number, alias: AliasPolicy, pending: number): void {
    if (!this.config.enabled || !this.config.verbose) return;
    if (!this.emitter.listening('deferred')) return;
    this.emitter.emit('deferred', { handleId, alias, pending });
  }

  logStrictCopy(handleId: number, durationMs: number): void {
    if (!this.config.enabled) return;
    this.emitter.emit('strict-copy', { handleId, durationMs });
  }
}
