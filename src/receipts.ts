/**
 * copybatch Flush Receipts — Structured flush results
 *
 * Every flush returns a FlushReceipt, including the no-op flush of an empty queue.
 */

import type { FlushReceipt, FlushTrigger } from './types.js';

export function createReceipt(opts: {
  trigger: FlushTrigger;
  startTime: number;
  preserveEntries?: number;
  duplicateEntries?: number;
  uniqueRoots?: number;
  copyCalls?: number;
  bytes?: number;
  success?: boolean;
}): FlushReceipt {
  const preserveEntries = opts.preserveEntries ?? 0;
  const duplicateEntries = opts.duplicateEntries ?? 0;
  return {
    trigger: opts.trigger,
    entries: preserveEntries + duplicateEntries,
    preserveEntries,
    duplicateEntries,
    uniqueRoots: opts.uniqueRoots ?? 0,
    copyCalls: opts.copyCalls ?? 0,
    bytes: opts.bytes ?? 0,
    duration: Date.now() - opts.startTime,
    success: opts.success ?? true,
  };
}
