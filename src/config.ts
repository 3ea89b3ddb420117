/**
 * copybatch Configuration — Zod-validated batcher options
 *
 * Options are checked once, at construction. A bad value never reaches the
 * first defer() call.
 */

import { z } from 'zod';
import type { BatcherOptions, CopyPrimitive, ResolvedBatcherConfig, SizeEstimator } from './types.js';
import { CopyBatchError } from './errors.js';
import { structuredClonePrimitive } from './primitives.js';
import { estimateBytes } from './size.js';

export const DEFAULT_MAX_ITEMS = 64;
export const DEFAULT_SLOW_FLUSH_MS = 100;

function isCopyPrimitive(value: unknown): value is CopyPrimitive {
  return typeof value === 'object'
    && value !== null
    && 'copyMany' in value
    && typeof value.copyMany === 'function'
    && 'name' in value
    && typeof value.name === 'string';
}

function isSizeEstimator(value: unknown): value is SizeEstimator {
  return typeof value === 'function';
}

export const batcherOptionsSchema = z.object({
  maxItems: z.number().int().positive().default(DEFAULT_MAX_ITEMS),
  maxBytes: z.number().int().positive().optional(),
  consistency: z.enum(['at_access', 'strict']).default('at_access'),
  alias: z.enum(['preserve', 'duplicate']).default('preserve'),
  slowFlushMs: z.number().nonnegative().default(DEFAULT_SLOW_FLUSH_MS),
  logging: z.union([z.boolean(), z.literal('verbose')]).default(true),
  primitive: z.custom<CopyPrimitive>(isCopyPrimitive, { message: 'Expected an object with a name and a copyMany() method' }).optional(),
  sizeOf: z.custom<SizeEstimator>(isSizeEstimator, { message: 'Expected a function' }).optional(),
}).strict();

/**
 * Validate user options and fill in defaults. The result is frozen.
 * Throws CopyBatchError with code INVALID_CONFIG.
 */
export function resolveConfig(options: BatcherOptions = {}): ResolvedBatcherConfig {
  const parsed = batcherOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`);
    throw new CopyBatchError({
      code: 'INVALID_CONFIG',
      message: `Invalid batcher options: ${issues.join(', ')}`,
      fix: `maxItems must be an integer > 0, maxBytes an integer > 0 if set, consistency "at_access" or "strict", alias "preserve" or "duplicate".`,
      originalError: parsed.error,
      operation: 'constructor',
    });
  }

  const data = parsed.data;
  return Object.freeze({
    maxItems: data.maxItems,
    maxBytes: data.maxBytes ?? null,
    consistency: data.consistency,
    alias: data.alias,
    slowFlushMs: data.slowFlushMs,
    logging: data.logging,
    primitive: data.primitive ?? structuredClonePrimitive,
    sizeOf: data.sizeOf ?? estimateBytes,
  });
}
