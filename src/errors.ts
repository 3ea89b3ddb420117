/**
 * copybatch Error System — Normalized errors with fix instructions
 *
 * Every failure the batcher raises is a CopyBatchError carrying a stable code
 * and a fix telling the caller what to change.
 */

import type { CopyBatchErrorCode } from './types.js';

// ─── CopyBatchError ──────────────────────────────────────────────────────────

export class CopyBatchError extends Error {
  readonly code: CopyBatchErrorCode;
  readonly originalError: unknown;
  readonly handleId?: number;
  readonly operation?: string;
  readonly retryable: boolean;
  readonly timestamp: Date;
  readonly fix: string;

  constructor(opts: {
    code: CopyBatchErrorCode;
    message: string;
    fix: string;
    originalError?: unknown;
    handleId?: number;
    operation?: string;
    retryable?: boolean;
  }) {
    super(`${opts.message} Fix: ${opts.fix}`);
    this.name = 'CopyBatchError';
    this.code = opts.code;
    this.originalError = opts.originalError;
    this.handleId = opts.handleId;
    this.operation = opts.operation;
    this.retryable = opts.retryable ?? ERROR_RETRYABLE[opts.code];
    this.timestamp = new Date();
    this.fix = opts.fix;
  }
}

// ─── Error Code Metadata ─────────────────────────────────────────────────────

export const ERROR_RETRYABLE: Record<CopyBatchErrorCode, boolean> = {
  INVALID_CONFIG: false,
  UNCOPYABLE_OBJECT: false,
  COPY_CONTRACT_VIOLATION: false,
  REENTRANT_FLUSH: true,
  FOREIGN_HANDLE: false,
  UNSUPPORTED_OPERATION: false,
  INTERNAL_ERROR: false,
};

// ─── Copy Error Mapping ──────────────────────────────────────────────────────

/**
 * Normalize whatever a copy primitive threw into a CopyBatchError.
 * CopyBatchErrors pass through untouched.
 */
export function mapCopyError(err: unknown, operation: string): CopyBatchError {
  if (err instanceof CopyBatchError) return err;

  const name = errorName(err);
  const message = errorMessage(err);

  // structuredClone: functions, symbols, host objects
  if (name === 'DataCloneError' || message.includes('could not be cloned')) {
    return new CopyBatchError({
      code: 'UNCOPYABLE_OBJECT',
      message: `A queued root could not be copied: ${message}`,
      fix: `Remove functions, symbols and host objects from the graph, or construct the batcher with graphCopyPrimitive, or defer the value with a primitive that supports it.`,
      originalError: err,
      operation,
    });
  }

  // Stack overflow on very deep graphs, or a primitive rejecting its input
  if (name === 'RangeError' || name === 'TypeError') {
    return new CopyBatchError({
      code: 'UNCOPYABLE_OBJECT',
      message: `Copy primitive failed with ${name}: ${message}`,
      fix: `Check the original error. The whole flush was discarded; re-defer the roots that are copyable.`,
      originalError: err,
      operation,
    });
  }

  // Anything else a primitive throws, e.g. a getter failing mid-copy
  return new CopyBatchError({
    code: 'UNCOPYABLE_OBJECT',
    message: `Copy primitive threw during ${operation}: ${message}`,
    fix: `Check the original error. The whole flush was discarded; re-defer the roots that are copyable.`,
    originalError: err,
    operation,
  });
}

export function uncopyableValueError(kind: string, path: string): CopyBatchError {
  return new CopyBatchError({
    code: 'UNCOPYABLE_OBJECT',
    message: `Cannot deep-copy a ${kind} at ${path}.`,
    fix: `Replace the ${kind} with plain data before deferring, or keep it outside the copied graph.`,
    operation: 'copy',
  });
}

export function contractViolationError(primitive: string, expected: number, received: number): CopyBatchError {
  return new CopyBatchError({
    code: 'COPY_CONTRACT_VIOLATION',
    message: `Copy primitive "${primitive}" returned ${received} outputs for ${expected} roots.`,
    fix: `A CopyPrimitive must return exactly one output per root, in input order.`,
    operation: 'flush',
  });
}

export function reentrantFlushError(operation: string, handleId?: number): CopyBatchError {
  return new CopyBatchError({
    code: 'REENTRANT_FLUSH',
    message: `${operation} was called while a flush is running.`,
    fix: `Do not resolve pending copies from getters or from inside a copy primitive. Read the value after the running flush returns.`,
    handleId,
    operation,
  });
}

export function foreignHandleError(handleId: number): CopyBatchError {
  return new CopyBatchError({
    code: 'FOREIGN_HANDLE',
    message: `Handle #${handleId} belongs to a different batcher.`,
    fix: `Call get() on the batcher whose defer() returned the handle.`,
    handleId,
    operation: 'get',
  });
}

export function unsupportedOperationError(operation: string, received: string): CopyBatchError {
  return new CopyBatchError({
    code: 'UNSUPPORTED_OPERATION',
    message: `LazyCopy.${operation}() is not supported for a resolved ${received}.`,
    fix: `Call resolve() and work with the value directly.`,
    operation,
  });
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function errorName(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'name' in err && typeof err.name === 'string') {
    return err.name;
  }
  return undefined;
}

function errorMessage(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}

/** Short type description for error messages: "Map", "array", "null", "number". */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') {
    const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
    return typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
  }
  return typeof value;
}
