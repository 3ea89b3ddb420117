/**
 * LazyCopy — a deferred copy that resolves on first use
 *
 * Every operation except `materialized`, `handle`, `clone()` and inspection
 * goes through batcher.get(), so the first one on a pending copy flushes the
 * batcher's whole queue, not only this entry. That includes iteration, so
 * generic deep-equality helpers that call Symbol.iterator (test matchers,
 * lodash isEqual) force the copy; compare LazyCopy objects with ===.
 */

import { inspect } from 'util';
import type { InspectOptions } from 'util';
import type { Resolvable } from './types.js';
import type { CopyHandle } from './handle.js';
import type { DeepCopyBatcher } from './batcher.js';
import { describeValue, unsupportedOperationError } from './errors.js';

export class LazyCopy<T> implements Resolvable<T>, Iterable<unknown> {
  readonly handle: CopyHandle<T>;
  private readonly batcher: DeepCopyBatcher;

  constructor(batcher: DeepCopyBatcher, handle: CopyHandle<T>) {
    this.batcher = batcher;
    this.handle = handle;
  }

  /** Whether the copy exists yet. Never forces a flush. */
  get materialized(): boolean {
    return this.handle.ready;
  }

  resolve(): T {
    return this.batcher.get(this.handle);
  }

  get value(): T {
    return this.resolve();
  }

  read<K extends keyof T>(key: K): T[K] {
    return this.resolve()[key];
  }

  /** Assigns on the copy. The source is never touched. */
  write<K extends keyof T>(key: K, value: T[K]): void {
    this.resolve()[key] = value;
  }

  has(key: PropertyKey): boolean {
    const value: unknown = this.resolve();
    return typeof value === 'object' && value !== null && key in value;
  }

  [Symbol.iterator](): Iterator<unknown> {
    const value: unknown = this.resolve();
    if (typeof value === 'string') return value[Symbol.iterator]();
    if (!isIterable(value)) {
      throw unsupportedOperationError('iterate', describeValue(value));
    }
    return value[Symbol.iterator]();
  }

  /**
   * Element count: length for arrays, strings and typed arrays, size for Map
   * and Set, own enumerable keys for plain objects.
   */
  size(): number {
    const value: unknown = this.resolve();
    if (typeof value === 'string' || Array.isArray(value)) return value.length;
    if (value instanceof Map || value instanceof Set) return value.size;
    if (ArrayBuffer.isView(value) && !(value instanceof DataView)) {
      return value.byteLength / bytesPerElement(value);
    }
    if (isPlainObject(value)) return Object.keys(value).length;
    throw unsupportedOperationError('size', describeValue(value));
  }

  toBoolean(): boolean {
    return Boolean(this.resolve());
  }

  toString(): string {
    return String(this.resolve());
  }

  toJSON(): T {
    return this.resolve();
  }

  /** Another LazyCopy over the same handle. */
  clone(): LazyCopy<T> {
    return new LazyCopy(this.batcher, this.handle);
  }

  [inspect.custom](_depth: number, options: InspectOptions): string {
    if (this.handle.ready) return inspect(this.handle.unwrap(), options);
    return `LazyCopy <${this.handle.status}>`;
  }
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return typeof value === 'object'
    && value !== null
    && Symbol.iterator in value
    && typeof value[Symbol.iterator] === 'function';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function bytesPerElement(view: ArrayBufferView): number {
  const perElement: unknown = Reflect.get(view, 'BYTES_PER_ELEMENT');
  return typeof perElement === 'number' && perElement > 0 ? perElement : 1;
}
