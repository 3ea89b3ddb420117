/**
 * copybatch Copy Primitives — the deep-copy capability behind every flush
 *
 * structuredClonePrimitive hands the whole root list to the host's
 * structuredClone, which keeps shared and cyclic identity across elements of
 * one call. graphCopyPrimitive is a depth-first copier with an identity-keyed
 * memo table that also keeps prototypes, for class instances structuredClone
 * would flatten. It copies own enumerable properties (plus an Error's message,
 * stack and cause); `#private` fields live outside any property table and are
 * not carried, so methods that read them throw on the copy.
 */

import type { CopyPrimitive } from './types.js';
import { contractViolationError, uncopyableValueError } from './errors.js';

export const structuredClonePrimitive: CopyPrimitive = {
  name: 'structuredClone',
  copyMany(roots: readonly unknown[]): unknown[] {
    return structuredClone([...roots]);
  },
};

export const graphCopyPrimitive: CopyPrimitive = {
  name: 'graphCopy',
  copyMany(roots: readonly unknown[]): unknown[] {
    const memo = new Map<object, object>();
    return roots.map((root, i) => copyValue(root, memo, `[${i}]`));
  },
};

/**
 * Single-root form of a primitive: copyMany([root])[0].
 */
export function copyOne(primitive: CopyPrimitive, root: unknown): unknown {
  return copyManyChecked(primitive, [root])[0];
}

/**
 * Run a primitive and verify it returned one output per root.
 */
export function copyManyChecked(primitive: CopyPrimitive, roots: readonly unknown[]): unknown[] {
  const outputs: unknown = primitive.copyMany(roots);
  if (!Array.isArray(outputs)) {
    throw contractViolationError(primitive.name, roots.length, 0);
  }
  if (outputs.length !== roots.length) {
    throw contractViolationError(primitive.name, roots.length, outputs.length);
  }
  return outputs;
}

// ─── Graph Copy ──────────────────────────────────────────────────────────────

function copyValue(value: unknown, memo: Map<object, object>, path: string): unknown {
  if (typeof value === 'function') throw uncopyableValueError('function', path);
  if (typeof value === 'symbol') throw uncopyableValueError('symbol', path);
  if (typeof value !== 'object' || value === null) return value;

  return memo.get(value) ?? copyObject(value, memo, path);
}

function copyObject(source: object, memo: Map<object, object>, path: string): object {
  if (source instanceof WeakMap) throw uncopyableValueError('WeakMap', path);
  if (source instanceof WeakSet) throw uncopyableValueError('WeakSet', path);
  if (source instanceof WeakRef) throw uncopyableValueError('WeakRef', path);
  if (source instanceof Promise) throw uncopyableValueError('Promise', path);

  if (source instanceof Date) {
    const target = new Date(source.getTime());
    memo.set(source, target);
    return target;
  }

  if (source instanceof RegExp) {
    const target = new RegExp(source.source, source.flags);
    target.lastIndex = source.lastIndex;
    memo.set(source, target);
    return target;
  }

  if (source instanceof ArrayBuffer) {
    return copyBuffer(source, memo);
  }

  if (source instanceof DataView) {
    const target = new DataView(copyBuffer(source.buffer, memo), source.byteOffset, source.byteLength);
    memo.set(source, target);
    return target;
  }

  if (ArrayBuffer.isView(source)) {
    if (!isTypedArray(source)) throw uncopyableValueError(source.constructor.name, path);
    // Views over one buffer keep sharing it in the copy.
    const target = createTypedArray(source, copyBuffer(source.buffer, memo));
    memo.set(source, target);
    return target;
  }

  if (source instanceof Map) {
    const target = new Map<unknown, unknown>();
    memo.set(source, target);
    let i = 0;
    for (const [k, v] of source) {
      target.set(copyValue(k, memo, `${path}<key ${i}>`), copyValue(v, memo, `${path}<value ${i}>`));
      i++;
    }
    return target;
  }

  if (source instanceof Set) {
    const target = new Set<unknown>();
    memo.set(source, target);
    let i = 0;
    for (const v of source) {
      target.add(copyValue(v, memo, `${path}<${i}>`));
      i++;
    }
    return target;
  }

  if (source instanceof Error) {
    const target: object = Object.create(Object.getPrototypeOf(source));
    memo.set(source, target);
    // message, stack and cause are own but non-enumerable.
    for (const key of ERROR_FIELDS) {
      const descriptor = Object.getOwnPropertyDescriptor(source, key);
      if (!descriptor || descriptor.enumerable) continue;
      Object.defineProperty(target, key, {
        value: copyValue(Reflect.get(source, key), memo, `${path}.${key}`),
        writable: true,
        enumerable: false,
        configurable: true,
      });
    }
    copyOwnEnumerable(source, target, memo, path);
    return target;
  }

  // Allocate before recursing so back-edges land on this copy.
  const target: object = Array.isArray(source)
    ? new Array<unknown>(source.length)
    : Object.create(Object.getPrototypeOf(source));
  memo.set(source, target);
  copyOwnEnumerable(source, target, memo, path);
  return target;
}

const ERROR_FIELDS = ['name', 'message', 'stack', 'cause'] as const;

function copyOwnEnumerable(source: object, target: object, memo: Map<object, object>, path: string): void {
  for (const key of Reflect.ownKeys(source)) {
    const descriptor = Object.getOwnPropertyDescriptor(source, key);
    if (!descriptor?.enumerable) continue;
    const label = typeof key === 'symbol' ? key.toString() : key;
    const value: unknown = Reflect.get(source, key);
    Reflect.set(target, key, copyValue(value, memo, `${path}.${label}`));
  }
}

function copyBuffer(source: ArrayBufferLike, memo: Map<object, object>): ArrayBufferLike {
  // Shared memory stays shared, as with structuredClone.
  if (!(source instanceof ArrayBuffer)) return source;

  const seen = memo.get(source);
  if (seen instanceof ArrayBuffer) return seen;

  const target = source.slice(0);
  memo.set(source, target);
  return target;
}

type TypedArray =
  | Int8Array
  | Uint8Array
  | Uint8ClampedArray
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | Float32Array
  | Float64Array
  | BigInt64Array
  | BigUint64Array;

function isTypedArray(view: ArrayBufferView): view is TypedArray {
  return !(view instanceof DataView);
}

function createTypedArray(source: TypedArray, buffer: ArrayBufferLike): TypedArray {
  const { byteOffset, length } = source;
  if (source instanceof Int8Array) return new Int8Array(buffer, byteOffset, length);
  if (source instanceof Uint8ClampedArray) return new Uint8ClampedArray(buffer, byteOffset, length);
  if (source instanceof Uint8Array) return new Uint8Array(buffer, byteOffset, length);
  if (source instanceof Int16Array) return new Int16Array(buffer, byteOffset, length);
  if (source instanceof Uint16Array) return new Uint16Array(buffer, byteOffset, length);
  if (source instanceof Int32Array) return new Int32Array(buffer, byteOffset, length);
  if (source instanceof Uint32Array) return new Uint32Array(buffer, byteOffset, length);
  if (source instanceof Float32Array) return new Float32Array(buffer, byteOffset, length);
  if (source instanceof Float64Array) return new Float64Array(buffer, byteOffset, length);
  if (source instanceof BigInt64Array) return new BigInt64Array(buffer, byteOffset, length);
  return new BigUint64Array(buffer, byteOffset, length);
}
