/**
 * copybatch Size Estimation — rough byte accounting for the maxBytes cap
 *
 * Advisory only. Walks the graph once, counting each reachable object a single
 * time, with V8-ish per-value costs. Good enough to bound a queue, not to
 * measure memory.
 */

const OBJECT_OVERHEAD = 16;
const SLOT = 8;

export function estimateBytes(root: unknown): number {
  const seen = new Set<object>();
  const stack: unknown[] = [root];
  let total = 0;

  while (stack.length > 0) {
    const value = stack.pop();
    switch (typeof value) {
      case 'string':
        total += 2 * value.length;
        continue;
      case 'number':
      case 'bigint':
        total += SLOT;
        continue;
      case 'boolean':
        total += 4;
        continue;
      case 'object':
        break;
      default:
        continue;
    }
    if (typeof value !== 'object' || value === null || seen.has(value)) continue;
    seen.add(value);

    total += OBJECT_OVERHEAD;

    if (value instanceof ArrayBuffer) {
      total += value.byteLength;
    } else if (ArrayBuffer.isView(value)) {
      total += value.byteLength;
    } else if (value instanceof Map) {
      for (const [k, v] of value) {
        total += 2 * SLOT;
        stack.push(k, v);
      }
    } else if (value instanceof Set) {
      for (const v of value) {
        total += SLOT;
        stack.push(v);
      }
    } else if (Array.isArray(value)) {
      total += SLOT * value.length;
      for (const v of value) stack.push(v);
    } else if (value instanceof Date) {
      total += SLOT;
    } else {
      for (const [k, v] of Object.entries(value)) {
        total += SLOT + 2 * k.length;
        stack.push(v);
      }
    }
  }

  return total;
}
