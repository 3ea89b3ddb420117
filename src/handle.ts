/**
 * copybatch Handles — one pending-or-resolved copy result
 *
 *   pending ──flush ok──▶ ready
 *      └────flush failed─▶ failed
 *
 * A strict defer creates the handle already ready. No state is ever left.
 */

import { CopyBatchError } from './errors.js';

type HandleState<T> =
  | { status: 'pending' }
  | { status: 'ready'; value: T }
  | { status: 'failed'; error: CopyBatchError };

export type HandleStatus = HandleState<unknown>['status'];

export class CopyHandle<T> {
  readonly id: number;
  /** Identity of the batcher that issued this handle. */
  readonly owner: object;
  private state: HandleState<T> = { status: 'pending' };

  constructor(id: number, owner: object) {
    this.id = id;
    this.owner = owner;
  }

  get status(): HandleStatus {
    return this.state.status;
  }

  get ready(): boolean {
    return this.state.status === 'ready';
  }

  /**
   * The resolved copy. Throws the flush error for a failed handle and
   * INTERNAL_ERROR for a pending one; resolve through the batcher instead.
   */
  unwrap(): T {
    const state = this.state;
    if (state.status === 'ready') return state.value;
    if (state.status === 'failed') throw state.error;

    throw new CopyBatchError({
      code: 'INTERNAL_ERROR',
      message: `Handle #${this.id} is still pending.`,
      fix: `Resolve it with batcher.get(handle), which flushes the queue first.`,
      handleId: this.id,
      operation: 'unwrap',
    });
  }

  /** @internal Called by the batcher only. */
  settle(value: T): void {
    this.assertPending('settle');
    this.state = { status: 'ready', value };
  }

  /** @internal Called by the batcher only. */
  fail(error: CopyBatchError): void {
    this.assertPending('fail');
    this.state = { status: 'failed', error };
  }

  toString(): string {
    return `CopyHandle#${this.id}(${this.state.status})`;
  }

  private assertPending(operation: string): void {
    if (this.state.status !== 'pending') {
      throw new CopyBatchError({
        code: 'INTERNAL_ERROR',
        message: `Handle #${this.id} is already ${this.state.status}; it cannot change state again.`,
        fix: `This is a copybatch bug. Handles transition exactly once.`,
        handleId: this.id,
        operation,
      });
    }
  }
}
