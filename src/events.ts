/**
 * copybatch Event System
 *
 * Wraps a private EventEmitter so only the batcher's own event map can be
 * emitted or subscribed to. `listening()` lets the logger skip building
 * payloads nobody will receive.
 */

import { EventEmitter } from 'events';
import type { CopyBatchEvents } from './types.js';

export type CopyBatchEventName = keyof CopyBatchEvents;
export type CopyBatchListener<E extends CopyBatchEventName> = (payload: CopyBatchEvents[E]) => void;

export class CopyBatchEventEmitter {
  private readonly inner = new EventEmitter();

  on<E extends CopyBatchEventName>(event: E, listener: CopyBatchListener<E>): this {
    this.inner.on(event, listener);
    return this;
  }

  once<E extends CopyBatchEventName>(event: E, listener: CopyBatchListener<E>): this {
    this.inner.once(event, listener);
    return this;
  }

  off<E extends CopyBatchEventName>(event: E, listener: CopyBatchListener<E>): this {
    this.inner.off(event, listener);
    return this;
  }

  emit<E extends CopyBatchEventName>(event: E, payload: CopyBatchEvents[E]): boolean {
    return this.inner.emit(event, payload);
  }

  listening(event: CopyBatchEventName): boolean {
    return this.inner.listenerCount(event) > 0;
  }
}
