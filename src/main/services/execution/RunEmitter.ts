/**
 * RunEmitter: typed EventEmitter for run progress.
 *
 * Every RunEvent is emitted twice: under its own type (for listeners that care
 * about one kind) and under 'event' (for renderers that take the whole stream).
 *
 * stream() exposes the same events as an async generator that ends after
 * 'run-completed' or 'run-failed'.
 */

import { EventEmitter } from 'events';
import type { RunEvent, RunEventOf, RunEventType } from '@shared/types';

export class RunEmitter extends EventEmitter {
  publish(event: RunEvent): void {
    this.emit(event.type, event);
    this.emit('event', event);
  }

  emit<T extends RunEventType>(event: T, payload: RunEventOf<T>): boolean;
  emit(event: 'event', payload: RunEvent): boolean;
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  emit(event: string | symbol, ...args: any[]): boolean {
    return super.emit(event, ...args);
  }

  on<T extends RunEventType>(event: T, listener: (payload: RunEventOf<T>) => void): this;
  on(event: 'event', listener: (payload: RunEvent) => void): this;
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  on(event: string | symbol, listener: (...args: any[]) => void): this {
    return super.on(event, listener);
  }

  once<T extends RunEventType>(event: T, listener: (payload: RunEventOf<T>) => void): this;
  once(event: 'event', listener: (payload: RunEvent) => void): this;
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  once(event: string | symbol, listener: (...args: any[]) => void): this {
    return super.once(event, listener);
  }

  removeListener<T extends RunEventType>(event: T, listener: (payload: RunEventOf<T>) => void): this;
  removeListener(event: 'event', listener: (payload: RunEvent) => void): this;
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  removeListener(event: string | symbol, listener: (...args: any[]) => void): this {
    return super.removeListener(event, listener);
  }

  /**
   * Async view of the event stream. Events published before the first next()
   * call are buffered; the generator returns after 'run-completed' or
   * 'run-failed'.
   */
  async *stream(): AsyncGenerator<RunEvent, void, undefined> {
    const queue: RunEvent[] = [];
    let wake: (() => void) | null = null;

    const onEvent = (event: RunEvent) => {
      queue.push(event);
      if (wake) {
        wake();
        wake = null;
      }
    };
    this.on('event', onEvent);

    try {
      while (true) {
        const next = queue.shift();
        if (!next) {
          await new Promise<void>((resolve) => {
            wake = resolve;
          });
          continue;
        }
        yield next;
        if (next.type === 'run-completed' || next.type === 'run-failed') return;
      }
    } finally {
      this.removeListener('event', onEvent);
    }
  }
}
