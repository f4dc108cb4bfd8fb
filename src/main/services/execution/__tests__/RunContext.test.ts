import { describe, it, expect } from 'vitest';
import type { RunEvent } from '@shared/types';
import { makeContext } from './fixtures';

describe('RunContext', () => {
  it('should hold waiters until resume', async () => {
    const context = makeContext();
    context.pause();

    let released = false;
    const waiting = context.waitWhilePaused().then(() => {
      released = true;
    });
    await new Promise((resolve) => setTimeout(resolve, 5));
    expect(released).toBe(false);

    context.resume();
    await waiting;
    expect(released).toBe(true);
  });

  it('should release paused waiters on cancel and abort the signal', async () => {
    const context = makeContext();
    context.pause();
    const waiting = context.waitWhilePaused();

    context.cancel('Operator stop');
    await waiting;

    expect(context.signal.aborted).toBe(true);
    expect(context.isPaused).toBe(false);
    expect(context.cancelReason).toBe('Operator stop');
  });

  it('should publish each control change once', () => {
    const context = makeContext();
    const events: RunEvent[] = [];
    context.emitter.on('event', (event) => events.push(event));

    context.pause();
    context.pause();
    context.resume();
    context.resume();
    context.cancel();
    context.cancel();
    context.pause();

    expect(events).toEqual([
      { type: 'run-paused' },
      { type: 'run-resumed' },
      { type: 'run-cancelled', reason: 'Cancelled by user' },
    ]);
  });
});
