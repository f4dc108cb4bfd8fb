import { describe, it, expect } from 'vitest';
import { TransportError } from '../../../errors';
import { FailureClassifier } from '../FailureClassifier';

describe('FailureClassifier', () => {
  const classifier = new FailureClassifier({ retryCount: 2, retryDelaySeconds: 1.5 });

  it('should keep transport kinds while connecting', () => {
    expect(classifier.classify(new TransportError('auth', 'denied'), 'connect')).toEqual({
      kind: 'auth',
      retryable: false,
      detail: 'denied',
    });
    expect(classifier.classify(new TransportError('timeout', 'slow'), 'connect').kind).toBe('timeout');
    expect(classifier.classify(new Error('ECONNRESET'), 'connect')).toEqual({
      kind: 'connect',
      retryable: true,
      detail: 'ECONNRESET',
    });
  });

  it('should treat any escalation failure as auth', () => {
    expect(classifier.classify(new TransportError('timeout', 'no prompt'), 'escalate').kind).toBe('auth');
  });

  it('should map execution errors by kind', () => {
    expect(classifier.classify(new TransportError('command', '% Invalid'), 'execute').kind).toBe('command');
    expect(classifier.classify(new TransportError('connect', 'closed'), 'execute').kind).toBe('connect');
    expect(classifier.classify('weird', 'execute')).toEqual({ kind: 'command', retryable: false, detail: 'weird' });
  });

  it('should retry connect and timeout failures until attempts run out', () => {
    expect(classifier.maxAttempts).toBe(3);
    expect(classifier.shouldRetry('connect', 1)).toBe(true);
    expect(classifier.shouldRetry('timeout', 2)).toBe(true);
    expect(classifier.shouldRetry('timeout', 3)).toBe(false);
    expect(classifier.shouldRetry('auth', 1)).toBe(false);
    expect(classifier.shouldRetry('command', 1)).toBe(false);
  });

  it('should back off linearly', () => {
    expect(classifier.backoffMs(1)).toBe(1500);
    expect(classifier.backoffMs(2)).toBe(3000);
  });
});
