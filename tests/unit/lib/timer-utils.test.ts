import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createDeadline } from '../../../src/lib/timer-utils.js';

describe('createDeadline', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('aborts its signal with a TimeoutError once elapsed', () => {
    const deadline = createDeadline(100);

    vi.advanceTimersByTime(99);
    expect(deadline.expired).toBe(false);
    expect(deadline.signal.aborted).toBe(false);

    vi.advanceTimersByTime(1);
    expect(deadline.expired).toBe(true);
    expect(deadline.signal.aborted).toBe(true);
    expect(deadline.signal.reason).toMatchObject({
      name: 'TimeoutError',
      message: 'Deadline of 100ms elapsed',
    });
  });

  it('never fires once cleared', () => {
    const deadline = createDeadline(100);

    deadline.clear();
    vi.advanceTimersByTime(1000);

    expect(deadline.expired).toBe(false);
    expect(deadline.signal.aborted).toBe(false);
  });
});
