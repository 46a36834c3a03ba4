import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ErrorChannel } from '../../src/application/error-channel.js';
import { GenerationTimers } from '../../src/application/generation-timers.js';
import { SerialQueue } from '../../src/application/serial-queue.js';
import { captureLogger } from '../helpers/logger.js';

function setup() {
  const logs = captureLogger();
  const queue = new SerialQueue(new ErrorChannel(logs.log), logs.log);
  return { logs, queue, timers: new GenerationTimers<string>(queue, logs.log, 'test') };
}

describe('GenerationTimers', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('fires once after the delay', () => {
    const { timers } = setup();
    const fired = vi.fn();

    expect(timers.arm('a', 100, fired)).toBe(1);
    vi.advanceTimersByTime(99);
    expect(fired).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(fired).toHaveBeenCalledOnce();
    expect(timers.isArmed('a')).toBe(false);
  });

  it('replaces the previous arming of the same key', () => {
    const { timers } = setup();
    const first = vi.fn();
    const second = vi.fn();

    timers.arm('a', 100, first);
    vi.advanceTimersByTime(60);
    expect(timers.arm('a', 100, second)).toBe(2);
    vi.advanceTimersByTime(60);

    expect(first).not.toHaveBeenCalled();
    expect(second).not.toHaveBeenCalled();

    vi.advanceTimersByTime(40);
    expect(second).toHaveBeenCalledOnce();
    expect(first).not.toHaveBeenCalled();
  });

  it('drops a fired timer that was superseded before its queued check ran', () => {
    const { timers, queue, logs } = setup();
    const stale = vi.fn();
    const fresh = vi.fn();

    timers.arm('a', 10, stale);
    // hold the queue so the timer's check waits behind this task
    queue.enqueue('busy', () => {
      vi.advanceTimersByTime(10);
      timers.arm('a', 50, fresh);
    });

    expect(stale).not.toHaveBeenCalled();
    expect(logs.messages('debug')).toEqual(['Stale timer ignored']);

    vi.advanceTimersByTime(50);
    expect(fresh).toHaveBeenCalledOnce();
  });

  it('cancels one key or all keys', () => {
    const { timers } = setup();
    const a = vi.fn();
    const b = vi.fn();

    timers.arm('a', 10, a);
    timers.arm('b', 10, b);
    expect(timers.armedCount).toBe(2);

    expect(timers.cancel('a')).toBe(true);
    expect(timers.cancel('a')).toBe(false);
    timers.cancelAll();
    vi.advanceTimersByTime(20);

    expect(a).not.toHaveBeenCalled();
    expect(b).not.toHaveBeenCalled();
    expect(timers.armedCount).toBe(0);
    expect(timers.generationOf('b')).toBe(0);
  });

  it('does not let a cancelled timer match a later arming of the same key', () => {
    const { timers, queue, logs } = setup();
    const stale = vi.fn();
    const fresh = vi.fn();

    expect(timers.arm('a', 10, stale)).toBe(1);
    queue.enqueue('busy', () => {
      vi.advanceTimersByTime(10);
      timers.cancel('a');
      expect(timers.arm('a', 50, fresh)).toBe(2);
    });

    expect(stale).not.toHaveBeenCalled();
    expect(logs.messages('debug')).toEqual(['Stale timer ignored']);
    expect(timers.generationOf('a')).toBe(2);

    vi.advanceTimersByTime(50);
    expect(fresh).toHaveBeenCalledOnce();
    expect(timers.armedCount).toBe(0);
  });

  it('releases slots once they fire or are cancelled', () => {
    const { timers } = setup();

    timers.arm('a', 10, vi.fn());
    timers.arm('b', 10, vi.fn());
    timers.arm('c', 30, vi.fn());
    timers.cancel('b');
    vi.advanceTimersByTime(10);

    expect(timers.isArmed('a')).toBe(false);
    expect(timers.isArmed('b')).toBe(false);
    expect(timers.armedCount).toBe(1);

    timers.cancelAll();
    expect(timers.armedCount).toBe(0);
  });
});
