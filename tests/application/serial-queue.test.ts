import { describe, it, expect } from 'vitest';
import { ErrorChannel, type RuntimeFailure } from '../../src/application/error-channel.js';
import { SerialQueue } from '../../src/application/serial-queue.js';
import { captureLogger } from '../helpers/logger.js';

function setup() {
  const logs = captureLogger();
  const errors = new ErrorChannel(logs.log);
  const failures: RuntimeFailure[] = [];
  errors.subscribe((f) => failures.push(f));
  return { logs, failures, queue: new SerialQueue(errors, logs.log) };
}

describe('SerialQueue', () => {
  it('runs a task immediately when idle', () => {
    const { queue } = setup();
    const order: string[] = [];

    queue.enqueue('a', () => order.push('a'));
    order.push('after');

    expect(order).toEqual(['a', 'after']);
    expect(queue.isDraining).toBe(false);
  });

  it('runs tasks enqueued from inside a task after it, never nested', () => {
    const { queue } = setup();
    const order: string[] = [];

    queue.enqueue('outer', () => {
      order.push('outer:start');
      queue.enqueue('inner', () => order.push('inner'));
      order.push('outer:end');
    });

    expect(order).toEqual(['outer:start', 'outer:end', 'inner']);
    expect(queue.pending).toBe(0);
  });

  it('reports a failing task and keeps draining', () => {
    const { queue, failures, logs } = setup();
    const order: string[] = [];
    const boom = new Error('boom');

    queue.enqueue('outer', () => {
      queue.enqueue('bad', () => {
        throw boom;
      });
      queue.enqueue('good', () => order.push('good'));
    });

    expect(order).toEqual(['good']);
    expect(failures).toEqual([{ source: 'task', error: boom, task: 'bad' }]);
    expect(logs.messages('warn')).toEqual(['Queued task failed']);
  });
});
