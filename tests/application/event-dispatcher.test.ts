import { describe, it, expect } from 'vitest';
import { ErrorChannel, type RuntimeFailure } from '../../src/application/error-channel.js';
import { EventDispatcher } from '../../src/application/event-dispatcher.js';
import { captureLogger } from '../helpers/logger.js';

type TestEvent = { type: 'ping'; n: number } | { type: 'pong'; label: string };

function setup() {
  const logs = captureLogger();
  const errors = new ErrorChannel(logs.log);
  const failures: RuntimeFailure[] = [];
  errors.subscribe((f) => failures.push(f));
  const dispatcher = new EventDispatcher<TestEvent>({ name: 'test', log: logs.log, errors });
  return { logs, errors, failures, dispatcher };
}

describe('EventDispatcher', () => {
  it('delivers to handlers of the event type in registration order, then catch-all handlers', () => {
    const { dispatcher } = setup();
    const calls: string[] = [];

    dispatcher.subscribeAll((e) => calls.push(`all:${e.type}`));
    dispatcher.subscribe('ping', (e) => calls.push(`first:${e.n}`));
    dispatcher.subscribe('ping', (e) => calls.push(`second:${e.n}`));
    dispatcher.subscribe('pong', (e) => calls.push(`pong:${e.label}`));

    dispatcher.publish({ type: 'ping', n: 1 });

    expect(calls).toEqual(['first:1', 'second:1', 'all:ping']);
  });

  it('keeps delivering after a handler throws and reports the failure', () => {
    const { dispatcher, failures, logs } = setup();
    const seen: number[] = [];
    const boom = new Error('boom');

    dispatcher.subscribe('ping', () => {
      throw boom;
    });
    dispatcher.subscribe('ping', (e) => seen.push(e.n));

    dispatcher.publish({ type: 'ping', n: 2 });

    expect(seen).toEqual([2]);
    expect(failures).toEqual([{ source: 'handler', error: boom, eventType: 'ping', dispatcher: 'test' }]);
    expect(logs.messages('warn')).toEqual(['Event handler failed']);
  });

  it('stops delivering to an unsubscribed handler', () => {
    const { dispatcher } = setup();
    const seen: number[] = [];
    const handler = (e: { n: number }) => {
      seen.push(e.n);
    };

    const unsubscribe = dispatcher.subscribe('ping', handler);
    dispatcher.publish({ type: 'ping', n: 1 });
    unsubscribe();
    dispatcher.publish({ type: 'ping', n: 2 });

    expect(seen).toEqual([1]);
    expect(dispatcher.unsubscribe('ping', handler)).toBe(false);
    expect(dispatcher.handlerCount('ping')).toBe(0);
  });

  it('applies subscriptions made during delivery to later publishes only', () => {
    const { dispatcher } = setup();
    const seen: string[] = [];

    dispatcher.subscribe('ping', () => {
      seen.push('outer');
      dispatcher.subscribe('ping', () => seen.push('inner'));
    });

    dispatcher.publish({ type: 'ping', n: 1 });
    expect(seen).toEqual(['outer']);

    dispatcher.publish({ type: 'ping', n: 2 });
    expect(seen).toEqual(['outer', 'outer', 'inner']);
  });

  it('counts and clears handlers', () => {
    const { dispatcher } = setup();
    dispatcher.subscribe('ping', () => undefined);
    dispatcher.subscribe('pong', () => undefined);
    dispatcher.subscribeAll(() => undefined);

    expect(dispatcher.handlerCount()).toBe(3);
    dispatcher.clear();
    expect(dispatcher.handlerCount()).toBe(0);
  });
});

describe('ErrorChannel', () => {
  it('logs a throwing failure handler and still calls the rest', () => {
    const logs = captureLogger();
    const errors = new ErrorChannel(logs.log);
    const seen: string[] = [];

    errors.subscribe(() => {
      throw new Error('handler broke');
    });
    errors.subscribe((f) => seen.push(f.source));

    errors.report({ source: 'task', error: new Error('x'), task: 'job' });

    expect(seen).toEqual(['task']);
    expect(logs.messages('error')).toEqual(['Error channel handler failed']);
  });
});
