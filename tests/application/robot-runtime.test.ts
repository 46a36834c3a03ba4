import { describe, it, expect } from 'vitest';
import type { RuntimeFailure } from '../../src/application/error-channel.js';
import { RobotRuntime } from '../../src/application/robot-runtime.js';
import type { RobotEvent } from '../../src/domain/robot-events.js';
import { encodeRobotStatus } from '../../src/domain/robot-status.js';
import { observedObject, robotState } from '../helpers/envelopes.js';
import { captureLogger } from '../helpers/logger.js';

function setup() {
  const logs = captureLogger();
  let now = 0;
  const runtime = new RobotRuntime({ log: logs.log, quietIntervalMs: 250, nowFn: () => now });
  const failures: RuntimeFailure[] = [];
  runtime.errors.subscribe((f) => failures.push(f));
  return {
    logs,
    runtime,
    failures,
    at: (ms: number) => {
      now = ms;
    },
  };
}

describe('RobotRuntime', () => {
  it('publishes decoded events to subscribers', () => {
    const { runtime } = setup();
    const seen: RobotEvent[] = [];
    runtime.events.subscribe('photo_taken', (e) => seen.push(e));

    runtime.ingest({ kind: 'photo_taken', payload: { photo_id: 12 } });

    expect(seen).toEqual([{ kind: 'photo_taken', type: 'photo_taken', photoId: 12 }]);
  });

  it('updates the world before later subscribers see the raw event', () => {
    const { runtime } = setup();
    const visibleWhenSeen: boolean[] = [];
    runtime.events.subscribe('robot_observed_object', (e) => {
      visibleWhenSeen.push(runtime.world.getObject(e.objectId)?.isVisible ?? false);
    });

    runtime.ingest(observedObject(4));

    expect(visibleWhenSeen).toEqual([true]);
  });

  it('drops undecodable envelopes and reports them on the error channel', () => {
    const { runtime, failures, logs } = setup();
    const seen: RobotEvent[] = [];
    runtime.events.subscribeAll((e) => seen.push(e));

    runtime.ingest({ kind: 'teleport', payload: {} });
    runtime.ingest({ kind: 'keep_alive', payload: {} });

    expect(seen.map((e) => e.type)).toEqual(['keep_alive']);
    expect(failures).toHaveLength(1);
    const [failure] = failures;
    if (failure?.source !== 'decode') throw new Error('expected a decode failure');
    expect(failure.error.reason).toBe('unknown_kind');
    expect(failure.envelope.kind).toBe('teleport');
    expect(logs.messages('warn')).toEqual(['Dropped undecodable envelope']);
  });

  it('keeps ingesting after a subscriber throws', () => {
    const { runtime, failures } = setup();
    let calls = 0;
    runtime.events.subscribe('keep_alive', () => {
      calls++;
      throw new Error('subscriber bug');
    });

    runtime.ingest({ kind: 'keep_alive', payload: {} });
    runtime.ingest({ kind: 'keep_alive', payload: {} });

    expect(calls).toBe(2);
    expect(failures.map((f) => f.source)).toEqual(['handler', 'handler']);
  });

  it('processes envelopes ingested from a subscriber after the current one', () => {
    const { runtime } = setup();
    const order: string[] = [];
    runtime.events.subscribe('keep_alive', () => {
      order.push('keep_alive:start');
      runtime.ingest({ kind: 'photo_taken', payload: { photo_id: 1 } });
      order.push('keep_alive:end');
    });
    runtime.events.subscribe('photo_taken', () => order.push('photo_taken'));

    runtime.ingest({ kind: 'keep_alive', payload: {} });

    expect(order).toEqual(['keep_alive:start', 'keep_alive:end', 'photo_taken']);
  });

  it('completes a tracked action from the robot state stream', async () => {
    const { runtime, at } = setup();
    const handle = runtime.completions.begin('pathing');

    at(100);
    runtime.ingest(robotState(encodeRobotStatus(['isPathing'])));
    at(300);
    runtime.ingest(robotState(0));

    await expect(handle.completion).resolves.toBe('completed');
  });

  it('cancels pending work and ignores envelopes after teardown', async () => {
    const { runtime, logs } = setup();
    const handle = runtime.completions.begin('docking');
    const seen: RobotEvent[] = [];
    runtime.events.subscribeAll((e) => seen.push(e));

    runtime.teardown();
    runtime.ingest({ kind: 'keep_alive', payload: {} });

    expect(runtime.isTornDown).toBe(true);
    expect(seen).toEqual([]);
    await expect(handle.completion).resolves.toBe('cancelled');
    expect(logs.messages('info')).toContain('Robot runtime torn down');
    expect(runtime.animations).toBeNull();
  });
});
