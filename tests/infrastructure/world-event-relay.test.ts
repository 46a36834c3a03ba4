import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { RobotRuntime } from '../../src/application/robot-runtime.js';
import { startWorldEventRelay, type Publisher } from '../../src/infrastructure/redis/world-event-relay.js';
import { observedObject } from '../helpers/envelopes.js';
import { captureLogger } from '../helpers/logger.js';

class RecordingPublisher implements Publisher {
  readonly messages: Array<{ channel: string; message: unknown }> = [];
  failing = false;

  async publish(channel: string, message: string): Promise<number> {
    if (this.failing) throw new Error('redis down');
    this.messages.push({ channel, message: JSON.parse(message) });
    return 1;
  }
}

const flush = () => new Promise((resolve) => setImmediate(resolve));

describe('startWorldEventRelay', () => {
  it('publishes each world event as a snapshot', async () => {
    const logs = captureLogger();
    const runtime = new RobotRuntime({ log: logs.log, nowFn: () => 5000 });
    const publisher = new RecordingPublisher();
    startWorldEventRelay(runtime.world.events, publisher, 'world_events', logs.log);

    runtime.ingest(observedObject(4));
    await flush();
    runtime.teardown();

    expect(publisher.messages.map((m) => m.channel)).toEqual(['world_events', 'world_events', 'world_events']);
    const types = publisher.messages.map((m) => z.object({ type: z.string() }).parse(m.message).type);
    expect(types).toEqual(['object_added', 'object_appeared', 'object_observed']);
    expect(publisher.messages[0]?.message).toMatchObject({
      object: {
        object_type: 'light_cube',
        object_id: 4,
        is_visible: true,
        is_connected: false,
        last_observed_time: 5000,
        pose: { x: 100, y: 50, z: 0, q0: 1, origin_id: 1 },
      },
    });
  });

  it('logs publish failures without throwing', async () => {
    const logs = captureLogger();
    const runtime = new RobotRuntime({ log: logs.log });
    const publisher = new RecordingPublisher();
    publisher.failing = true;
    const stop = startWorldEventRelay(runtime.world.events, publisher, 'world_events', logs.log);

    runtime.ingest(observedObject(4));
    await flush();
    stop();
    runtime.teardown();

    expect(logs.messages('warn')).toEqual([
      'Failed to publish world event',
      'Failed to publish world event',
      'Failed to publish world event',
    ]);
  });
});
