import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import type { RobotRuntime } from '../application/robot-runtime.js';
import type { EnvelopeStream } from './redis/envelope-stream.js';
import { startWorldEventRelay, type Publisher } from './redis/world-event-relay.js';
import { startEnvelopeConsumer } from './worker/envelope-consumer.js';

export interface RuntimePluginOptions {
  runtime: RobotRuntime;
  log: Logger;
  /** Inbound envelopes. Without it the runtime is only fed through `ingest`. */
  consumer?: {
    stream: EnvelopeStream;
    blockMs: number;
    batchSize: number;
    /** Releases the stream's connection once the consumer has stopped. */
    release?: () => void | Promise<void>;
  };
  /** Outbound world events. */
  relay?: {
    publisher: Publisher;
    channel: string;
  };
}

/**
 * Owns the robot runtime for the server's lifetime.
 *
 * - Decorates `fastify.runtime`.
 * - Starts the stream consumer and world-event relay once the server is ready.
 * - On close: stops the consumer, waits for it, releases its connection,
 *   then tears the runtime down.
 */
async function runtimePlugin(fastify: FastifyInstance, options: RuntimePluginOptions): Promise<void> {
  const { runtime, log } = options;
  const ac = new AbortController();
  let consumerDone: Promise<void> | null = null;
  let stopRelay: (() => void) | null = null;

  fastify.decorate('runtime', runtime);

  fastify.addHook('onReady', async () => {
    if (options.relay !== undefined) {
      stopRelay = startWorldEventRelay(runtime.world.events, options.relay.publisher, options.relay.channel, log);
    }
    if (options.consumer !== undefined) {
      consumerDone = startEnvelopeConsumer({ ...options.consumer, runtime, log, signal: ac.signal }).catch(
        (err: unknown) => {
          log.error({ err }, 'Envelope consumer failed');
        },
      );
    }
  });

  fastify.addHook('onClose', async () => {
    ac.abort();
    if (consumerDone !== null) await consumerDone;
    // only now: closing it earlier fails the blocked read before the loop sees the abort
    await options.consumer?.release?.();
    stopRelay?.();
    runtime.teardown();
  });
}

export default fp(runtimePlugin, {
  name: 'runtime',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    runtime: RobotRuntime;
  }
}
