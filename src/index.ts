import Fastify from 'fastify';
import pino from 'pino';

import { RobotRuntime } from './application/robot-runtime.js';
import { loadRuntimeConfig } from './infrastructure/config/runtime-config.js';
import { redisPlugin, runtimePlugin, RedisEnvelopeStream } from './infrastructure/index.js';
import { worldRoutes } from './interfaces/http/index.js';

/**
 * Bootstrap the world runtime service.
 *
 * Order:
 * 1) Config + runtime
 * 2) Infrastructure plugins (Redis, runtime lifecycle)
 * 3) HTTP routes
 * 4) Shutdown hooks
 * 5) listen()
 */
async function main(): Promise<void> {
  const config = loadRuntimeConfig();

  const log = pino({ level: config.log.level }).child({ component: 'runtime' });

  const fastify = Fastify({
    logger: {
      level: config.log.level,
    },
  });

  const runtime = new RobotRuntime({
    log,
    visibilityTimeoutMs: config.world.visibility_timeout_ms,
    quietIntervalMs: config.completion.quiet_interval_ms,
  });

  runtime.errors.subscribe((failure) => {
    if (failure.source === 'decode') {
      log.debug({ kind: failure.envelope.kind, reason: failure.error.reason }, 'Decode failure reported');
    }
  });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(redisPlugin, { url: config.stream.redis_url });

  // Blocking XREADGROUP holds its connection, so reads get their own.
  const streamRedis = fastify.redis.duplicate();
  await streamRedis.connect();

  await fastify.register(runtimePlugin, {
    runtime,
    log,
    consumer: {
      stream: new RedisEnvelopeStream(
        streamRedis,
        { key: config.stream.key, group: config.stream.group, consumer: config.stream.consumer },
        log,
      ),
      blockMs: config.stream.block_ms,
      batchSize: config.stream.batch_size,
      release: () => {
        streamRedis.disconnect();
      },
    },
    relay: config.relay.enabled ? { publisher: fastify.redis, channel: config.relay.channel } : undefined,
  });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(worldRoutes);

  const shutdown = (): void => {
    fastify.log.info('Shutting down...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  await fastify.listen({
    host: config.http.host,
    port: config.http.port,
  });
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
