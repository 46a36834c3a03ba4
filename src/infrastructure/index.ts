export { redisPlugin, RedisEnvelopeStream, parseEnvelopeEntry } from './redis/index.js';
export { publishWorldEvent, startWorldEventRelay } from './redis/index.js';
export type { RedisPluginOptions, EnvelopeStream, StreamEntry, StreamOptions, Publisher } from './redis/index.js';
export { default as runtimePlugin } from './runtime-plugin.js';
export type { RuntimePluginOptions } from './runtime-plugin.js';
export { startEnvelopeConsumer } from './worker/envelope-consumer.js';
export type { EnvelopeConsumerOptions } from './worker/envelope-consumer.js';
export { loadRuntimeConfig, parseSimpleYaml, runtimeConfigSchema, DEFAULT_RUNTIME_CONFIG } from './config/runtime-config.js';
export type { RuntimeConfig } from './config/runtime-config.js';
