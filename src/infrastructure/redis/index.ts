export { default as redisPlugin } from './redis-plugin.js';
export type { RedisPluginOptions } from './redis-plugin.js';
export { RedisEnvelopeStream, parseEnvelopeEntry } from './envelope-stream.js';
export type { EnvelopeStream, StreamEntry, StreamOptions, EntryParseResult } from './envelope-stream.js';
export { publishWorldEvent, startWorldEventRelay } from './world-event-relay.js';
export type { Publisher } from './world-event-relay.js';
