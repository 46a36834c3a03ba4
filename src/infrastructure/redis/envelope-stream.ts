import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { Envelope } from '../../domain/envelope.js';

/** One entry read from the inbound stream. */
export interface StreamEntry {
  readonly id: string;
  /** Raw field/value pairs; empty for entries deleted while pending. */
  readonly fields: ReadonlyMap<string, string>;
}

/**
 * Transport boundary for inbound envelopes.
 *
 * `read('0')` returns this consumer's delivered-but-unacknowledged entries,
 * `read('>')` waits up to `blockMs` for new ones.
 */
export interface EnvelopeStream {
  ensureGroup(): Promise<void>;
  read(cursor: '0' | '>', count: number, blockMs?: number): Promise<StreamEntry[]>;
  ack(id: string): Promise<void>;
}

export interface StreamOptions {
  key: string;
  group: string;
  consumer: string;
}

const readReplySchema = z
  .array(
    z.tuple([
      z.string(),
      z.array(z.tuple([z.string(), z.array(z.string()).nullable()])),
    ]),
  )
  .nullable();

/**
 * Stream entries arrive as flat [field, value, field, value, ...] arrays.
 */
function toFieldMap(flat: readonly string[] | null): ReadonlyMap<string, string> {
  const map = new Map<string, string>();
  if (flat === null) return map;
  for (let i = 0; i < flat.length; i += 2) {
    const key = flat[i];
    const value = flat[i + 1];
    if (key !== undefined && value !== undefined) map.set(key, value);
  }
  return map;
}

export type EntryParseResult =
  | { ok: true; envelope: Envelope }
  | { ok: false; kind: string; reason: string };

/**
 * Turns stream fields into an envelope. `payload` is JSON; an absent
 * payload field means the envelope carries none.
 */
export function parseEnvelopeEntry(fields: ReadonlyMap<string, string>): EntryParseResult {
  const kind = fields.get('kind') ?? '';
  if (kind === '') return { ok: false, kind, reason: 'Stream entry has no kind field' };

  const raw = fields.get('payload');
  if (raw === undefined) return { ok: true, envelope: { kind, payload: undefined } };
  try {
    const payload: unknown = JSON.parse(raw);
    return { ok: true, envelope: { kind, payload } };
  } catch {
    return { ok: false, kind, reason: 'Stream entry payload is not valid JSON' };
  }
}

export class RedisEnvelopeStream implements EnvelopeStream {
  constructor(
    private readonly redis: Redis,
    private readonly options: StreamOptions,
    private readonly log: Logger,
  ) {}

  /**
   * Ensures the consumer group exists on the stream.
   *
   * Start ID "$" = only envelopes arriving after group creation. A fresh
   * runtime has no use for history: world state is rebuilt from live
   * observations. Crash recovery goes through `read('0')` instead.
   *
   * Uses MKSTREAM so the stream is created if it doesn't exist yet.
   * Ignores BUSYGROUP errors (group already exists).
   */
  async ensureGroup(): Promise<void> {
    const { key, group } = this.options;
    try {
      await this.redis.xgroup('CREATE', key, group, '$', 'MKSTREAM');
      this.log.info({ group, stream: key }, 'Consumer group created (from $)');
    } catch (err: unknown) {
      if (err instanceof Error && err.message.includes('BUSYGROUP')) {
        this.log.debug({ group }, 'Consumer group already exists');
        return;
      }
      throw err;
    }
  }

  async read(cursor: '0' | '>', count: number, blockMs?: number): Promise<StreamEntry[]> {
    const { key, group, consumer } = this.options;
    const reply: unknown =
      blockMs === undefined
        ? await this.redis.xreadgroup('GROUP', group, consumer, 'COUNT', count, 'STREAMS', key, cursor)
        : await this.redis.xreadgroup('GROUP', group, consumer, 'COUNT', count, 'BLOCK', blockMs, 'STREAMS', key, cursor);

    // null = timeout with no new messages
    const streams = readReplySchema.parse(reply);
    if (streams === null) return [];

    const entries: StreamEntry[] = [];
    for (const [, streamEntries] of streams) {
      for (const [id, flat] of streamEntries) {
        entries.push({ id, fields: toFieldMap(flat) });
      }
    }
    return entries;
  }

  async ack(id: string): Promise<void> {
    await this.redis.xack(this.options.key, this.options.group, id);
  }
}
