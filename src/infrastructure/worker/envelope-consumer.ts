import type { Logger } from 'pino';
import type { RobotRuntime } from '../../application/robot-runtime.js';
import { DecodeError } from '../../domain/errors.js';
import { parseEnvelopeEntry, type EnvelopeStream, type StreamEntry } from '../redis/envelope-stream.js';

export interface EnvelopeConsumerOptions {
  stream: EnvelopeStream;
  runtime: RobotRuntime;
  log: Logger;
  signal: AbortSignal;
  blockMs: number;
  batchSize: number;
  /** Delay before the loop retries after a read failure. */
  retryDelayMs?: number;
  sleepFn?: (ms: number) => Promise<void>;
}

/**
 * Feeds the inbound stream into the runtime.
 *
 * 1. Replays this consumer's pending entries (delivered, never acked).
 * 2. Blocks on new entries until `signal` is aborted.
 *
 * Each entry is handed to `runtime.ingest` and then acked. Ingest never
 * throws; an envelope that fails to decode is reported on the runtime's
 * error channel, so acking it is final. Malformed entries are acked too:
 * redelivery would not fix them.
 *
 * A failed ack leaves the entry pending; it is replayed on the next start.
 */
export async function startEnvelopeConsumer(options: EnvelopeConsumerOptions): Promise<void> {
  const { stream, log, signal, blockMs, batchSize } = options;
  const retryDelayMs = options.retryDelayMs ?? 1000;
  const sleepFn = options.sleepFn ?? sleep;

  await stream.ensureGroup();
  log.info({ blockMs, batchSize }, 'Envelope consumer started');

  await processPending(options);

  while (!signal.aborted) {
    try {
      const entries = await stream.read('>', batchSize, blockMs);
      for (const entry of entries) {
        await processEntry(options, entry);
      }
    } catch (err: unknown) {
      if (signal.aborted) break;
      log.error({ err }, 'Envelope consumer loop error, retrying');
      await sleepFn(retryDelayMs);
    }
  }

  log.info('Envelope consumer stopped');
}

async function processPending(options: EnvelopeConsumerOptions): Promise<void> {
  const entries = await options.stream.read('0', options.batchSize);

  let count = 0;
  for (const entry of entries) {
    // acked or trimmed while pending
    if (entry.fields.size === 0) continue;
    await processEntry(options, entry);
    count++;
  }

  if (count > 0) {
    options.log.info({ count }, 'Recovered pending envelopes');
  }
}

async function processEntry(options: EnvelopeConsumerOptions, entry: StreamEntry): Promise<void> {
  const { runtime, log, stream } = options;
  const parsed = parseEnvelopeEntry(entry.fields);

  if (parsed.ok) {
    runtime.ingest(parsed.envelope);
  } else {
    log.warn({ streamId: entry.id, kind: parsed.kind, reason: parsed.reason }, 'Malformed stream entry');
    runtime.errors.report({
      source: 'decode',
      error: new DecodeError('invalid_payload', parsed.kind, parsed.reason),
      envelope: { kind: parsed.kind, payload: undefined },
    });
  }

  try {
    await stream.ack(entry.id);
  } catch (err: unknown) {
    log.error({ err, streamId: entry.id }, 'Failed to ack stream entry');
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
