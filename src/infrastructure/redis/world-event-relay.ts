import type { Logger } from 'pino';
import type { EventDispatcher } from '../../application/event-dispatcher.js';
import { snapshotWorldEvent } from '../../application/world-snapshot.js';
import type { WorldEvent } from '../../domain/world-events.js';

/** The part of an ioredis client the relay needs. */
export interface Publisher {
  publish(channel: string, message: string): Promise<unknown>;
}

/**
 * Publishes one world event to a Pub/Sub channel as a JSON snapshot.
 *
 * Best-effort: publish failures are logged, never rethrown.
 */
export async function publishWorldEvent(
  publisher: Publisher,
  channel: string,
  log: Logger,
  event: WorldEvent,
): Promise<void> {
  try {
    await publisher.publish(channel, JSON.stringify(snapshotWorldEvent(event)));
    log.debug({ channel, eventType: event.type }, 'Publishing world event');
  } catch (err: unknown) {
    log.warn({ err, channel, eventType: event.type }, 'Failed to publish world event');
  }
}

/**
 * Forwards every world event to `channel`. Returns the unsubscribe.
 */
export function startWorldEventRelay(
  events: EventDispatcher<WorldEvent>,
  publisher: Publisher,
  channel: string,
  log: Logger,
): () => void {
  log.info({ channel }, 'World event relay started');
  return events.subscribeAll((event) => {
    void publishWorldEvent(publisher, channel, log, event);
  });
}
