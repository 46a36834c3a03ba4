import type { Logger } from 'pino';
import type { ErrorChannel } from './error-channel.js';

export type EventHandler<E> = (event: E) => void;

interface Registration<E> {
  // kept for identity comparison in unsubscribe()
  readonly handler: (event: never) => void;
  readonly invoke: (event: E) => void;
}

export interface DispatcherOptions {
  /** Shows up in logs and on the error channel; defaults to `events`. */
  name?: string;
  log: Logger;
  errors: ErrorChannel;
}

function isOfType<E extends { type: string }, T extends E['type']>(
  event: E,
  type: T,
): event is Extract<E, { type: T }> {
  return event.type === type;
}

/**
 * Synchronous multi-subscriber dispatcher keyed by the event's `type`.
 *
 * `publish` delivers to every handler registered for the type, in
 * registration order, then to catch-all handlers, and returns only after
 * all of them ran. A throwing handler is reported on the error channel and
 * the remaining handlers still run.
 *
 * Handler lists are replaced, never mutated, so subscribing or
 * unsubscribing from inside a handler only affects later publishes.
 */
export class EventDispatcher<E extends { type: string }> {
  private readonly byType = new Map<string, readonly Registration<E>[]>();
  private catchAll: readonly Registration<E>[] = [];
  private readonly name: string;
  private readonly log: Logger;
  private readonly errors: ErrorChannel;

  constructor(options: DispatcherOptions) {
    this.name = options.name ?? 'events';
    this.log = options.log;
    this.errors = options.errors;
  }

  subscribe<T extends E['type']>(type: T, handler: EventHandler<Extract<E, { type: T }>>): () => void {
    const registration: Registration<E> = {
      handler,
      invoke: (event) => {
        if (isOfType(event, type)) handler(event);
      },
    };
    this.byType.set(type, [...(this.byType.get(type) ?? []), registration]);
    return () => {
      this.unsubscribe(type, handler);
    };
  }

  /**
   * Removes the earliest registration of `handler` for `type`.
   * Returns false when it was not registered.
   */
  unsubscribe<T extends E['type']>(type: T, handler: EventHandler<Extract<E, { type: T }>>): boolean {
    const current = this.byType.get(type);
    if (current === undefined) return false;
    const index = current.findIndex((r) => r.handler === handler);
    if (index === -1) return false;

    const next = current.filter((_, i) => i !== index);
    if (next.length === 0) {
      this.byType.delete(type);
    } else {
      this.byType.set(type, next);
    }
    return true;
  }

  /** Receives every published event after the type-specific handlers. */
  subscribeAll(handler: EventHandler<E>): () => void {
    const registration: Registration<E> = { handler, invoke: handler };
    this.catchAll = [...this.catchAll, registration];
    return () => {
      this.catchAll = this.catchAll.filter((r) => r !== registration);
    };
  }

  publish(event: E): void {
    const specific = this.byType.get(event.type) ?? [];
    const all = this.catchAll;

    for (const registration of specific) this.deliver(registration, event);
    for (const registration of all) this.deliver(registration, event);
  }

  handlerCount(type?: E['type']): number {
    if (type !== undefined) return this.byType.get(type)?.length ?? 0;
    let count = this.catchAll.length;
    for (const registrations of this.byType.values()) count += registrations.length;
    return count;
  }

  clear(): void {
    this.byType.clear();
    this.catchAll = [];
  }

  private deliver(registration: Registration<E>, event: E): void {
    try {
      registration.invoke(event);
    } catch (err: unknown) {
      this.log.warn({ err, eventType: event.type, dispatcher: this.name }, 'Event handler failed');
      this.errors.report({ source: 'handler', error: err, eventType: event.type, dispatcher: this.name });
    }
  }
}
