import type { Logger } from 'pino';
import type { DecodeError } from '../domain/errors.js';
import type { Envelope } from '../domain/envelope.js';

/**
 * Failures surfaced on the process-wide side channel.
 *
 * `decode`: the event factory dropped an envelope.
 * `handler`: a subscriber threw while an event was being delivered.
 * `task`: a queued task threw outside any handler.
 */
export type RuntimeFailure =
  | { source: 'decode'; error: DecodeError; envelope: Envelope }
  | { source: 'handler'; error: unknown; eventType: string; dispatcher: string }
  | { source: 'task'; error: unknown; task: string };

export type FailureHandler = (failure: RuntimeFailure) => void;

export class ErrorChannel {
  private handlers: readonly FailureHandler[] = [];

  constructor(private readonly log: Logger) {}

  /** Returns a function that removes the handler again. */
  subscribe(handler: FailureHandler): () => void {
    this.handlers = [...this.handlers, handler];
    return () => {
      this.handlers = this.handlers.filter((h) => h !== handler);
    };
  }

  /**
   * Delivers a failure to every handler. A handler that throws here is
   * logged and skipped; it is never reported back onto this channel.
   */
  report(failure: RuntimeFailure): void {
    for (const handler of this.handlers) {
      try {
        handler(failure);
      } catch (err: unknown) {
        this.log.error({ err, source: failure.source }, 'Error channel handler failed');
      }
    }
  }

  get handlerCount(): number {
    return this.handlers.length;
  }
}
