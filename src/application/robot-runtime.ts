import type { Logger } from 'pino';
import type { Envelope } from '../domain/envelope.js';
import type { RobotEvent } from '../domain/robot-events.js';
import { AnimationTracker, type AnimationRpc } from './animation-tracker.js';
import { ActionCompletionCorrelator } from './completion-correlator.js';
import { ErrorChannel } from './error-channel.js';
import { EventDispatcher } from './event-dispatcher.js';
import { decodeEnvelope } from './event-factory.js';
import { SerialQueue } from './serial-queue.js';
import { WorldRegistry } from './world-registry.js';

export interface RobotRuntimeOptions {
  log: Logger;
  visibilityTimeoutMs?: number;
  quietIntervalMs?: number;
  nowFn?: () => number;
  /** Enables `animations` when given. */
  animationRpc?: AnimationRpc;
}

/**
 * Client runtime for one robot connection.
 *
 * envelope → factory → dispatcher → { registry, correlator, subscribers }
 *
 * `ingest` is the only inbound entry point. Everything it triggers, and
 * every disappear timer, runs on one serial queue.
 */
export class RobotRuntime {
  readonly errors: ErrorChannel;
  readonly queue: SerialQueue;
  readonly events: EventDispatcher<RobotEvent>;
  readonly world: WorldRegistry;
  readonly completions: ActionCompletionCorrelator;
  readonly animations: AnimationTracker | null;

  private readonly log: Logger;
  private readonly unbind: Array<() => void>;
  private tornDown = false;

  constructor(options: RobotRuntimeOptions) {
    const { log } = options;
    this.log = log;
    this.errors = new ErrorChannel(log);
    this.queue = new SerialQueue(this.errors, log);
    this.events = new EventDispatcher<RobotEvent>({ name: 'robot', log, errors: this.errors });
    this.world = new WorldRegistry({
      log,
      queue: this.queue,
      errors: this.errors,
      visibilityTimeoutMs: options.visibilityTimeoutMs,
      nowFn: options.nowFn,
    });
    this.completions = new ActionCompletionCorrelator({
      log,
      quietIntervalMs: options.quietIntervalMs,
      nowFn: options.nowFn,
    });
    this.animations =
      options.animationRpc === undefined
        ? null
        : new AnimationTracker({ rpc: options.animationRpc, correlator: this.completions, log });

    this.unbind = [this.world.bind(this.events), this.completions.bindStatusStream(this.events)];
  }

  /**
   * Decodes and dispatches one envelope. Undecodable envelopes are logged,
   * reported on `errors` and dropped; nothing is thrown.
   */
  ingest(envelope: Envelope): void {
    if (this.tornDown) {
      this.log.debug({ kind: envelope.kind }, 'Envelope ignored after teardown');
      return;
    }
    this.queue.enqueue(`ingest:${envelope.kind}`, () => {
      const result = decodeEnvelope(envelope);
      if (!result.ok) {
        const { error } = result;
        this.log.warn({ kind: error.kind, reason: error.reason, issues: error.issues }, 'Dropped undecodable envelope');
        this.errors.report({ source: 'decode', error, envelope });
        return;
      }
      this.events.publish(result.event);
    });
  }

  get isTornDown(): boolean {
    return this.tornDown;
  }

  /** Settles pending completions as cancelled and stops all registry timers. */
  teardown(): void {
    if (this.tornDown) return;
    this.tornDown = true;
    for (const unbind of this.unbind) unbind();
    this.animations?.teardown();
    const cancelled = this.completions.cancelAll();
    this.world.teardown();
    this.log.info({ cancelled }, 'Robot runtime torn down');
  }
}
