import type { Logger } from 'pino';
import type { RobotEvent } from '../domain/robot-events.js';
import type { RobotStatus, RobotStatusFlag } from '../domain/robot-status.js';
import type { EventDispatcher } from './event-dispatcher.js';

export type ActionKind = 'animation' | 'pathing' | 'docking' | 'motors';

/**
 * How a completion handle settled.
 *
 * `superseded` is not a failure: a newer request of the same kind took over
 * the tracking slot.
 */
export type CompletionOutcome = 'completed' | 'superseded' | 'cancelled';

export const DEFAULT_QUIET_INTERVAL_MS = 250;

/** Status flag that reports whether each action kind is still running. */
const ACTIVE_FLAG: Record<ActionKind, RobotStatusFlag> = {
  animation: 'isAnimating',
  pathing: 'isPathing',
  docking: 'isDockingToMarker',
  motors: 'areMotorsMoving',
};

/** Settles exactly once; later settle calls are ignored. */
export class ActionCompletion {
  readonly completion: Promise<CompletionOutcome>;
  private resolveCompletion: (outcome: CompletionOutcome) => void = () => undefined;
  private settledAs: CompletionOutcome | null = null;

  constructor(
    readonly kind: ActionKind,
    readonly startedAt: number,
  ) {
    this.completion = new Promise<CompletionOutcome>((resolve) => {
      this.resolveCompletion = resolve;
    });
  }

  get outcome(): CompletionOutcome | null {
    return this.settledAs;
  }

  get isSettled(): boolean {
    return this.settledAs !== null;
  }

  settle(outcome: CompletionOutcome): boolean {
    if (this.settledAs !== null) return false;
    this.settledAs = outcome;
    this.resolveCompletion(outcome);
    return true;
  }
}

export interface CompletionCorrelatorOptions {
  log: Logger;
  quietIntervalMs?: number;
  nowFn?: () => number;
}

/**
 * Infers completion of robot actions that have no explicit "done" message.
 *
 * At most one handle is pending per action kind. A handle completes on the
 * first status update that reports the action inactive once the quiet
 * interval since `begin` has passed; earlier "inactive" reports are the
 * tail of whatever ran before and are ignored.
 */
export class ActionCompletionCorrelator {
  private readonly pendingByKind = new Map<ActionKind, ActionCompletion>();
  private readonly log: Logger;
  private readonly nowFn: () => number;
  readonly quietIntervalMs: number;

  constructor(options: CompletionCorrelatorOptions) {
    this.log = options.log;
    this.nowFn = options.nowFn ?? Date.now;
    this.quietIntervalMs = options.quietIntervalMs ?? DEFAULT_QUIET_INTERVAL_MS;
  }

  /** Starts tracking `kind`. A handle already pending for it settles as `superseded`. */
  begin(kind: ActionKind): ActionCompletion {
    const previous = this.pendingByKind.get(kind);
    if (previous !== undefined) {
      previous.settle('superseded');
      this.log.debug({ kind, startedAt: previous.startedAt }, 'Pending completion superseded');
    }
    const handle = new ActionCompletion(kind, this.nowFn());
    this.pendingByKind.set(kind, handle);
    return handle;
  }

  /** Feeds one status observation. Returns true when it completed the pending handle. */
  update(kind: ActionKind, isActive: boolean): boolean {
    const handle = this.pendingByKind.get(kind);
    if (handle === undefined || isActive) return false;
    if (this.nowFn() - handle.startedAt < this.quietIntervalMs) return false;

    this.pendingByKind.delete(kind);
    handle.settle('completed');
    return true;
  }

  /** Feeds every tracked kind from one robot status snapshot. */
  updateFromStatus(status: RobotStatus): void {
    for (const kind of [...this.pendingByKind.keys()]) {
      this.update(kind, status[ACTIVE_FLAG[kind]]);
    }
  }

  bindStatusStream(dispatcher: EventDispatcher<RobotEvent>): () => void {
    return dispatcher.subscribe('robot_state', (event) => {
      this.updateFromStatus(event.status);
    });
  }

  pending(kind: ActionKind): ActionCompletion | undefined {
    return this.pendingByKind.get(kind);
  }

  /**
   * Settles `handle` as cancelled and frees its slot if it still holds it.
   * Returns false when the handle had already settled.
   */
  cancel(handle: ActionCompletion): boolean {
    if (this.pendingByKind.get(handle.kind) === handle) this.pendingByKind.delete(handle.kind);
    return handle.settle('cancelled');
  }

  /** Settles every pending handle as cancelled. Returns how many there were. */
  cancelAll(): number {
    const handles = [...this.pendingByKind.values()];
    this.pendingByKind.clear();
    for (const handle of handles) handle.settle('cancelled');
    if (handles.length > 0) this.log.debug({ count: handles.length }, 'Pending completions cancelled');
    return handles.length;
  }
}
