import type { Logger } from 'pino';
import { UnknownAnimationError } from '../domain/errors.js';
import type { ActionCompletionCorrelator, CompletionOutcome } from './completion-correlator.js';

export type PlaybackStatus = 'ok' | 'busy' | 'failed';

export interface PlayOptions {
  loops: number;
  ignoreBodyTrack: boolean;
  ignoreHeadTrack: boolean;
  ignoreLiftTrack: boolean;
}

export interface TriggerPlayOptions extends PlayOptions {
  /** Let the robot drop the lift track while it is carrying an object. */
  useLiftSafe: boolean;
}

export const DEFAULT_PLAY_OPTIONS: PlayOptions = {
  loops: 1,
  ignoreBodyTrack: false,
  ignoreHeadTrack: false,
  ignoreLiftTrack: false,
};

export const DEFAULT_TRIGGER_PLAY_OPTIONS: TriggerPlayOptions = {
  ...DEFAULT_PLAY_OPTIONS,
  useLiftSafe: false,
};

/**
 * Robot-bound animation calls. Each returns the robot's result code only;
 * completion is inferred from the status stream.
 */
export interface AnimationRpc {
  listAnimations(): Promise<string[]>;
  listAnimationTriggers(): Promise<string[]>;
  playAnimation(name: string, options: PlayOptions): Promise<PlaybackStatus>;
  playAnimationTrigger(name: string, options: TriggerPlayOptions): Promise<PlaybackStatus>;
}

export interface PlaybackResult {
  status: PlaybackStatus;
  /** Already settled as `cancelled` when the robot did not accept the request. */
  completion: Promise<CompletionOutcome>;
}

export interface AnimationTrackerOptions {
  rpc: AnimationRpc;
  correlator: ActionCompletionCorrelator;
  log: Logger;
}

type Catalog = 'animation' | 'trigger';

/**
 * Plays animations and tracks their completion.
 *
 * Animation and trigger names are loaded once per tracker and kept until
 * `invalidate()` or `teardown()`.
 */
export class AnimationTracker {
  private readonly rpc: AnimationRpc;
  private readonly correlator: ActionCompletionCorrelator;
  private readonly log: Logger;
  private readonly catalogs = new Map<Catalog, Promise<ReadonlySet<string>>>();

  constructor(options: AnimationTrackerOptions) {
    this.rpc = options.rpc;
    this.correlator = options.correlator;
    this.log = options.log;
  }

  async animationNames(): Promise<string[]> {
    return [...(await this.catalog('animation'))];
  }

  async triggerNames(): Promise<string[]> {
    return [...(await this.catalog('trigger'))];
  }

  /** @throws {UnknownAnimationError} when `name` is not in the robot's animation list */
  async play(name: string, options: Partial<PlayOptions> = {}): Promise<PlaybackResult> {
    return this.start('animation', name, () => this.rpc.playAnimation(name, { ...DEFAULT_PLAY_OPTIONS, ...options }));
  }

  /** @throws {UnknownAnimationError} when `name` is not in the robot's trigger list */
  async playTrigger(name: string, options: Partial<TriggerPlayOptions> = {}): Promise<PlaybackResult> {
    return this.start('trigger', name, () =>
      this.rpc.playAnimationTrigger(name, { ...DEFAULT_TRIGGER_PLAY_OPTIONS, ...options }),
    );
  }

  /** Resolves with `idle` at once when no animation is being tracked. */
  waitForCompletion(): Promise<CompletionOutcome | 'idle'> {
    const pending = this.correlator.pending('animation');
    return pending === undefined ? Promise.resolve<'idle'>('idle') : pending.completion;
  }

  invalidate(): void {
    this.catalogs.clear();
  }

  teardown(): void {
    const pending = this.correlator.pending('animation');
    if (pending !== undefined) this.correlator.cancel(pending);
    this.invalidate();
  }

  private async start(
    catalog: Catalog,
    name: string,
    send: () => Promise<PlaybackStatus>,
  ): Promise<PlaybackResult> {
    const names = await this.catalog(catalog);
    if (!names.has(name)) throw new UnknownAnimationError(name, catalog);

    const status = await send();
    if (status !== 'ok') {
      this.log.warn({ animation: name, catalog, status }, 'Animation request not accepted');
      return { status, completion: Promise.resolve<CompletionOutcome>('cancelled') };
    }

    // the quiet interval counts from acceptance, not from the request
    const handle = this.correlator.begin('animation');
    return { status, completion: handle.completion };
  }

  private catalog(catalog: Catalog): Promise<ReadonlySet<string>> {
    const cached = this.catalogs.get(catalog);
    if (cached !== undefined) return cached;

    const load = this.loadCatalog(catalog);
    this.catalogs.set(catalog, load);
    return load;
  }

  private async loadCatalog(catalog: Catalog): Promise<ReadonlySet<string>> {
    try {
      const names = catalog === 'animation' ? await this.rpc.listAnimations() : await this.rpc.listAnimationTriggers();
      this.log.debug({ catalog, count: names.length }, 'Animation catalog loaded');
      return new Set(names);
    } catch (err: unknown) {
      // a failed load is not cached
      this.catalogs.delete(catalog);
      throw err;
    }
  }
}
