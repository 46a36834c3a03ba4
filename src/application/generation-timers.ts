import type { Logger } from 'pino';
import type { SerialQueue } from './serial-queue.js';

interface TimerSlot {
  readonly generation: number;
  readonly handle: ReturnType<typeof setTimeout>;
}

/**
 * Cancel-and-replace delayed callbacks, one slot per key.
 *
 * Each `arm` takes a fresh generation from a counter shared by all keys and
 * clears the previous handle. When a timer fires it does not run its
 * callback directly: it enqueues a check on the serial queue, and the
 * callback runs only if the key's slot still carries the generation it was
 * armed with. A timer that fired but was superseded or cancelled before its
 * check ran is a no-op. Slots exist only while armed.
 */
export class GenerationTimers<K> {
  private readonly slots = new Map<K, TimerSlot>();
  private lastGeneration = 0;

  constructor(
    private readonly queue: SerialQueue,
    private readonly log: Logger,
    private readonly label = 'timer',
  ) {}

  /** Returns the generation this arming was tagged with. */
  arm(key: K, delayMs: number, onFire: () => void): number {
    const previous = this.slots.get(key);
    if (previous !== undefined) clearTimeout(previous.handle);

    this.lastGeneration += 1;
    const generation = this.lastGeneration;
    const handle = setTimeout(() => {
      this.queue.enqueue(this.label, () => {
        this.fire(key, generation, onFire);
      });
    }, delayMs);
    this.slots.set(key, { generation, handle });
    return generation;
  }

  /** Returns false when nothing was armed for `key`. */
  cancel(key: K): boolean {
    const slot = this.slots.get(key);
    if (slot === undefined) return false;
    clearTimeout(slot.handle);
    this.slots.delete(key);
    return true;
  }

  cancelAll(): void {
    for (const slot of this.slots.values()) clearTimeout(slot.handle);
    this.slots.clear();
  }

  isArmed(key: K): boolean {
    return this.slots.has(key);
  }

  /** Generation of the pending arming for `key`, or 0 when none is pending. */
  generationOf(key: K): number {
    return this.slots.get(key)?.generation ?? 0;
  }

  get armedCount(): number {
    return this.slots.size;
  }

  private fire(key: K, generation: number, onFire: () => void): void {
    const slot = this.slots.get(key);
    if (slot === undefined || slot.generation !== generation) {
      this.log.debug({ timer: this.label, generation }, 'Stale timer ignored');
      return;
    }
    this.slots.delete(key);
    onFire();
  }
}
