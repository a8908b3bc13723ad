import { systemClock, type Clock, type TimerHandle } from './clock.js';

/**
 * Accumulates items by key and flushes them once the key has been quiet for
 * the delay. Used by the config watcher to coalesce bursts of file events.
 */
export class Debouncer<T> {
  private map = new Map<string, { items: T[]; timer: TimerHandle }>();

  constructor(private delayMs: number, private clock: Clock = systemClock) {}

  /**
   * Add an item to the window for the given key. Every item restarts the
   * timer; when it fires, onFlush gets all items accumulated for the key.
   */
  debounce(key: string, item: T, onFlush: (items: T[]) => void): void {
    const existing = this.map.get(key);
    existing?.timer.cancel();

    const items = existing ? [...existing.items, item] : [item];
    const timer = this.clock.schedule(this.delayMs, () => {
      this.map.delete(key);
      onFlush(items);
    });
    this.map.set(key, { items, timer });
  }

  /** Check if a key has a pending flush. */
  has(key: string): boolean {
    return this.map.has(key);
  }

  /** Drop every pending flush without calling it. */
  cancelAll(): void {
    for (const entry of this.map.values()) entry.timer.cancel();
    this.map.clear();
  }
}
