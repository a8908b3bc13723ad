import { z } from 'zod';
import { systemClock, type Clock, type TimerHandle } from './clock.js';
import { errorMessage, isBotError } from './errors.js';
import { makeEvent } from './events.js';
import { logger, type Logger } from './logger.js';
import { applyModeChange } from './masks.js';
import type { PluginConfig } from './plugin-config.js';
import type { Transport } from './transport.js';

/** Persisted row: [fire time in epoch seconds, parameter, channel, mode spec]. */
const LaterSchema = z.tuple([z.number(), z.string(), z.string(), z.string()]);
export type Later = z.infer<typeof LaterSchema>;

export interface ScheduledActionKey {
  param: string;
  channel: string;
  /** Sign plus one mode letter, e.g. "-q". */
  mode: string;
}

export interface PendingAction extends ScheduledActionKey {
  /** Epoch seconds. */
  fireAt: number;
}

export interface ModeSchedulerOptions {
  transport: Transport;
  clock?: Clock;
  log?: Logger;
}

function keyOf(param: string, channel: string, mode: string): string {
  return JSON.stringify([param, channel, mode]);
}

function laterKey(later: Later): string {
  return keyOf(later[1], later[2], later[3]);
}

/**
 * Timed mode changes that survive restarts. At most one pending action per
 * (param, channel, mode); every pending action has both a live timer and a
 * row in the owning plugin's `laters` config list.
 */
export class ModeScheduler {
  private timers = new Map<string, TimerHandle>();
  private laters: Later[] = [];
  private store: PluginConfig | undefined;
  private readonly transport: Transport;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(options: ModeSchedulerOptions) {
    this.transport = options.transport;
    this.clock = options.clock ?? systemClock;
    this.log = options.log ?? logger.child({ component: 'scheduler' });
  }

  /** Attach the config that holds the persisted `laters` list. Malformed rows are dropped. */
  bind(store: PluginConfig): void {
    this.store = store;
    const raw = store.get('laters');
    const laters: Later[] = [];
    let dropped = 0;

    if (Array.isArray(raw)) {
      for (const row of raw) {
        const parsed = LaterSchema.safeParse(row);
        if (parsed.success) laters.push(parsed.data);
        else dropped++;
      }
    } else if (raw !== undefined) {
      dropped++;
    }

    this.laters = laters;
    store.set('laters', this.laters);
    if (dropped > 0) {
      this.log.warn({ dropped }, 'dropped malformed scheduled actions from config');
      store.save();
    }
  }

  /**
   * In `delaySeconds` (at least 1), apply `mode` with `param` on `channel`.
   * Replaces any pending action for the same key.
   */
  schedule(delaySeconds: number, param: string, channel: string, mode: string): void {
    const key = keyOf(param, channel, mode);
    this.timers.get(key)?.cancel();
    this.timers.delete(key);
    this.laters = this.laters.filter((later) => laterKey(later) !== key);

    const delay = Math.max(1, delaySeconds);
    const action: PendingAction = { param, channel, mode, fireAt: this.clock.now() / 1000 + delay };
    this.arm(key, delay, action);

    this.laters.push([action.fireAt, param, channel, mode]);
    this.persist();
    this.log.info({ mode, param, channel, delay }, 'scheduled mode change');
  }

  /** Drop a pending action that external evidence shows is no longer needed. No-op when none is pending. */
  invalidate(param: string, channel: string, mode: string): boolean {
    const key = keyOf(param, channel, mode);
    const timer = this.timers.get(key);
    const persisted = this.laters.some((later) => laterKey(later) === key);
    if (!timer && !persisted) return false;

    timer?.cancel();
    this.timers.delete(key);
    this.laters = this.laters.filter((later) => laterKey(later) !== key);
    this.persist();
    this.log.info({ mode, param, channel }, 'scheduled mode change no longer needed');
    return true;
  }

  /** Rebuild live timers from the persisted list. Overdue actions fire after the minimum delay. */
  resync(): void {
    this.cancelTimers();

    const byKey = new Map<string, Later>();
    for (const later of this.laters) {
      byKey.delete(laterKey(later));
      byKey.set(laterKey(later), later);
    }
    const deduped = [...byKey.values()];
    const changed = deduped.length !== this.laters.length;
    this.laters = deduped;

    const nowSeconds = this.clock.now() / 1000;
    for (const [key, later] of byKey) {
      const [fireAt, param, channel, mode] = later;
      this.arm(key, Math.max(1, fireAt - nowSeconds), { param, channel, mode, fireAt });
    }

    if (changed) this.persist();
    this.log.info({ count: deduped.length }, 'scheduled mode changes resynced');
  }

  /** Cancel live timers. The persisted list is kept for the next resync(). */
  stop(): void {
    this.cancelTimers();
  }

  /** Persisted pending actions, in list order. */
  pending(): PendingAction[] {
    return this.laters.map(([fireAt, param, channel, mode]) => ({ fireAt, param, channel, mode }));
  }

  /** Keys with a live timer. */
  armed(): ScheduledActionKey[] {
    return [...this.timers.keys()].map((key) => {
      const [param = '', channel = '', mode = ''] = z.array(z.string()).parse(JSON.parse(key));
      return { param, channel, mode };
    });
  }

  private arm(key: string, delaySeconds: number, action: PendingAction): void {
    const timer = this.clock.schedule(delaySeconds * 1000, () => {
      this.fire(key, action).catch((err: unknown) => {
        this.log.error({ err, mode: action.mode, param: action.param, channel: action.channel }, 'scheduled mode change failed');
      });
    });
    this.timers.set(key, timer);
  }

  private async fire(key: string, action: PendingAction): Promise<void> {
    const { param, channel, mode } = action;
    this.log.info({ mode, param, channel }, 'firing scheduled mode change');

    this.timers.delete(key);
    this.laters = this.laters.filter((later) => laterKey(later) !== key);
    this.persist();

    try {
      await applyModeChange(this.transport, channel, mode, param);
    } catch (err) {
      if (!isBotError(err, 'OPERATION_FAILED') && !isBotError(err, 'INVALID_PARAMETER')) throw err;
      this.transport.sendEvent(makeEvent('message.send', {
        target: channel,
        message: `I was about to do a ${mode} ${param}, but ${errorMessage(err)}`,
      }));
    }
  }

  private cancelTimers(): void {
    for (const timer of this.timers.values()) timer.cancel();
    this.timers.clear();
  }

  private persist(): void {
    if (!this.store) {
      throw new Error('ModeScheduler used before bind()');
    }
    this.store.set('laters', this.laters);
    this.store.save();
  }
}
