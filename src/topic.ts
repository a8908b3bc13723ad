import { systemClock, type Clock, type TimerHandle } from './clock.js';
import { TopicIndexError, TopicUnavailableError, errorMessage } from './errors.js';
import { logger, type Logger } from './logger.js';
import type { Transport } from './transport.js';

export const TOPIC_HISTORY_CAPACITY = 10;
export const TOPIC_QUERY_TIMEOUT_MS = 10_000;

const SEPARATOR = '|';
const JOINER = ' | ';

// ── Pure topic editing ──────────────────────────────────────────

export function splitTopic(topic: string): string[] {
  if (topic.trim() === '') return [];
  return topic.split(SEPARATOR).map((part) => part.trim());
}

export function joinTopic(parts: readonly string[]): string {
  return parts.join(JOINER);
}

/** Negative positions count from the end. `allowEnd` admits pos === length (insert at the end). */
function resolvePosition(pos: number, length: number, allowEnd: boolean): number {
  const max = allowEnd ? length : length - 1;
  if (!Number.isInteger(pos) || pos < -length || pos > max) {
    throw new TopicIndexError(length);
  }
  return pos < 0 ? pos + length : pos;
}

export function appendPart(topic: string, text: string): string {
  return joinTopic([...splitTopic(topic), text.trim()]);
}

export function insertPart(topic: string, pos: number, text: string): string {
  const parts = splitTopic(topic);
  parts.splice(resolvePosition(pos, parts.length, true), 0, text.trim());
  return joinTopic(parts);
}

export function replacePart(topic: string, pos: number, text: string): string {
  const parts = splitTopic(topic);
  parts[resolvePosition(pos, parts.length, false)] = text.trim();
  return joinTopic(parts);
}

export function removePart(topic: string, pos: number): string {
  const parts = splitTopic(topic);
  parts.splice(resolvePosition(pos, parts.length, false), 1);
  return joinTopic(parts);
}

export function popPart(topic: string): string {
  return removePart(topic, -1);
}

// ── History ─────────────────────────────────────────────────────

/** Last observed topics per channel, newest last. */
export class TopicHistory {
  private entries = new Map<string, string[]>();

  constructor(readonly capacity = TOPIC_HISTORY_CAPACITY) {}

  top(channel: string): string | undefined {
    return this.entries.get(channel)?.at(-1);
  }

  size(channel: string): number {
    return this.entries.get(channel)?.length ?? 0;
  }

  /** Returns false when the topic equals the current top. */
  push(channel: string, topic: string): boolean {
    const list = this.entries.get(channel) ?? [];
    if (list.at(-1) === topic) return false;
    list.push(topic);
    if (list.length > this.capacity) list.shift();
    this.entries.set(channel, list);
    return true;
  }

  pop(channel: string): string | undefined {
    return this.entries.get(channel)?.pop();
  }

  /** Entries oldest first. */
  list(channel: string): string[] {
    return [...(this.entries.get(channel) ?? [])];
  }
}

// ── Consensus ───────────────────────────────────────────────────

interface Waiter {
  resolve: (topic: string) => void;
  reject: (err: Error) => void;
}

interface PendingQuery {
  waiters: Waiter[];
  timer: TimerHandle;
}

/**
 * What the bot believes each channel's topic is. Learns topics from
 * topic.updated events, asks the protocol client when it knows nothing, and
 * turns edits into protocol.setTopic requests.
 */
export class TopicConsensus {
  readonly history = new TopicHistory();
  private pending = new Map<string, PendingQuery>();
  private readonly log: Logger;

  constructor(
    private readonly transport: Transport,
    private readonly clock: Clock = systemClock,
    private readonly timeoutMs = TOPIC_QUERY_TIMEOUT_MS,
    log?: Logger,
  ) {
    this.log = log ?? logger.child({ component: 'topic' });
  }

  onObservedTopic(channel: string, topic: string): void {
    if (this.history.push(channel, topic)) {
      this.log.debug({ channel, topic }, 'topic observed');
    }
    const query = this.pending.get(channel);
    if (!query) return;
    this.pending.delete(channel);
    query.timer.cancel();
    for (const waiter of query.waiters) waiter.resolve(topic);
  }

  getCurrentTopic(channel: string): Promise<string> {
    const known = this.history.top(channel);
    if (known !== undefined) return Promise.resolve(known);

    return new Promise<string>((resolve, reject) => {
      const existing = this.pending.get(channel);
      if (existing) {
        existing.waiters.push({ resolve, reject });
        return;
      }

      const timer = this.clock.schedule(this.timeoutMs, () => {
        this.log.warn({ channel }, 'topic query timed out');
        this.failQuery(channel, new TopicUnavailableError(channel));
      });
      this.pending.set(channel, { waiters: [{ resolve, reject }], timer });

      // The answer may arrive synchronously, so the waiter is registered first
      this.transport.issueRequest('protocol.fetchTopic', { channel }).catch((err: unknown) => {
        this.log.warn({ err, channel }, 'topic fetch failed');
        this.failQuery(channel, new TopicUnavailableError(channel, `Could not fetch the topic of ${channel}: ${errorMessage(err)}`));
      });
    });
  }

  append(channel: string, text: string): Promise<string> {
    return this.edit(channel, (topic) => appendPart(topic, text));
  }

  insert(channel: string, pos: number, text: string): Promise<string> {
    return this.edit(channel, (topic) => insertPart(topic, pos, text));
  }

  replace(channel: string, pos: number, text: string): Promise<string> {
    return this.edit(channel, (topic) => replacePart(topic, pos, text));
  }

  remove(channel: string, pos: number): Promise<string> {
    return this.edit(channel, (topic) => removePart(topic, pos));
  }

  pop(channel: string): Promise<string> {
    return this.edit(channel, popPart);
  }

  /**
   * Put back the topic before the current one. Resolves to the restored
   * topic, or undefined when fewer than two topics are remembered.
   */
  async undo(channel: string): Promise<string | undefined> {
    if (this.history.size(channel) < 2) return undefined;

    const current = this.history.pop(channel);
    const previous = this.history.top(channel);
    if (current === undefined || previous === undefined) return undefined;

    try {
      await this.transport.issueRequest('protocol.setTopic', { channel, topic: previous });
    } catch (err) {
      // A topic observed meanwhile is newer than the one we popped
      if (this.history.top(channel) === previous) this.history.push(channel, current);
      throw err;
    }
    return previous;
  }

  /** Cancel outstanding queries; their waiters are rejected. */
  stop(): void {
    for (const channel of [...this.pending.keys()]) {
      this.failQuery(channel, new TopicUnavailableError(channel, `Stopped waiting for the topic of ${channel}`));
    }
  }

  private async edit(channel: string, change: (topic: string) => string): Promise<string> {
    const topic = change(await this.getCurrentTopic(channel));
    await this.transport.issueRequest('protocol.setTopic', { channel, topic });
    return topic;
  }

  private failQuery(channel: string, err: Error): void {
    const query = this.pending.get(channel);
    if (!query) return;
    this.pending.delete(channel);
    query.timer.cancel();
    for (const waiter of query.waiters) waiter.reject(err);
  }
}
