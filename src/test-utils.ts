import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { NoSuchTargetError } from './errors.js';
import { makeEvent } from './events.js';
import { BotPlugin } from './plugin.js';
import { PluginConfig } from './plugin-config.js';
import type { Clock, TimerHandle } from './clock.js';
import type { EventMap, RequestName, WhoisResult } from './events.js';
import type { PluginHost } from './plugin.js';
import type { Transport } from './transport.js';

interface PendingTimer {
  at: number;
  seq: number;
  fn: () => void;
  cancelled: boolean;
}

/** Manually advanced clock for tests. Timers fire in due order during advance(). */
export class FakeClock implements Clock {
  private current: number;
  private seq = 0;
  private timers: PendingTimer[] = [];

  constructor(start = Date.UTC(2026, 0, 1)) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  schedule(delayMs: number, fn: () => void): TimerHandle {
    const timer: PendingTimer = { at: this.current + delayMs, seq: this.seq++, fn, cancelled: false };
    this.timers.push(timer);
    return {
      cancel: () => {
        timer.cancelled = true;
      },
    };
  }

  /** Timers neither fired nor cancelled. */
  get pendingCount(): number {
    return this.timers.filter((t) => !t.cancelled).length;
  }

  /** Move time forward, firing due timers in order, then let their promise chains settle. */
  async advance(ms: number): Promise<void> {
    const target = this.current + ms;
    for (;;) {
      const due = this.timers
        .filter((t) => !t.cancelled && t.at <= target)
        .sort((a, b) => a.at - b.at || a.seq - b.seq)[0];
      if (!due) break;
      this.timers = this.timers.filter((t) => t !== due);
      this.current = due.at;
      due.fn();
      await flush();
    }
    this.current = target;
    await flush();
  }

  /** Jump the wall clock without firing anything (a process that was down for a while). */
  jump(ms: number): void {
    this.current += ms;
  }
}

/** Let pending promise callbacks run. */
export async function flush(): Promise<void> {
  for (let i = 0; i < 10; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

/** Fresh temporary directory. */
export function tempDir(prefix = 'opsbot-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** A registry stand-in: plugin configs as JSON files in a directory, and a fake clock. */
export class TestHost implements PluginHost {
  readonly commandPrefix = '!';
  readonly saves: string[] = [];

  constructor(readonly dir: string = tempDir(), readonly clock: FakeClock = new FakeClock()) {}

  configPath(name: string): string {
    return path.join(this.dir, `${name}.json`);
  }

  getPluginConfig(name: string): PluginConfig {
    const file = this.configPath(name);
    if (!fs.existsSync(file)) fs.writeFileSync(file, '{}\n', 'utf8');
    return new PluginConfig(file, (saved) => {
      this.saves.push(saved);
    });
  }

  writeConfig(name: string, data: Record<string, unknown>): void {
    fs.writeFileSync(this.configPath(name), JSON.stringify(data), 'utf8');
  }

  readConfig(name: string): unknown {
    return JSON.parse(fs.readFileSync(this.configPath(name), 'utf8'));
  }
}

/** Construct, configure and start a plugin the way the registry does. */
export async function startPlugin<P extends BotPlugin>(
  PluginType: new (name: string, transport: Transport, host: PluginHost) => P,
  name: string,
  transport: Transport,
  host: PluginHost,
): Promise<P> {
  const plugin = new PluginType(name, transport, host);
  plugin.reload();
  await plugin.start();
  return plugin;
}

export interface RecordedRequest {
  name: RequestName;
  args: unknown;
}

const OP_REQUESTS = [
  'op.ban', 'op.unban', 'op.quiet', 'op.unquiet',
  'op.op', 'op.deop', 'op.voice', 'op.devoice',
] as const;

/**
 * The other side of the bus in tests: an op provider, whois directory and
 * protocol client that records what it was asked and answers from tables.
 */
export class FakeNetwork extends BotPlugin {
  readonly requests: RecordedRequest[] = [];
  readonly sent: EventMap['message.send'][] = [];
  readonly whois = new Map<string, WhoisResult>();
  /** Requests by name that should fail, with the error to fail with. */
  readonly failures = new Map<RequestName, Error>();
  readonly topics = new Map<string, string>();
  readonly chanModes = new Map<string, string>();
  /** Answer protocol.fetchTopic with a topic.updated event for known topics. */
  answerFetch = true;
  /** Echo protocol.setTopic back as a topic.updated event. */
  echoSetTopic = true;

  async start(): Promise<void> {
    await super.start();

    for (const name of OP_REQUESTS) {
      this.providesRequest(name, async (args) => this.record(name, args));
    }
    this.providesRequest('op.kick', async (args) => this.record('op.kick', args));
    this.providesRequest('op.mode', async (args) => this.record('op.mode', args));

    this.providesRequest('directory.whois', async (args) => {
      this.record('directory.whois', args);
      const found = this.whois.get(args.nick);
      if (!found) throw new NoSuchTargetError(args.nick);
      return found;
    });

    this.providesRequest('protocol.fetchTopic', async ({ channel }) => {
      this.record('protocol.fetchTopic', { channel });
      const topic = this.topics.get(channel);
      if (this.answerFetch && topic !== undefined) {
        this.transport.sendEvent(makeEvent('topic.updated', { channel, topic }));
      }
    });

    this.providesRequest('protocol.setTopic', async ({ channel, topic }) => {
      this.record('protocol.setTopic', { channel, topic });
      this.topics.set(channel, topic);
      if (this.echoSetTopic) {
        this.transport.sendEvent(makeEvent('topic.updated', { channel, topic }));
      }
    });

    this.providesRequest('protocol.queryChanMode', async ({ channel }) => {
      this.record('protocol.queryChanMode', { channel });
      return { modes: this.chanModes.get(channel) ?? '' };
    });

    this.listenForEvent('message.send', (event) => {
      this.sent.push(event.data);
    });
  }

  /** Recorded requests of one name, args only. */
  argsOf(name: RequestName): unknown[] {
    return this.requests.filter((r) => r.name === name).map((r) => r.args);
  }

  /** Messages sent so far, text only. */
  messages(): string[] {
    return this.sent.map((m) => m.message);
  }

  private record(name: RequestName, args: unknown): void {
    this.requests.push({ name, args });
    const failure = this.failures.get(name);
    if (failure) throw failure;
  }
}

/** Emit a command.invoked event as the command front end would. */
export function invoke(transport: Transport, channel: string | null, command: string, args = '', user = 'alice!alice@example.org'): void {
  transport.sendEvent(makeEvent('command.invoked', { channel, user, command, args }));
}
