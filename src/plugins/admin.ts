import { z } from 'zod';
import { CommandPlugin, type ChannelCommandContext, type CommandArgs } from '../command.js';
import { isBotError } from '../errors.js';
import { applyModeChange, resolveTarget, reverseMode } from '../masks.js';
import { ModeScheduler, type PendingAction } from '../scheduler.js';
import { isDeferral, parseTime } from '../timeparse.js';
import type { RequestArgs } from '../events.js';

const REDIRECT_DESTINATION = '##FIX_YOUR_CONNECTION';
const REDIRECT_SECONDS = 2 * 60 * 60;
const FLEX_SECONDS = 10;

const DefaultTimeSchema = z.union([z.number().positive(), z.string().min(1)]).nullable().optional();

const TimedQuietArgsSchema = z.object({
  channel: z.string().min(1),
  target: z.string().min(1),
  duration: z.union([z.number().positive(), z.string().min(1)]),
});

const NICKS = /^(?<nicks>.+)?$/;
const TARGET_AND_TIME = /^(?<target>\S+)(?:\s+(?<time>.+))?$/;

/** Wait for every request, then throw the first failure in issue order. */
async function settleAll(requests: Promise<unknown>[]): Promise<void> {
  const results = await Promise.allSettled(requests);
  for (const result of results) {
    if (result.status === 'rejected') throw result.reason;
  }
}

function nicksOrSelf(ctx: ChannelCommandContext, args: CommandArgs): string[] {
  const nicks = args.nicks?.split(/\s+/).filter(Boolean) ?? [];
  return nicks.length > 0 ? nicks : [ctx.nick];
}

function notOnNetwork(err: unknown, nick: string, hint: string): string | undefined {
  if (isBotError(err, 'NO_SUCH_TARGET')) {
    return `There is no user by that nick on the network. ${hint.replace('{nick}', nick)}`;
  }
  if (isBotError(err, 'LOOKUP_TIMED_OUT')) {
    return `That's odd, the whois I did on ${nick} didn't work. Sorry.`;
  }
  return undefined;
}

/**
 * Channel operator commands: kicks, bans, quiets, voices and ops, timed
 * mode changes that undo themselves, and the admin.timedQuiet request.
 *
 * Settings: `defaulttime` (seconds or a duration like "1h") applied to ban
 * and quiet when no duration is given.
 */
export class ChannelAdmin extends CommandPlugin {
  readonly requires = ['ircop.OpProvider'];

  private readonly scheduler = new ModeScheduler({ transport: this.transport, clock: this.clock, log: this.log });
  private defaultSeconds: number | null = null;

  reload(): void {
    super.reload();
    this.scheduler.bind(this.config);
    this.defaultSeconds = this.readDefaultTime();
    if (this.state === 'started') this.scheduler.resync();
  }

  async start(): Promise<void> {
    await super.start();
    this.scheduler.resync();

    this.listenForEvent('mode.changed', (event) => {
      const { channel, mode, set, arg } = event.data;
      if (arg === null) return;
      this.scheduler.invalidate(arg, channel, `${set ? '+' : '-'}${mode}`);
    });

    this.providesRequest('admin.timedQuiet', (args) => this.timedQuiet(args));

    this.installChannelCommand({
      name: 'kick',
      usage: '<nickname> [reason]',
      argPattern: /^(?<nick>\S+)(?:\s+(?<reason>.+))?$/,
      help: 'Kicks a user from the current channel',
      handler: (ctx, args) => this.transport.issueRequest('op.kick', {
        channel: ctx.channel,
        target: args.nick ?? '',
        reason: args.reason ?? null,
      }),
    });

    for (const [name, request, help] of [
      ['op', 'op.op', 'Gives op to the given users, or to you'],
      ['deop', 'op.deop', 'Takes op from the given users, or from you'],
      ['voice', 'op.voice', 'Grants voice in the current channel'],
      ['devoice', 'op.devoice', 'Revokes voice in the current channel'],
    ] as const) {
      this.installChannelCommand({
        name,
        usage: '[nick] ...',
        argPattern: NICKS,
        help,
        handler: (ctx, args) => settleAll(
          nicksOrSelf(ctx, args).map((target) => this.transport.issueRequest(request, { channel: ctx.channel, target })),
        ),
      });
    }

    this.installChannelCommand({
      name: 'quiet',
      usage: '<nick or hostmask> [for <duration>]',
      argPattern: TARGET_AND_TIME,
      help: 'Quiets a user',
      handler: (ctx, args) => this.quiet(ctx, args.target ?? '', args.time),
    });
    this.installChannelCommand({
      name: 'unquiet',
      usage: '<nick or hostmask> [in <delay>]',
      argPattern: TARGET_AND_TIME,
      help: 'Un-quiets a user',
      handler: (ctx, args) => this.lift(ctx, '-q', args.target ?? '', args.time),
    });
    this.installChannelCommand({
      name: 'ban',
      usage: '<nick or hostmask> [for <duration>]',
      argPattern: TARGET_AND_TIME,
      help: 'Bans a user',
      handler: (ctx, args) => this.ban(ctx, args.target ?? '', args.time),
    });
    this.installChannelCommand({
      name: 'unban',
      usage: '<nick or hostmask> [in <delay>]',
      argPattern: TARGET_AND_TIME,
      help: 'Un-bans a user',
      handler: (ctx, args) => this.lift(ctx, '-b', args.target ?? '', args.time),
    });
    this.installChannelCommand({
      name: 'redirect',
      usage: '<nick> [#channel]',
      argPattern: /^(?<nick>\S+)(?:\s+(?<destination>#\S+))?$/,
      help: `Redirects a user to ${REDIRECT_DESTINATION} or the given channel for 2 hours`,
      handler: (ctx, args) => this.redirect(ctx, args.nick ?? '', args.destination ?? REDIRECT_DESTINATION),
    });
    this.installChannelCommand({
      name: 'mode',
      usage: '[+-]<mode_letter> [param] [for|until|in|at <time>]',
      argPattern: /^(?<mode>[+-][a-zA-Z])(?:\s+(?<param>\S+))?(?:\s+(?<time>(?:for|until|in|at)\s.+))?$/,
      help: 'Sets a channel mode, now or later, for a while or for good',
      handler: (ctx, args) => this.mode(ctx, args.mode ?? '', args.param ?? null, args.time),
    });
    this.installChannelCommand({
      name: 'm',
      help: 'Emergency moderation: toggles +m and ops you while it is on',
      handler: (ctx) => this.toggleModerated(ctx),
    });
    this.installChannelCommand({
      name: 'flex',
      usage: '[time to hold op]',
      argPattern: /^(?<time>.+)?$/,
      help: 'Ops you for a few seconds',
      handler: (ctx, args) => this.flex(ctx, args.time),
    });
  }

  async stop(): Promise<void> {
    this.scheduler.stop();
    await super.stop();
  }

  /** Persisted pending actions, for inspection. */
  pendingActions(): PendingAction[] {
    return this.scheduler.pending();
  }

  // ── Handlers ──

  private async quiet(ctx: ChannelCommandContext, target: string, time: string | undefined): Promise<void> {
    let duration = this.defaultSeconds;
    let misunderstood: string | undefined;
    if (time !== undefined) {
      try {
        duration = parseTime(time, this.clock.now());
      } catch (err) {
        if (!isBotError(err, 'PARSE_ERROR')) throw err;
        this.log.info({ target, time }, 'quiet duration not understood; using the default');
        misunderstood = err.message;
      }
    }

    const mask = await this.resolveOrExplain(ctx, target, 'Try {nick}!*@* to quiet anyone with that nick, or specify a full hostmask.');
    if (mask === undefined) return;
    await this.timedMode(ctx.channel, '+q', mask, duration);
    if (misunderstood !== undefined) {
      ctx.reply(duration === null
        ? `${misunderstood} ("${time}"), so the quiet on ${mask} has no end`
        : `${misunderstood} ("${time}"), so ${mask} is quieted for ${Math.round(duration)} seconds`);
    }
  }

  private async ban(ctx: ChannelCommandContext, target: string, time: string | undefined): Promise<void> {
    let reason = `Banned by ${ctx.nick}`;
    let duration = this.defaultSeconds;
    if (time !== undefined) {
      try {
        duration = parseTime(time, this.clock.now());
      } catch (err) {
        if (!isBotError(err, 'PARSE_ERROR')) throw err;
        // Whatever it was, it reads better as a reason
        reason = time;
      }
    }

    let mask = target;
    let kickNick: string | undefined;
    if (target.includes('!') && target.includes('@') && !target.includes('$')) {
      const nick = target.split('!', 1)[0] ?? '';
      if (!nick.includes('*')) kickNick = nick;
    } else if (!/[!@$]/.test(target)) {
      const resolved = await this.resolveOrExplain(ctx, target, 'Try {nick}!*@* to ban anyone with that nick, or specify a full hostmask.');
      if (resolved === undefined) return;
      mask = resolved;
      kickNick = target;
    }
    // Anything else (extbans, odd masks) is passed on as given, without a kick

    const requests: Promise<unknown>[] = [this.timedMode(ctx.channel, '+b', mask, duration)];
    if (kickNick !== undefined) {
      requests.push(this.transport.issueRequest('op.kick', { channel: ctx.channel, target: kickNick, reason }));
    }
    await settleAll(requests);
  }

  /** unquiet / unban, now or after a delay. */
  private async lift(ctx: ChannelCommandContext, mode: '-q' | '-b', target: string, time: string | undefined): Promise<void> {
    const delay = time === undefined ? undefined : parseTime(time, this.clock.now());
    const list = mode === '-q' ? 'quiet' : 'ban';
    const mask = await this.resolveOrExplain(ctx, target, `Try specifying a full hostmask. Use "/mode +${mode.charAt(1)}" to see the channel ${list} list`);
    if (mask === undefined) return;

    if (delay === undefined) {
      await applyModeChange(this.transport, ctx.channel, mode, mask);
      return;
    }
    this.scheduler.schedule(delay, mask, ctx.channel, mode);
    ctx.reply('It shall be done.');
  }

  private async redirect(ctx: ChannelCommandContext, nick: string, destination: string): Promise<void> {
    let mask: string;
    let kickNick = nick;
    try {
      const whois = await this.transport.issueRequest('directory.whois', { nick });
      kickNick = whois.nick;
      mask = `*!${whois.username}@*`;
    } catch (err) {
      if (!isBotError(err, 'NO_SUCH_TARGET')) throw err;
      mask = `${nick}!*@*`;
    }
    mask += `$${destination}`;

    await settleAll([
      this.timedMode(ctx.channel, '+b', mask, REDIRECT_SECONDS),
      this.transport.issueRequest('op.kick', {
        channel: ctx.channel,
        target: kickNick,
        reason: `Redirected to ${destination}`,
      }),
    ]);
    ctx.reply(`Redirected ${kickNick} to ${destination} for 2 hours`);
  }

  private async mode(ctx: ChannelCommandContext, mode: string, param: string | null, time: string | undefined): Promise<void> {
    if (time === undefined) {
      await applyModeChange(this.transport, ctx.channel, mode, param);
      return;
    }

    const seconds = parseTime(time, this.clock.now());
    if (isDeferral(time)) {
      this.scheduler.schedule(seconds, param ?? '', ctx.channel, mode);
      const what = param === null ? mode : `${mode} ${param}`;
      ctx.reply(`Doing a ${what} in ${Math.round(seconds)} seconds`);
      return;
    }

    await applyModeChange(this.transport, ctx.channel, mode, param);
    this.scheduler.schedule(seconds, param ?? '', ctx.channel, reverseMode(mode));
  }

  private async toggleModerated(ctx: ChannelCommandContext): Promise<void> {
    const { modes } = await this.transport.issueRequest('protocol.queryChanMode', { channel: ctx.channel });
    const moderate = !modes.includes('m');
    this.log.info({ channel: ctx.channel, moderate }, 'toggling moderated mode');

    await settleAll([
      applyModeChange(this.transport, ctx.channel, moderate ? '+m' : '-m', null),
      this.transport.issueRequest(moderate ? 'op.op' : 'op.deop', { channel: ctx.channel, target: ctx.nick }),
    ]);
  }

  private async flex(ctx: ChannelCommandContext, time: string | undefined): Promise<void> {
    let seconds = FLEX_SECONDS;
    if (time !== undefined) {
      try {
        seconds = parseTime(time, this.clock.now());
      } catch (err) {
        if (!isBotError(err, 'PARSE_ERROR')) throw err;
      }
    }

    await this.transport.issueRequest('op.op', { channel: ctx.channel, target: ctx.nick });
    await new Promise<void>((resolve) => {
      this.clock.schedule(seconds * 1000, resolve);
    });
    await this.transport.issueRequest('op.deop', { channel: ctx.channel, target: ctx.nick });
  }

  private async timedQuiet(raw: RequestArgs<'admin.timedQuiet'>): Promise<void> {
    const { channel, target, duration } = TimedQuietArgsSchema.parse(raw);
    const seconds = typeof duration === 'number' ? duration : parseTime(duration, this.clock.now());
    const mask = await resolveTarget(this.transport, target);
    await this.timedMode(channel, '+q', mask, seconds);
  }

  // ── Helpers ──

  /** Set a mode, and once that succeeds schedule its reversal when a duration is given. */
  private async timedMode(channel: string, mode: '+q' | '+b', mask: string, seconds: number | null): Promise<void> {
    this.log.info({ channel, mode, mask, seconds }, 'setting mode');
    await applyModeChange(this.transport, channel, mode, mask);
    if (seconds !== null) {
      this.scheduler.schedule(seconds, mask, channel, reverseMode(mode));
    }
  }

  /** Resolve a target, replying with an explanation (and resolving to undefined) when the nick can't be found. */
  private async resolveOrExplain(ctx: ChannelCommandContext, target: string, hint: string): Promise<string | undefined> {
    try {
      return await resolveTarget(this.transport, target);
    } catch (err) {
      const explanation = notOnNetwork(err, target, hint);
      if (explanation === undefined) throw err;
      ctx.reply(explanation);
      return undefined;
    }
  }

  private readDefaultTime(): number | null {
    const parsed = DefaultTimeSchema.safeParse(this.config.get('defaulttime'));
    const value = parsed.success ? parsed.data : undefined;
    if (!parsed.success) {
      this.log.warn('ignoring malformed defaulttime setting');
    }
    if (value === undefined || value === null) return null;
    if (typeof value === 'number') return value;
    try {
      return parseTime(value, this.clock.now());
    } catch (err) {
      this.log.warn({ err, defaulttime: value }, 'ignoring unparseable defaulttime setting');
      return null;
    }
  }
}
