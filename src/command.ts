import { errorMessage, isBotError } from './errors.js';
import { BotPlugin } from './plugin.js';
import type { EventMap } from './events.js';

export interface CommandContext {
  channel: string | null;
  /** Full nick!user@host of the invoking user. */
  user: string;
  nick: string;
  reply(message: string): void;
}

export interface ChannelCommandContext extends CommandContext {
  channel: string;
}

/** Named groups of the argument pattern. Optional groups that did not participate are undefined. */
export type CommandArgs = Record<string, string | undefined>;

export interface CommandDefinition<C extends CommandContext = CommandContext> {
  name: string;
  aliases?: string[];
  /** Subcommand of a group, e.g. "append" in "topic append <text>". */
  group?: string;
  usage?: string;
  /** Applied to the trimmed argument string. Omitted: any arguments are accepted. */
  argPattern?: RegExp;
  help?: string;
  handler: (ctx: C, args: CommandArgs) => void | Promise<void>;
}

interface InstalledCommand {
  names: string[];
  group?: string;
  definition: CommandDefinition<CommandContext>;
  run: (ctx: CommandContext, args: CommandArgs) => void | Promise<void>;
}

export function nickOf(user: string): string {
  return user.split('!', 1)[0] ?? user;
}

/**
 * A plugin that answers chat commands. Commands arrive as command.invoked
 * events, already authorized by the front end that produced them.
 */
export abstract class CommandPlugin extends BotPlugin {
  private commands: InstalledCommand[] = [];

  async start(): Promise<void> {
    await super.start();
    this.listenForEvent('command.invoked', (event) => this.dispatchCommand(event.data));
  }

  async stop(): Promise<void> {
    this.commands = [];
    await super.stop();
  }

  protected installCommand(definition: CommandDefinition): void {
    this.commands.push({
      names: [definition.name, ...(definition.aliases ?? [])].map((n) => n.toLowerCase()),
      group: definition.group?.toLowerCase(),
      definition,
      run: definition.handler,
    });
  }

  /** Install a command that only makes sense inside a channel. */
  protected installChannelCommand(definition: CommandDefinition<ChannelCommandContext>): void {
    const { handler, ...rest } = definition;
    this.installCommand({
      ...rest,
      handler: (ctx, args) => {
        const channel = ctx.channel;
        if (channel === null) {
          ctx.reply('That command only works in a channel');
          return;
        }
        return handler({ ...ctx, channel }, args);
      },
    });
  }

  private async dispatchCommand(data: EventMap['command.invoked']): Promise<void> {
    const found = this.findCommand(data.command, data.args);
    if (!found) return;
    const { command, rest } = found;

    const nick = nickOf(data.user);
    const ctx: CommandContext = {
      channel: data.channel,
      user: data.user,
      nick,
      reply: (message) => this.sendMessage(data.channel ?? nick, message),
    };

    let args: CommandArgs = {};
    const pattern = command.definition.argPattern;
    if (pattern) {
      const match = pattern.exec(rest);
      if (!match) {
        const label = command.group ? `${command.group} ${command.definition.name}` : command.definition.name;
        ctx.reply(`Usage: ${this.host.commandPrefix}${label} ${command.definition.usage ?? ''}`.trimEnd());
        return;
      }
      args = { ...match.groups };
    }

    try {
      await command.run(ctx, args);
    } catch (err) {
      if (isBotError(err)) {
        ctx.reply(err.message);
        return;
      }
      this.log.error({ err, command: data.command }, 'command failed');
      ctx.reply(`Something went wrong: ${errorMessage(err)}`);
    }
  }

  private findCommand(command: string, args: string): { command: InstalledCommand; rest: string } | undefined {
    const name = command.toLowerCase();
    const trimmed = args.trim();
    const first = trimmed.split(/\s+/, 1)[0] ?? '';
    const sub = first.toLowerCase();

    for (const installed of this.commands) {
      if (installed.group !== undefined) {
        if (installed.group === name && installed.names.includes(sub)) {
          return { command: installed, rest: trimmed.slice(first.length).trim() };
        }
      } else if (installed.names.includes(name)) {
        return { command: installed, rest: trimmed };
      }
    }
    return undefined;
  }
}
