import { CommandPlugin, type ChannelCommandContext } from '../command.js';
import { errorMessage, isBotError } from '../errors.js';
import { TopicConsensus } from '../topic.js';

const POSITION_AND_TEXT = /^(?<pos>-?\d+)\s+(?<text>.+)$/;

/** The `topic` command group: edit the channel topic one `|`-separated part at a time. */
export class ChannelTopic extends CommandPlugin {
  readonly requires = ['ircop.OpProvider'];

  readonly consensus = new TopicConsensus(this.transport, this.clock, undefined, this.log);

  async start(): Promise<void> {
    await super.start();

    this.listenForEvent('topic.updated', (event) => {
      this.consensus.onObservedTopic(event.data.channel, event.data.topic);
    });

    this.installChannelCommand({
      group: 'topic',
      name: 'append',
      aliases: ['push', 'add'],
      usage: '<text>',
      argPattern: /^(?<text>.+)$/,
      help: 'Appends text to the end of the channel topic',
      handler: (ctx, args) => this.setting(ctx, this.consensus.append(ctx.channel, args.text ?? '')),
    });
    this.installChannelCommand({
      group: 'topic',
      name: 'insert',
      usage: '<pos> <text>',
      argPattern: POSITION_AND_TEXT,
      help: 'Inserts text into the topic at the given position',
      handler: (ctx, args) => this.setting(ctx, this.consensus.insert(ctx.channel, Number(args.pos), args.text ?? '')),
    });
    this.installChannelCommand({
      group: 'topic',
      name: 'replace',
      aliases: ['set'],
      usage: '<pos> <text>',
      argPattern: POSITION_AND_TEXT,
      help: 'Replaces the given part with the given text',
      handler: (ctx, args) => this.setting(ctx, this.consensus.replace(ctx.channel, Number(args.pos), args.text ?? '')),
    });
    this.installChannelCommand({
      group: 'topic',
      name: 'remove',
      usage: '<pos>',
      argPattern: /^(?<pos>-?\d+)$/,
      help: 'Removes the given part',
      handler: (ctx, args) => this.setting(ctx, this.consensus.remove(ctx.channel, Number(args.pos))),
    });
    this.installChannelCommand({
      group: 'topic',
      name: 'pop',
      help: 'Removes the last part',
      handler: (ctx) => this.setting(ctx, this.consensus.pop(ctx.channel)),
    });
    this.installChannelCommand({
      group: 'topic',
      name: 'undo',
      help: 'Reverts to the previous known topic',
      handler: async (ctx) => {
        if (this.consensus.history.size(ctx.channel) < 2) {
          ctx.reply("I don't know what the topic used to be. Cannot undo =(");
          return;
        }
        await this.setting(ctx, this.consensus.undo(ctx.channel));
      },
    });
  }

  async stop(): Promise<void> {
    this.consensus.stop();
    await super.stop();
  }

  /** Await a topic change, explaining a refused set. Other failures go to the command boundary. */
  private async setting(ctx: ChannelCommandContext, change: Promise<unknown>): Promise<void> {
    try {
      await change;
    } catch (err) {
      if (!isBotError(err, 'OPERATION_FAILED')) throw err;
      ctx.reply(`Channel is +t and I can't acquire op! Reason: ${errorMessage(err)}`);
    }
  }
}
