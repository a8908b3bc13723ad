import { test, describe } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';
import { MasterConfig } from './config.js';
import { BotPlugin } from './plugin.js';
import { startBot } from './index.js';
import { ChannelAdmin } from './plugins/admin.js';
import { ChannelTopic } from './plugins/topic.js';
import type { PluginResolver } from './registry.js';
import { FakeClock, FakeNetwork, flush, invoke, tempDir } from './test-utils.js';

class Unstartable extends BotPlugin {
  async start(): Promise<void> {
    await super.start();
    throw new Error('cannot reach the network');
  }
}

const stopped: string[] = [];

class RecordingNetwork extends FakeNetwork {
  async stop(): Promise<void> {
    stopped.push(this.name);
    await super.stop();
  }
}

const modules: Record<string, Record<string, unknown>> = {
  ircop: { OpProvider: FakeNetwork, Recording: RecordingNetwork },
  admin: { ChannelAdmin },
  topic: { ChannelTopic },
  broken: { Unstartable },
};

const resolve: PluginResolver = async (moduleName, className) => modules[moduleName]?.[className];

function master(plugins: string[], watch = false): { master: MasterConfig; configDir: string } {
  const dir = tempDir();
  return {
    master: new MasterConfig(path.join(dir, 'config.toml'), {
      core: { plugins },
      logging: { level: 'minimal' },
      watch: { enabled: watch },
    }),
    configDir: path.join(dir, 'plugins'),
  };
}

describe('startBot', () => {
  test('loads the configured plugins and routes commands between them', async () => {
    const bot = await startBot({
      ...master(['ircop.OpProvider', 'admin.ChannelAdmin', 'topic.ChannelTopic']),
      resolve,
      clock: new FakeClock(),
    });
    try {
      assert.deepStrictEqual(bot.registry.loaded(), ['ircop.OpProvider', 'admin.ChannelAdmin', 'topic.ChannelTopic']);
      assert.strictEqual(bot.registry.isReady('admin.ChannelAdmin'), true);
      assert.strictEqual(bot.watcher, undefined);

      const network = bot.registry.get('ircop.OpProvider');
      assert.ok(network instanceof FakeNetwork);
      invoke(bot.transport, '#a', 'voice', 'bob');
      await flush();
      assert.deepStrictEqual(network.argsOf('op.voice'), [{ channel: '#a', target: 'bob' }]);
    } finally {
      await bot.shutdown();
    }
    assert.deepStrictEqual(bot.registry.loaded(), []);
  });

  test('a plugin that fails to load aborts startup and unloads the rest', async () => {
    const options = master(['ircop.Recording', 'broken.Unstartable', 'admin.ChannelAdmin']);
    await assert.rejects(startBot({ ...options, resolve, clock: new FakeClock() }), {
      message: 'cannot reach the network',
    });
    assert.deepStrictEqual(stopped, ['ircop.Recording']);
    assert.strictEqual(fs.existsSync(path.join(options.configDir, 'admin.ChannelAdmin.json')), false);
  });

  test('external config edits reload the plugin', async () => {
    const options = master(['ircop.OpProvider', 'admin.ChannelAdmin'], true);
    const clock = new FakeClock();
    const bot = await startBot({ ...options, resolve, clock });
    try {
      const { watcher } = bot;
      assert.ok(watcher);
      const admin = bot.registry.get('admin.ChannelAdmin');
      assert.ok(admin instanceof ChannelAdmin);

      const file = path.join(options.configDir, 'admin.ChannelAdmin.json');
      fs.writeFileSync(file, JSON.stringify({ laters: [[clock.now() / 1000 + 5, 'x!*@*', '#a', '-q']] }));
      watcher.handleChange(file);
      assert.deepStrictEqual(admin.pendingActions(), [
        { fireAt: clock.now() / 1000 + 5, param: 'x!*@*', channel: '#a', mode: '-q' },
      ]);
    } finally {
      await bot.shutdown();
    }
  });
});
