import { test, describe } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';
import { MasterConfig } from './config.js';
import { PluginLoadError, isBotError } from './errors.js';
import { makeEvent } from './events.js';
import { BotPlugin, isEventOf } from './plugin.js';
import { PluginRegistry, type PluginResolver } from './registry.js';
import { EventBus } from './transport.js';
import { FakeClock, tempDir } from './test-utils.js';

// ── Test helpers ────────────────────────────────────────────────

const started: string[] = [];
const strayCalls: string[] = [];

class Echo extends BotPlugin {
  reloads = 0;

  reload(): void {
    super.reload();
    this.reloads++;
  }

  async start(): Promise<void> {
    await super.start();
    started.push(this.name);
    this.listenForEvent('topic.updated', (event) => {
      this.sendMessage(event.data.channel, `topic is ${event.data.topic}`);
    });
  }
}

class Dependent extends BotPlugin {
  readonly requires = ['echo.Echo'];
}

class FailsToStart extends BotPlugin {
  async start(): Promise<void> {
    await super.start();
    this.listenForEvent('topic.updated', (event) => {
      strayCalls.push(event.data.topic);
    });
    throw new Error('no network');
  }
}

const modules: Record<string, Record<string, unknown>> = {
  echo: { Echo },
  dependent: { Dependent },
  broken: { FailsToStart, NotAPlugin: class {} },
};

const resolve: PluginResolver = async (moduleName, className) => {
  const mod = modules[moduleName];
  if (!mod) throw new Error(`Cannot find module '${moduleName}'`);
  return mod[className];
};

function setup(raw: Record<string, unknown> = {}) {
  const dir = tempDir();
  const master = new MasterConfig(path.join(dir, 'config.toml'), raw);
  const transport = new EventBus();
  const saved: string[] = [];
  const registry = new PluginRegistry({
    transport,
    master,
    configDir: path.join(dir, 'plugins'),
    resolve,
    clock: new FakeClock(),
    onConfigSaved: (file) => saved.push(file),
  });
  return { dir, master, transport, registry, saved };
}

async function rejectsWithLoadError(promise: Promise<unknown>, message: RegExp): Promise<void> {
  await assert.rejects(promise, (err: unknown) => {
    assert.ok(err instanceof PluginLoadError);
    assert.match(err.message, message);
    return true;
  });
}

describe('load', () => {
  test('constructs, configures and starts the plugin', async () => {
    const { registry } = setup();
    const plugin = await registry.load('echo.Echo');

    assert.ok(plugin instanceof Echo);
    assert.strictEqual(plugin.state, 'started');
    assert.strictEqual(plugin.reloads, 1);
    assert.deepStrictEqual(registry.loaded(), ['echo.Echo']);
    assert.strictEqual(registry.get('echo.Echo'), plugin);
    assert.strictEqual(registry.isReady('echo.Echo'), true);
  });

  test('loaded plugins are hooked into the bus', async () => {
    const { registry, transport } = setup();
    await registry.load('echo.Echo');
    const messages: string[] = [];
    transport.listenForEvent('message.send', {
      name: 'listener',
      state: 'started',
      receivedEvent: (event) => {
        if (isEventOf(event, 'message.send')) messages.push(JSON.stringify(event.data));
      },
      receivedMiddlewareEvent: (event) => event,
      incomingRequest: () => Promise.reject(new Error('unused')),
    });

    transport.sendEvent(makeEvent('topic.updated', { channel: '#a', topic: 'hello' }));
    assert.deepStrictEqual(messages, ['{"target":"#a","message":"topic is hello"}']);
  });

  test('a second load of the same name is refused', async () => {
    const { registry } = setup();
    await registry.load('echo.Echo');
    await rejectsWithLoadError(registry.load('echo.Echo'), /already loaded/);
  });

  test('malformed names, missing modules and non-plugin exports are refused', async () => {
    const { registry } = setup();
    await rejectsWithLoadError(registry.load('Echo'), /must look like module.ClassName/);
    await rejectsWithLoadError(registry.load('missing.Thing'), /Could not import plugin module 'missing'/);
    await rejectsWithLoadError(registry.load('echo.Missing'), /has no plugin class 'Missing'/);
    await rejectsWithLoadError(registry.load('broken.NotAPlugin'), /has no plugin class 'NotAPlugin'/);
    assert.deepStrictEqual(registry.loaded(), []);
  });

  test('a plugin that fails to start is not registered and leaves no hooks', async () => {
    const { registry, transport } = setup();
    await assert.rejects(registry.load('broken.FailsToStart'), { message: 'no network' });
    assert.strictEqual(registry.has('broken.FailsToStart'), false);

    strayCalls.length = 0;
    transport.sendEvent(makeEvent('topic.updated', { channel: '#a', topic: 'x' }));
    assert.deepStrictEqual(strayCalls, []);
  });

  test('missing dependencies do not block loading but keep the plugin unready', async () => {
    const { registry } = setup();
    await registry.load('dependent.Dependent');
    assert.strictEqual(registry.isReady('dependent.Dependent'), false);
    await registry.load('echo.Echo');
    assert.strictEqual(registry.isReady('dependent.Dependent'), true);
  });
});

describe('loadAll / unload', () => {
  test('loadAll loads [core] plugins in order', async () => {
    started.length = 0;
    const { registry } = setup({ core: { plugins: ['echo.Echo', 'dependent.Dependent'] } });
    await registry.loadAll();
    assert.deepStrictEqual(registry.loaded(), ['echo.Echo', 'dependent.Dependent']);
    assert.deepStrictEqual(started, ['echo.Echo']);
  });

  test('loadAll stops at the first failure and keeps earlier plugins', async () => {
    const { registry } = setup({ core: { plugins: ['echo.Echo', 'broken.FailsToStart', 'dependent.Dependent'] } });
    await assert.rejects(registry.loadAll(), { message: 'no network' });
    assert.deepStrictEqual(registry.loaded(), ['echo.Echo']);
  });

  test('unload stops the plugin and frees the name', async () => {
    const { registry, transport } = setup();
    const plugin = await registry.load('echo.Echo');
    await registry.unload('echo.Echo');

    assert.strictEqual(plugin.state, 'stopped');
    assert.strictEqual(transport.hookCount(plugin), 0);
    assert.strictEqual(registry.has('echo.Echo'), false);

    const again = await registry.load('echo.Echo');
    assert.notStrictEqual(again, plugin);
  });

  test('unloading an unknown plugin is a PluginLoadError', async () => {
    const { registry } = setup();
    await rejectsWithLoadError(registry.unload('echo.Echo'), /is not loaded/);
  });

  test('unloadAll empties the registry', async () => {
    const { registry } = setup({ core: { plugins: ['echo.Echo', 'dependent.Dependent'] } });
    await registry.loadAll();
    await registry.unloadAll();
    assert.deepStrictEqual(registry.loaded(), []);
  });

  test('reload re-reads the plugin config', async () => {
    const { registry } = setup();
    const plugin = await registry.load('echo.Echo');
    assert.ok(plugin instanceof Echo);
    fs.writeFileSync(registry.configPath('echo.Echo'), '{"greeting": "hi"}');

    registry.reload('echo.Echo');
    assert.strictEqual(plugin.reloads, 2);
    assert.strictEqual(plugin.config.get('greeting'), 'hi');
    assert.strictEqual(plugin.state, 'started');
    assert.throws(() => registry.reload('dependent.Dependent'), (err: unknown) => isBotError(err, 'PLUGIN_LOAD_FAILED'));
  });
});

describe('plugin config', () => {
  test('first access creates an empty JSON file', () => {
    const { registry } = setup();
    const config = registry.getPluginConfig('echo.Echo');
    assert.deepStrictEqual(config.keys(), []);
    assert.strictEqual(fs.readFileSync(registry.configPath('echo.Echo'), 'utf8'), '{}\n');
  });

  test('inline [plugin_config] settings move into the plugin file', () => {
    const { registry, master } = setup({
      core: { plugins: [] },
      plugin_config: { 'echo.Echo': { greeting: 'hello', laters: [] } },
    });
    const config = registry.getPluginConfig('echo.Echo');

    assert.strictEqual(config.get('greeting'), 'hello');
    assert.deepStrictEqual(JSON.parse(fs.readFileSync(registry.configPath('echo.Echo'), 'utf8')), { greeting: 'hello', laters: [] });
    assert.strictEqual(master.legacyPluginConfig('echo.Echo'), undefined);
    assert.strictEqual(fs.readFileSync(master.file, 'utf8').includes('plugin_config'), false);
  });

  test('saves through a plugin config reach the save listener', () => {
    const { registry, saved } = setup();
    const config = registry.getPluginConfig('echo.Echo');
    config.set('greeting', 'hi');
    config.save();
    assert.deepStrictEqual(saved, [registry.configPath('echo.Echo')]);
  });

  test('the command prefix comes from the master config', () => {
    assert.strictEqual(setup().registry.commandPrefix, '!');
    assert.strictEqual(setup({ command: { prefix: '.' } }).registry.commandPrefix, '.');
  });
});
