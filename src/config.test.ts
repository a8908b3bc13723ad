import { test } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';
import { parse as parseToml } from 'smol-toml';
import { ConfigSchema, MasterConfig, loadConfig } from './config.js';
import { ConfigurationUnreadableError } from './errors.js';
import { tempDir } from './test-utils.js';

test('empty config gets every default', () => {
  const result = ConfigSchema.safeParse({});
  assert.ok(result.success);
  assert.deepStrictEqual(result.data, {
    core: { plugins: [] },
    command: { prefix: '!' },
    logging: { level: 'debug' },
    watch: { enabled: true, debounceMs: 500 },
  });
});

test('unknown log level fails validation', () => {
  const result = ConfigSchema.safeParse({ logging: { level: 'loud' } });
  assert.ok(!result.success);
  const paths = result.error.issues.map((i) => i.path.join('.'));
  assert.deepStrictEqual(paths, ['logging.level']);
});

test('user config deep-merges over package defaults', () => {
  const dir = tempDir();
  const defaults = path.join(dir, 'defaults.toml');
  const file = path.join(dir, 'config.toml');
  fs.writeFileSync(defaults, '[core]\nplugins = ["admin.ChannelAdmin"]\n[watch]\ndebounceMs = 250\n');
  fs.writeFileSync(file, '[watch]\nenabled = false\n');

  const master = loadConfig(file, defaults);
  assert.deepStrictEqual(master.plugins, ['admin.ChannelAdmin']);
  assert.deepStrictEqual(master.config.watch, { enabled: false, debounceMs: 250 });
});

test('arrays from the user config replace default arrays', () => {
  const dir = tempDir();
  const defaults = path.join(dir, 'defaults.toml');
  const file = path.join(dir, 'config.toml');
  fs.writeFileSync(defaults, '[core]\nplugins = ["admin.ChannelAdmin", "topic.ChannelTopic"]\n');
  fs.writeFileSync(file, '[core]\nplugins = ["topic.ChannelTopic"]\n');

  assert.deepStrictEqual(loadConfig(file, defaults).plugins, ['topic.ChannelTopic']);
});

test('unparseable config raises ConfigurationUnreadableError', () => {
  const dir = tempDir();
  const file = path.join(dir, 'config.toml');
  fs.writeFileSync(file, '[core\nplugins = ');

  assert.throws(() => loadConfig(file, path.join(dir, 'missing.toml')), (err: unknown) => {
    assert.ok(err instanceof ConfigurationUnreadableError);
    assert.strictEqual(err.code, 'CONFIG_UNREADABLE');
    assert.strictEqual(err.file, file);
    return true;
  });
});

test('missing config file is a plain read error', () => {
  const dir = tempDir();
  const file = path.join(dir, 'config.toml');
  assert.throws(() => loadConfig(file, path.join(dir, 'missing.toml')), { message: /^Failed to read / });
});

test('dropLegacyPluginConfig removes the section and saves without defaults', () => {
  const dir = tempDir();
  const file = path.join(dir, 'config.toml');
  const raw = {
    core: { plugins: ['admin.ChannelAdmin'] },
    plugin_config: { 'admin.ChannelAdmin': { defaulttime: 600 } },
  };
  const master = new MasterConfig(file, raw, { logging: { level: 'verbose' } });

  assert.deepStrictEqual(master.legacyPluginConfig('admin.ChannelAdmin'), { defaulttime: 600 });
  assert.strictEqual(master.dropLegacyPluginConfig('admin.ChannelAdmin'), true);
  assert.strictEqual(master.legacyPluginConfig('admin.ChannelAdmin'), undefined);
  assert.strictEqual(master.config.plugin_config, undefined);

  const saved: unknown = JSON.parse(JSON.stringify(parseToml(fs.readFileSync(file, 'utf8'))));
  assert.deepStrictEqual(saved, { core: { plugins: ['admin.ChannelAdmin'] } });
  assert.strictEqual(fs.existsSync(`${file}~`), false);
});

test('dropLegacyPluginConfig keeps other plugins and is a no-op without a section', () => {
  const dir = tempDir();
  const file = path.join(dir, 'config.toml');
  const master = new MasterConfig(file, {
    plugin_config: { a: { x: 1 }, b: { y: 2 } },
  });

  assert.strictEqual(master.dropLegacyPluginConfig('a'), true);
  assert.deepStrictEqual(master.legacyPluginConfig('b'), { y: 2 });
  assert.strictEqual(master.dropLegacyPluginConfig('a'), false);

  const bare = new MasterConfig(path.join(dir, 'other.toml'), {});
  assert.strictEqual(bare.dropLegacyPluginConfig('a'), false);
  assert.strictEqual(fs.existsSync(path.join(dir, 'other.toml')), false);
});
