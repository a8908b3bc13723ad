import { loadConfig, type MasterConfig } from './config.js';
import { applyConfigLogLevel, logger, logTier } from './logger.js';
import { getInstancePath } from './paths.js';
import { PluginRegistry, type PluginResolver } from './registry.js';
import { EventBus } from './transport.js';
import { ConfigWatcher } from './watcher.js';
import type { Clock } from './clock.js';

export interface StartOptions {
  master: MasterConfig;
  /** Directory for per-plugin JSON configs. */
  configDir: string;
  resolve?: PluginResolver;
  clock?: Clock;
}

export interface Bot {
  transport: EventBus;
  registry: PluginRegistry;
  watcher: ConfigWatcher | undefined;
  shutdown(): Promise<void>;
}

/**
 * Wire the bus, registry and config watcher, and load every configured
 * plugin. A plugin that fails to load aborts startup: whatever loaded
 * before it is unloaded again and the error is rethrown.
 */
export async function startBot(options: StartOptions): Promise<Bot> {
  const { master, configDir } = options;
  const settings = master.config;
  applyConfigLogLevel(settings.logging.level);

  const transport = new EventBus();
  const watcher = settings.watch.enabled
    ? new ConfigWatcher({
        configDir,
        debounceMs: settings.watch.debounceMs,
        clock: options.clock,
        onExternalEdit: (name) => {
          if (registry.has(name)) registry.reload(name);
        },
      })
    : undefined;

  const registry = new PluginRegistry({
    transport,
    master,
    configDir,
    resolve: options.resolve,
    clock: options.clock,
    onConfigSaved: watcher?.recordSave,
  });

  try {
    await registry.loadAll();
  } catch (err) {
    await registry.unloadAll();
    throw err;
  }

  watcher?.start();

  return {
    transport,
    registry,
    watcher,
    async shutdown() {
      await watcher?.close();
      await registry.unloadAll();
    },
  };
}

/** `opsbot start`: run until SIGINT/SIGTERM. */
export async function main(): Promise<void> {
  let master: MasterConfig;
  try {
    master = loadConfig();
  } catch (err) {
    console.log('\n  opsbot — config load failed\n');
    logger.error({ err }, 'config load failed');
    process.exit(1);
  }

  let bot: Bot;
  try {
    bot = await startBot({ master, configDir: getInstancePath('plugins') });
  } catch (err) {
    console.log('\n  opsbot — startup aborted\n');
    logger.error({ err }, 'startup aborted');
    process.exit(1);
  }

  logger.info({ plugins: bot.registry.loaded(), logLevel: logTier }, 'opsbot started');

  let stopping = false;
  async function shutdown(): Promise<void> {
    if (stopping) return;
    stopping = true;
    logger.info('shutting down');
    await bot.shutdown();
    process.exit(0);
  }

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.error({ err }, 'shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}
