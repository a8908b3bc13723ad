import fs from 'node:fs';
import path from 'node:path';
import { systemClock, type Clock } from './clock.js';
import { PluginLoadError } from './errors.js';
import { logger } from './logger.js';
import { BotPlugin } from './plugin.js';
import { PluginConfig, serializeJson, type SaveListener } from './plugin-config.js';
import type { MasterConfig } from './config.js';
import type { PluginClass, PluginHost } from './plugin.js';
import type { Transport } from './transport.js';

/** Turns a `module.ClassName` plugin name into the class to construct. */
export type PluginResolver = (moduleName: string, className: string) => Promise<unknown>;

export interface PluginRegistryOptions {
  transport: Transport;
  master: MasterConfig;
  /** Directory holding one <plugin name>.json per plugin. */
  configDir: string;
  resolve?: PluginResolver;
  onConfigSaved?: SaveListener;
  clock?: Clock;
}

export interface PluginDescriptor {
  name: string;
  plugin: BotPlugin;
}

const PLUGIN_NAME = /^([a-z][\w-]*)\.([A-Za-z_]\w*)$/;

/** Default resolver: src/plugins/<module>.ts, named export <ClassName>. */
export const importPlugin: PluginResolver = async (moduleName, className) => {
  const mod: Record<string, unknown> = await import(new URL(`./plugins/${moduleName}.js`, import.meta.url).href);
  return mod[className];
};

function isPluginClass(value: unknown): value is PluginClass {
  return typeof value === 'function' && value.prototype instanceof BotPlugin;
}

/**
 * Loads, starts, stops and unloads plugins, and hands each its durable config.
 * Exactly one live instance per plugin name.
 */
export class PluginRegistry implements PluginHost {
  readonly clock: Clock;
  private loadedPlugins = new Map<string, PluginDescriptor>();
  private readonly transport: Transport;
  private readonly master: MasterConfig;
  private readonly configDir: string;
  private readonly resolve: PluginResolver;
  private readonly onConfigSaved?: SaveListener;
  private readonly log = logger.child({ component: 'registry' });

  constructor(options: PluginRegistryOptions) {
    this.transport = options.transport;
    this.master = options.master;
    this.configDir = options.configDir;
    this.resolve = options.resolve ?? importPlugin;
    this.onConfigSaved = options.onConfigSaved;
    this.clock = options.clock ?? systemClock;
    fs.mkdirSync(this.configDir, { recursive: true });
  }

  /** Load every plugin named in [core] plugins, in order. Stops at the first failure; earlier loads stay. */
  async loadAll(): Promise<void> {
    for (const name of this.master.plugins) {
      await this.load(name);
    }
  }

  async load(name: string): Promise<BotPlugin> {
    if (this.loadedPlugins.has(name)) {
      throw new PluginLoadError(name, `Plugin '${name}' is already loaded`);
    }

    const parsed = PLUGIN_NAME.exec(name);
    const moduleName = parsed?.[1];
    const className = parsed?.[2];
    if (moduleName === undefined || className === undefined) {
      throw new PluginLoadError(name, `Plugin name '${name}' must look like module.ClassName`);
    }

    let resolved: unknown;
    try {
      resolved = await this.resolve(moduleName, className);
    } catch (err) {
      throw new PluginLoadError(name, `Could not import plugin module '${moduleName}'`, { cause: err });
    }
    if (!isPluginClass(resolved)) {
      throw new PluginLoadError(name, `Module '${moduleName}' has no plugin class '${className}'`);
    }

    const plugin = new resolved(name, this.transport, this);
    try {
      plugin.reload();
      await plugin.start();
    } catch (err) {
      // Whatever start() managed to hook must not stay on the bus
      this.transport.unhookPlugin(plugin);
      this.log.error({ err, plugin: name }, 'plugin failed to start');
      throw err;
    }

    this.loadedPlugins.set(name, { name, plugin });

    const missing = this.missingDependencies(plugin);
    if (missing.length > 0) {
      this.log.warn({ plugin: name, missing }, 'plugin loaded without its dependencies');
    }
    this.log.info({ plugin: name }, 'plugin loaded');
    return plugin;
  }

  async unload(name: string): Promise<void> {
    const descriptor = this.loadedPlugins.get(name);
    if (!descriptor) {
      throw new PluginLoadError(name, `Plugin '${name}' is not loaded`);
    }
    this.loadedPlugins.delete(name);
    // Unhook before stop so nothing arrives mid-stop
    this.transport.unhookPlugin(descriptor.plugin);
    await descriptor.plugin.stop();
    this.log.info({ plugin: name }, 'plugin unloaded');
  }

  /** Unload everything in reverse load order. Errors are logged, never thrown. */
  async unloadAll(): Promise<void> {
    for (const name of [...this.loadedPlugins.keys()].reverse()) {
      try {
        await this.unload(name);
      } catch (err) {
        this.log.error({ err, plugin: name }, 'failed to unload plugin');
      }
    }
  }

  /** Tell a loaded plugin its configuration changed. */
  reload(name: string): void {
    const descriptor = this.loadedPlugins.get(name);
    if (!descriptor) {
      throw new PluginLoadError(name, `Plugin '${name}' is not loaded`);
    }
    descriptor.plugin.reload();
    this.log.info({ plugin: name }, 'plugin reloaded');
  }

  get commandPrefix(): string {
    return this.master.config.command.prefix;
  }

  get(name: string): BotPlugin | undefined {
    return this.loadedPlugins.get(name)?.plugin;
  }

  has(name: string): boolean {
    return this.loadedPlugins.has(name);
  }

  /** Names of loaded plugins in load order. */
  loaded(): string[] {
    return [...this.loadedPlugins.keys()];
  }

  /** Started, with every declared dependency loaded. */
  isReady(name: string): boolean {
    const plugin = this.get(name);
    return plugin !== undefined && plugin.state === 'started' && this.missingDependencies(plugin).length === 0;
  }

  configPath(name: string): string {
    return path.join(this.configDir, `${name}.json`);
  }

  /**
   * The plugin's own JSON config. On first access, settings left inline in
   * the master config's [plugin_config] move into the plugin file and the
   * master config is saved without them.
   */
  getPluginConfig(name: string): PluginConfig {
    const file = this.configPath(name);

    if (!fs.existsSync(file)) {
      const legacy = this.master.legacyPluginConfig(name) ?? {};
      fs.writeFileSync(file, serializeJson(legacy), 'utf8');
    }
    if (this.master.dropLegacyPluginConfig(name)) {
      this.log.info({ plugin: name }, 'moved inline plugin config out of the master config');
    }

    return new PluginConfig(file, this.onConfigSaved);
  }

  private missingDependencies(plugin: BotPlugin): string[] {
    return plugin.requires.filter((dep) => !this.loadedPlugins.has(dep));
  }
}
