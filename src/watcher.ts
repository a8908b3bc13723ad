import fs from 'node:fs';
import path from 'node:path';
import { watch, type FSWatcher } from 'chokidar';
import { systemClock, type Clock } from './clock.js';
import { Debouncer } from './debounce.js';
import { logger } from './logger.js';
import type { SaveListener } from './plugin-config.js';

export type ExternalEditHandler = (pluginName: string) => void;

export interface ConfigWatcherOptions {
  /** Directory holding the per-plugin <name>.json files. */
  configDir: string;
  debounceMs: number;
  onExternalEdit: ExternalEditHandler;
  usePolling?: boolean;
  clock?: Clock;
}

/**
 * Watches plugin config files and reports edits made by anything other than
 * the bot. Saves the bot makes itself are recorded through `recordSave` and
 * ignored when their change event comes back.
 */
export class ConfigWatcher {
  private lastWritten = new Map<string, string>();
  private readonly debouncer: Debouncer<string>;
  private watcher: FSWatcher | undefined;
  private readonly log = logger.child({ component: 'watcher' });

  constructor(private readonly options: ConfigWatcherOptions) {
    this.debouncer = new Debouncer<string>(options.debounceMs, options.clock ?? systemClock);
  }

  /** Pass to the plugin registry as its save listener. */
  readonly recordSave: SaveListener = (file, content) => {
    this.lastWritten.set(path.resolve(file), content);
  };

  start(): FSWatcher {
    const watcher = watch(this.options.configDir, {
      awaitWriteFinish: { stabilityThreshold: 300, pollInterval: 100 },
      ignoreInitial: true,
      usePolling: this.options.usePolling ?? false,
    });

    const queue = (filePath: string) => {
      if (!filePath.endsWith('.json')) return;
      this.debouncer.debounce(path.resolve(filePath), filePath, () => this.handleChange(filePath));
    };
    watcher.on('add', queue);
    watcher.on('change', queue);
    watcher.on('error', (err) => {
      this.log.error({ err }, 'config watcher error');
    });

    this.watcher = watcher;
    this.log.info({ dir: this.options.configDir }, 'watching plugin config files');
    return watcher;
  }

  /** Decide whether a changed file is an external edit, and report it. */
  handleChange(filePath: string): void {
    const file = path.resolve(filePath);
    let content: string;
    try {
      content = fs.readFileSync(file, 'utf8');
    } catch (err) {
      this.log.warn({ err, file }, 'changed config file could not be read');
      return;
    }

    if (this.lastWritten.get(file) === content) {
      this.log.debug({ file }, 'ignoring our own config save');
      return;
    }
    this.lastWritten.set(file, content);

    const pluginName = path.basename(file, '.json');
    this.log.info({ plugin: pluginName }, 'plugin config edited externally');
    try {
      this.options.onExternalEdit(pluginName);
    } catch (err) {
      this.log.error({ err, plugin: pluginName }, 'failed to apply edited plugin config');
    }
  }

  async close(): Promise<void> {
    this.debouncer.cancelAll();
    await this.watcher?.close();
    this.watcher = undefined;
  }
}
