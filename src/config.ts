import fs from 'node:fs';
import { parse as parseToml, stringify as stringifyToml } from 'smol-toml';
import { z } from 'zod';
import { ConfigurationUnreadableError } from './errors.js';
import { getInstancePath, getPackagePath } from './paths.js';

const LogLevelSchema = z.enum(['minimal', 'debug', 'verbose']).default('debug');

export const ConfigSchema = z.object({
  core: z.object({
    plugins: z.array(z.string()).default([]),
  }).default({ plugins: [] }),
  // Legacy inline plugin settings. Migrated out to plugins/<name>.json on first access.
  plugin_config: z.record(z.string(), z.record(z.string(), z.unknown())).optional(),
  command: z.object({
    prefix: z.string().min(1).default('!'),
  }).default({ prefix: '!' }),
  logging: z.object({
    level: LogLevelSchema,
  }).default({ level: 'debug' }),
  watch: z.object({
    enabled: z.boolean().default(true),
    debounceMs: z.number().int().positive().default(500),
  }).default({ enabled: true, debounceMs: 500 }),
});

export type Config = z.infer<typeof ConfigSchema>;

type Table = Record<string, unknown>;

function isTable(value: unknown): value is Table {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep-merge two plain objects. `override` values win over `base`.
 * Arrays and non-object values are replaced entirely, not merged.
 */
function deepMerge(base: Table, override: Table): Table {
  const result: Table = { ...base };
  for (const key of Object.keys(override)) {
    const baseVal = base[key];
    const overrideVal = override[key];
    if (isTable(baseVal) && isTable(overrideVal)) {
      result[key] = deepMerge(baseVal, overrideVal);
    } else {
      result[key] = overrideVal;
    }
  }
  return result;
}

function validate(file: string, merged: Table): Config {
  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new Error(`${file} is invalid:\n${issues}`);
  }
  return result.data;
}

/**
 * The master config.toml. Keeps the user's own table separately from the
 * merged view so that saving never writes package defaults into the file.
 */
export class MasterConfig {
  private _config: Config;

  constructor(
    readonly file: string,
    private raw: Table,
    private defaults: Table = {},
  ) {
    this._config = validate(file, deepMerge(defaults, raw));
  }

  get config(): Config {
    return this._config;
  }

  get plugins(): string[] {
    return this._config.core.plugins;
  }

  /** Inline settings for a plugin left over in [plugin_config], if any. */
  legacyPluginConfig(name: string): Table | undefined {
    const section = this.raw['plugin_config'];
    if (!isTable(section)) return undefined;
    const entry = section[name];
    return isTable(entry) ? entry : undefined;
  }

  /**
   * Remove a plugin's inline section, and [plugin_config] itself once empty.
   * Saves only when something was removed. Returns whether the file changed.
   */
  dropLegacyPluginConfig(name: string): boolean {
    const section = this.raw['plugin_config'];
    if (!isTable(section)) return false;

    let changed = false;
    if (Object.hasOwn(section, name)) {
      delete section[name];
      changed = true;
    }
    if (Object.keys(section).length === 0) {
      delete this.raw['plugin_config'];
      changed = true;
    }
    if (changed) {
      this._config = validate(this.file, deepMerge(this.defaults, this.raw));
      this.save();
    }
    return changed;
  }

  save(): void {
    const tmp = `${this.file}~`;
    fs.writeFileSync(tmp, stringifyToml(this.raw) + '\n', 'utf8');
    fs.renameSync(tmp, this.file);
  }
}

function readToml(file: string): Table {
  let content: string;
  try {
    content = fs.readFileSync(file, 'utf8');
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to read ${file}: ${msg}`);
  }
  try {
    return parseToml(content);
  } catch (err) {
    throw new ConfigurationUnreadableError(file, { cause: err });
  }
}

export function loadConfig(
  file: string = getInstancePath('config.toml'),
  defaultsFile: string = getPackagePath('config.defaults.toml'),
): MasterConfig {
  // Package defaults are a fallback for missing user fields
  let defaults: Table = {};
  if (fs.existsSync(defaultsFile)) {
    defaults = readToml(defaultsFile);
  }

  return new MasterConfig(file, readToml(file), defaults);
}
