import fs from 'node:fs';
import { ConfigurationUnreadableError } from './errors.js';

export type SaveListener = (file: string, content: string) => void;

/**
 * A plugin's durable settings, backed by one JSON file. Values are kept as
 * plain JSON; callers validate what they read.
 */
export class PluginConfig {
  private data: Record<string, unknown>;

  constructor(readonly file: string, private onSave?: SaveListener) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(file, 'utf8'));
    } catch (err) {
      throw new ConfigurationUnreadableError(file, { cause: err });
    }
    if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new ConfigurationUnreadableError(file);
    }
    this.data = Object.fromEntries(Object.entries(parsed));
  }

  get(key: string): unknown {
    return this.data[key];
  }

  has(key: string): boolean {
    return Object.hasOwn(this.data, key);
  }

  set(key: string, value: unknown): void {
    this.data[key] = value;
  }

  delete(key: string): void {
    delete this.data[key];
  }

  keys(): string[] {
    return Object.keys(this.data);
  }

  /** Write to a sibling temp file, then rename over the original. */
  save(): void {
    const content = serializeJson(this.data);
    const tmp = `${this.file}~`;
    fs.writeFileSync(tmp, content, 'utf8');
    fs.renameSync(tmp, this.file);
    this.onSave?.(this.file, content);
  }
}

export function serializeJson(value: unknown): string {
  return JSON.stringify(value, null, 2) + '\n';
}
