import os from 'node:os';
import path from 'node:path';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';

/**
 * Central path resolver. Two path domains:
 *
 * 1. Instance  (OPSBOT_HOME env var, default ~/.opsbot/)
 *    config.toml, .env, per-plugin JSON configs under plugins/.
 *
 * 2. Package   (import.meta.url)
 *    Compiled bot code and config.defaults.toml. Nothing user-facing.
 */

// Package root: src/paths.ts → ../
const PACKAGE_ROOT = fileURLToPath(new URL('../', import.meta.url));

let _instanceRoot: string | undefined;

/**
 * Resolve the instance root directory.
 *
 * Priority: OPSBOT_HOME env var → ~/.opsbot/ default.
 * Errors if the resolved directory does not exist.
 */
export function getInstanceRoot(): string {
  if (_instanceRoot !== undefined) return _instanceRoot;

  const fromEnv = process.env.OPSBOT_HOME;
  const resolved = fromEnv
    ? path.resolve(fromEnv)
    : path.join(os.homedir(), '.opsbot');

  if (!fs.existsSync(resolved)) {
    throw new Error(
      `Instance root not found at ${resolved}. ` +
      (fromEnv
        ? 'Check that OPSBOT_HOME points to an existing directory.'
        : 'Set OPSBOT_HOME or create ~/.opsbot/ with a config.toml.'),
    );
  } else if (!fs.statSync(resolved).isDirectory()) {
    throw new Error(`Instance root ${resolved} is not a directory.`);
  }

  _instanceRoot = resolved;
  return _instanceRoot;
}

/**
 * Join path segments under the instance root.
 * e.g. getInstancePath('plugins') → ~/.opsbot/plugins
 */
export function getInstancePath(...segments: string[]): string {
  return path.join(getInstanceRoot(), ...segments);
}

/**
 * Join path segments under the package root.
 * e.g. getPackagePath('package.json')
 */
export function getPackagePath(...segments: string[]): string {
  return path.join(PACKAGE_ROOT, ...segments);
}
